import { InvalidArgumentError, type Command } from "commander";
import { env, type Env } from "../../core/config";
import { logger } from "../../core/logger";
import { describeError, resolveExitCode, EXIT_OK } from "../../core/errors";
import { buildScrapeConfig, type ScrapeConfigOverrides } from "../../domain/scrape-config";
import { CompanyScrapeRunner, type RunnerDependencies } from "../../orchestration/company-scrape-runner";

export interface ScrapeCommandOptions {
  companyUrl: string;
  companyName?: string;
  scrolls?: number;
  scrollPause?: number;
  maxComments?: number;
  idleScrolls?: number;
  outputDir?: string;
  headless?: boolean;
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative number of seconds.");
  }
  return parsed;
}

function toOverrides(options: ScrapeCommandOptions): ScrapeConfigOverrides {
  return {
    companyUrl: options.companyUrl,
    companyName: options.companyName,
    numScrolls: options.scrolls,
    scrollPauseSeconds: options.scrollPause,
    maxComments: options.maxComments,
    idleScrollLimit: options.idleScrolls,
    outputDir: options.outputDir,
    headless: options.headless,
  };
}

/** Runs one scrape and maps the outcome to a process exit code. */
export async function runScrapeCommand(
  options: ScrapeCommandOptions,
  source: Env = env,
  deps: Partial<RunnerDependencies> = {},
): Promise<number> {
  try {
    const config = buildScrapeConfig(source, toOverrides(options));
    const result = await new CompanyScrapeRunner(config, deps).run();

    if (result.warnings.length > 0) {
      logger.warn({ warnings: result.warnings }, "Some posts were skipped");
    }
    logger.info({ outputPath: result.outputPath, postsWritten: result.postsWritten }, "Scrape finished");
    return EXIT_OK;
  } catch (error) {
    logger.error({ error: describeError(error) }, "Scrape failed");
    return resolveExitCode(error);
  }
}

export const commands = (program: Command) => {
  program
    .command("scrape")
    .description("Scrape recent posts from a LinkedIn company page into a JSON file")
    .requiredOption("--company-url <url>", "Company posts page, e.g. https://www.linkedin.com/company/acme/posts/")
    .option("--company-name <name>", "Name used in the output file (defaults to the URL slug)")
    .option("--scrolls <n>", "Number of scroll passes", parseNonNegativeInt)
    .option("--scroll-pause <seconds>", "Pause after each scroll pass", parseSeconds)
    .option("--max-comments <n>", "Comments to keep per post", parseNonNegativeInt)
    .option("--idle-scrolls <n>", "Stop after this many passes without new posts (0 disables)", parseNonNegativeInt)
    .option("--output-dir <dir>", "Directory for the output file")
    .option("--headless", "Run the browser without a window")
    .option("--no-headless", "Show the browser window")
    .action(async (options: ScrapeCommandOptions) => {
      const exitCode = await runScrapeCommand(options);
      process.exit(exitCode);
    });
};
