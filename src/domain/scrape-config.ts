import type { Env } from "../core/config";
import { ConfigError } from "../core/errors";
import { companySlugFromUrl } from "../core/normalize";
import { ScrapeConfigSchema, type ScrapeConfig } from "./models";

export interface ScrapeConfigOverrides {
  companyUrl: string;
  companyName?: string;
  numScrolls?: number;
  scrollPauseSeconds?: number;
  maxComments?: number;
  idleScrollLimit?: number;
  outputDir?: string;
  headless?: boolean;
}

/**
 * Merges environment defaults with per-run overrides into a validated, frozen
 * config. Missing credentials or a URL without a /company/ segment raise a
 * ConfigError before any browser starts.
 */
export function buildScrapeConfig(source: Env, overrides: ScrapeConfigOverrides): ScrapeConfig {
  const companyName = overrides.companyName ?? companySlugFromUrl(overrides.companyUrl);
  if (!companyName) {
    throw new ConfigError(`Cannot derive a company name from ${overrides.companyUrl}`);
  }

  const parsed = ScrapeConfigSchema.safeParse({
    email: source.LINKEDIN_EMAIL ?? "",
    password: source.LINKEDIN_PASSWORD ?? "",
    headless: overrides.headless ?? source.PLAYWRIGHT_HEADLESS,
    slowMo: source.PLAYWRIGHT_SLOW_MO,
    windowSize: { width: source.SCRAPER_WINDOW_WIDTH, height: source.SCRAPER_WINDOW_HEIGHT },
    numScrolls: overrides.numScrolls ?? source.SCRAPER_NUM_SCROLLS,
    scrollPauseMs: Math.round((overrides.scrollPauseSeconds ?? source.SCRAPER_SCROLL_PAUSE_SECONDS) * 1000),
    maxComments: overrides.maxComments ?? source.SCRAPER_MAX_COMMENTS,
    idleScrollLimit: overrides.idleScrollLimit ?? source.SCRAPER_IDLE_SCROLL_LIMIT,
    authTimeoutMs: source.SCRAPER_AUTH_TIMEOUT_MS,
    commentWaitMs: source.SCRAPER_COMMENT_WAIT_MS,
    feedWaitMs: source.SCRAPER_FEED_WAIT_MS,
    companyUrl: overrides.companyUrl,
    companyName,
    outputDir: overrides.outputDir ?? source.SCRAPER_OUTPUT_DIR,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid scrape configuration: ${issues.join("; ")}`);
  }

  return Object.freeze({ ...parsed.data, windowSize: Object.freeze(parsed.data.windowSize) });
}
