import type { ScrapeConfig } from "../domain/models";
import type { ScrapeRunResult } from "../domain/scrape-types";
import { PostCollector } from "../domain/post-collector";
import { logger } from "../core/logger";
import { performLogin } from "../platforms/linkedin/auth";
import { loadFeed } from "../platforms/linkedin/feed-loader";
import { extractPosts } from "../platforms/linkedin/post-extractor";
import { openSession, type BrowserSession, type SessionOpener } from "../services/browser-session";
import { buildPostsDocument, writePostsFile } from "../services/output-writer";

export interface RunnerDependencies {
  openSession: SessionOpener;
  now: () => Date;
  loginUrl?: string;
}

export class CompanyScrapeRunner {
  private readonly deps: RunnerDependencies;

  constructor(
    private readonly config: ScrapeConfig,
    deps: Partial<RunnerDependencies> = {},
  ) {
    this.deps = {
      openSession: deps.openSession ?? openSession,
      now: deps.now ?? (() => new Date()),
      loginUrl: deps.loginUrl,
    };
  }

  async run(): Promise<ScrapeRunResult> {
    const { config } = this;
    logger.info({ companyName: config.companyName, companyUrl: config.companyUrl }, "Starting company scrape");

    let session: BrowserSession | null = null;
    try {
      session = await this.deps.openSession(config);
      const { driver } = session;

      await performLogin(
        driver,
        { email: config.email, password: config.password },
        { timeoutMs: config.authTimeoutMs, loginUrl: this.deps.loginUrl },
      );

      const feed = await loadFeed(driver, config.companyUrl, {
        numScrolls: config.numScrolls,
        scrollPauseMs: config.scrollPauseMs,
        idleScrollLimit: config.idleScrollLimit,
        renderTimeoutMs: config.feedWaitMs,
      });

      const collector = new PostCollector();
      const batch = await extractPosts(
        driver,
        { maxComments: config.maxComments, commentWaitMs: config.commentWaitMs },
        collector,
      );

      const document = buildPostsDocument({
        companyName: config.companyName,
        sourceUrl: config.companyUrl,
        posts: collector.records(),
        now: this.deps.now(),
      });
      const outputPath = await writePostsFile(document, { outputDir: config.outputDir });

      logger.info(
        {
          companyName: config.companyName,
          postsWritten: document.post_count,
          elementsFound: batch.elementsFound,
          warnings: batch.warnings.length,
          scrollsPerformed: feed.scrollsPerformed,
          stoppedEarly: feed.stoppedEarly,
          outputPath,
        },
        "Company scrape completed",
      );

      return {
        outputPath,
        postsWritten: document.post_count,
        warnings: batch.warnings,
        scrollsPerformed: feed.scrollsPerformed,
      };
    } finally {
      if (session) await session.close();
    }
  }
}
