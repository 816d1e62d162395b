import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { CompanyScrapeRunner } from "../../src/orchestration/company-scrape-runner";
import { runScrapeCommand } from "../../src/cli/commands/scrape";
import { buildScrapeConfig } from "../../src/domain/scrape-config";
import { readPostsFile } from "../../src/services/output-writer";
import type { SessionOpener } from "../../src/services/browser-session";
import { FakeDriver } from "../support/fake-driver";
import { testEnv } from "../support/env";
import {
  COMPANY_URL,
  FEED_URL,
  HOME_FEED_HTML,
  LOGIN_PAGE_HTML,
  LOGIN_URL,
  feedHtml,
  staticPosts,
} from "../support/fixtures";

const RUN_TIME = new Date(2024, 0, 15, 9, 30, 0);

function loggedInDriver(postCount: number): FakeDriver {
  return new FakeDriver()
    .route(LOGIN_URL, LOGIN_PAGE_HTML)
    .route(COMPANY_URL, feedHtml(staticPosts(postCount)))
    .onSubmit((d) => d.show(FEED_URL, HOME_FEED_HTML));
}

function sessionFor(driver: FakeDriver): { opener: SessionOpener; opened: () => number; closed: () => number } {
  let opened = 0;
  let closed = 0;
  const opener: SessionOpener = async () => {
    opened++;
    return {
      driver,
      close: async () => {
        closed++;
      },
    };
  };
  return { opener, opened: () => opened, closed: () => closed };
}

describe("Company scrape run", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "company-posts-run-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should write every post of a static feed without comments", async () => {
    const driver = loggedInDriver(5);
    const session = sessionFor(driver);
    const config = buildScrapeConfig(testEnv(), {
      companyUrl: COMPANY_URL,
      numScrolls: 2,
      scrollPauseSeconds: 0,
      maxComments: 0,
      outputDir: dir,
    });

    const result = await new CompanyScrapeRunner(config, { openSession: session.opener, now: () => RUN_TIME }).run();

    expect(result.outputPath).toBe(join(dir, "acme-robotics_posts_20240115_093000.json"));
    expect(result.postsWritten).toBe(5);
    expect(result.scrollsPerformed).toBe(2);
    expect(result.warnings).toEqual([]);
    expect(driver.scrolls).toBe(2);
    expect(session.closed()).toBe(1);

    const document = await readPostsFile(result.outputPath);
    expect(document.company_name).toBe("acme-robotics");
    expect(document.timestamp).toBe("20240115_093000");
    expect(document.source_url).toBe(COMPANY_URL);
    expect(document.post_count).toBe(5);
    expect(document.posts.map((p) => p.comment_texts)).toEqual([[], [], [], [], []]);
    expect(document.posts[0]).toEqual({
      text: "Update number 1 from the robotics team",
      likes: "10",
      comments: "1",
      shares: "0",
      images: [],
      videos: [],
      comment_texts: [],
    });
  });

  it("should keep feed order and collect comments when enabled", async () => {
    const driver = loggedInDriver(3);
    const session = sessionFor(driver);
    const config = buildScrapeConfig(testEnv(), {
      companyUrl: COMPANY_URL,
      numScrolls: 0,
      maxComments: 15,
      outputDir: dir,
    });

    const result = await new CompanyScrapeRunner(config, { openSession: session.opener, now: () => RUN_TIME }).run();
    const document = await readPostsFile(result.outputPath);

    expect(document.posts.map((p) => p.text)).toEqual([
      "Update number 1 from the robotics team",
      "Update number 2 from the robotics team",
      "Update number 3 from the robotics team",
    ]);
    expect(document.posts.map((p) => p.comment_texts)).toEqual([["Great news 1"], ["Great news 2"], ["Great news 3"]]);
  });

  it("should close the session when the output cannot be written", async () => {
    const driver = loggedInDriver(1);
    const session = sessionFor(driver);
    const blocker = join(dir, "blocker");
    await writeFile(blocker, "not a directory");
    const config = buildScrapeConfig(testEnv(), {
      companyUrl: COMPANY_URL,
      numScrolls: 0,
      maxComments: 0,
      outputDir: join(blocker, "out"),
    });

    const run = new CompanyScrapeRunner(config, { openSession: session.opener, now: () => RUN_TIME }).run();

    await expect(run).rejects.toMatchObject({ code: "OUTPUT_WRITE_FAILED" });
    expect(session.closed()).toBe(1);
  });

  describe("scrape command", () => {
    it("should exit with zero after a completed run", async () => {
      const session = sessionFor(loggedInDriver(2));

      const exitCode = await runScrapeCommand(
        { companyUrl: COMPANY_URL, scrolls: 1, scrollPause: 0, maxComments: 0, outputDir: dir },
        testEnv(),
        { openSession: session.opener, now: () => RUN_TIME },
      );

      expect(exitCode).toBe(0);
      expect(await readdir(dir)).toEqual(["acme-robotics_posts_20240115_093000.json"]);
    });

    it("should exit non-zero and write nothing when the login form is missing", async () => {
      const driver = new FakeDriver()
        .route(LOGIN_URL, "<html><body><h1>Let's do a quick security check</h1></body></html>")
        .route(COMPANY_URL, feedHtml(staticPosts(5)));
      const session = sessionFor(driver);

      const exitCode = await runScrapeCommand(
        { companyUrl: COMPANY_URL, scrolls: 2, maxComments: 0, outputDir: dir },
        testEnv(),
        { openSession: session.opener, now: () => RUN_TIME },
      );

      expect(exitCode).toBe(1);
      expect(await readdir(dir)).toEqual([]);
      expect(driver.visited).toEqual([LOGIN_URL]);
      expect(session.closed()).toBe(1);
    });

    it("should exit non-zero before opening a browser when credentials are missing", async () => {
      const session = sessionFor(loggedInDriver(1));

      const exitCode = await runScrapeCommand(
        { companyUrl: COMPANY_URL, outputDir: dir },
        testEnv({ LINKEDIN_EMAIL: undefined }),
        { openSession: session.opener },
      );

      expect(exitCode).toBe(1);
      expect(session.opened()).toBe(0);
    });
  });
});
