import type { BrowserDriver } from "../driver";
import type { LoadFeedOptions, LoadFeedResult } from "../../domain/scrape-types";
import { NavigationError } from "../../core/errors";
import { logger } from "../../core/logger";
import { postLocator } from "./selectors";

const DEFAULT_RENDER_TIMEOUT_MS = 10_000;

/**
 * Opens the feed, waits for the client-rendered posts and spends a fixed scroll
 * budget on it. A feed that renders nothing in time is treated as empty. With
 * idleScrollLimit set, it stops once that many consecutive passes added no
 * post element.
 */
export async function loadFeed(
  driver: BrowserDriver,
  targetUrl: string,
  options: LoadFeedOptions,
): Promise<LoadFeedResult> {
  const idleScrollLimit = options.idleScrollLimit ?? 0;
  logger.info({ targetUrl, numScrolls: options.numScrolls, scrollPauseMs: options.scrollPauseMs }, "Loading feed");

  try {
    await driver.goto(targetUrl);
  } catch (error) {
    throw new NavigationError(`Failed to open ${targetUrl}`, "FEED_NAVIGATION_FAILED", { cause: error });
  }

  const renderTimeoutMs = options.renderTimeoutMs ?? DEFAULT_RENDER_TIMEOUT_MS;
  const rendered = await driver.waitForSelector(postLocator.any("POST_ITEM"), renderTimeoutMs);
  if (!rendered) {
    logger.info({ targetUrl, renderTimeoutMs }, "No post elements rendered");
  }

  let scrollsPerformed = 0;
  let idlePasses = 0;
  let previousCount = idleScrollLimit > 0 ? (await postLocator.findAll(driver, "POST_ITEM")).length : 0;

  for (let pass = 0; pass < options.numScrolls; pass++) {
    await driver.scrollToBottom();
    await driver.pause(options.scrollPauseMs);
    scrollsPerformed++;

    if (idleScrollLimit <= 0) continue;

    const count = (await postLocator.findAll(driver, "POST_ITEM")).length;
    idlePasses = count > previousCount ? 0 : idlePasses + 1;
    previousCount = count;

    logger.debug({ pass, postElements: count, idlePasses }, "Scroll pass complete");

    if (idlePasses >= idleScrollLimit) {
      logger.info({ scrollsPerformed, postElements: count }, "Feed stopped growing, ending scroll early");
      return { scrollsPerformed, stoppedEarly: true };
    }
  }

  return { scrollsPerformed, stoppedEarly: false };
}
