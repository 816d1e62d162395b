import type { BrowserDriver, DriverElement } from "../driver";
import type { CollectCommentOptions } from "../../domain/scrape-types";
import { logger } from "../../core/logger";
import { parseCommentTexts } from "./parsers";
import { commentLocator } from "./selectors";

const DEFAULT_MAX_EXPANSION_ROUNDS = 10;

async function expandComments(
  driver: BrowserDriver,
  post: DriverElement,
  options: CollectCommentOptions,
): Promise<void> {
  const maxRounds = options.maxExpansionRounds ?? DEFAULT_MAX_EXPANSION_ROUNDS;

  const openButton = await commentLocator.findFirst(post, "OPEN_BUTTON");
  if (openButton) {
    await openButton.click();
    await driver.pause(options.waitMs);
  }

  let previousVisible = -1;
  for (let round = 0; round < maxRounds; round++) {
    const visible = (await commentLocator.findAll(post, "COMMENT_ITEM")).length;
    if (visible >= options.maxComments || visible === previousVisible) break;
    previousVisible = visible;

    const loadMore = await commentLocator.findFirst(post, "LOAD_MORE");
    if (!loadMore) break;

    await loadMore.click();
    await driver.pause(options.waitMs);
  }
}

/**
 * Reads up to maxComments comment texts from a post, expanding the comment
 * list first. Never throws: whatever could be read is returned.
 */
export async function extractComments(
  driver: BrowserDriver,
  post: DriverElement,
  options: CollectCommentOptions,
): Promise<string[]> {
  if (options.maxComments <= 0) return [];

  try {
    await expandComments(driver, post, options);
  } catch (error) {
    logger.debug({ error }, "Comment expansion failed, reading what is rendered");
  }

  try {
    return parseCommentTexts(await post.html(), options.maxComments);
  } catch (error) {
    logger.debug({ error }, "Failed to read comments");
    return [];
  }
}
