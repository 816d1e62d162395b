import type { BrowserDriver, DriverElement } from "../driver";
import type { PostRecord } from "../../domain/models";
import type {
  ExtractedPost,
  ExtractionBatch,
  ExtractionResult,
  ExtractPostOptions,
} from "../../domain/scrape-types";
import { partitionResults } from "../../domain/scrape-types";
import { PostCollector } from "../../domain/post-collector";
import { computePostFingerprint } from "../../core/hash";
import { logger } from "../../core/logger";
import { extractComments } from "./comments";
import { parsePostHtml, type ParsedPost } from "./parsers";
import { postLocator } from "./selectors";

const TEXT_PREVIEW_LENGTH = 100;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function expandInlineText(driver: BrowserDriver, element: DriverElement, waitMs: number): Promise<void> {
  try {
    await element.scrollIntoView();
    const seeMore = await postLocator.findFirst(element, "SEE_MORE");
    if (seeMore) {
      await seeMore.click();
      await driver.pause(waitMs);
    }
  } catch (error) {
    logger.debug({ error }, "Could not expand post text");
  }
}

function toRecord(parsed: ParsedPost, commentTexts: string[]): PostRecord {
  return Object.freeze({
    text: parsed.text,
    likes: parsed.likes,
    comments: parsed.comments,
    shares: parsed.shares,
    images: Object.freeze([...parsed.images]),
    videos: Object.freeze([...parsed.videos]),
    comment_texts: Object.freeze([...commentTexts]),
  });
}

export async function extractPost(
  driver: BrowserDriver,
  element: DriverElement,
  index: number,
  options: ExtractPostOptions,
): Promise<ExtractionResult> {
  await expandInlineText(driver, element, options.commentWaitMs);

  const commentTexts = await extractComments(driver, element, {
    maxComments: options.maxComments,
    waitMs: options.commentWaitMs,
  });

  let html: string;
  try {
    html = await element.html();
  } catch (error) {
    return { ok: false, warning: { index, code: "POST_UNREADABLE", message: errorMessage(error) } };
  }

  let parsed: ParsedPost;
  try {
    parsed = parsePostHtml(html);
  } catch (error) {
    return { ok: false, warning: { index, code: "POST_PARSE_FAILED", message: errorMessage(error) } };
  }

  if (parsed.missingFields.length > 0) {
    logger.debug({ index, missingFields: parsed.missingFields }, "Post fields missing, recorded as empty/zero");
  }

  const record = toRecord(parsed, commentTexts.slice(0, options.maxComments));
  const fingerprint = computePostFingerprint({
    bodyText: parsed.text,
    author: parsed.author,
    timestamp: parsed.timestamp,
    mediaUrls: [...parsed.images, ...parsed.videos],
  });

  return { ok: true, index, post: { fingerprint, record } };
}

/**
 * Two different posts can share a fingerprint within one page (a repeated
 * announcement, or items with none of the hashed fields). The n-th repeat in
 * document order is keyed `${fingerprint}#${n}`, so they stay apart while a
 * second pass over the same DOM yields the same keys.
 */
function withOccurrenceKeys(posts: ExtractedPost[]): ExtractedPost[] {
  const seen = new Map<string, number>();
  return posts.map((post) => {
    const count = seen.get(post.fingerprint) ?? 0;
    seen.set(post.fingerprint, count + 1);
    return count === 0 ? post : { ...post, fingerprint: `${post.fingerprint}#${count}` };
  });
}

function logPostSummary(index: number, record: PostRecord): void {
  logger.info(
    {
      post: index + 1,
      text: record.text.slice(0, TEXT_PREVIEW_LENGTH),
      likes: record.likes,
      comments: record.comments,
      shares: record.shares,
      images: record.images.length,
      videos: record.videos.length,
      topComments: record.comment_texts.length,
    },
    "Post extracted",
  );
}

/**
 * Parses every feed item currently in the DOM, in document order. A post that
 * cannot be read becomes a warning; the rest of the batch carries on.
 */
export async function extractPosts(
  driver: BrowserDriver,
  options: ExtractPostOptions,
  collector: PostCollector = new PostCollector(),
): Promise<ExtractionBatch> {
  const elements = await postLocator.findAll(driver, "POST_ITEM");
  logger.info({ elementsFound: elements.length, selectors: postLocator.version }, "Found post elements");

  const results: ExtractionResult[] = [];
  for (const [index, element] of elements.entries()) {
    const result = await extractPost(driver, element, index, options);
    results.push(result);

    if (result.ok) {
      logPostSummary(index, result.post.record);
    } else {
      logger.warn({ warning: result.warning }, "Skipping unreadable post");
    }
  }

  const { posts, warnings } = partitionResults(results);
  const unique = withOccurrenceKeys(posts).filter((post) => collector.add(post));

  if (unique.length < posts.length) {
    logger.debug({ duplicates: posts.length - unique.length }, "Dropped duplicate posts");
  }

  return { posts: unique, warnings, elementsFound: elements.length };
}
