import * as cheerio from "cheerio";
import { cleanText, countOrZero, extractCountToken } from "../../core/normalize";
import { commentLocator, postLocator } from "./selectors";

export type PostField = "text" | "likes" | "comments" | "shares";

export interface ParsedPost {
  text: string;
  author: string;
  timestamp: string;
  likes: string;
  comments: string;
  shares: string;
  images: string[];
  videos: string[];
  missingFields: PostField[];
}

function isUsableMediaUrl(src: string | undefined): src is string {
  return !!src && src.trim().length > 0 && !src.startsWith("data:");
}

/**
 * Parses one feed item from its outer HTML. Nothing here throws on missing
 * markup: absent text becomes "", absent counts become "0" and the field is
 * listed in missingFields.
 */
export function parsePostHtml(html: string): ParsedPost {
  const $ = cheerio.load(html);
  const root = $.root();
  const commentScope = commentLocator.any("COMMENT_ITEM");
  const outsideComments = (selector: string) =>
    root.find(selector).filter((_, el) => $(el).closest(commentScope).length === 0);

  const missingFields: PostField[] = [];

  const textMatch = postLocator.pick("POST_TEXT", outsideComments);
  const text = cleanText(textMatch?.first().text());
  if (!textMatch) missingFields.push("text");

  const author = cleanText(postLocator.pick("POST_AUTHOR", outsideComments)?.first().text());
  const timestamp = cleanText(postLocator.pick("POST_TIMESTAMP", outsideComments)?.first().text());

  const likesMatch = postLocator.pick("LIKES_COUNT", outsideComments);
  const likes = countOrZero(likesMatch?.first().text());
  if (!likesMatch) missingFields.push("likes");

  let comments: string | null = null;
  let shares: string | null = null;
  const socialSpans = postLocator.pick("SOCIAL_COUNTS", outsideComments)?.toArray() ?? [];
  for (const el of socialSpans) {
    const label = cleanText($(el).text());
    const kind = label.toLowerCase();
    if (comments === null && kind.includes("comment")) {
      comments = extractCountToken(label) ?? "0";
    } else if (shares === null && (kind.includes("share") || kind.includes("repost"))) {
      shares = extractCountToken(label) ?? "0";
    }
  }
  if (comments === null) missingFields.push("comments");
  if (shares === null) missingFields.push("shares");

  const images = (postLocator.pick("IMAGES", outsideComments)?.toArray() ?? [])
    .map((el) => $(el).attr("src"))
    .filter(isUsableMediaUrl);
  const videos = (postLocator.pick("VIDEOS", outsideComments)?.toArray() ?? [])
    .map((el) => $(el).attr("src"))
    .filter(isUsableMediaUrl);

  return {
    text,
    author,
    timestamp,
    likes,
    comments: comments ?? "0",
    shares: shares ?? "0",
    images,
    videos,
    missingFields,
  };
}

export function parseCommentTexts(html: string, maxComments: number): string[] {
  if (maxComments <= 0) return [];

  const $ = cheerio.load(html);
  const items = commentLocator.pick("COMMENT_ITEM", (selector) => $.root().find(selector));
  if (!items) return [];

  const texts: string[] = [];
  for (const item of items.toArray()) {
    if (texts.length >= maxComments) break;

    const body = commentLocator.pick("COMMENT_TEXT", (selector) => $(item).find(selector));
    const text = cleanText(body?.first().text());
    if (text) texts.push(text);
  }

  return texts;
}
