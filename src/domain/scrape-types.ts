import type { PostRecord } from "./models";

export interface ExtractedPost {
  fingerprint: string;
  record: PostRecord;
}

export type ExtractionWarningCode = "POST_UNREADABLE" | "POST_PARSE_FAILED";

export interface ExtractionWarning {
  index: number;
  code: ExtractionWarningCode;
  message: string;
}

export type ExtractionResult =
  | { ok: true; index: number; post: ExtractedPost }
  | { ok: false; warning: ExtractionWarning };

export interface ExtractionBatch {
  posts: ExtractedPost[];
  warnings: ExtractionWarning[];
  elementsFound: number;
}

export interface LoadFeedOptions {
  numScrolls: number;
  scrollPauseMs: number;
  idleScrollLimit?: number;
  /** How long to wait for the first post to render after navigation. */
  renderTimeoutMs?: number;
}

export interface LoadFeedResult {
  scrollsPerformed: number;
  stoppedEarly: boolean;
}

export interface ExtractPostOptions {
  maxComments: number;
  commentWaitMs: number;
}

export interface CollectCommentOptions {
  maxComments: number;
  waitMs: number;
  maxExpansionRounds?: number;
}

export interface ScrapeRunResult {
  outputPath: string;
  postsWritten: number;
  warnings: ExtractionWarning[];
  scrollsPerformed: number;
}

export function partitionResults(results: ExtractionResult[]): { posts: ExtractedPost[]; warnings: ExtractionWarning[] } {
  const posts: ExtractedPost[] = [];
  const warnings: ExtractionWarning[] = [];

  for (const result of results) {
    if (result.ok) {
      posts.push(result.post);
    } else {
      warnings.push(result.warning);
    }
  }

  return { posts, warnings };
}
