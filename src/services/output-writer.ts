import { mkdir, readFile, rename, stat, unlink, writeFile } from "fs/promises";
import { join } from "path";
import { format } from "date-fns";
import { PostsDocumentSchema, type PostRecord, type PostsDocument } from "../domain/models";
import { OutputError } from "../core/errors";
import { logger } from "../core/logger";

const TIMESTAMP_FORMAT = "yyyyMMdd_HHmmss";
const MAX_NAME_ATTEMPTS = 1000;

export interface WriteOptions {
  outputDir: string;
}

export function formatRunTimestamp(now: Date): string {
  return format(now, TIMESTAMP_FORMAT);
}

export function buildOutputFileName(companyName: string, timestamp: string, attempt = 0): string {
  const suffix = attempt > 0 ? `_${attempt}` : "";
  return `${companyName}_posts_${timestamp}${suffix}.json`;
}

export function buildPostsDocument(input: {
  companyName: string;
  sourceUrl: string;
  posts: PostRecord[];
  now?: Date;
}): PostsDocument {
  return {
    company_name: input.companyName,
    timestamp: formatRunTimestamp(input.now ?? new Date()),
    source_url: input.sourceUrl,
    post_count: input.posts.length,
    posts: input.posts,
  };
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return false;
    throw error;
  }
}

async function resolveFreePath(outputDir: string, companyName: string, timestamp: string): Promise<string> {
  for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
    const candidate = join(outputDir, buildOutputFileName(companyName, timestamp, attempt));
    if (!(await pathExists(candidate))) return candidate;
  }
  throw new OutputError(`No free file name for ${companyName} at ${timestamp}`, "OUTPUT_WRITE_FAILED");
}

/**
 * Writes the document under outputDir and returns the final path. An existing
 * file is never overwritten; a half-written file never carries the final name.
 */
export async function writePostsFile(document: PostsDocument, options: WriteOptions): Promise<string> {
  let tempPath: string | null = null;

  try {
    await mkdir(options.outputDir, { recursive: true });
    const target = await resolveFreePath(options.outputDir, document.company_name, document.timestamp);
    tempPath = `${target}.tmp`;

    await writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, "utf-8");
    await rename(tempPath, target);

    logger.info({ path: target, postCount: document.post_count }, "Saved posts");
    return target;
  } catch (error) {
    if (tempPath) {
      await unlink(tempPath).catch((cleanupError: unknown) => {
        logger.debug({ error: cleanupError, tempPath }, "Temp output file not removed");
      });
    }
    if (error instanceof OutputError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new OutputError(`Failed to write output to ${options.outputDir}: ${message}`, "OUTPUT_WRITE_FAILED", {
      cause: error,
    });
  }
}

export async function readPostsFile(path: string): Promise<PostsDocument> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (error) {
    throw new OutputError(`Failed to read ${path}`, "OUTPUT_READ_FAILED", { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new OutputError(`${path} is not valid JSON`, "OUTPUT_INVALID", { cause: error });
  }

  const parsed = PostsDocumentSchema.safeParse(json);
  if (!parsed.success) {
    throw new OutputError(`${path} is not a posts document: ${parsed.error.message}`, "OUTPUT_INVALID");
  }
  return parsed.data;
}
