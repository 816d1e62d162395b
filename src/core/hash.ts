import crypto from "crypto";
import { normalizeContent, extractMediaFingerprint } from "./normalize";

export interface FingerprintInput {
  bodyText: string;
  author: string;
  timestamp: string;
  mediaUrls?: string[];
}

/**
 * Identity of a post across scroll passes. The feed markup carries no stable
 * post id, so body, author, relative timestamp and media together stand in.
 */
export function computePostFingerprint(input: FingerprintInput): string {
  const parts = [
    normalizeContent(input.bodyText),
    normalizeContent(input.author),
    normalizeContent(input.timestamp),
    extractMediaFingerprint(input.mediaUrls ?? []),
  ];
  return crypto.createHash("sha256").update(parts.join("|")).digest("hex");
}
