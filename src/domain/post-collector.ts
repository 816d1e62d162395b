import type { PostRecord } from "./models";
import type { ExtractedPost } from "./scrape-types";

/**
 * Ordered, fingerprint-keyed set of posts. The first sighting of a post fixes
 * its position, so merging repeated extraction passes keeps feed order.
 */
export class PostCollector {
  private readonly byFingerprint = new Map<string, PostRecord>();

  add(post: ExtractedPost): boolean {
    if (this.byFingerprint.has(post.fingerprint)) return false;
    this.byFingerprint.set(post.fingerprint, post.record);
    return true;
  }

  get size(): number {
    return this.byFingerprint.size;
  }

  records(): PostRecord[] {
    return Array.from(this.byFingerprint.values());
  }
}
