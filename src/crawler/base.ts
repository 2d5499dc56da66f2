import type { FailedPage, SkippedPage, Strategy, WalkResult } from '../types.js';

/**
 * URLs that have already been dequeued and emitted during one traversal.
 *
 * URLs are compared by their exact string form; any normalization happens
 * earlier, when references are resolved.
 */
export class VisitedSet {
  private set = new Set<string>();

  /**
   * Check whether a URL has been visited.
   */
  has(url: string): boolean {
    return this.set.has(url);
  }

  /**
   * Mark a URL as visited. Marking twice is a no-op.
   */
  add(url: string): void {
    this.set.add(url);
  }

  /**
   * Return the number of visited URLs.
   */
  get size(): number {
    return this.set.size;
  }
}

/**
 * Build a WalkResult from the collected URLs and timing info.
 */
export function buildWalkResult(
  startUrl: string,
  strategy: Strategy,
  visited: string[],
  failed: FailedPage[],
  skipped: SkippedPage[],
  startTime: number,
): WalkResult {
  return {
    startUrl,
    strategy,
    visited,
    failed,
    skipped,
    stats: {
      totalVisited: visited.length,
      totalFailed: failed.length,
      totalSkipped: skipped.length,
      duration: Date.now() - startTime,
    },
  };
}
