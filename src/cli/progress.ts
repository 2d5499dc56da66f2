import type { WalkResult } from '../types.js';

/**
 * Output verbosity level for the CLI.
 */
export type Verbosity = 'normal' | 'verbose' | 'quiet';

/**
 * Create event callback handlers for a walk.
 *
 * Visited URLs are the program's output and always go to stdout, one per
 * line. Progress goes to stderr:
 *
 * - quiet mode: nothing
 * - normal mode: fetch errors
 * - verbose mode: fetch errors, a running count of visits, skipped URLs
 *
 * @param verbosity - The desired output verbosity
 */
export function createProgressCallbacks(verbosity: Verbosity): {
  onPageVisited: (url: string) => void;
  onPageSkipped: (url: string, reason: string) => void;
  onError: (url: string, error: Error) => void;
} {
  let visitedCount = 0;

  return {
    onPageVisited: (url: string) => {
      visitedCount++;
      process.stdout.write(`${url}\n`);
      if (verbosity === 'verbose') {
        process.stderr.write(`[${visitedCount}] Visited: ${url}\n`);
      }
    },

    onPageSkipped: (url: string, reason: string) => {
      if (verbosity === 'verbose') {
        process.stderr.write(`  Skipped: ${url} (${reason})\n`);
      }
    },

    onError: (url: string, error: Error) => {
      if (verbosity !== 'quiet') {
        process.stderr.write(`  Error: ${url} - ${error.message}\n`);
      }
    },
  };
}

/**
 * Print a summary of the walk to stderr.
 *
 * @param result - The walk result to summarize
 * @param verbosity - The desired output verbosity
 */
export function printSummary(result: WalkResult, verbosity: Verbosity): void {
  if (verbosity === 'quiet') {
    return;
  }

  const durationSec = (result.stats.duration / 1000).toFixed(1);

  process.stderr.write('\n');
  process.stderr.write(
    `Done! Visited ${result.stats.totalVisited} pages (${result.strategy})`,
  );
  if (result.stats.totalFailed > 0) {
    process.stderr.write(`, ${result.stats.totalFailed} failed`);
  }
  if (result.stats.totalSkipped > 0) {
    process.stderr.write(`, skipped ${result.stats.totalSkipped}`);
  }
  process.stderr.write(` in ${durationSec}s\n`);
}
