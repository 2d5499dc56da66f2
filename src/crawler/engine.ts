import type { Strategy } from '../types.js';
import type { LinkSource } from '../fetcher/link-source.js';
import type { RobotsPolicy } from '../fetcher/robots.js';
import { logger } from '../logger.js';
import { VisitedSet } from './base.js';
import { Frontier } from './frontier.js';
import { insertionPolicyFor, resolveStrategy, type InsertionPolicy } from './strategy.js';

/**
 * Lifecycle of a TraversalEngine. There is no failed state: fetch failures
 * only affect the URL they happened on.
 */
export type TraversalState = 'init' | 'running' | 'done';

export interface TraversalOptions {
  /** When set, URLs the policy disallows are skipped. */
  robots?: RobotsPolicy;
  /** User agent used for robots.txt matching. */
  userAgent?: string;
  /** Stop after this many URLs have been emitted. */
  maxPages?: number;
  /** Called once for each URL left out of the walk. */
  onSkipped?: (url: string, reason: string) => void;
  /** Called when the link source could not retrieve a page's links. */
  onFetchError?: (url: string, error: Error) => void;
}

/**
 * Thrown when `traverse` is called on an engine that has already started.
 */
export class TraversalStateError extends Error {
  constructor(public readonly state: TraversalState) {
    super(
      `TraversalEngine is single-use (current state: ${state}); create a new engine to traverse again`,
    );
    this.name = 'TraversalStateError';
  }
}

/**
 * Walks the same-host link graph reachable from a start URL, emitting each
 * URL once, in the order given by the chosen strategy.
 *
 * Each engine runs one traversal and owns its frontier and visited set.
 * URLs are fetched one at a time; the next URL is only popped once the
 * consumer asks for it.
 */
export class TraversalEngine {
  private currentState: TraversalState = 'init';
  private started = false;
  private readonly visited = new VisitedSet();

  constructor(
    private readonly linkSource: LinkSource,
    private readonly options: TraversalOptions = {},
  ) {}

  get state(): TraversalState {
    return this.currentState;
  }

  /** Number of URLs emitted so far. */
  get visitedCount(): number {
    return this.visited.size;
  }

  /** Whether `url` has already been emitted. */
  hasVisited(url: string): boolean {
    return this.visited.has(url);
  }

  /**
   * Start the traversal.
   *
   * The strategy is resolved before anything else happens, so an unknown
   * name throws here and no page is ever fetched. The engine enters
   * `running` on the first `next()`; a generator closed before that never
   * runs and the engine stays in `init`, though it cannot be started again.
   *
   * @param startUrl - First URL to visit
   * @param strategyName - "depth-first"/"dfs" or "breadth-first"/"bfs" (default)
   * @returns Visited URLs, lazily, in visitation order
   * @throws UnknownStrategyError if the strategy name is not recognized
   * @throws TraversalStateError if this engine has already been started
   */
  traverse(startUrl: string, strategyName?: string): AsyncGenerator<string> {
    const strategy = resolveStrategy(strategyName);
    if (this.started) {
      throw new TraversalStateError(this.currentState);
    }
    this.started = true;
    return this.run(startUrl, strategy);
  }

  private async *run(startUrl: string, strategy: Strategy): AsyncGenerator<string> {
    const { robots, userAgent, maxPages = Infinity, onSkipped, onFetchError } = this.options;
    const push: InsertionPolicy = insertionPolicyFor(strategy);
    const frontier = new Frontier();
    // Disallowed URLs, so each is reported once however often it is discovered
    const rejected = new Set<string>();

    this.currentState = 'running';
    logger.info({ startUrl, strategy }, 'Starting traversal');
    push(frontier, startUrl);

    try {
      while (!frontier.isEmpty() && this.visited.size < maxPages) {
        const url = frontier.pop();
        if (url === undefined || this.visited.has(url) || rejected.has(url)) {
          continue;
        }

        if (robots && !robots.isAllowed(url, userAgent)) {
          rejected.add(url);
          logger.debug({ url }, 'Disallowed by robots.txt');
          onSkipped?.(url, 'Disallowed by robots.txt');
          continue;
        }

        this.visited.add(url);
        yield url;

        // The last page allowed by maxPages is not expanded
        if (this.visited.size >= maxPages) {
          break;
        }

        const result = await this.linkSource.getSameHostLinks(url);
        if (!result.ok) {
          logger.warn({ url, error: result.error.message }, 'Could not retrieve links');
          onFetchError?.(url, result.error);
          continue;
        }

        for (const link of result.links) {
          if (!this.visited.has(link)) {
            push(frontier, link);
          }
        }
      }
    } finally {
      this.currentState = 'done';
      logger.info({ startUrl, visited: this.visited.size }, 'Traversal finished');
    }
  }
}
