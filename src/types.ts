/**
 * Raw fetched page data.
 */
export interface FetchedPageRaw {
  /** Final URL after redirects. */
  url: string;
  html: string;
  statusCode: number;
  headers: Record<string, string>;
  fetchedAt: Date;
}

/**
 * Frontier insertion discipline for a walk.
 */
export type Strategy = 'depth-first' | 'breadth-first';

/**
 * A page that was left out of the walk (e.g. disallowed by robots.txt).
 */
export interface SkippedPage {
  url: string;
  reason: string;
}

/**
 * A page that was visited but whose links could not be retrieved.
 */
export interface FailedPage {
  url: string;
  reason: string;
}

/**
 * Full configuration interface for sitewalk.
 */
export interface WalkConfig {
  // Required
  url: string;

  // Traversal
  /** Strategy name, resolved when the walk starts ("depth-first", "breadth-first", "dfs", "bfs"). */
  strategy: string;
  maxPages?: number;

  // Robots
  respectRobots: boolean;
  /** Defaults to `<origin>/robots.txt` of the start URL. */
  robotsUrl?: string;

  // Fetching
  userAgent: string;
  headers?: Record<string, string>;
  timeoutMs: number;

  // Events
  onPageVisited?: (url: string) => void;
  onPageSkipped?: (url: string, reason: string) => void;
  onError?: (url: string, error: Error) => void;
}

/**
 * Result returned from a completed walk.
 */
export interface WalkResult {
  startUrl: string;
  strategy: Strategy;
  /** Visited URLs in emission order. */
  visited: string[];
  failed: FailedPage[];
  skipped: SkippedPage[];
  stats: {
    totalVisited: number;
    totalFailed: number;
    totalSkipped: number;
    duration: number;
  };
}

/**
 * Default user agent string for fetching and robots.txt matching.
 */
export const DEFAULT_USER_AGENT = 'sitewalk/1.0';

/**
 * Default configuration values. Applied when merging user-provided
 * partial config into a full WalkConfig.
 */
export const CONFIG_DEFAULTS = {
  strategy: 'breadth-first',
  respectRobots: true,
  userAgent: DEFAULT_USER_AGENT,
  timeoutMs: 30_000,
} satisfies Partial<WalkConfig>;
