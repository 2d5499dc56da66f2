import { z } from 'zod';
import type {
  WalkConfig,
  WalkResult,
  FailedPage,
  SkippedPage,
  Strategy,
} from '../types.js';
import { CONFIG_DEFAULTS, DEFAULT_USER_AGENT } from '../types.js';
import { createFetcher } from '../fetcher/index.js';
import type { FetcherConfig } from '../fetcher/index.js';
import { createLinkSource } from '../fetcher/link-source.js';
import { extractImageSources, resolveReference } from '../fetcher/link-extractor.js';
import { prepareRobots, robotsUrlFor } from '../fetcher/robots.js';
import { TraversalEngine } from '../crawler/engine.js';
import { resolveStrategy } from '../crawler/strategy.js';
import { buildWalkResult } from '../crawler/base.js';

/**
 * Config as accepted from callers: everything but the URL is optional.
 */
export type UserWalkConfig = Partial<WalkConfig> & { url: string };

/**
 * Schema for the data fields of a user config. Event callbacks are not
 * validated here.
 */
const userConfigSchema = z.object({
  url: z.string().url(),
  strategy: z.string().optional(),
  maxPages: z.number().int().positive().optional(),
  respectRobots: z.boolean().optional(),
  robotsUrl: z.string().url().optional(),
  userAgent: z.string().min(1).optional(),
  headers: z.record(z.string()).optional(),
  timeoutMs: z.number().int().positive().optional(),
});

/**
 * Thrown when a user config fails validation.
 */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`sitewalk: invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Validate the user-provided config and merge CONFIG_DEFAULTS underneath it.
 *
 * @param userConfig - The partial config provided by the user
 * @returns A validated, fully populated WalkConfig
 * @throws ConfigError if a field is missing or invalid
 */
function validateAndMergeConfig(userConfig: UserWalkConfig): WalkConfig {
  const parsed = userConfigSchema.safeParse(userConfig);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`),
    );
  }

  return {
    ...userConfig,
    strategy: userConfig.strategy ?? CONFIG_DEFAULTS.strategy,
    respectRobots: userConfig.respectRobots ?? CONFIG_DEFAULTS.respectRobots,
    userAgent: userConfig.userAgent ?? CONFIG_DEFAULTS.userAgent,
    timeoutMs: userConfig.timeoutMs ?? CONFIG_DEFAULTS.timeoutMs,
  };
}

async function* runWalk(config: WalkConfig, strategy: Strategy): AsyncGenerator<string> {
  const robots = config.respectRobots
    ? await prepareRobots(config.robotsUrl ?? robotsUrlFor(config.url), {
        userAgent: config.userAgent,
        timeoutMs: config.timeoutMs,
      })
    : undefined;

  const engine = new TraversalEngine(createLinkSource(createFetcher(config)), {
    robots,
    userAgent: config.userAgent,
    maxPages: config.maxPages,
    onSkipped: config.onPageSkipped,
    onFetchError: config.onError,
  });

  for await (const url of engine.traverse(config.url, strategy)) {
    config.onPageVisited?.(url);
    yield url;
  }
}

/**
 * Walk the same-host pages reachable from `config.url`.
 *
 * Config and strategy are validated before this function returns, so an
 * invalid config or unknown strategy throws immediately and nothing is
 * fetched. robots.txt is loaded when iteration starts.
 *
 * @example
 * ```ts
 * for await (const url of walk({ url: 'https://example.com', strategy: 'dfs' })) {
 *   console.log(url);
 * }
 * ```
 *
 * @param userConfig - The partial config provided by the user
 * @returns Visited URLs, lazily, in visitation order
 * @throws ConfigError if the config is invalid
 * @throws UnknownStrategyError if the strategy name is not recognized
 */
export function walk(userConfig: UserWalkConfig): AsyncGenerator<string> {
  const config = validateAndMergeConfig(userConfig);
  const strategy = resolveStrategy(config.strategy);
  return runWalk(config, strategy);
}

/**
 * Run a complete walk and collect what happened along the way.
 *
 * @param userConfig - The partial config provided by the user
 * @returns Visited, failed and skipped pages plus stats
 */
export async function walkSite(userConfig: UserWalkConfig): Promise<WalkResult> {
  const startTime = Date.now();
  const config = validateAndMergeConfig(userConfig);
  const strategy = resolveStrategy(config.strategy);

  const visited: string[] = [];
  const failed: FailedPage[] = [];
  const skipped: SkippedPage[] = [];

  const urls = runWalk(
    {
      ...config,
      onPageSkipped: (url, reason) => {
        skipped.push({ url, reason });
        config.onPageSkipped?.(url, reason);
      },
      onError: (url, error) => {
        failed.push({ url, reason: error.message });
        config.onError?.(url, error);
      },
    },
    strategy,
  );

  for await (const url of urls) {
    visited.push(url);
  }

  return buildWalkResult(config.url, strategy, visited, failed, skipped, startTime);
}

/**
 * Download one page and list the absolute URLs of its `<img src>` values,
 * in document order. Sources that cannot be resolved are left out.
 *
 * @param url - Page to inspect
 * @param options - Fetch settings; defaults as for `walk`
 * @throws FetchError if the page cannot be downloaded
 */
export async function findImages(
  url: string,
  options: Partial<FetcherConfig> = {},
): Promise<string[]> {
  const fetcher = createFetcher({
    userAgent: options.userAgent ?? CONFIG_DEFAULTS.userAgent,
    headers: options.headers,
    timeoutMs: options.timeoutMs ?? CONFIG_DEFAULTS.timeoutMs,
  });
  const page = await fetcher.fetch(url);

  const images: string[] = [];
  for (const src of extractImageSources(page.html)) {
    const resolved = resolveReference(page.url, src);
    if (resolved !== null) {
      images.push(resolved);
    }
  }
  return images;
}

/**
 * robots.txt verdict for one URL.
 */
export interface RobotsVerdict {
  url: string;
  allowed: boolean;
}

/**
 * Load one robots.txt and check each URL against it.
 *
 * @param robotsUrl - Full URL of the robots.txt file
 * @param urls - URLs to check
 * @param options - `userAgent` to match rules for (default `*`) and download timeout
 */
export async function checkRobots(
  robotsUrl: string,
  urls: string[],
  options: { userAgent?: string; timeoutMs?: number } = {},
): Promise<RobotsVerdict[]> {
  const policy = await prepareRobots(robotsUrl, {
    userAgent: DEFAULT_USER_AGENT,
    timeoutMs: options.timeoutMs,
  });
  return urls.map((url) => ({
    url,
    allowed: policy.isAllowed(url, options.userAgent),
  }));
}

// Default export
export default walkSite;

// Re-export building blocks for advanced usage
export { createFetcher, FetchError } from '../fetcher/index.js';
export type { Fetcher, FetcherConfig } from '../fetcher/index.js';
export { createLinkSource } from '../fetcher/link-source.js';
export type { LinkSource, LinkResult } from '../fetcher/link-source.js';
export { extractHrefs, extractImageSources, resolveReference } from '../fetcher/link-extractor.js';
export { prepareRobots, parseRobots, robotsUrlFor } from '../fetcher/robots.js';
export type { RobotsPolicy } from '../fetcher/robots.js';
export {
  TraversalEngine,
  TraversalStateError,
  Frontier,
  VisitedSet,
  resolveStrategy,
  UnknownStrategyError,
  STRATEGIES,
  DEFAULT_STRATEGY,
} from '../crawler/index.js';
export type { TraversalOptions, TraversalState } from '../crawler/index.js';
export { CONFIG_DEFAULTS, DEFAULT_USER_AGENT } from '../types.js';
export type { WalkConfig, WalkResult, FailedPage, SkippedPage, Strategy } from '../types.js';

// Export internal helpers for testing
export { validateAndMergeConfig };
