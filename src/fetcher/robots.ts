import { createRequire } from 'node:module';
import { logger } from '../logger.js';

const require = createRequire(import.meta.url);
const robotsParser = require('robots-parser') as (
  url: string,
  robotstxt: string,
) => Robot;

/**
 * Parsed robots.txt instance from robots-parser library.
 */
interface Robot {
  isAllowed(url: string, ua?: string): boolean | undefined;
  getCrawlDelay(ua?: string): number | undefined;
  getSitemaps(): string[];
}

/**
 * A robots.txt policy for one host. Built once with `prepareRobots` (or
 * `parseRobots`) and passed to whatever needs permission checks.
 */
export interface RobotsPolicy {
  /** The robots.txt URL this policy was loaded from. */
  readonly robotsUrl: string;
  /** Whether `userAgent` (default `*`) may fetch `url`. */
  isAllowed(url: string, userAgent?: string): boolean;
  /** Crawl-delay in seconds for `userAgent`, if specified. */
  getCrawlDelay(userAgent?: string): number | undefined;
  getSitemaps(): string[];
}

export interface PrepareRobotsOptions {
  /** User agent sent when downloading robots.txt. */
  userAgent?: string;
  /** Timeout for the robots.txt fetch in milliseconds. */
  timeoutMs?: number;
}

const WILDCARD_AGENT = '*';

const DISALLOW_ALL = 'User-agent: *\nDisallow: /\n';

/**
 * Build the conventional robots.txt URL for the origin of `url`.
 *
 * @param url - Any URL on the host
 * @returns e.g. "https://example.com/robots.txt"
 */
export function robotsUrlFor(url: string): string {
  return `${new URL(url).origin}/robots.txt`;
}

function tryParseUrl(url: string): URL | undefined {
  try {
    return new URL(url);
  } catch {
    return undefined;
  }
}

/**
 * Build a policy from robots.txt content that is already in hand.
 *
 * @param robotsUrl - URL the content belongs to (scopes which URLs it governs)
 * @param content - Raw robots.txt text
 */
export function parseRobots(robotsUrl: string, content: string): RobotsPolicy {
  const robot = robotsParser(robotsUrl, content);
  const robotsLocation = tryParseUrl(robotsUrl);

  /**
   * robots-parser only governs its own origin. Rules apply per host, so a
   * same-host URL on another scheme or port is checked by its path and query.
   */
  function onRobotsOrigin(url: string): string {
    const parsed = tryParseUrl(url);
    if (!robotsLocation || !parsed || parsed.hostname !== robotsLocation.hostname) {
      return url;
    }
    return `${robotsLocation.origin}${parsed.pathname}${parsed.search}`;
  }

  return {
    robotsUrl,
    isAllowed(url: string, userAgent: string = WILDCARD_AGENT): boolean {
      // undefined means another host, which this file does not govern
      return robot.isAllowed(onRobotsOrigin(url), userAgent) !== false;
    },
    getCrawlDelay(userAgent: string = WILDCARD_AGENT): number | undefined {
      return robot.getCrawlDelay(userAgent);
    },
    getSitemaps(): string[] {
      return robot.getSitemaps();
    },
  };
}

/**
 * Download and parse robots.txt.
 *
 * A 401 or 403 answer means the whole host is off limits; any other
 * failure (404, 5xx, timeout, network error) yields an allow-all policy.
 *
 * @param robotsUrl - Full URL of the robots.txt file
 * @param options - User agent and timeout for the download
 * @returns The prepared policy
 */
export async function prepareRobots(
  robotsUrl: string,
  options: PrepareRobotsOptions = {},
): Promise<RobotsPolicy> {
  const timeoutMs = options.timeoutMs ?? 10_000;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(robotsUrl, {
      signal: controller.signal,
      headers: options.userAgent ? { 'User-Agent': options.userAgent } : {},
    });

    if (response.status === 401 || response.status === 403) {
      logger.debug({ robotsUrl, status: response.status }, 'robots.txt access denied, disallowing all');
      return parseRobots(robotsUrl, DISALLOW_ALL);
    }

    if (!response.ok) {
      logger.debug({ robotsUrl, status: response.status }, 'No robots.txt, allowing all');
      return parseRobots(robotsUrl, '');
    }

    const policy = parseRobots(robotsUrl, await response.text());
    logger.debug({ robotsUrl }, 'Parsed robots.txt');
    return policy;
  } catch (error) {
    logger.debug({ robotsUrl, error: String(error) }, 'Failed to fetch robots.txt, allowing all');
    return parseRobots(robotsUrl, '');
  } finally {
    clearTimeout(timeout);
  }
}
