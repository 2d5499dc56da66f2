import type { FetchedPageRaw, WalkConfig } from '../types.js';
import { logger } from '../logger.js';

/**
 * Downloads a single page. The link source and the image finder both go
 * through this interface, so tests can swap in a fake.
 */
export interface Fetcher {
  /** Fetch a URL and return raw page data. Throws FetchError on failure. */
  fetch(url: string): Promise<FetchedPageRaw>;
}

/**
 * The subset of the walk configuration the fetcher needs.
 */
export type FetcherConfig = Pick<WalkConfig, 'userAgent' | 'headers' | 'timeoutMs'>;

/** Maximum number of redirects to follow. */
const MAX_REDIRECTS = 5;

/** Content types considered as HTML. */
const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

/**
 * Error thrown when a fetch operation fails in an expected way.
 */
export class FetchError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

/**
 * Convert a Response's headers to a plain object.
 */
function responseHeadersToRecord(response: Response): Record<string, string> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });
  return headers;
}

/**
 * Create a Fetcher that downloads pages with the global `fetch`,
 * following redirects manually so the final URL is known.
 *
 * @param config - User agent, extra headers and request timeout
 * @returns A Fetcher instance
 */
export function createFetcher(config: FetcherConfig): Fetcher {
  const requestHeaders: Record<string, string> = {
    'User-Agent': config.userAgent,
    ...config.headers,
  };

  async function fetchOnce(url: string, currentUrl: string): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), config.timeoutMs);

    try {
      return await fetch(currentUrl, {
        headers: requestHeaders,
        signal: controller.signal,
        redirect: 'manual',
      });
    } catch (error) {
      if (error instanceof DOMException && error.name === 'AbortError') {
        throw new FetchError(
          `Request timed out after ${config.timeoutMs}ms: ${currentUrl}`,
          url,
        );
      }
      throw new FetchError(
        `Network error fetching ${currentUrl}: ${error instanceof Error ? error.message : String(error)}`,
        url,
      );
    } finally {
      clearTimeout(timeout);
    }
  }

  return {
    async fetch(url: string): Promise<FetchedPageRaw> {
      let currentUrl = url;
      let response = await fetchOnce(url, currentUrl);

      for (let redirectCount = 0; response.status >= 300 && response.status < 400; redirectCount++) {
        const location = response.headers.get('location');
        if (!location) {
          throw new FetchError(
            `Redirect response missing Location header: ${currentUrl}`,
            url,
            response.status,
          );
        }
        if (redirectCount === MAX_REDIRECTS) {
          throw new FetchError(
            `Too many redirects (max ${MAX_REDIRECTS}): ${url}`,
            url,
            response.status,
          );
        }

        // Resolve relative redirect URLs
        currentUrl = new URL(location, currentUrl).href;
        logger.debug({ url, location: currentUrl }, 'Following redirect');
        response = await fetchOnce(url, currentUrl);
      }

      if (!response.ok) {
        throw new FetchError(
          `HTTP ${response.status} for ${currentUrl}`,
          url,
          response.status,
        );
      }

      const contentType = response.headers.get('content-type') ?? '';
      const isHtml = HTML_CONTENT_TYPES.some((type) =>
        contentType.toLowerCase().includes(type),
      );

      if (!isHtml) {
        throw new FetchError(
          `Non-HTML content type (${contentType}): ${currentUrl}`,
          url,
          response.status,
        );
      }

      const html = await response.text();

      return {
        url: currentUrl, // Final URL after redirects
        html,
        statusCode: response.status,
        headers: responseHeadersToRecord(response),
        fetchedAt: new Date(),
      };
    },
  };
}

export { extractHrefs, extractImageSources, resolveReference, isSameHost } from './link-extractor.js';
export { createLinkSource } from './link-source.js';
export type { LinkSource, LinkResult } from './link-source.js';
export { prepareRobots, parseRobots, robotsUrlFor } from './robots.js';
export type { RobotsPolicy, PrepareRobotsOptions } from './robots.js';
