import type { FetchedPageRaw } from '../types.js';
import type { Fetcher } from './index.js';
import { extractHrefs, isSameHost, resolveReference } from './link-extractor.js';
import { logger } from '../logger.js';

/**
 * Outcome of asking for a page's links. A failed retrieval is reported
 * separately from a page that simply has no links.
 */
export type LinkResult =
  | { ok: true; links: string[] }
  | { ok: false; error: Error };

/**
 * Provides the same-host outbound links of a page.
 */
export interface LinkSource {
  getSameHostLinks(url: string): Promise<LinkResult>;
}

/**
 * Create a LinkSource that downloads the page, extracts anchor hrefs,
 * resolves them against the fetched page's final URL and keeps only those
 * on the requested URL's host.
 *
 * Links are returned in document order; duplicates are kept.
 */
export function createLinkSource(fetcher: Fetcher): LinkSource {
  return {
    async getSameHostLinks(url: string): Promise<LinkResult> {
      let hostname: string;
      try {
        hostname = new URL(url).hostname;
      } catch {
        return { ok: false, error: new Error(`Invalid URL: ${url}`) };
      }

      let page: FetchedPageRaw;
      try {
        page = await fetcher.fetch(url);
      } catch (error) {
        return {
          ok: false,
          error: error instanceof Error ? error : new Error(String(error)),
        };
      }

      const links: string[] = [];
      for (const href of extractHrefs(page.html)) {
        const resolved = resolveReference(page.url, href);
        if (resolved === null) {
          logger.debug({ page: page.url, href }, 'Dropping malformed link');
          continue;
        }
        if (isSameHost(resolved, hostname)) {
          links.push(resolved);
        }
      }

      return { ok: true, links };
    },
  };
}
