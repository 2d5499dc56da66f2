import { describe, it, expect, vi } from "vitest";
import { createLinkSource } from "../fetcher/link-source.js";
import { FetchError } from "../fetcher/index.js";
import type { Fetcher } from "../fetcher/index.js";
import type { FetchedPageRaw } from "../types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Create a mock FetchedPageRaw result for a given URL. */
function makeFetchedPageRaw(url: string, html: string): FetchedPageRaw {
  return {
    url,
    html,
    statusCode: 200,
    headers: { "content-type": "text/html" },
    fetchedAt: new Date(),
  };
}

/**
 * Create a mock Fetcher that returns predetermined responses.
 * A response may name a different final URL to simulate a redirect.
 */
function createMockFetcher(
  responses: Record<string, { html: string; finalUrl?: string } | Error>,
): Fetcher {
  return {
    fetch: vi.fn(async (url: string): Promise<FetchedPageRaw> => {
      const response = responses[url];
      if (!response) {
        throw new FetchError(`HTTP 404 for ${url}`, url, 404);
      }
      if (response instanceof Error) {
        throw response;
      }
      return makeFetchedPageRaw(response.finalUrl ?? url, response.html);
    }),
  };
}

// ---------------------------------------------------------------------------
// createLinkSource
// ---------------------------------------------------------------------------
describe("createLinkSource", () => {
  it("should return resolved same-host links in document order", async () => {
    const fetcher = createMockFetcher({
      "https://example.com/docs/index.html": {
        html: `
          <a href="intro.html">Intro</a>
          <a href="/about">About</a>
          <a href="https://example.com/contact#form">Contact</a>
        `,
      },
    });
    const source = createLinkSource(fetcher);

    const result = await source.getSameHostLinks("https://example.com/docs/index.html");

    expect(result).toEqual({
      ok: true,
      links: [
        "https://example.com/docs/intro.html",
        "https://example.com/about",
        "https://example.com/contact",
      ],
    });
  });

  it("should drop links to other hosts and non-http schemes", async () => {
    const fetcher = createMockFetcher({
      "https://example.com/": {
        html: `
          <a href="https://other.org/page">Other</a>
          <a href="https://sub.example.com/page">Subdomain</a>
          <a href="mailto:team@example.com">Mail</a>
          <a href="javascript:void(0)">JS</a>
          <a href="/kept">Kept</a>
        `,
      },
    });
    const source = createLinkSource(fetcher);

    const result = await source.getSameHostLinks("https://example.com/");

    expect(result).toEqual({ ok: true, links: ["https://example.com/kept"] });
  });

  it("should keep duplicate links", async () => {
    const fetcher = createMockFetcher({
      "https://example.com/": {
        html: '<a href="/a">A</a><a href="/a">A again</a>',
      },
    });
    const source = createLinkSource(fetcher);

    const result = await source.getSameHostLinks("https://example.com/");

    expect(result).toEqual({
      ok: true,
      links: ["https://example.com/a", "https://example.com/a"],
    });
  });

  it("should drop references that cannot be resolved", async () => {
    const fetcher = createMockFetcher({
      "https://example.com/": {
        html: '<a href="http://">Broken</a><a href="/ok">Ok</a>',
      },
    });
    const source = createLinkSource(fetcher);

    const result = await source.getSameHostLinks("https://example.com/");

    expect(result).toEqual({ ok: true, links: ["https://example.com/ok"] });
  });

  it("should resolve relative links against the final URL after a redirect", async () => {
    const fetcher = createMockFetcher({
      "https://example.com/old": {
        finalUrl: "https://example.com/new/home.html",
        html: '<a href="child.html">Child</a>',
      },
    });
    const source = createLinkSource(fetcher);

    const result = await source.getSameHostLinks("https://example.com/old");

    expect(result).toEqual({
      ok: true,
      links: ["https://example.com/new/child.html"],
    });
  });

  it("should keep only the requested host when a redirect leaves it", async () => {
    const fetcher = createMockFetcher({
      "https://example.com/moved": {
        finalUrl: "https://elsewhere.net/",
        html: '<a href="/inside">Inside</a><a href="https://example.com/back">Back</a>',
      },
    });
    const source = createLinkSource(fetcher);

    const result = await source.getSameHostLinks("https://example.com/moved");

    expect(result).toEqual({ ok: true, links: ["https://example.com/back"] });
  });

  it("should report a page without links as an empty success", async () => {
    const fetcher = createMockFetcher({
      "https://example.com/": { html: "<p>No links here</p>" },
    });
    const source = createLinkSource(fetcher);

    const result = await source.getSameHostLinks("https://example.com/");

    expect(result).toEqual({ ok: true, links: [] });
  });

  it("should report a fetch failure as a failed result", async () => {
    const failure = new FetchError("HTTP 500 for https://example.com/", "https://example.com/", 500);
    const fetcher = createMockFetcher({ "https://example.com/": failure });
    const source = createLinkSource(fetcher);

    const result = await source.getSameHostLinks("https://example.com/");

    expect(result).toEqual({ ok: false, error: failure });
  });

  it("should wrap non-Error rejections", async () => {
    const fetcher: Fetcher = {
      fetch: vi.fn(async () => {
        throw "socket closed";
      }),
    };
    const source = createLinkSource(fetcher);

    const result = await source.getSameHostLinks("https://example.com/");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(Error);
      expect(result.error.message).toBe("socket closed");
    }
  });

  it("should fail without fetching when the URL is invalid", async () => {
    const fetcher = createMockFetcher({});
    const source = createLinkSource(fetcher);

    const result = await source.getSameHostLinks("not a url");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Invalid URL: not a url");
    }
    expect(fetcher.fetch).not.toHaveBeenCalled();
  });
});
