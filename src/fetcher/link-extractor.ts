/**
 * Pattern-based extraction of link and image references from HTML.
 *
 * No DOM is built: each pattern captures the first quoted value following
 * `href=` inside an `<a>` tag (or `src=` inside an `<img>` tag). Matching is
 * case-insensitive and the value capture is non-greedy, so an attribute
 * whose quote is never closed produces no match.
 */

const ANCHOR_HREF_PATTERN = /<a[^>]+href=(["'])(.*?)\1/gi;
const IMAGE_SRC_PATTERN = /<img[^>]+src=(["'])(.*?)\1/gi;

function matchAll(pattern: RegExp, content: string): string[] {
  const values: string[] = [];
  for (const match of content.matchAll(pattern)) {
    values.push(match[2]);
  }
  return values;
}

/**
 * Extract raw `href` values of anchor tags, in document order.
 * Values are returned exactly as written (relative references are not resolved).
 */
export function extractHrefs(content: string): string[] {
  return matchAll(ANCHOR_HREF_PATTERN, content);
}

/**
 * Extract raw `src` values of image tags, in document order.
 */
export function extractImageSources(content: string): string[] {
  return matchAll(IMAGE_SRC_PATTERN, content);
}

/**
 * Resolve a raw reference against the URL of the page it was found on.
 * The fragment is dropped since it never reaches the server.
 *
 * @param baseUrl - URL of the page the reference appears in
 * @param reference - Raw href/src value
 * @returns The absolute URL, or null if the reference cannot be resolved
 */
export function resolveReference(baseUrl: string, reference: string): string | null {
  let resolved: URL;
  try {
    resolved = new URL(reference.trim(), baseUrl);
  } catch {
    return null;
  }
  resolved.hash = '';
  return resolved.href;
}

/**
 * Whether `url` has the given hostname. Unparseable URLs never match.
 */
export function isSameHost(url: string, hostname: string): boolean {
  try {
    return new URL(url).hostname === hostname;
  } catch {
    return false;
  }
}
