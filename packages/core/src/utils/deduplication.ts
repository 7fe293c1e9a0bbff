/**
 * Deduplication utilities
 *
 * URL normalization and duplicate detection for search results.
 */

/**
 * Normalize URL for consistent comparison
 * - Remove www prefix
 * - Remove trailing slashes
 * - Remove query parameters and fragments
 * - Convert hostname to lowercase
 */
export function normalizeUrl(url: string): string {
  try {
    const urlObj = new URL(url);

    // Normalize hostname (remove www)
    let hostname = urlObj.hostname.toLowerCase();
    if (hostname.startsWith("www.")) {
      hostname = hostname.substring(4);
    }

    // Normalize pathname (remove trailing slash)
    let pathname = urlObj.pathname;
    if (pathname.endsWith("/") && pathname.length > 1) {
      pathname = pathname.slice(0, -1);
    }

    // Return protocol + hostname + pathname (no query/hash)
    return `${urlObj.protocol}//${hostname}${pathname}`;
  } catch {
    // If URL parsing fails, just lowercase and return
    return url.toLowerCase().trim();
  }
}

/**
 * Hostname without the www prefix, or undefined for unparseable input
 */
export function extractDomain(url: string): string | undefined {
  try {
    const hostname = new URL(url).hostname.toLowerCase();
    return hostname.startsWith("www.") ? hostname.substring(4) : hostname;
  } catch {
    return undefined;
  }
}

/**
 * Keep the first item for every normalized URL, preserving order.
 * Items without a URL are always kept.
 */
export function dedupeByUrl<T>(items: T[], getUrl: (item: T) => string): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];

  for (const item of items) {
    const url = getUrl(item);
    if (!url) {
      unique.push(item);
      continue;
    }

    const key = normalizeUrl(url);
    if (seen.has(key)) continue;

    seen.add(key);
    unique.push(item);
  }

  return unique;
}
