/**
 * Text sanitization for search results and page content
 *
 * Output is restricted to printable ASCII plus the CJK ranges agents are
 * expected to read; everything else becomes a space before whitespace is
 * collapsed. sanitizeText(sanitizeText(x)) === sanitizeText(x).
 */

import type {
  NormalizedSearchResult,
  SearchResultItem,
} from "../../interfaces/search-provider";
import type { SanitizationConfig } from "../research-engine/config";

const CONTROL_CHARS = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F-\x9F]/g;

// Printable ASCII, CJK Unified Ideographs, CJK Extension A,
// CJK Symbols and Punctuation, Halfwidth and Fullwidth Forms
const UNSUPPORTED_CHARS =
  /[^\x20-\x7E\u4e00-\u9fff\u3400-\u4dbf\u3000-\u303f\uff00-\uffef]/g;

const EMPTY_FIELD = "N/A";

export function sanitizeText(text: string): string {
  return text
    .replace(CONTROL_CHARS, " ")
    .replace(UNSUPPORTED_CHARS, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Cut to at most maxLength characters without leaving trailing whitespace
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength).trimEnd();
}

/**
 * Accept only absolute http(s) URLs; anything else becomes ""
 */
export function sanitizeLink(url: string, maxLength: number): string {
  const trimmed = url.trim();
  if (!trimmed || trimmed.length > maxLength) return "";

  try {
    const parsed = new URL(trimmed);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      return "";
    }
    return parsed.href.length <= maxLength ? parsed.href : "";
  } catch {
    return "";
  }
}

function boundedField(text: string, maxLength: number): string {
  return truncateText(sanitizeText(text), maxLength) || EMPTY_FIELD;
}

/**
 * Map a raw backend item to a bounded result, or undefined when nothing
 * usable is left after sanitization
 */
export function normalizeResult(
  item: SearchResultItem,
  limits: SanitizationConfig
): NormalizedSearchResult | undefined {
  const link = sanitizeLink(item.url, limits.linkMaxLength);
  const title = sanitizeText(item.title);
  const snippet = sanitizeText(item.description);

  if (!link && !title && !snippet) {
    return undefined;
  }

  return {
    title: boundedField(title, limits.titleMaxLength),
    link,
    snippet: boundedField(snippet, limits.snippetMaxLength),
    source: boundedField(item.source, limits.sourceMaxLength),
  };
}
