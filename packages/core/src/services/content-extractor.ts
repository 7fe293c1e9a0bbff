/**
 * Content extraction service
 *
 * Fetches a web page and renders its readable content (headings,
 * paragraphs, list items) as sanitized structured text for agents.
 *
 * Configuration is loaded from research-config.yaml
 */

import * as cheerio from "cheerio";
import { logger } from "../logger";
import { formatTimestamp } from "../utils/date-format";
import { getExtractionConfig } from "./research-engine/config";
import { sanitizeText, truncateText } from "./search/sanitize";

const log = logger.child("content-extractor");

export const CONTENT_TRUNCATION_MARKER =
  "\n\n[Content truncated due to length limit]";

/**
 * Options for content extraction
 */
export interface ExtractionOptions {
  maxChars?: number; // Content cap when the caller gives none (default: from config)
  timeoutMs?: number; // Request timeout in ms (default: from config)
  userAgent?: string; // Custom user agent (default: from config)
  now?: () => Date;
}

const BLOCK_SELECTOR = "h1, h2, h3, h4, h5, h6, p, li";

/**
 * Get default extraction options from config
 */
function getDefaultOptions(): Required<ExtractionOptions> {
  const config = getExtractionConfig();
  return {
    maxChars: config.maxChars,
    timeoutMs: config.timeoutMs,
    userAgent: config.userAgent,
    now: () => new Date(),
  };
}

/**
 * Pick the element holding the main content
 * Tries common content selectors
 */
function findContentRoot($: cheerio.CheerioAPI) {
  // Common content selectors (in priority order)
  const contentSelectors = [
    "article",
    '[role="main"]',
    "main",
    ".post-content",
    ".article-content",
    ".entry-content",
    "#content",
  ];

  for (const selector of contentSelectors) {
    const candidate = $(selector).first();
    // Minimum viable content length
    if (candidate.length > 0 && candidate.text().trim().length > 100) {
      return candidate;
    }
  }

  // Fallback to body
  return $("body");
}

/**
 * Render headings, paragraphs and list items as text blocks
 */
function extractBlocks($: cheerio.CheerioAPI): string[] {
  const root = findContentRoot($);
  const blocks: string[] = [];

  root.find(BLOCK_SELECTOR).each((_, element) => {
    // Nested blocks are covered by their outer block's text
    if ($(element).parents(BLOCK_SELECTOR).length > 0) return;

    const text = sanitizeText($(element).text());
    if (!text) return;

    const tag = element.tagName.toLowerCase();
    if (/^h[1-6]$/.test(tag)) {
      blocks.push(`${"#".repeat(Number(tag[1]))} ${text}`);
    } else if (tag === "li") {
      blocks.push(`- ${text}`);
    } else {
      blocks.push(text);
    }
  });

  if (blocks.length === 0) {
    const text = sanitizeText(root.text());
    if (text) blocks.push(text);
  }

  return blocks;
}

function describeError(error: unknown, timeoutMs: number): string {
  if (error instanceof Error) {
    return error.name === "AbortError"
      ? `Request timed out after ${timeoutMs}ms`
      : error.message;
  }
  return String(error);
}

function isPositiveLimit(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value) && value > 0;
}

/**
 * Fetch a page and return it as structured text, capped at maxChars
 * (or the configured extraction limit when omitted).
 * Never throws: failures are returned as an error description.
 */
export async function fetchPage(
  url: string,
  maxChars?: number,
  options?: ExtractionOptions
): Promise<string> {
  const defaults = getDefaultOptions();
  const configuredMax = options?.maxChars;
  const opts = {
    maxChars: isPositiveLimit(configuredMax) ? configuredMax : defaults.maxChars,
    timeoutMs: options?.timeoutMs ?? defaults.timeoutMs,
    userAgent: options?.userAgent ?? defaults.userAgent,
    now: options?.now ?? defaults.now,
  };
  const limit = isPositiveLimit(maxChars) ? maxChars : opts.maxChars;
  const source = sanitizeText(url);

  // Create abort controller for timeout
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), opts.timeoutMs);

  try {
    const parsedUrl = new URL(url);
    if (parsedUrl.protocol !== "http:" && parsedUrl.protocol !== "https:") {
      throw new Error(`Unsupported protocol ${parsedUrl.protocol}`);
    }

    const response = await fetch(parsedUrl.href, {
      signal: controller.signal,
      headers: {
        "User-Agent": opts.userAgent,
        Accept:
          "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        "Accept-Language": "en-US,en;q=0.9",
      },
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}: ${response.statusText}`);
    }

    const html = await response.text();
    const $ = cheerio.load(html);

    const title = sanitizeText($("title").first().text()) || "Web Page";

    // Remove unwanted elements
    $("script, style, nav, footer, iframe, noscript").remove();

    const content = extractBlocks($).join("\n\n");
    if (!content) {
      return `Successfully retrieved content from ${source}, but no readable text was found.`;
    }

    const body =
      content.length > limit
        ? truncateText(content, limit) + CONTENT_TRUNCATION_MARKER
        : content;

    log.debug("Fetched page content", { url, length: body.length });

    return [
      `## Web Content: ${title}`,
      `**Source**: ${source}`,
      `**Retrieved**: ${formatTimestamp(opts.now())}`,
      "",
      body,
    ].join("\n");
  } catch (error) {
    const detail = describeError(error, opts.timeoutMs);
    log.warn("Page fetch failed", { url, error: detail });
    return `Error fetching page content from ${source}: ${detail}`;
  } finally {
    clearTimeout(timeoutId);
  }
}
