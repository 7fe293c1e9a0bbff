/**
 * Search activity summary
 *
 * Derived from the researcher's findings text: which URLs it cites, which
 * domains they belong to, and a short preview of the first few.
 */

import { extractDomain } from "../../utils/deduplication";
import { sanitizeText, truncateText } from "../search/sanitize";
import type { SearchActivitySummary } from "./types";

const URL_PATTERN = /https?:\/\/[^\s<>"'`)\]]+/g;
const MARKDOWN_LINK = /\[([^\]\n]+)\]\((https?:\/\/[^\s)]+)\)/g;
const TRAILING_PUNCTUATION = /[.,;:!?]+$/;

const MAX_DOMAINS = 5;
const MAX_PREVIEWS = 3;
const PREVIEW_TITLE_LENGTH = 100;
const PREVIEW_SNIPPET_LENGTH = 150;

function cleanUrl(url: string): string {
  return url.replace(TRAILING_PUNCTUATION, "");
}

function citedUrls(findings: string): string[] {
  const urls = (findings.match(URL_PATTERN) ?? [])
    .map(cleanUrl)
    .filter((url) => extractDomain(url) !== undefined);
  return Array.from(new Set(urls));
}

function linkTitles(findings: string): Map<string, string> {
  const titles = new Map<string, string>();
  for (const match of findings.matchAll(MARKDOWN_LINK)) {
    const url = cleanUrl(match[2]);
    if (!titles.has(url)) titles.set(url, match[1].trim());
  }
  return titles;
}

/**
 * The line citing a URL, without any URLs in it
 */
function contextSnippet(findings: string, url: string): string {
  const line = findings.split("\n").find((candidate) => candidate.includes(url));
  if (!line) return "";
  return truncateText(
    sanitizeText(line.replace(URL_PATTERN, " ")),
    PREVIEW_SNIPPET_LENGTH
  );
}

export function summarizeSearchActivity(
  query: string,
  findings: string,
  now: Date = new Date()
): SearchActivitySummary {
  const urls = citedUrls(findings);
  const titles = linkTitles(findings);

  const domains: string[] = [];
  for (const url of urls) {
    const domain = extractDomain(url);
    if (domain && !domains.includes(domain)) domains.push(domain);
  }

  return {
    query,
    totalSources: urls.length,
    domains: domains.slice(0, MAX_DOMAINS),
    status: urls.length > 0 ? "success" : "no_sources",
    timestamp: now.toISOString(),
    resultsPreview: urls.slice(0, MAX_PREVIEWS).map((url) => {
      const domain = extractDomain(url) ?? "unknown";
      return {
        title: truncateText(
          sanitizeText(titles.get(url) ?? domain),
          PREVIEW_TITLE_LENGTH
        ),
        domain,
        snippet: contextSnippet(findings, url),
      };
    }),
  };
}

export function formatSearchActivity(summary: SearchActivitySummary): string {
  const lines = [
    "## Search Activity Summary",
    `- **Query**: ${summary.query}`,
    `- **Sources Referenced**: ${summary.totalSources}`,
    `- **Top Domains**: ${
      summary.domains.length > 0 ? summary.domains.join(", ") : "None"
    }`,
  ];

  if (summary.resultsPreview.length > 0) {
    lines.push("", "### Top Sources");
    summary.resultsPreview.forEach((preview, index) => {
      lines.push(`${index + 1}. ${preview.title} (${preview.domain})`);
    });
  }

  return lines.join("\n");
}
