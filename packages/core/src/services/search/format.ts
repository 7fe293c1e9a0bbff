/**
 * Agent-facing rendering of search outcomes
 */

import type { NormalizedSearchResult } from "../../interfaces/search-provider";
import { formatTimestamp } from "../../utils/date-format";
import { sanitizeText, truncateText } from "./sanitize";

export const SEARCH_TRUNCATION_MARKER =
  "\n\n[Search results truncated due to length limit]";

/**
 * Message returned when every backend failed
 */
export function degradedSearchMessage(query: string): string {
  return `Search temporarily unavailable for query: '${query}'

I am currently unable to access external search engines. I can still provide information based on my training data.

For the topic '${query}', I can offer general information and insights. Let me know if you would like what I know about this subject, or try the search again later.`;
}

/**
 * Render results as a markdown summary, bounded to maxLength characters
 * plus the truncation marker
 */
export function formatSearchResults(
  query: string,
  results: NormalizedSearchResult[],
  maxLength: number,
  now: Date = new Date()
): string {
  const cleanQuery = sanitizeText(query) || "N/A";

  if (results.length === 0) {
    return `No search results found for query: ${cleanQuery}`;
  }

  const sources = Array.from(new Set(results.map((result) => result.source)));

  const lines = [
    "## Search Results Summary",
    `**Query**: ${cleanQuery}`,
    `**Results Count**: ${results.length}`,
    `**Sources**: ${sources.join(", ")}`,
    `**Search Time**: ${formatTimestamp(now)}`,
    "",
    "## Detailed Results",
    "",
  ];

  results.forEach((result, index) => {
    lines.push(
      `### Result ${index + 1}: ${result.title}`,
      `**Source**: ${result.source}`,
      `**URL**: ${result.link || "N/A"}`,
      `**Summary**: ${result.snippet}`,
      "",
      "---",
      ""
    );
  });

  const formatted = lines.join("\n").trimEnd();

  if (formatted.length > maxLength) {
    return truncateText(formatted, maxLength) + SEARCH_TRUNCATION_MARKER;
  }
  return formatted;
}
