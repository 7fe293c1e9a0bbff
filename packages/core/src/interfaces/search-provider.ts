/**
 * Search Provider Interface
 *
 * Abstract interface for search backends.
 * Every backend maps its own response shape into SearchResultItem; the
 * resolver turns those into sanitized NormalizedSearchResult values.
 */

export type SearchBackendName =
  | "tavily"
  | "brave"
  | "serpapi"
  | "google"
  | "duckduckgo"
  | "wikipedia";

/**
 * Single search result as reported by a backend (not yet sanitized)
 */
export interface SearchResultItem {
  title: string;
  url: string;
  description: string;
  source: string;
}

/**
 * Sanitized, length-bounded search result
 */
export interface NormalizedSearchResult {
  title: string;
  link: string;
  snippet: string;
  source: string;
}

/**
 * Result of resolving one query across the ranked backends.
 * A failed outcome is a valid value, not a fault.
 */
export interface SearchOutcome {
  query: string;
  status: "success" | "failed";
  results: NormalizedSearchResult[];
  methodUsed: SearchBackendName | "failed";
  errorDetail?: string;
  // Formatted summary for agents (or the degraded-service message)
  message: string;
}

/**
 * Search backend interface
 * All backends must implement these members
 */
export interface SearchBackend {
  readonly name: SearchBackendName;

  /**
   * Execute a single search. Throws on any failure, including
   * missing credentials.
   */
  search(query: string, count: number): Promise<SearchResultItem[]>;
}
