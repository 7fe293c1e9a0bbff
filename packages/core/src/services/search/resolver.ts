/**
 * Search Resolver
 *
 * Tries the configured backends in priority order and returns the first
 * non-empty, sanitized result list. Backend failures are logged and
 * skipped; when every backend comes back empty the outcome is "failed"
 * with a degraded-service message the agent can still work with.
 */

import type {
  NormalizedSearchResult,
  SearchBackend,
  SearchOutcome,
} from "../../interfaces/search-provider";
import { logger } from "../../logger";
import { dedupeByUrl } from "../../utils/deduplication";
import { fetchPage, type ExtractionOptions } from "../content-extractor";
import type { SanitizationConfig } from "../research-engine/config";
import { degradedSearchMessage, formatSearchResults } from "./format";
import { normalizeResult, sanitizeText } from "./sanitize";

const log = logger.child("search-resolver");

export const MIN_RESULT_COUNT = 1;
export const MAX_RESULT_COUNT = 10;
export const DEFAULT_RESULT_COUNT = 10;

export interface SearchResolverOptions {
  // Priority order; the first backend with results wins
  backends: SearchBackend[];
  sanitization: SanitizationConfig;
  // Used when resolve() is called without a count (clamped to 1-10)
  defaultResultCount?: number;
  extraction?: ExtractionOptions;
  now?: () => Date;
}

function clampResultCount(count: number): number {
  if (!Number.isFinite(count)) return DEFAULT_RESULT_COUNT;
  return Math.min(
    MAX_RESULT_COUNT,
    Math.max(MIN_RESULT_COUNT, Math.floor(count))
  );
}

export class SearchResolver {
  private readonly backends: SearchBackend[];
  private readonly sanitization: SanitizationConfig;
  private readonly defaultResultCount: number;
  private readonly extraction: ExtractionOptions;
  private readonly now: () => Date;

  constructor(options: SearchResolverOptions) {
    this.backends = [...options.backends];
    this.sanitization = options.sanitization;
    this.defaultResultCount = clampResultCount(
      options.defaultResultCount ?? DEFAULT_RESULT_COUNT
    );
    this.extraction = options.extraction ?? {};
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Names of the configured backends, in priority order
   */
  getBackendNames(): string[] {
    return this.backends.map((backend) => backend.name);
  }

  /**
   * Resolve a query against the backends. Never throws.
   */
  async resolve(
    query: string,
    desiredCount?: number
  ): Promise<SearchOutcome> {
    const count =
      desiredCount === undefined
        ? this.defaultResultCount
        : clampResultCount(desiredCount);
    const failures: string[] = [];

    if (!sanitizeText(query)) {
      return this.failed(query, "Empty query");
    }

    for (const backend of this.backends) {
      let results: NormalizedSearchResult[];

      try {
        const items = await backend.search(query, count);
        results = dedupeByUrl(
          items.flatMap((item) => {
            const normalized = normalizeResult(item, this.sanitization);
            return normalized ? [normalized] : [];
          }),
          (result) => result.link
        ).slice(0, count);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        log.warn("Search backend failed", { backend: backend.name, error: message });
        failures.push(`${backend.name}: ${message}`);
        continue;
      }

      if (results.length === 0) {
        log.debug("Search backend returned no results", { backend: backend.name });
        continue;
      }

      log.info("Search successful", {
        backend: backend.name,
        query,
        results: results.length,
      });

      return {
        query,
        status: "success",
        results,
        methodUsed: backend.name,
        message: formatSearchResults(
          query,
          results,
          this.sanitization.summaryMaxLength,
          this.now()
        ),
      };
    }

    const detail =
      failures.length > 0
        ? `All search methods failed (${failures.join("; ")})`
        : "All search methods failed";
    return this.failed(query, detail);
  }

  /**
   * Fetch a page through the shared content extractor
   */
  async fetchPage(url: string, maxChars?: number): Promise<string> {
    return fetchPage(url, maxChars, { now: this.now, ...this.extraction });
  }

  private failed(query: string, errorDetail: string): SearchOutcome {
    log.warn("Search unavailable", { query, error: errorDetail });
    return {
      query,
      status: "failed",
      results: [],
      methodUsed: "failed",
      errorDetail,
      message: degradedSearchMessage(query),
    };
  }
}
