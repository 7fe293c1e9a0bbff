/**
 * Wikipedia Provider
 *
 * Last-resort encyclopedic backend. Tries the page summary for an exact
 * title match first, then falls back to full-text search.
 */

import type {
  SearchBackend,
  SearchBackendName,
  SearchResultItem,
} from "../../interfaces/search-provider";
import { logger } from "../../logger";
import { asArray, asRecord, asString } from "../../utils/json";
import { fetchJson } from "./http";
import type { BackendOptions } from "./types";

const log = logger.child("wikipedia");

const SUMMARY_API_URL = "https://en.wikipedia.org/api/rest_v1/page/summary/";
const SEARCH_API_URL = "https://en.wikipedia.org/w/api.php";
const ARTICLE_BASE_URL = "https://en.wikipedia.org/wiki/";

function titleSlug(title: string): string {
  return encodeURIComponent(title.replace(/ /g, "_"));
}

function articleUrl(title: string): string {
  return ARTICLE_BASE_URL + titleSlug(title);
}

export class WikipediaSearchProvider implements SearchBackend {
  readonly name: SearchBackendName = "wikipedia";

  constructor(private readonly options: BackendOptions) {}

  private async searchSummary(query: string): Promise<SearchResultItem[]> {
    const data = asRecord(
      await fetchJson(SUMMARY_API_URL + titleSlug(query), {
        label: "Wikipedia",
        timeoutMs: this.options.timeoutMs,
      })
    );

    const extract = asString(data?.extract);
    if (!data || !extract) return [];

    const title = asString(data.title, query);
    const desktop = asRecord(asRecord(data.content_urls)?.desktop);

    return [
      {
        title,
        url: asString(desktop?.page, articleUrl(title)),
        description: extract,
        source: "Wikipedia",
      },
    ];
  }

  private async searchFullText(
    query: string,
    count: number
  ): Promise<SearchResultItem[]> {
    const params = new URLSearchParams({
      action: "query",
      format: "json",
      list: "search",
      srsearch: query,
      srlimit: Math.min(count, 5).toString(),
    });

    const data = await fetchJson(`${SEARCH_API_URL}?${params.toString()}`, {
      label: "Wikipedia",
      timeoutMs: this.options.timeoutMs,
    });

    return asArray(asRecord(asRecord(data)?.query)?.search).map((entry) => {
      const item = asRecord(entry) ?? {};
      const title = asString(item.title);
      return {
        title,
        url: articleUrl(title),
        // Snippets carry <span class="searchmatch"> highlighting
        description: asString(item.snippet).replace(/<[^>]+>/g, ""),
        source: "Wikipedia",
      };
    });
  }

  async search(query: string, count: number): Promise<SearchResultItem[]> {
    try {
      const summary = await this.searchSummary(query);
      if (summary.length > 0) return summary;
    } catch (error) {
      log.debug("Summary lookup failed, using full-text search", {
        query,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    return this.searchFullText(query, count);
  }
}
