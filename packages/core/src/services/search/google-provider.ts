/**
 * Google Custom Search Provider
 */

import type {
  SearchBackend,
  SearchBackendName,
  SearchResultItem,
} from "../../interfaces/search-provider";
import { asArray, asRecord, asString } from "../../utils/json";
import { fetchJson } from "./http";
import type { BackendOptions } from "./types";

const GOOGLE_CSE_URL = "https://www.googleapis.com/customsearch/v1";

export interface GoogleSearchOptions extends BackendOptions {
  searchEngineId?: string;
}

export class GoogleSearchProvider implements SearchBackend {
  readonly name: SearchBackendName = "google";

  constructor(private readonly options: GoogleSearchOptions) {}

  async search(query: string, count: number): Promise<SearchResultItem[]> {
    const { apiKey, searchEngineId, timeoutMs } = this.options;
    if (!apiKey || !searchEngineId) {
      throw new Error("Google Search API credentials not configured");
    }

    const params = new URLSearchParams({
      key: apiKey,
      cx: searchEngineId,
      q: query,
      num: Math.min(count, 10).toString(),
    });

    const data = await fetchJson(`${GOOGLE_CSE_URL}?${params.toString()}`, {
      label: "Google Search",
      timeoutMs,
    });

    return asArray(asRecord(data)?.items)
      .slice(0, count)
      .map((entry) => {
        const item = asRecord(entry) ?? {};
        return {
          title: asString(item.title),
          url: asString(item.link),
          description: asString(item.snippet),
          source: asString(item.displayLink),
        };
      });
  }
}
