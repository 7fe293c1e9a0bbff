/**
 * SerpAPI Provider (Google results through serpapi.com)
 */

import type {
  SearchBackend,
  SearchBackendName,
  SearchResultItem,
} from "../../interfaces/search-provider";
import { asArray, asRecord, asString } from "../../utils/json";
import { fetchJson } from "./http";
import type { BackendOptions } from "./types";

const SERPAPI_URL = "https://serpapi.com/search";

export class SerpApiSearchProvider implements SearchBackend {
  readonly name: SearchBackendName = "serpapi";

  constructor(private readonly options: BackendOptions) {}

  async search(query: string, count: number): Promise<SearchResultItem[]> {
    const { apiKey, timeoutMs } = this.options;
    if (!apiKey) {
      throw new Error("SerpAPI key not configured");
    }

    const params = new URLSearchParams({
      api_key: apiKey,
      engine: "google",
      q: query,
      google_domain: "google.com",
      gl: "us",
      hl: "en",
      num: Math.min(count, 10).toString(),
    });

    const data = await fetchJson(`${SERPAPI_URL}?${params.toString()}`, {
      label: "SerpAPI",
      timeoutMs,
    });

    return asArray(asRecord(data)?.organic_results)
      .slice(0, count)
      .map((entry) => {
        const item = asRecord(entry) ?? {};
        return {
          title: asString(item.title),
          url: asString(item.link),
          description: asString(item.snippet),
          source: "SerpAPI",
        };
      });
  }
}
