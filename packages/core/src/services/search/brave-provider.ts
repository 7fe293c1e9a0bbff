/**
 * Brave Search Provider
 *
 * General web search through the Brave Search API
 */

import type {
  SearchBackend,
  SearchBackendName,
  SearchResultItem,
} from "../../interfaces/search-provider";
import { asArray, asRecord, asString } from "../../utils/json";
import { fetchJson } from "./http";
import type { BackendOptions } from "./types";

const BRAVE_SEARCH_API_URL = "https://api.search.brave.com/res/v1/web/search";
const MIN_REQUEST_INTERVAL = 1000; // 1 second between requests

export class BraveSearchProvider implements SearchBackend {
  readonly name: SearchBackendName = "brave";
  private lastRequestTime = 0;

  constructor(private readonly options: BackendOptions) {}

  /**
   * Rate limiting delay
   */
  private async applyRateLimit(): Promise<void> {
    const timeSinceLastRequest = Date.now() - this.lastRequestTime;

    if (timeSinceLastRequest < MIN_REQUEST_INTERVAL) {
      const waitTime = MIN_REQUEST_INTERVAL - timeSinceLastRequest;
      await new Promise((resolve) => setTimeout(resolve, waitTime));
    }

    this.lastRequestTime = Date.now();
  }

  async search(query: string, count: number): Promise<SearchResultItem[]> {
    const { apiKey, timeoutMs } = this.options;
    if (!apiKey) {
      throw new Error("Brave Search API key not configured");
    }

    await this.applyRateLimit();

    const params = new URLSearchParams({
      q: query,
      count: Math.min(count, 20).toString(),
    });

    const data = await fetchJson(`${BRAVE_SEARCH_API_URL}?${params.toString()}`, {
      label: "Brave Search",
      timeoutMs,
      headers: {
        "Accept-Encoding": "gzip",
        "X-Subscription-Token": apiKey,
      },
    });

    // Extract web results
    const webResults = asArray(asRecord(asRecord(data)?.web)?.results);

    return webResults.slice(0, count).map((entry) => {
      const result = asRecord(entry) ?? {};
      return {
        title: asString(result.title),
        url: asString(result.url),
        description: asString(result.description),
        source: asString(asRecord(result.meta_url)?.hostname, "Brave Search"),
      };
    });
  }
}
