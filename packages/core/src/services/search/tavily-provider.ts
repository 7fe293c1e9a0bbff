/**
 * Tavily Search Provider
 *
 * Semantic search API tuned for research agents. Highest priority backend.
 */

import type {
  SearchBackend,
  SearchBackendName,
  SearchResultItem,
} from "../../interfaces/search-provider";
import { asArray, asRecord, asString } from "../../utils/json";
import { fetchJson } from "./http";
import type { BackendOptions } from "./types";

const TAVILY_API_URL = "https://api.tavily.com/search";

export interface TavilyOptions extends BackendOptions {
  searchDepth: "basic" | "advanced";
}

export class TavilySearchProvider implements SearchBackend {
  readonly name: SearchBackendName = "tavily";

  constructor(private readonly options: TavilyOptions) {}

  async search(query: string, count: number): Promise<SearchResultItem[]> {
    const { apiKey, timeoutMs, searchDepth } = this.options;
    if (!apiKey) {
      throw new Error("Tavily Search API key not configured");
    }

    const data = await fetchJson(TAVILY_API_URL, {
      label: "Tavily",
      timeoutMs,
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify({
        query,
        search_depth: searchDepth,
        max_results: Math.min(count, 10),
        include_answer: false,
        include_raw_content: false,
      }),
    });

    return asArray(asRecord(data)?.results)
      .slice(0, count)
      .map((entry) => {
        const item = asRecord(entry) ?? {};
        return {
          title: asString(item.title),
          url: asString(item.url),
          description: asString(item.content),
          source: "Tavily",
        };
      });
  }
}
