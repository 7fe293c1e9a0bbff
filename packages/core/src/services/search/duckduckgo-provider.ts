/**
 * DuckDuckGo Instant Answer Provider
 *
 * Keyless. Returns the abstract (when present) followed by related topics.
 */

import type {
  SearchBackend,
  SearchBackendName,
  SearchResultItem,
} from "../../interfaces/search-provider";
import { extractDomain } from "../../utils/deduplication";
import { asArray, asRecord, asString } from "../../utils/json";
import { fetchJson } from "./http";
import type { BackendOptions } from "./types";

const DUCKDUCKGO_API_URL = "https://api.duckduckgo.com/";

export class DuckDuckGoSearchProvider implements SearchBackend {
  readonly name: SearchBackendName = "duckduckgo";

  constructor(private readonly options: BackendOptions) {}

  async search(query: string, count: number): Promise<SearchResultItem[]> {
    const params = new URLSearchParams({
      q: query,
      format: "json",
      no_html: "1",
      skip_disambig: "1",
    });

    const data = asRecord(
      await fetchJson(`${DUCKDUCKGO_API_URL}?${params.toString()}`, {
        label: "DuckDuckGo",
        timeoutMs: this.options.timeoutMs,
      })
    );
    if (!data) return [];

    const results: SearchResultItem[] = [];

    const abstract = asString(data.Abstract);
    if (abstract) {
      const abstractSource = asString(data.AbstractSource);
      results.push({
        title: abstractSource || "DuckDuckGo",
        url: asString(data.AbstractURL),
        description: abstract,
        source: abstractSource,
      });
    }

    for (const entry of asArray(data.RelatedTopics)) {
      const topic = asRecord(entry);
      const text = asString(topic?.Text);
      // Grouped topics have no Text of their own
      if (!topic || !text) continue;

      const firstUrl = asString(topic.FirstURL);
      results.push({
        title: text.includes(" - ") ? text.split(" - ")[0] : text,
        url: firstUrl,
        description: text,
        source: extractDomain(firstUrl) ?? "",
      });
    }

    return results.slice(0, count);
  }
}
