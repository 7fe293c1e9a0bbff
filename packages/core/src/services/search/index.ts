/**
 * Search backends and resolver
 */

import type {
  SearchBackend,
  SearchBackendName,
} from "../../interfaces/search-provider";
import type { SearchConfig } from "../research-engine/config";
import { BraveSearchProvider } from "./brave-provider";
import { DuckDuckGoSearchProvider } from "./duckduckgo-provider";
import { GoogleSearchProvider } from "./google-provider";
import { SerpApiSearchProvider } from "./serpapi-provider";
import { TavilySearchProvider } from "./tavily-provider";
import { WikipediaSearchProvider } from "./wikipedia-provider";

export { SearchResolver, type SearchResolverOptions } from "./resolver";
export {
  sanitizeText,
  truncateText,
  sanitizeLink,
  normalizeResult,
} from "./sanitize";
export {
  formatSearchResults,
  degradedSearchMessage,
  SEARCH_TRUNCATION_MARKER,
} from "./format";
export {
  BraveSearchProvider,
  DuckDuckGoSearchProvider,
  GoogleSearchProvider,
  SerpApiSearchProvider,
  TavilySearchProvider,
  WikipediaSearchProvider,
};

export type SearchEnv = Record<string, string | undefined>;

/**
 * Build a backend by name. Credentials come from the environment; a missing
 * key is reported by the backend when it is tried.
 */
export function createSearchBackend(
  name: SearchBackendName,
  config: SearchConfig,
  env: SearchEnv
): SearchBackend {
  const timeoutMs = config.requestTimeoutMs;

  switch (name) {
    case "tavily":
      return new TavilySearchProvider({
        apiKey: env.TAVILY_API_KEY,
        timeoutMs,
        searchDepth: config.tavilySearchDepth,
      });
    case "brave":
      return new BraveSearchProvider({
        apiKey: env.BRAVE_SEARCH_API_KEY,
        timeoutMs,
      });
    case "serpapi":
      return new SerpApiSearchProvider({
        apiKey: env.SERPAPI_API_KEY,
        timeoutMs,
      });
    case "google":
      return new GoogleSearchProvider({
        apiKey: env.GOOGLE_SEARCH_API_KEY,
        searchEngineId: env.GOOGLE_SEARCH_ENGINE_ID,
        timeoutMs,
      });
    case "duckduckgo":
      return new DuckDuckGoSearchProvider({ timeoutMs });
    case "wikipedia":
      return new WikipediaSearchProvider({ timeoutMs });
  }
}

/**
 * Build the configured backends in priority order
 */
export function createSearchBackends(
  config: SearchConfig,
  env: SearchEnv = process.env
): SearchBackend[] {
  return config.backends.map((name) => createSearchBackend(name, config, env));
}
