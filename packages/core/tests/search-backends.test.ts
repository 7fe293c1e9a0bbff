/**
 * Tests for the individual search backends.
 *
 * fetch is stubbed, so these cover request construction and response
 * mapping only. Verifies that:
 * - keyed backends refuse to run without credentials
 * - each backend maps its response shape to SearchResultItem
 * - HTTP errors and timeouts surface as thrown errors
 * - createSearchBackends builds backends in configured order
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  BraveSearchProvider,
  DuckDuckGoSearchProvider,
  GoogleSearchProvider,
  SerpApiSearchProvider,
  TavilySearchProvider,
  WikipediaSearchProvider,
  createSearchBackends,
} from "../src/services/search";
import { DEFAULT_CONFIG } from "../src/services/research-engine/config";
import { jsonResponse } from "./helpers";

const fetchMock = vi.fn<(url: string | URL | Request, init?: RequestInit) => Promise<Response>>();

function requestUrl(callIndex = 0): string {
  return String(fetchMock.mock.calls[callIndex][0]);
}

function requestInit(callIndex = 0): RequestInit {
  return fetchMock.mock.calls[callIndex][1] ?? {};
}

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal("fetch", fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

// =============================================================================
// Tavily
// =============================================================================

describe("TavilySearchProvider", () => {
  const provider = new TavilySearchProvider({
    apiKey: "test-secret",
    timeoutMs: 1000,
    searchDepth: "advanced",
  });

  it("posts the query and maps results", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        results: [{ title: "T", url: "https://t.com", content: "C" }],
      })
    );

    const items = await provider.search("fusion", 5);

    expect(items).toEqual([
      { title: "T", url: "https://t.com", description: "C", source: "Tavily" },
    ]);
    expect(requestUrl()).toBe("https://api.tavily.com/search");

    const init = requestInit();
    expect(init.method).toBe("POST");
    expect(init.headers).toMatchObject({ Authorization: "Bearer test-secret" });
    expect(JSON.parse(String(init.body))).toMatchObject({
      query: "fusion",
      search_depth: "advanced",
      max_results: 5,
    });
  });

  it("requires an API key", async () => {
    const keyless = new TavilySearchProvider({ timeoutMs: 1000, searchDepth: "basic" });
    await expect(keyless.search("fusion", 5)).rejects.toThrow(
      "Tavily Search API key not configured"
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("throws on HTTP errors", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: "bad" }, 401));
    await expect(provider.search("fusion", 5)).rejects.toThrow(
      'Tavily API error (401): {"error":"bad"}'
    );
  });

  it("turns an aborted request into a timeout", async () => {
    fetchMock.mockRejectedValueOnce(
      Object.assign(new Error("aborted"), { name: "AbortError" })
    );
    await expect(provider.search("fusion", 5)).rejects.toThrow(
      "Tavily request timed out after 1000ms"
    );
  });
});

// =============================================================================
// Brave, SerpAPI, Google
// =============================================================================

describe("BraveSearchProvider", () => {
  it("sends the subscription token and maps web results", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        web: {
          results: [
            {
              title: "A",
              url: "https://a.com",
              description: "About A",
              meta_url: { hostname: "a.com" },
            },
            { title: "B", url: "https://b.com", description: "About B" },
          ],
        },
      })
    );

    const provider = new BraveSearchProvider({ apiKey: "test-secret", timeoutMs: 1000 });
    const items = await provider.search("fusion", 3);

    expect(items).toEqual([
      { title: "A", url: "https://a.com", description: "About A", source: "a.com" },
      { title: "B", url: "https://b.com", description: "About B", source: "Brave Search" },
    ]);
    expect(new URL(requestUrl()).searchParams.get("count")).toBe("3");
    expect(requestInit().headers).toMatchObject({ "X-Subscription-Token": "test-secret" });
  });

  it("requires an API key", async () => {
    const provider = new BraveSearchProvider({ timeoutMs: 1000 });
    await expect(provider.search("fusion", 3)).rejects.toThrow(
      "Brave Search API key not configured"
    );
  });
});

describe("SerpApiSearchProvider", () => {
  it("maps organic results", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        organic_results: [{ title: "S", link: "https://s.com", snippet: "Snip" }],
      })
    );

    const provider = new SerpApiSearchProvider({ apiKey: "test-secret", timeoutMs: 1000 });

    expect(await provider.search("fusion", 10)).toEqual([
      { title: "S", url: "https://s.com", description: "Snip", source: "SerpAPI" },
    ]);
    expect(new URL(requestUrl()).searchParams.get("q")).toBe("fusion");
  });

  it("requires an API key", async () => {
    const provider = new SerpApiSearchProvider({ timeoutMs: 1000 });
    await expect(provider.search("fusion", 10)).rejects.toThrow("SerpAPI key not configured");
  });
});

describe("GoogleSearchProvider", () => {
  it("maps items with their display link", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        items: [
          { title: "G", link: "https://g.com/x", snippet: "Gee", displayLink: "g.com" },
        ],
      })
    );

    const provider = new GoogleSearchProvider({
      apiKey: "test-secret",
      searchEngineId: "test-engine",
      timeoutMs: 1000,
    });

    expect(await provider.search("fusion", 10)).toEqual([
      { title: "G", url: "https://g.com/x", description: "Gee", source: "g.com" },
    ]);
    expect(new URL(requestUrl()).searchParams.get("cx")).toBe("test-engine");
  });

  it("requires both the key and the engine id", async () => {
    const provider = new GoogleSearchProvider({ apiKey: "test-secret", timeoutMs: 1000 });
    await expect(provider.search("fusion", 10)).rejects.toThrow(
      "Google Search API credentials not configured"
    );
  });
});

// =============================================================================
// DuckDuckGo
// =============================================================================

describe("DuckDuckGoSearchProvider", () => {
  it("returns the abstract followed by related topics", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        Abstract: "Fusion is a nuclear reaction.",
        AbstractSource: "Wikipedia",
        AbstractURL: "https://en.wikipedia.org/wiki/Nuclear_fusion",
        RelatedTopics: [
          { Text: "Tokamak - a magnetic confinement device", FirstURL: "https://duckduckgo.com/Tokamak" },
          { Name: "Grouped", Topics: [] },
        ],
      })
    );

    const provider = new DuckDuckGoSearchProvider({ timeoutMs: 1000 });

    expect(await provider.search("fusion", 10)).toEqual([
      {
        title: "Wikipedia",
        url: "https://en.wikipedia.org/wiki/Nuclear_fusion",
        description: "Fusion is a nuclear reaction.",
        source: "Wikipedia",
      },
      {
        title: "Tokamak",
        url: "https://duckduckgo.com/Tokamak",
        description: "Tokamak - a magnetic confinement device",
        source: "duckduckgo.com",
      },
    ]);
  });

  it("limits the number of results", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        Abstract: "Fusion is a nuclear reaction.",
        AbstractSource: "Wikipedia",
        AbstractURL: "https://en.wikipedia.org/wiki/Nuclear_fusion",
        RelatedTopics: [{ Text: "Tokamak", FirstURL: "https://duckduckgo.com/Tokamak" }],
      })
    );

    const provider = new DuckDuckGoSearchProvider({ timeoutMs: 1000 });
    const items = await provider.search("fusion", 1);
    expect(items.map((item) => item.title)).toEqual(["Wikipedia"]);
  });
});

// =============================================================================
// Wikipedia
// =============================================================================

describe("WikipediaSearchProvider", () => {
  const provider = new WikipediaSearchProvider({ timeoutMs: 1000 });

  it("uses the page summary when the title matches", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        title: "Quantum computing",
        extract: "A quantum computer exploits quantum mechanics.",
        content_urls: {
          desktop: { page: "https://en.wikipedia.org/wiki/Quantum_computing" },
        },
      })
    );

    expect(await provider.search("quantum computing", 3)).toEqual([
      {
        title: "Quantum computing",
        url: "https://en.wikipedia.org/wiki/Quantum_computing",
        description: "A quantum computer exploits quantum mechanics.",
        source: "Wikipedia",
      },
    ]);
    expect(requestUrl()).toBe(
      "https://en.wikipedia.org/api/rest_v1/page/summary/quantum_computing"
    );
  });

  it("falls back to full-text search", async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ title: "Not found" }, 404))
      .mockResolvedValueOnce(
        jsonResponse({
          query: {
            search: [
              {
                title: "Quantum computing",
                snippet: '<span class="searchmatch">Quantum</span> computers',
              },
            ],
          },
        })
      );

    expect(await provider.search("qubits explained", 3)).toEqual([
      {
        title: "Quantum computing",
        url: "https://en.wikipedia.org/wiki/Quantum_computing",
        description: "Quantum computers",
        source: "Wikipedia",
      },
    ]);
    expect(new URL(requestUrl(1)).searchParams.get("srlimit")).toBe("3");
  });
});

// =============================================================================
// Factory
// =============================================================================

describe("createSearchBackends", () => {
  it("builds the configured backends in order", () => {
    const backends = createSearchBackends(
      { ...DEFAULT_CONFIG.search, backends: ["wikipedia", "tavily", "duckduckgo"] },
      {}
    );
    expect(backends.map((backend) => backend.name)).toEqual([
      "wikipedia",
      "tavily",
      "duckduckgo",
    ]);
  });
});
