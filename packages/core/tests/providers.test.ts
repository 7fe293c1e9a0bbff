/**
 * Tests for research system wiring.
 *
 * Verifies that:
 * - a missing LLM key or an unknown provider is reported as a ConfigurationError
 * - provider settings resolve to the right endpoint
 * - a system built around an injected chat client runs a full session
 */

import { describe, it, expect } from "vitest";
import {
  DEEPSEEK_BASE_URL,
  createResearchSystem,
  resolveChatClientConfig,
} from "../src/providers";
import { ConfigurationError } from "../src/errors";
import type { ResearchConfig } from "../src/services/research-engine/config";
import { ScriptedChatClient, TEST_CONFIG, collect } from "./helpers";

const UNKNOWN_PROVIDER_CONFIG: ResearchConfig = {
  ...TEST_CONFIG,
  llm: { ...TEST_CONFIG.llm, provider: "anthropic" },
};

const DEEPSEEK_CONFIG: ResearchConfig = {
  ...TEST_CONFIG,
  llm: { ...TEST_CONFIG.llm, provider: "deepseek" },
};

// =============================================================================
// resolveChatClientConfig
// =============================================================================

describe("resolveChatClientConfig", () => {
  it("requires the provider's API key", () => {
    expect(() => resolveChatClientConfig(TEST_CONFIG, {})).toThrow(ConfigurationError);
    expect(() => resolveChatClientConfig(TEST_CONFIG, {})).toThrow(
      'OPENAI_API_KEY is not set (required for the "openai" LLM provider)'
    );
  });

  it("rejects an unknown provider instead of defaulting to OpenAI", () => {
    const resolve = () =>
      resolveChatClientConfig(UNKNOWN_PROVIDER_CONFIG, { OPENAI_API_KEY: "test-secret" });

    expect(resolve).toThrow(ConfigurationError);
    expect(resolve).toThrow(
      'Unknown LLM provider "anthropic" (expected one of: openai, deepseek)'
    );
  });

  it("uses the default endpoint for OpenAI", () => {
    expect(resolveChatClientConfig(TEST_CONFIG, { OPENAI_API_KEY: "test-secret" })).toEqual({
      provider: "openai",
      apiKey: "test-secret",
      baseUrl: undefined,
      timeoutMs: 1000,
    });
  });

  it("points DeepSeek at its own endpoint", () => {
    const clientConfig = resolveChatClientConfig(DEEPSEEK_CONFIG, {
      DEEPSEEK_API_KEY: "test-secret",
      OPENAI_API_KEY: "unused",
    });
    expect(clientConfig.apiKey).toBe("test-secret");
    expect(clientConfig.baseUrl).toBe(DEEPSEEK_BASE_URL);
  });

  it("prefers a configured base URL", () => {
    const config: ResearchConfig = {
      ...DEEPSEEK_CONFIG,
      llm: { ...DEEPSEEK_CONFIG.llm, baseUrl: "http://localhost:8080/v1" },
    };
    expect(resolveChatClientConfig(config, { DEEPSEEK_API_KEY: "test-secret" }).baseUrl).toBe(
      "http://localhost:8080/v1"
    );
  });
});

// =============================================================================
// createResearchSystem
// =============================================================================

describe("createResearchSystem", () => {
  const config: ResearchConfig = {
    ...TEST_CONFIG,
    search: { ...TEST_CONFIG.search, backends: ["duckduckgo", "wikipedia"] },
  };

  it("fails fast without an LLM key", () => {
    expect(() => createResearchSystem({ config, env: {} })).toThrow(ConfigurationError);
  });

  it("rejects an unknown provider even with an injected chat client", () => {
    expect(() =>
      createResearchSystem({
        config: UNKNOWN_PROVIDER_CONFIG,
        env: {},
        chatClient: new ScriptedChatClient([]),
      })
    ).toThrow(ConfigurationError);
  });

  it("wires backends, tools and agents from configuration", () => {
    const system = createResearchSystem({
      config,
      env: {},
      chatClient: new ScriptedChatClient([]),
    });

    expect(system.resolver.getBackendNames()).toEqual(["duckduckgo", "wikipedia"]);
    expect(system.tools.list().map((tool) => tool.name)).toEqual([
      "generate_search_queries",
      "enhanced_web_search",
      "get_page_content",
    ]);
    expect(system.agents.researcher.name).toBe(config.llm.models.researcher.model);
    expect(system.agents.writer.name).toBe(config.llm.models.writer.model);
  });

  it("runs a session end to end", async () => {
    const chatClient = new ScriptedChatClient(
      [
        { content: "Findings from https://example.com/source", toolCalls: [] },
        { content: "The findings are consistent.", toolCalls: [] },
      ],
      ["# Report", "\n\nDone."]
    );
    const system = createResearchSystem({ config, env: {}, chatClient });

    const events = await collect(system.orchestrator.run("Photosynthesis"));
    const complete = events[events.length - 1];

    expect(complete.type).toBe("complete");
    expect(complete.data.final_report).toBe("# Report\n\nDone.");
    expect(complete.data.research_findings).toBe("Findings from https://example.com/source");
    expect(complete.data.research_loops).toBe(1);

    const searchEvent = events.find((event) => event.step === "initial_research_complete");
    expect(searchEvent?.message).toContain("- **Top Domains**: example.com");
  });
});
