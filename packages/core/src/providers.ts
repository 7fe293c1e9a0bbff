/**
 * Provider Factory Functions
 *
 * Centralized creation of the research system from configuration and
 * environment: chat client, search backends, tools, agents and the
 * orchestrator. Missing credentials are reported here, before any session.
 */

import OpenAI from "openai";
import { ConfigurationError } from "./errors";
import type { Agent, AgentRole } from "./interfaces/agent";
import { logger } from "./logger";
import { createOpenAIChatClient, type ChatClient } from "./services/llm/client";
import { OpenAIAgent } from "./services/llm/openai-agent";
import {
  LLM_PROVIDERS,
  getConfig,
  isLLMProvider,
  type LLMProvider,
  type ResearchConfig,
} from "./services/research-engine/config";
import { ConvergenceController } from "./services/research-engine/convergence";
import { ResearchOrchestrator } from "./services/research-engine/orchestrator";
import {
  createSearchBackends,
  type SearchEnv,
} from "./services/search";
import { SearchResolver } from "./services/search/resolver";
import { createResearchTools } from "./services/tools/research-tools";
import { ToolRegistry } from "./services/tools/registry";
import { ToolCallAdapter } from "./services/tools/tool-call-adapter";

const log = logger.child("providers");

export const DEEPSEEK_BASE_URL = "https://api.deepseek.com";

/**
 * LLM Provider configuration
 */
export interface ChatClientConfig {
  provider: LLMProvider;
  apiKey: string;
  baseUrl?: string;
  timeoutMs: number;
}

export interface ResearchSystemOptions {
  // Defaults to the loaded research-config.yaml
  config?: ResearchConfig;
  env?: SearchEnv;
  // Replaces the OpenAI-backed client (tests, custom gateways)
  chatClient?: ChatClient;
}

export interface ResearchSystem {
  config: ResearchConfig;
  resolver: SearchResolver;
  tools: ToolRegistry;
  agents: Record<AgentRole, Agent>;
  orchestrator: ResearchOrchestrator;
}

function requireLLMProvider(config: ResearchConfig): LLMProvider {
  const { provider } = config.llm;
  if (!isLLMProvider(provider)) {
    throw new ConfigurationError(
      `Unknown LLM provider "${provider}" (expected one of: ${LLM_PROVIDERS.join(", ")})`
    );
  }
  return provider;
}

/**
 * Read the API key for the configured LLM provider
 */
export function resolveChatClientConfig(
  config: ResearchConfig,
  env: SearchEnv
): ChatClientConfig {
  const provider = requireLLMProvider(config);
  const { baseUrl } = config.llm;
  const keyName = provider === "deepseek" ? "DEEPSEEK_API_KEY" : "OPENAI_API_KEY";
  const apiKey = env[keyName];

  if (!apiKey) {
    throw new ConfigurationError(
      `${keyName} is not set (required for the "${provider}" LLM provider)`
    );
  }

  return {
    provider,
    apiKey,
    baseUrl: baseUrl || (provider === "deepseek" ? DEEPSEEK_BASE_URL : undefined),
    timeoutMs: config.limits.agentTimeoutMs,
  };
}

/**
 * Create an OpenAI-compatible chat client
 */
export function createChatClient(clientConfig: ChatClientConfig): ChatClient {
  const openai = new OpenAI({
    apiKey: clientConfig.apiKey,
    baseURL: clientConfig.baseUrl,
    timeout: clientConfig.timeoutMs,
    maxRetries: 2,
  });
  return createOpenAIChatClient(openai);
}

/**
 * Build the full research system
 */
export function createResearchSystem(
  options: ResearchSystemOptions = {}
): ResearchSystem {
  const config = options.config ?? getConfig();
  const env = options.env ?? process.env;
  requireLLMProvider(config);

  const chatClient =
    options.chatClient ?? createChatClient(resolveChatClientConfig(config, env));

  const backends = createSearchBackends(config.search, env);
  if (backends.length === 0) {
    log.warn("No search backends configured; searches will report failure");
  }

  const resolver = new SearchResolver({
    backends,
    sanitization: config.sanitization,
    defaultResultCount: config.search.defaultResultCount,
    extraction: {
      maxChars: config.extraction.maxChars,
      timeoutMs: config.extraction.timeoutMs,
      userAgent: config.extraction.userAgent,
    },
  });

  const tools = new ToolRegistry(createResearchTools(resolver));
  const toolCallAdapter = new ToolCallAdapter();

  const createAgent = (role: AgentRole, withTools: boolean): Agent =>
    new OpenAIAgent({
      role,
      client: chatClient,
      model: config.llm.models[role],
      tools: withTools ? tools : undefined,
      nativeToolCalls: config.llm.nativeToolCalls,
      maxToolRounds: config.llm.maxToolRounds,
      toolCallAdapter,
    });

  const agents: Record<AgentRole, Agent> = {
    researcher: createAgent("researcher", true),
    analyst: createAgent("analyst", false),
    writer: createAgent("writer", false),
  };

  const orchestrator = new ResearchOrchestrator({
    ...agents,
    tools,
    toolCallAdapter,
    convergence: new ConvergenceController(),
    config,
  });

  log.info("Research system ready", {
    provider: config.llm.provider,
    backends: resolver.getBackendNames(),
    tools: tools.list().map((tool) => tool.name),
  });

  return { config, resolver, tools, agents, orchestrator };
}
