/**
 * Core package entry point
 *
 * Exports the research pipeline: orchestrator, search resolver, tools,
 * agents and the provider factory.
 */

// Interfaces
export type * from "./interfaces";

// Errors and logging
export {
  ConfigurationError,
  AgentInvocationError,
  TimeoutError,
  withTimeout,
} from "./errors";
export { logger, type Logger, type LogMeta } from "./logger";

// Services
export * from "./services/research-engine";
export * from "./services/search";
export * from "./services/tools";
export * from "./services/llm";
export { fetchPage, type ExtractionOptions } from "./services/content-extractor";

// Providers
export {
  createResearchSystem,
  createChatClient,
  resolveChatClientConfig,
  DEEPSEEK_BASE_URL,
  type ResearchSystem,
  type ResearchSystemOptions,
  type ChatClientConfig,
} from "./providers";

// Utilities
export * from "./utils";
