/**
 * Provider-agnostic interfaces
 */

export type { Agent, AgentRole } from "./agent";
export type {
  SearchBackend,
  SearchBackendName,
  SearchResultItem,
  NormalizedSearchResult,
  SearchOutcome,
} from "./search-provider";
export type {
  ToolDefinition,
  ToolLookup,
  ToolParameters,
  ToolParametersSchema,
  ToolParameterSchema,
  ToolCallRequest,
  ToolCallResult,
} from "./tool";
