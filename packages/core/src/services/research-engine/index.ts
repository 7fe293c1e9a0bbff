/**
 * Research Engine service
 *
 * Staged orchestrator that coordinates the full research flow:
 * 1. Collect findings (researcher agent with search tools)
 * 2. Analyze findings (analyst agent)
 * 3. Refine while the analysis reports knowledge gaps (bounded)
 * 4. Stream the final report (writer agent)
 */

export {
  ResearchOrchestrator,
  ADDITIONAL_RESEARCH_SEPARATOR,
} from "./orchestrator";
export { ConvergenceController, DEFAULT_GAP_INDICATORS } from "./convergence";
export {
  detectLanguage,
  getLanguageDisplayName,
  isLanguage,
  SUPPORTED_LANGUAGES,
  type LanguageDetection,
} from "./language";
export {
  analyzeQueryType,
  getQueryTypeLabel,
  type QueryType,
} from "./query-analysis";
export {
  createEvent,
  serializeEvent,
  parseEventLine,
  isProgressEventType,
  PROGRESS_EVENT_TYPES,
  type ProgressEvent,
  type ProgressEventType,
  type ProgressStage,
  type CompletionData,
} from "./events";
export {
  summarizeSearchActivity,
  formatSearchActivity,
} from "./search-summary";
export {
  loadConfig,
  getConfig,
  clearConfigCache,
  getConfigPath,
  withConfigOverrides,
  DEFAULT_CONFIG,
  LLM_PROVIDERS,
  isLLMProvider,
  type LLMProvider,
  type ResearchConfig,
  type LLMConfig,
  type ModelConfig,
  type SearchConfig,
  type SanitizationConfig,
  type ExtractionConfig,
  type ResearchPipelineConfig,
  type LimitsConfig,
} from "./config";
export type {
  Language,
  SessionStage,
  ResearchSession,
  OrchestratorDependencies,
  SearchActivitySummary,
} from "./types";
