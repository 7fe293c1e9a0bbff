/**
 * Type definitions for research engine
 */

import type { Agent } from "../../interfaces/agent";
import type { ToolLookup } from "../../interfaces/tool";
import type { ToolCallAdapter } from "../tools/tool-call-adapter";
import type { ConvergenceController } from "./convergence";
import type { ResearchConfig } from "./config";

export type Language =
  | "english"
  | "chinese"
  | "japanese"
  | "korean"
  | "spanish"
  | "french"
  | "german"
  | "russian";

export type SessionStage =
  | "INIT"
  | "COLLECT"
  | "ANALYZE"
  | "REFINE"
  | "REPORT"
  | "DONE"
  | "ERROR";

/**
 * State of one orchestrator invocation. Never shared across runs.
 */
export interface ResearchSession {
  query: string;
  language: Language;
  stage: SessionStage;
  loopCount: number;
  findings: string;
  analysis: string;
  reportChunks: string[];
}

/**
 * Collaborators and settings for the orchestrator
 */
export interface OrchestratorDependencies {
  researcher: Agent;
  analyst: Agent;
  writer: Agent;

  // Registry used to execute tool calls recovered from agent text
  tools: ToolLookup;
  toolCallAdapter?: ToolCallAdapter;
  convergence?: ConvergenceController;

  // Defaults to the loaded research-config.yaml
  config?: ResearchConfig;
  // "auto" detects from the query (default: from config)
  language?: Language | "auto";
  clock?: () => Date;
}

/**
 * Derived view of the search activity behind a set of findings
 */
export interface SearchActivitySummary {
  query: string;
  totalSources: number;
  domains: string[];
  status: "success" | "no_sources";
  timestamp: string;
  resultsPreview: Array<{
    title: string;
    domain: string;
    snippet: string;
  }>;
}
