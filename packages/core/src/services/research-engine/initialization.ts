/**
 * Initialization summary shown at the start of a session
 */

import type { Agent } from "../../interfaces/agent";
import { formatTimestamp } from "../../utils/date-format";
import { getLanguageDisplayName } from "./language";
import {
  analyzeQueryType,
  describeSearchStrategy,
  getQueryTypeLabel,
  type QueryType,
} from "./query-analysis";
import type { Language } from "./types";

export interface InitializationInfo {
  query: string;
  language: Language;
  autoDetected: boolean;
  maxRounds: number;
  agents: { researcher: Agent; analyst: Agent; writer: Agent };
  searchBackends: string[];
  startedAt: Date;
}

export interface InitializationSummary {
  queryType: QueryType;
  text: string;
}

export function buildInitializationSummary(
  info: InitializationInfo
): InitializationSummary {
  const queryType = analyzeQueryType(info.query);
  const wordCount = info.query.split(/\s+/).filter(Boolean).length;
  const { researcher, analyst, writer } = info.agents;

  const text = `## Research Initialization

### Query Analysis
- **Research Topic**: ${info.query}
- **Query Type**: ${getQueryTypeLabel(queryType)}
- **Query Length**: ${info.query.length} characters (${wordCount} words)
- **Detected Language**: ${getLanguageDisplayName(info.language)} (${info.language})
- **Auto-Detection**: ${info.autoDetected ? "Enabled" : "Disabled"}

### Agent Configuration
- **Researcher Agent**: ${researcher.name} (Information Collection)
- **Analyst Agent**: ${analyst.name} (Quality Assessment)
- **Writer Agent**: ${writer.name} (Report Generation)
- **Max Research Loops**: ${info.maxRounds}

### Search Strategy
${describeSearchStrategy(queryType, info.language, info.searchBackends)}

### Expected Process Flow
1. **Information Collection** (15-35%) - Multi-source web search
2. **Quality Analysis** (45-55%) - Source verification and gap identification
3. **Additional Research** (58-84%) - Targeted follow-up searches (if needed)
4. **Report Generation** (85-100%) - Comprehensive report synthesis

**Start Time**: ${formatTimestamp(info.startedAt)}`;

  return { queryType, text };
}
