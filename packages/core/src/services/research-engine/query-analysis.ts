/**
 * Query classification for the initialization summary
 */

import vocabulary from "../../../data/query-types.json";
import type { Language } from "./types";

export type QueryType =
  | "how_to"
  | "definition"
  | "causal"
  | "general_question"
  | "trend"
  | "comparative"
  | "market"
  | "general_topic";

const QUERY_TYPE_LABELS: Record<QueryType, string> = {
  how_to: "How-to / Process Inquiry",
  definition: "Definition / Concept Research",
  causal: "Causal Analysis",
  general_question: "General Question",
  trend: "Trend Analysis",
  comparative: "Comparative Analysis",
  market: "Market/Business Research",
  general_topic: "General Topic Research",
};

const SPECIALIZED_FOCUS: Partial<Record<QueryType, string>> = {
  definition:
    "Authoritative definitions, academic sources, official documentation",
  trend: "Recent publications, market reports, industry analyses",
  comparative: "Side-by-side comparisons, feature matrices, expert reviews",
  market: "Market research, financial reports, industry statistics",
  how_to: "Step-by-step guides, tutorials, best practices",
};

const REGIONAL_SOURCES: Partial<Record<Language, string>> = {
  chinese: "百度, 知乎, 学术搜索, 官方网站",
  japanese: "Yahoo Japan, Goo, J-STAGE, 政府サイト",
  korean: "Naver, Daum, KISS, 정부사이트",
};

function containsAny(text: string, words: string[]): boolean {
  return words.some((word) => text.includes(word));
}

/**
 * Classify a query by substring match against the query-type vocabulary.
 * Question words take precedence over topic words.
 */
export function analyzeQueryType(query: string): QueryType {
  const text = query.toLowerCase();

  if (containsAny(text, vocabulary.questionWords)) {
    if (containsAny(text, vocabulary.howWords)) return "how_to";
    if (containsAny(text, vocabulary.whatWords)) return "definition";
    if (containsAny(text, vocabulary.whyWords)) return "causal";
    return "general_question";
  }

  if (containsAny(text, vocabulary.trendWords)) return "trend";
  if (containsAny(text, vocabulary.comparisonWords)) return "comparative";
  if (containsAny(text, vocabulary.marketWords)) return "market";
  return "general_topic";
}

export function getQueryTypeLabel(queryType: QueryType): string {
  return QUERY_TYPE_LABELS[queryType];
}

/**
 * Search strategy lines shown in the initialization summary
 */
export function describeSearchStrategy(
  queryType: QueryType,
  language: Language,
  backends: string[]
): string {
  const lines = [
    "**Primary Approach**: Multi-source information gathering",
    `**Language Focus**: ${language} sources with English supplements`,
    `**Search Engines**: ${backends.length > 0 ? backends.join(", ") : "none configured"}`,
  ];

  const focus = SPECIALIZED_FOCUS[queryType];
  if (focus) lines.push(`**Specialized Focus**: ${focus}`);

  const regional = REGIONAL_SOURCES[language];
  if (regional) lines.push(`**Regional Sources**: ${regional}`);

  return lines.join("\n");
}
