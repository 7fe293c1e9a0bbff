/**
 * AI Prompt Configuration
 *
 * Centralized location for all prompts used in the research pipeline.
 * Prompts use template placeholders that are filled at runtime.
 *
 * Template syntax: {{placeholder}} - will be replaced with actual values
 *
 * Every step prompt ends with an instruction to answer in the session
 * language, which is chosen once per session and passed in explicitly.
 */

import type { AgentRole } from "../../interfaces/agent";

const SYSTEM_PROMPTS: Record<AgentRole, string> = {
  researcher: `You are a Research Agent specialized in gathering comprehensive information from the web.

Your workflow:
1. Use generate_search_queries to create several targeted search queries
2. Use enhanced_web_search for each query to collect results from multiple search engines
3. Use get_page_content on the most relevant URLs for detailed information
4. Compile the findings with source URLs for every claim

If search is unavailable, say so and continue with what you already know, marking such content as unverified.`,

  analyst: `You are an Analyst Agent specialized in verifying information and extracting insights.

Evaluate the research findings you are given:
- Check consistency between sources and flag contradictions
- Identify the key insights and how well they are supported
- Point out any knowledge gap explicitly. When the findings are not enough, state "additional research needed" and list what is missing.`,

  writer: `You are a Writer Agent specialized in creating clear, comprehensive research reports.

Write a well-structured markdown report with an executive summary, detailed sections, and a list of sources. Base every statement on the findings and analysis you are given and cite sources by URL.`,
};

const LANGUAGE_INSTRUCTION = "Respond in {{language}}.";

const RESEARCH_PROMPT = `Research the following topic comprehensively: '{{query}}'. Use your tools to gather information from multiple reliable sources.`;

const ANALYSIS_PROMPT = `Analyze these research findings about '{{query}}' and determine if additional research is needed:

{{findings}}`;

const ADDITIONAL_RESEARCH_PROMPT = `Based on this analysis, conduct additional targeted research on '{{query}}':

{{analysis}}

Focus on filling the identified knowledge gaps.`;

const REPORT_PROMPT = `Create a comprehensive research report on '{{query}}' based on this analysis:

{{analysis}}

Research findings:
{{findings}}`;

/**
 * Replace {{placeholder}} tokens in a single pass; values are inserted
 * verbatim and never re-scanned. Unknown placeholders are left in place.
 */
export function renderPrompt(
  template: string,
  variables: Record<string, string | number>
): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, key: string) =>
    key in variables ? String(variables[key]) : placeholder
  );
}

function withLanguage(prompt: string, language: string): string {
  return `${prompt}\n\n${renderPrompt(LANGUAGE_INSTRUCTION, { language })}`;
}

/**
 * Role instructions (language-neutral; the step prompts carry the language)
 */
export function getSystemPrompt(role: AgentRole): string {
  return SYSTEM_PROMPTS[role];
}

export function buildResearchPrompt(query: string, language: string): string {
  return withLanguage(renderPrompt(RESEARCH_PROMPT, { query }), language);
}

export function buildAnalysisPrompt(
  query: string,
  findings: string,
  language: string
): string {
  return withLanguage(
    renderPrompt(ANALYSIS_PROMPT, { query, findings }),
    language
  );
}

export function buildAdditionalResearchPrompt(
  query: string,
  analysis: string,
  language: string
): string {
  return withLanguage(
    renderPrompt(ADDITIONAL_RESEARCH_PROMPT, { query, analysis }),
    language
  );
}

export function buildReportPrompt(
  query: string,
  analysis: string,
  findings: string,
  language: string
): string {
  return withLanguage(
    renderPrompt(REPORT_PROMPT, { query, analysis, findings }),
    language
  );
}
