/**
 * LLM service
 *
 * Chat client over the OpenAI SDK and the agents built on it.
 */

export {
  createOpenAIChatClient,
  type ChatClient,
  type ChatRequest,
  type ChatReply,
  type ChatToolCall,
} from "./client";
export { OpenAIAgent, type OpenAIAgentOptions } from "./openai-agent";
export {
  getSystemPrompt,
  renderPrompt,
  buildResearchPrompt,
  buildAnalysisPrompt,
  buildAdditionalResearchPrompt,
  buildReportPrompt,
} from "./prompts";
