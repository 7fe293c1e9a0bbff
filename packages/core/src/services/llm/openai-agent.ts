/**
 * OpenAI-backed agent
 *
 * Runs one role (researcher, analyst, writer) against a chat model with
 * a bounded tool-calling loop. Tool calls arrive either through the
 * native tool_calls channel or embedded in the text, in which case the
 * tool call adapter recovers them.
 */

import type {
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import type { Agent, AgentRole } from "../../interfaces/agent";
import type { ToolDefinition } from "../../interfaces/tool";
import { logger, type Logger } from "../../logger";
import { parseJsonObject } from "../../utils/json";
import type { ModelConfig } from "../research-engine/config";
import type { ToolRegistry } from "../tools/registry";
import {
  DEFAULT_TOOL_CALL_MARKERS,
  ToolCallAdapter,
  type ToolCallMarkers,
} from "../tools/tool-call-adapter";
import type { ChatClient, ChatToolCall } from "./client";
import { getSystemPrompt } from "./prompts";

export interface OpenAIAgentOptions {
  role: AgentRole;
  client: ChatClient;
  model: ModelConfig;
  // Defaults to the role's system prompt
  systemPrompt?: string;
  // Tools this agent may call; omit for a tool-less agent
  tools?: ToolRegistry;
  // false: tools are described in the system prompt and called in text
  nativeToolCalls?: boolean;
  maxToolRounds?: number;
  toolCallAdapter?: ToolCallAdapter;
  toolCallMarkers?: ToolCallMarkers;
}

const DEFAULT_MAX_TOOL_ROUNDS = 6;

const FINAL_ANSWER_PROMPT =
  "You have used all available tool calls. Give your final answer now using the information gathered so far.";

function toChatTool(tool: ToolDefinition): ChatCompletionTool {
  return {
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  };
}

/**
 * Tool instructions for models that write calls into their text output
 */
function describeToolsForText(
  tools: ToolDefinition[],
  markers: ToolCallMarkers
): string {
  const listing = tools
    .map((tool) => {
      const params = Object.entries(tool.parameters.properties)
        .map(([name, schema]) => `${name} (${schema.type})`)
        .join(", ");
      return `- ${tool.name}: ${tool.description} Parameters: ${params}`;
    })
    .join("\n");

  return `You can call these tools:
${listing}

To call a tool, write exactly:
${markers.begin}function${markers.separator}TOOL_NAME
\`\`\`json
{"parameter": "value"}
\`\`\`${markers.end}

Call one tool at a time and wait for its result.`;
}

export class OpenAIAgent implements Agent {
  readonly role: AgentRole;
  readonly name: string;

  private readonly client: ChatClient;
  private readonly model: ModelConfig;
  private readonly systemPrompt: string;
  private readonly tools?: ToolRegistry;
  private readonly nativeToolCalls: boolean;
  private readonly maxToolRounds: number;
  private readonly adapter: ToolCallAdapter;
  private readonly log: Logger;

  constructor(options: OpenAIAgentOptions) {
    const markers = options.toolCallMarkers ?? DEFAULT_TOOL_CALL_MARKERS;

    this.role = options.role;
    this.name = options.model.model;
    this.client = options.client;
    this.model = options.model;
    this.tools =
      options.tools && options.tools.list().length > 0 ? options.tools : undefined;
    this.nativeToolCalls = options.nativeToolCalls ?? true;
    this.maxToolRounds = Math.max(
      1,
      options.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS
    );
    this.adapter = options.toolCallAdapter ?? new ToolCallAdapter(markers);
    this.log = logger.child(`agent:${options.role}`);

    const basePrompt = options.systemPrompt ?? getSystemPrompt(options.role);
    this.systemPrompt =
      this.tools && !this.nativeToolCalls
        ? `${basePrompt}\n\n${describeToolsForText(this.tools.list(), markers)}`
        : basePrompt;
  }

  private get chatTools(): ChatCompletionTool[] | undefined {
    if (!this.tools || !this.nativeToolCalls) return undefined;
    return this.tools.list().map(toChatTool);
  }

  /**
   * Execute one native tool call; failures become the tool's reply text
   */
  private async runToolCall(call: ChatToolCall): Promise<string> {
    const tool = this.tools?.get(call.name);
    if (!tool) {
      this.log.warn("Model called an unknown tool", { tool: call.name });
      return `Error: unknown tool "${call.name}"`;
    }

    const params = parseJsonObject(call.arguments || "{}");
    if (!params) {
      this.log.warn("Tool arguments are not a JSON object", { tool: call.name });
      return `Error: arguments for ${call.name} must be a JSON object`;
    }

    try {
      this.log.info("Executing tool", { tool: call.name });
      return await tool.execute(params);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.warn("Tool execution failed", { tool: call.name, error: message });
      return `Error executing ${call.name}: ${message}`;
    }
  }

  private initialMessages(prompt: string): ChatCompletionMessageParam[] {
    return [
      { role: "system", content: this.systemPrompt },
      { role: "user", content: prompt },
    ];
  }

  /**
   * Run to completion, executing tool calls until the model answers in
   * plain text or the round budget is spent
   */
  async call(prompt: string): Promise<string> {
    const messages = this.initialMessages(prompt);
    const tools = this.chatTools;

    for (let round = 0; round < this.maxToolRounds; round++) {
      const reply = await this.client.complete({
        model: this.model.model,
        temperature: this.model.temperature,
        maxTokens: this.model.maxTokens,
        messages,
        tools,
      });

      if (reply.toolCalls.length > 0) {
        messages.push({
          role: "assistant",
          content: reply.content || null,
          tool_calls: reply.toolCalls.map((call) => ({
            id: call.id,
            type: "function",
            function: { name: call.name, arguments: call.arguments },
          })),
        });

        for (const call of reply.toolCalls) {
          messages.push({
            role: "tool",
            tool_call_id: call.id,
            content: await this.runToolCall(call),
          });
        }
        continue;
      }

      if (this.tools) {
        const recovered = await this.adapter.recover(reply.content, this.tools);
        if (recovered) {
          messages.push(
            { role: "assistant", content: reply.content },
            {
              role: "user",
              content: `Tool result:\n\n${recovered.text}\n\nContinue with the task using this result.`,
            }
          );
          continue;
        }
      }

      return reply.content;
    }

    this.log.warn("Tool round budget exhausted", {
      maxToolRounds: this.maxToolRounds,
    });

    const final = await this.client.complete({
      model: this.model.model,
      temperature: this.model.temperature,
      maxTokens: this.model.maxTokens,
      messages: [...messages, { role: "user", content: FINAL_ANSWER_PROMPT }],
    });
    return final.content;
  }

  /**
   * Yield the answer incrementally. Agents with tools need the full tool
   * loop first, so their answer arrives as a single fragment.
   */
  async *streamCall(prompt: string): AsyncGenerator<string> {
    if (this.tools) {
      yield await this.call(prompt);
      return;
    }

    yield* this.client.stream({
      model: this.model.model,
      temperature: this.model.temperature,
      maxTokens: this.model.maxTokens,
      messages: this.initialMessages(prompt),
    });
  }
}
