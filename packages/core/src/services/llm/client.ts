/**
 * Chat client
 *
 * Narrow seam over the OpenAI SDK used by agents. Works with any
 * OpenAI-compatible endpoint (DeepSeek is configured through baseURL).
 */

import type OpenAI from "openai";
import type {
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions";

export interface ChatRequest {
  model: string;
  temperature: number;
  maxTokens: number;
  messages: ChatCompletionMessageParam[];
  tools?: ChatCompletionTool[];
}

export interface ChatToolCall {
  id: string;
  name: string;
  // Raw JSON text as produced by the model
  arguments: string;
}

export interface ChatReply {
  content: string;
  toolCalls: ChatToolCall[];
}

export interface ChatClient {
  complete(request: ChatRequest): Promise<ChatReply>;

  /**
   * Stream content deltas. Breaking out of the loop closes the
   * underlying HTTP response.
   */
  stream(request: ChatRequest): AsyncIterable<string>;
}

export function createOpenAIChatClient(client: OpenAI): ChatClient {
  return {
    async complete(request) {
      const response = await client.chat.completions.create({
        model: request.model,
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        messages: request.messages,
        tools:
          request.tools && request.tools.length > 0 ? request.tools : undefined,
      });

      const message = response.choices[0]?.message;
      if (!message) {
        throw new Error("No choices in chat completion response");
      }

      return {
        content: message.content ?? "",
        toolCalls: (message.tool_calls ?? []).map((call) => ({
          id: call.id,
          name: call.function.name,
          arguments: call.function.arguments,
        })),
      };
    },

    async *stream(request) {
      const stream = await client.chat.completions.create({
        model: request.model,
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        messages: request.messages,
        stream: true,
      });

      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) {
          yield delta;
        }
      }
    },
  };
}
