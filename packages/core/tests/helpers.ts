/**
 * Shared test fixtures: configuration, fake agents and fake search backends.
 */

import type { Agent, AgentRole } from "../src/interfaces/agent";
import type {
  SearchBackend,
  SearchBackendName,
  SearchResultItem,
} from "../src/interfaces/search-provider";
import {
  DEFAULT_CONFIG,
  type ResearchConfig,
} from "../src/services/research-engine/config";
import type { ProgressEvent } from "../src/services/research-engine/events";
import type {
  ChatClient,
  ChatReply,
  ChatRequest,
} from "../src/services/llm/client";

export const TEST_CONFIG: ResearchConfig = {
  ...DEFAULT_CONFIG,
  research: { maxResearchLoops: 2, language: "auto" },
  limits: { agentTimeoutMs: 1000, streamIdleTimeoutMs: 1000 },
};

// =============================================================================
// Agents
// =============================================================================

export interface FakeAgentOptions {
  reply?: (prompt: string, callIndex: number) => string | Promise<string>;
  chunks?: string[];
  // Throw from the stream before yielding the chunk at this index
  failAtChunk?: number;
}

export class FakeAgent implements Agent {
  readonly name: string;
  readonly prompts: string[] = [];
  streamFinalized = false;

  constructor(
    readonly role: AgentRole,
    private readonly options: FakeAgentOptions = {}
  ) {
    this.name = `fake-${role}`;
  }

  async call(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const reply = this.options.reply;
    return reply ? reply(prompt, this.prompts.length - 1) : `${this.role} output`;
  }

  async *streamCall(prompt: string): AsyncGenerator<string> {
    this.prompts.push(prompt);
    const chunks = this.options.chunks ?? ["# Report\n\n", "Findings summary."];

    try {
      for (let index = 0; index < chunks.length; index++) {
        if (this.options.failAtChunk === index) {
          throw new Error("writer stream broke");
        }
        yield chunks[index];
      }
    } finally {
      this.streamFinalized = true;
    }
  }
}

// =============================================================================
// Chat client
// =============================================================================

/**
 * Returns the scripted replies in order and streams fixed chunks
 */
export class ScriptedChatClient implements ChatClient {
  readonly requests: ChatRequest[] = [];
  private replyIndex = 0;

  constructor(
    private readonly replies: ChatReply[],
    private readonly chunks: string[] = []
  ) {}

  async complete(request: ChatRequest): Promise<ChatReply> {
    // Agents keep appending to the same array
    this.requests.push({ ...request, messages: [...request.messages] });
    const reply = this.replies[this.replyIndex];
    this.replyIndex += 1;
    if (!reply) throw new Error("no scripted reply left");
    return reply;
  }

  async *stream(request: ChatRequest): AsyncGenerator<string> {
    this.requests.push(request);
    yield* this.chunks;
  }
}

// =============================================================================
// Search backends
// =============================================================================

export function resultItem(index: number, source = "Test"): SearchResultItem {
  return {
    title: `Result ${index}`,
    url: `https://example${index}.com/article`,
    description: `Snippet number ${index}`,
    source,
  };
}

export class StaticBackend implements SearchBackend {
  readonly calls: Array<{ query: string; count: number }> = [];

  constructor(
    readonly name: SearchBackendName,
    private readonly items: SearchResultItem[]
  ) {}

  async search(query: string, count: number): Promise<SearchResultItem[]> {
    this.calls.push({ query, count });
    return this.items;
  }
}

export class FailingBackend implements SearchBackend {
  calls = 0;

  constructor(
    readonly name: SearchBackendName,
    private readonly message = `${name} unavailable`
  ) {}

  async search(): Promise<SearchResultItem[]> {
    this.calls += 1;
    throw new Error(this.message);
  }
}

// =============================================================================
// Event helpers
// =============================================================================

export async function collect(
  events: AsyncIterable<ProgressEvent>
): Promise<ProgressEvent[]> {
  const collected: ProgressEvent[] = [];
  for await (const event of events) {
    collected.push(event);
  }
  return collected;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function htmlResponse(html: string, status = 200): Response {
  return new Response(html, {
    status,
    headers: { "Content-Type": "text/html" },
  });
}
