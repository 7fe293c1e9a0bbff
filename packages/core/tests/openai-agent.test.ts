/**
 * Tests for OpenAIAgent against a scripted chat client.
 *
 * Verifies that:
 * - native tool calls are executed and answered with tool messages
 * - tool calls written into text are recovered when native calls are off
 * - the tool round budget ends with a forced final answer
 * - streaming passes through client deltas for tool-less agents
 */

import { describe, it, expect } from "vitest";
import { OpenAIAgent } from "../src/services/llm/openai-agent";
import type { ChatReply } from "../src/services/llm/client";
import { getSystemPrompt } from "../src/services/llm/prompts";
import { ToolRegistry } from "../src/services/tools/registry";
import { DEFAULT_TOOL_CALL_MARKERS } from "../src/services/tools/tool-call-adapter";
import type { ToolDefinition } from "../src/interfaces/tool";
import type { ModelConfig } from "../src/services/research-engine/config";
import { ScriptedChatClient } from "./helpers";

const MODEL: ModelConfig = { model: "test-model", temperature: 0.2, maxTokens: 500 };

function text(content: string): ChatReply {
  return { content, toolCalls: [] };
}

function createTools(): ToolRegistry {
  const lookup: ToolDefinition = {
    name: "lookup",
    description: "Look up a record by id.",
    parameters: {
      type: "object",
      properties: { id: { type: "integer", description: "Record id" } },
      required: ["id"],
    },
    execute: async (params) => `record ${String(params.id)}`,
  };
  const failing: ToolDefinition = {
    name: "explode",
    description: "Always fails.",
    parameters: { type: "object", properties: {} },
    execute: async () => {
      throw new Error("boom");
    },
  };
  return new ToolRegistry([lookup, failing]);
}

// =============================================================================
// Plain completions
// =============================================================================

describe("OpenAIAgent without tools", () => {
  it("sends the role prompt and returns the reply", async () => {
    const client = new ScriptedChatClient([text("Answer")]);
    const agent = new OpenAIAgent({ role: "analyst", client, model: MODEL });

    expect(await agent.call("Question")).toBe("Answer");
    expect(agent.name).toBe("test-model");
    expect(client.requests[0]).toEqual({
      model: "test-model",
      temperature: 0.2,
      maxTokens: 500,
      messages: [
        { role: "system", content: getSystemPrompt("analyst") },
        { role: "user", content: "Question" },
      ],
      tools: undefined,
    });
  });

  it("leaves tool-call text alone when it has no tools", async () => {
    const { begin, separator, end } = DEFAULT_TOOL_CALL_MARKERS;
    const raw = `${begin}function${separator}lookup\n\`\`\`json\n{"id":1}\n\`\`\`${end}`;
    const client = new ScriptedChatClient([text(raw)]);
    const agent = new OpenAIAgent({ role: "writer", client, model: MODEL });

    expect(await agent.call("Question")).toBe(raw);
    expect(client.requests).toHaveLength(1);
  });

  it("streams client deltas", async () => {
    const client = new ScriptedChatClient([], ["Hel", "lo"]);
    const agent = new OpenAIAgent({ role: "writer", client, model: MODEL });

    const fragments: string[] = [];
    for await (const fragment of agent.streamCall("Write")) {
      fragments.push(fragment);
    }
    expect(fragments).toEqual(["Hel", "lo"]);
  });
});

// =============================================================================
// Native tool calls
// =============================================================================

describe("OpenAIAgent native tool calls", () => {
  it("executes tool calls and continues the conversation", async () => {
    const client = new ScriptedChatClient([
      { content: "", toolCalls: [{ id: "call_1", name: "lookup", arguments: '{"id":5}' }] },
      text("Final"),
    ]);
    const agent = new OpenAIAgent({
      role: "researcher",
      client,
      model: MODEL,
      tools: createTools(),
    });

    expect(await agent.call("Find record 5")).toBe("Final");

    expect(client.requests[0].tools?.map((tool) => tool.function.name)).toEqual([
      "lookup",
      "explode",
    ]);
    expect(client.requests[1].messages.slice(2)).toEqual([
      {
        role: "assistant",
        content: null,
        tool_calls: [
          {
            id: "call_1",
            type: "function",
            function: { name: "lookup", arguments: '{"id":5}' },
          },
        ],
      },
      { role: "tool", tool_call_id: "call_1", content: "record 5" },
    ]);
  });

  it("answers failed tool calls with error text", async () => {
    const client = new ScriptedChatClient([
      {
        content: "",
        toolCalls: [
          { id: "a", name: "missing", arguments: "{}" },
          { id: "b", name: "lookup", arguments: "[1]" },
          { id: "c", name: "explode", arguments: "" },
        ],
      },
      text("Recovered"),
    ]);
    const agent = new OpenAIAgent({
      role: "researcher",
      client,
      model: MODEL,
      tools: createTools(),
    });

    expect(await agent.call("Go")).toBe("Recovered");
    expect(client.requests[1].messages.slice(3)).toEqual([
      { role: "tool", tool_call_id: "a", content: 'Error: unknown tool "missing"' },
      {
        role: "tool",
        tool_call_id: "b",
        content: "Error: arguments for lookup must be a JSON object",
      },
      { role: "tool", tool_call_id: "c", content: "Error executing explode: boom" },
    ]);
  });

  it("forces a final answer when the round budget is spent", async () => {
    const toolReply: ChatReply = {
      content: "",
      toolCalls: [{ id: "x", name: "lookup", arguments: '{"id":1}' }],
    };
    const client = new ScriptedChatClient([toolReply, toolReply, text("Forced")]);
    const agent = new OpenAIAgent({
      role: "researcher",
      client,
      model: MODEL,
      tools: createTools(),
      maxToolRounds: 2,
    });

    expect(await agent.call("Go")).toBe("Forced");
    expect(client.requests).toHaveLength(3);

    const finalRequest = client.requests[2];
    expect(finalRequest.tools).toBeUndefined();
    const lastMessage = finalRequest.messages[finalRequest.messages.length - 1];
    expect(lastMessage.role).toBe("user");
    expect(String(lastMessage.content).startsWith("You have used all available tool calls.")).toBe(
      true
    );
  });

  it("returns a tool agent's stream as one fragment", async () => {
    const client = new ScriptedChatClient([text("Whole answer")], ["never", "used"]);
    const agent = new OpenAIAgent({
      role: "researcher",
      client,
      model: MODEL,
      tools: createTools(),
    });

    const fragments: string[] = [];
    for await (const fragment of agent.streamCall("Go")) {
      fragments.push(fragment);
    }
    expect(fragments).toEqual(["Whole answer"]);
  });
});

// =============================================================================
// Tool calls written into text
// =============================================================================

describe("OpenAIAgent text tool calls", () => {
  const { begin, separator, end } = DEFAULT_TOOL_CALL_MARKERS;
  const pseudoCall = `${begin}function${separator}lookup\n\`\`\`json\n{"id":5}\n\`\`\`${end}`;

  it("describes the tools in the system prompt", async () => {
    const client = new ScriptedChatClient([text("Plain answer")]);
    const agent = new OpenAIAgent({
      role: "researcher",
      client,
      model: MODEL,
      tools: createTools(),
      nativeToolCalls: false,
    });

    await agent.call("Go");

    const request = client.requests[0];
    expect(request.tools).toBeUndefined();
    const system = String(request.messages[0].content);
    expect(system.startsWith(getSystemPrompt("researcher"))).toBe(true);
    expect(system).toContain("- lookup: Look up a record by id. Parameters: id (integer)");
  });

  it("recovers a call from the text and feeds back the result", async () => {
    const client = new ScriptedChatClient([text(pseudoCall), text("Done")]);
    const agent = new OpenAIAgent({
      role: "researcher",
      client,
      model: MODEL,
      tools: createTools(),
      nativeToolCalls: false,
    });

    expect(await agent.call("Go")).toBe("Done");
    expect(client.requests[1].messages.slice(2)).toEqual([
      { role: "assistant", content: pseudoCall },
      {
        role: "user",
        content: "Tool result:\n\nrecord 5\n\nContinue with the task using this result.",
      },
    ]);
  });
});
