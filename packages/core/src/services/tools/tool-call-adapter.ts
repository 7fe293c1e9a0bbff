/**
 * Tool Call Adapter
 *
 * Some models (DeepSeek among them) write tool invocations into their text
 * output instead of returning structured tool calls:
 *
 *   <｜tool▁call▁begin｜>function<｜tool▁sep｜>enhanced_web_search
 *   ```json
 *   {"query": "solid state batteries"}
 *   ```<｜tool▁call▁end｜>
 *
 * The adapter recovers such a call and executes it through the registry.
 * Every failure mode yields undefined; nothing is thrown to the caller.
 */

import type {
  ToolCallRequest,
  ToolCallResult,
  ToolLookup,
} from "../../interfaces/tool";
import { logger } from "../../logger";
import { parseJsonObject } from "../../utils/json";

const log = logger.child("tool-call-adapter");

export interface ToolCallMarkers {
  begin: string;
  separator: string;
  end: string;
}

export const DEFAULT_TOOL_CALL_MARKERS: ToolCallMarkers = {
  begin: "<｜tool▁call▁begin｜>",
  separator: "<｜tool▁sep｜>",
  end: "<｜tool▁call▁end｜>",
};

const FUNCTION_NAME = /^[A-Za-z_][A-Za-z0-9_.-]*$/;
const JSON_FENCE = /```json\s*([\s\S]*?)```/;

export class ToolCallAdapter {
  constructor(
    private readonly markers: ToolCallMarkers = DEFAULT_TOOL_CALL_MARKERS
  ) {}

  /**
   * Recover the first pseudo tool call in text, if it is well formed
   */
  tryExtractCall(text: string): ToolCallRequest | undefined {
    const { begin, separator, end } = this.markers;

    const beginIndex = text.indexOf(begin);
    if (beginIndex === -1) return undefined;

    const separatorIndex = text.indexOf(separator, beginIndex + begin.length);
    if (separatorIndex === -1) return undefined;

    const afterSeparator = text.slice(separatorIndex + separator.length);
    const endIndex = afterSeparator.indexOf(end);
    if (endIndex === -1) return undefined;

    const body = afterSeparator.slice(0, endIndex);
    const lineBreak = body.indexOf("\n");
    if (lineBreak === -1) return undefined;

    const functionName = body.slice(0, lineBreak).trim();
    if (!FUNCTION_NAME.test(functionName)) return undefined;

    const fence = JSON_FENCE.exec(body.slice(lineBreak + 1));
    if (!fence) return undefined;

    const parameters = parseJsonObject(fence[1]);
    if (!parameters) return undefined;

    return { functionName, parameters };
  }

  /**
   * Look the tool up once and run it. Unknown tools, thrown errors and
   * non-text results all yield undefined.
   */
  async execute(
    request: ToolCallRequest,
    registry: ToolLookup
  ): Promise<ToolCallResult | undefined> {
    const tool = registry.get(request.functionName);
    if (!tool) {
      log.warn("Pseudo tool call names an unknown tool", {
        tool: request.functionName,
      });
      return undefined;
    }

    try {
      const output: unknown = await tool.execute(request.parameters);
      if (typeof output !== "string") {
        log.warn("Tool returned a non-text result", { tool: tool.name });
        return undefined;
      }
      return { text: output };
    } catch (error) {
      log.warn("Pseudo tool call failed", {
        tool: tool.name,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  /**
   * Extract and execute in one step; undefined when text holds no usable call
   */
  async recover(
    text: string,
    registry: ToolLookup
  ): Promise<ToolCallResult | undefined> {
    const request = this.tryExtractCall(text);
    if (!request) return undefined;

    log.info("Recovered pseudo tool call", { tool: request.functionName });
    return this.execute(request, registry);
  }
}
