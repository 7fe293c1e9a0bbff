/**
 * Agent tools
 */

export { ToolRegistry } from "./registry";
export {
  ToolCallAdapter,
  DEFAULT_TOOL_CALL_MARKERS,
  type ToolCallMarkers,
} from "./tool-call-adapter";
export { createResearchTools, generateSearchQueries } from "./research-tools";
