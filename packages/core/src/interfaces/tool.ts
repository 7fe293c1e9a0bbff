/**
 * Tool Interface
 *
 * Callable capabilities exposed to agents, looked up by name.
 */

export type ToolParameters = Record<string, unknown>;

export type ToolParameterSchema = {
  type: "string" | "number" | "integer" | "boolean";
  description?: string;
};

export type ToolParametersSchema = {
  type: "object";
  properties: Record<string, ToolParameterSchema>;
  required?: string[];
};

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParametersSchema;
  execute(params: ToolParameters): Promise<string>;
}

/**
 * The one lookup strategy tools are resolved through
 */
export interface ToolLookup {
  get(name: string): ToolDefinition | undefined;
}

/**
 * Structured request recovered from generated text
 */
export interface ToolCallRequest {
  functionName: string;
  parameters: ToolParameters;
}

export interface ToolCallResult {
  text: string;
}
