// pattern: Functional Core

/**
 * Tool system types for registration, dispatch, and exposure over MCP.
 * These types define the port interface for the tool registry and tool handlers.
 */

export type ToolParameterType = 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array';

export type ToolParameter = {
  readonly name: string;
  // several types mean the value may take any of them
  readonly type: ToolParameterType | ReadonlyArray<ToolParameterType>;
  readonly description: string;
  readonly required: boolean;
  readonly enum_values?: ReadonlyArray<string>;
  // element type of an array parameter
  readonly items?: ToolParameterType;
};

export type ToolDefinition = {
  readonly name: string;
  readonly description: string;
  readonly parameters: ReadonlyArray<ToolParameter>;
};

export type ToolResult = {
  readonly success: boolean;
  readonly output: string;
  readonly error?: string;
};

export type ToolHandler = (params: Readonly<Record<string, unknown>>, signal?: AbortSignal) => Promise<ToolResult>;

export type Tool = {
  readonly definition: ToolDefinition;
  readonly handler: ToolHandler;
};

export type JsonSchemaProperty = {
  readonly type: ToolParameterType | ReadonlyArray<ToolParameterType>;
  readonly description?: string;
  readonly enum?: ReadonlyArray<string>;
  readonly items?: JsonSchemaProperty;
};

export type ModelTool = {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: {
    readonly type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required: Array<string>;
  };
};

export interface ToolRegistry {
  register(tool: Tool): void;
  getDefinitions(): Array<ToolDefinition>;
  dispatch(name: string, params: Readonly<Record<string, unknown>>, signal?: AbortSignal): Promise<ToolResult>;
  toModelTools(): Array<ModelTool>;
}
