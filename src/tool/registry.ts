// pattern: Imperative Shell

/**
 * ToolRegistry implementation.
 * Manages tool registration, parameter validation, dispatch, and the JSON Schema
 * listing handed to MCP clients.
 */

import type {
  JsonSchemaProperty,
  ModelTool,
  Tool,
  ToolDefinition,
  ToolParameter,
  ToolParameterType,
  ToolResult,
  ToolRegistry,
} from './types.js';

function validateParameterType(value: unknown, expectedType: ToolParameterType): boolean {
  switch (expectedType) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'object':
      return typeof value === 'object' && value !== null && !Array.isArray(value);
    case 'array':
      return Array.isArray(value);
    default:
      return false;
  }
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function typesOf(param: ToolParameter): ReadonlyArray<ToolParameterType> {
  return typeof param.type === 'string' ? [param.type] : param.type;
}

// returns an error message, or null when the value fits the parameter
function checkParameter(param: ToolParameter, value: unknown): string | null {
  const types = typesOf(param);
  if (!types.some((type) => validateParameterType(value, type))) {
    return `invalid type for parameter ${param.name}: expected ${types.join(' or ')}, got ${describeType(value)}`;
  }

  if (types.includes('array') && param.items !== undefined && Array.isArray(value)) {
    const itemType = param.items;
    const bad = value.find((item) => !validateParameterType(item, itemType));
    if (bad !== undefined) {
      return `invalid item in parameter ${param.name}: expected ${itemType}, got ${describeType(bad)}`;
    }
  }

  if (param.enum_values) {
    const allowed = param.enum_values;
    const values: ReadonlyArray<unknown> = Array.isArray(value) ? value : [value];
    const bad = values.find((item) => typeof item !== 'string' || !allowed.includes(item));
    if (bad !== undefined) {
      return `invalid value for parameter ${param.name}: ${String(bad)} (expected one of ${allowed.join(', ')})`;
    }
  }

  return null;
}

function toSchemaProperty(param: ToolParameter): JsonSchemaProperty {
  const items: JsonSchemaProperty | undefined =
    typesOf(param).includes('array') && param.items !== undefined
      ? { type: param.items, ...(param.enum_values && { enum: param.enum_values }) }
      : undefined;

  return {
    type: param.type,
    description: param.description,
    ...(param.enum_values && !items && { enum: param.enum_values }),
    ...(items && { items }),
  };
}

export function createToolRegistry(): ToolRegistry {
  const tools = new Map<string, Tool>();

  return {
    register(tool: Tool): void {
      if (tools.has(tool.definition.name)) {
        throw new Error(`tool already registered: ${tool.definition.name}`);
      }
      tools.set(tool.definition.name, tool);
    },

    getDefinitions(): Array<ToolDefinition> {
      return Array.from(tools.values()).map((tool) => tool.definition);
    },

    async dispatch(
      name: string,
      params: Readonly<Record<string, unknown>>,
      signal?: AbortSignal,
    ): Promise<ToolResult> {
      const tool = tools.get(name);
      if (!tool) {
        return {
          success: false,
          output: '',
          error: `unknown tool: ${name}`,
        };
      }

      // null counts as omitted; some clients send it for unset optionals
      for (const param of tool.definition.parameters) {
        const value = params[param.name];
        if (value === undefined || value === null) {
          if (param.required) {
            return {
              success: false,
              output: '',
              error: `missing required parameter: ${param.name}`,
            };
          }
          continue;
        }

        const problem = checkParameter(param, value);
        if (problem !== null) {
          return { success: false, output: '', error: problem };
        }
      }

      try {
        return await tool.handler(params, signal);
      } catch (error) {
        return {
          success: false,
          output: '',
          error: `handler error: ${error instanceof Error ? error.message : String(error)}`,
        };
      }
    },

    toModelTools(): Array<ModelTool> {
      return Array.from(tools.values()).map((tool) => {
        const properties: Record<string, JsonSchemaProperty> = {};
        const required: Array<string> = [];

        for (const param of tool.definition.parameters) {
          properties[param.name] = toSchemaProperty(param);
          if (param.required) {
            required.push(param.name);
          }
        }

        return {
          name: tool.definition.name,
          description: tool.definition.description,
          inputSchema: {
            type: 'object',
            properties,
            required,
          },
        };
      });
    },
  };
}
