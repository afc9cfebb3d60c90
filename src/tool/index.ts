// pattern: Functional Core

export type {
  ToolParameterType,
  ToolParameter,
  ToolDefinition,
  ToolResult,
  ToolHandler,
  Tool,
  ToolRegistry,
  ModelTool,
  JsonSchemaProperty,
} from './types.js';

export { createToolRegistry } from './registry.js';
export {
  createOperations,
  type Operations,
  type OperationsConfig,
  type Result,
  type SearchInput,
  type FetchInput,
  type FetchManyInput,
  type FetchResult,
  type PageOutcome,
  MAX_FETCH_URLS,
} from './operations.js';
export {
  formatSearchResults,
  formatFetchResult,
  formatFetchResults,
  formatMemberResults,
  formatMemberProfile,
} from './format.js';
export { createIglooTools, describeFailure } from './builtin/igloo.js';
