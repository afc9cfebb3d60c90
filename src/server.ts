// pattern: Imperative Shell

/**
 * MCP server over the tool registry.
 * Transport-only: tool listing and dispatch are delegated to the registry,
 * and tool failures come back as error results rather than protocol errors.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { AppConfig } from './config/schema.js';
import { createIglooClient, type IglooClient, type Logger } from './igloo/index.js';
import { createIglooTools, createOperations, createToolRegistry, type ToolRegistry } from './tool/index.js';

export const SERVER_NAME = 'igloo-mcp';
export const SERVER_VERSION = '0.1.0';

export function createRegistry(config: AppConfig, client: IglooClient, logger: Logger): ToolRegistry {
  const operations = createOperations({ client, config, logger });
  const registry = createToolRegistry();
  for (const tool of createIglooTools({
    operations,
    defaultPageSize: config.igloo.default_page_size,
    maxPageSize: config.igloo.max_page_size,
  })) {
    registry.register(tool);
  }
  return registry;
}

export function createMcpServer(registry: ToolRegistry, logger: Logger = console): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.toModelTools(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name } = request.params;
    const result = await registry.dispatch(name, request.params.arguments ?? {}, extra.signal);
    if (!result.success) {
      logger.warn(`[server] ${name} failed: ${result.error ?? 'no error message'}`);
      return {
        content: [{ type: 'text' as const, text: result.error ?? `${name} failed` }],
        isError: true,
      };
    }
    return {
      content: [{ type: 'text' as const, text: result.output }],
    };
  });

  return server;
}

export function createServerFromConfig(config: AppConfig, logger: Logger = console): Server {
  const client = createIglooClient(config.igloo, { logger });
  return createMcpServer(createRegistry(config, client, logger), logger);
}
