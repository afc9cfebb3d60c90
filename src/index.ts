#!/usr/bin/env node
// pattern: Imperative Shell

/**
 * igloo-mcp entry point.
 * Composition root: loads configuration and serves the Igloo tools over stdio.
 * stdout carries the protocol, so every log line goes to stderr.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { loadConfig } from './config/config.js';
import { createServerFromConfig, SERVER_VERSION } from './server.js';

/**
 * Create a graceful shutdown handler that closes the server before exiting.
 */
export function createShutdownHandler(server: Server): () => Promise<void> {
  return async (): Promise<void> => {
    console.error('[server] shutting down');
    try {
      await server.close();
    } catch (error) {
      console.error('[server] error closing transport:', error);
    }
    process.exit(0);
  };
}

async function main(): Promise<void> {
  const configPath = process.argv[2] ?? process.env['IGLOO_MCP_CONFIG'];
  const config = loadConfig(configPath);

  const server = createServerFromConfig(config);
  const shutdownHandler = createShutdownHandler(server);
  process.on('SIGINT', () => void shutdownHandler());
  process.on('SIGTERM', () => void shutdownHandler());

  await server.connect(new StdioServerTransport());
  console.error(`[server] igloo-mcp ${SERVER_VERSION} serving ${config.igloo.community} on stdio`);
}

main().catch((error) => {
  console.error('[server] fatal error:', error);
  process.exit(1);
});
