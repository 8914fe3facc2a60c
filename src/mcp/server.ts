/**
 * @fileoverview objclint MCP Server - Main entry point.
 * Exposes the linter to AI assistants over stdio.
 *
 * @module mcp/server
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { createLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';
import { registerTools, type ToolOptions } from './tools/index.js';

const log = createLogger('mcp');

// ============================================================
// Server Configuration
// ============================================================

const SERVER_NAME = 'objclint';

// ============================================================
// Server Instance
// ============================================================

export function createServer(options: ToolOptions = {}): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: VERSION,
  });

  registerTools(server, options);

  return server;
}

// ============================================================
// Main Entry Point
// ============================================================

export async function startServer(): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();

  // Log to stderr (never stdout - that's for JSON-RPC)
  log.info(`Starting server v${VERSION}`);

  await server.connect(transport);

  log.info('Server connected and ready');
}
