#!/usr/bin/env node
/**
 * @fileoverview objclint MCP server entry point.
 * Run with: npx objclint-mcp
 *
 * @module bin/objclint-mcp
 */

import { startServer } from '../mcp/server.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('mcp');

// Handle graceful shutdown
process.on('SIGINT', () => {
  log.info('Received SIGINT, shutting down...');
  process.exit(0);
});

process.on('SIGTERM', () => {
  log.info('Received SIGTERM, shutting down...');
  process.exit(0);
});

startServer().catch((error: unknown) => {
  log.error('Fatal error:', error);
  process.exit(1);
});
