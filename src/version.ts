/**
 * @fileoverview Package version reported by the CLI and the MCP server.
 *
 * @module version
 */

export const VERSION = '0.1.0';
