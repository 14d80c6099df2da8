/**
 * @module mcp
 * MCP (Model Context Protocol) server exposing a Lexicon registry.
 *
 * Loads `messages/<lang>/<file>.json` (or a bundle) at startup and answers
 * translation and language-state tool calls over stdio. Diagnostics go to
 * stderr; stdout carries the protocol.
 *
 * Architecture:
 *   MCP client ──stdio──> This MCP Server (Node.js)
 *                               │
 *                               ↓
 *                        RegistryImpl (@lexicon/core)
 *                               ↑ catalogs
 *                        loadMessages / loadBundle (@lexicon/loader)
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { resolveServerConfig } from './config.js';
import { createToolContext } from './context.js';
import { createServer } from './server.js';

try {
  const config = resolveServerConfig(process.argv.slice(2), process.env);
  const server = createServer(createToolContext(config));
  const transport = new StdioServerTransport();
  await server.connect(transport);
} catch (error) {
  console.error(`[lexicon] ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
}
