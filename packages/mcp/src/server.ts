/**
 * @module server
 * MCP server wiring: tool listing and dispatch over a {@link ToolContext}.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { ToolContext } from './context.js';
import { TOOLS, handleToolCall } from './tools.js';

/** Server name and version reported to clients. */
export const SERVER_INFO = { name: 'lexicon', version: '0.1.0' } as const;

export function createServer(context: ToolContext): Server {
  const server = new Server(
    { ...SERVER_INFO },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: TOOLS,
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return handleToolCall(context, name, args ?? {});
  });

  return server;
}
