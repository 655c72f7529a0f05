#!/usr/bin/env node
/**
 * Geocoder MCP Server
 *
 * Model Context Protocol server over stdio exposing three-word address
 * conversion, autosuggest and offline address detection to AI agents.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import {
  formatErrorResponse,
  handleToolsCall,
  handleToolsList,
  toolRegistry,
} from './mcp/index.js';
import { registerAllTools } from './tools/index.js';

registerAllTools();

const server = new Server(
  {
    name: 'threeword-geocoder',
    version: '0.1.0',
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => {
  const { tools } = await handleToolsList();
  return {
    tools: tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: { ...tool.inputSchema, type: 'object' as const },
    })),
  };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  try {
    const result = await handleToolsCall(request);
    return {
      content: result.content.map((item) => ({ type: 'text' as const, text: item.text })),
      isError: result.isError,
    };
  } catch (error) {
    return {
      content: [{ type: 'text' as const, text: JSON.stringify(formatErrorResponse(error)) }],
      isError: true,
    };
  }
});

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);

  // Log to stderr so it doesn't interfere with stdio protocol
  console.error(`Geocoder MCP Server (stdio) started with ${toolRegistry.size} tools`);
}

main().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
