#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { LINT_SWIFT_TOOL, lintSwiftToolDefinition, runLintSwift } from './core/tool.js';

function jsonText(payload: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(payload, null, 2) }] };
}

/**
 * MCP server exposing the non-overridable class declaration check.
 */
function createServer(): Server {
  const server = new Server({ name: 'classfinal', version: '0.1.0' }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: [lintSwiftToolDefinition] }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    if (name !== LINT_SWIFT_TOOL) throw new Error(`Unknown tool: ${name}`);
    try {
      return jsonText(runLintSwift(args));
    } catch (error) {
      if (error instanceof z.ZodError) throw new Error(`Invalid arguments: ${error.message}`);
      throw error;
    }
  });

  return server;
}

async function main() {
  await createServer().connect(new StdioServerTransport());
  // stdout carries the protocol
  console.error('classfinal MCP server started');
}

main().catch((error: unknown) => {
  console.error('Failed to start MCP server:', error);
  process.exit(1);
});
