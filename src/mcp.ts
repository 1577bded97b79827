#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { compileDescriptor, translateExpression } from './core/service.js';
import { summarizeDiagnostics } from './core/format.js';

/**
 * MCP server for chart compilation
 * Provides tools for compiling models to JANI and for translating single expressions
 */

const CompileModelSchema = z.object({
  descriptor: z.unknown().describe('The model descriptor as a JSON object'),
  charts: z.record(z.unknown()).optional().describe('Charts named by file in the descriptor, keyed by that reference'),
});

const ParseExpressionSchema = z.object({
  source: z.string().describe('Expression source, e.g. "x + 1 < limit"'),
  expand: z.boolean().optional().describe('If true, rewrite macros into primitive operators'),
  constants: z.record(z.unknown()).optional().describe('Constant values for the geometric macros, as JANI expressions'),
});

function jsonContent(value: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }] };
}

/**
 * Start the MCP server
 */
async function startServer() {
  const server = new Server(
    {
      name: 'chart2jani',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: 'compile_model',
        description:
          'Compile a model descriptor and its state-charts into a JANI automata network. ' +
          'Charts may be inlined in the descriptor or passed in "charts", keyed by the reference the descriptor uses. ' +
          'Returns the JANI model, or diagnostics with codes and hints.',
        inputSchema: {
          type: 'object',
          properties: {
            descriptor: { type: 'object', description: 'Model descriptor' },
            charts: { type: 'object', description: 'Charts keyed by file reference' },
          },
          required: ['descriptor'],
        },
      },
      {
        name: 'parse_expression',
        description:
          'Parse a chart expression (e.g. "a[i] + 1 < limit && !done") and return its JANI JSON. ' +
          'Set expand=true to rewrite macros such as norm2d or distance into primitive operators.',
        inputSchema: {
          type: 'object',
          properties: {
            source: { type: 'string', description: 'Expression source' },
            expand: { type: 'boolean', description: 'Rewrite macros into primitive operators' },
            constants: { type: 'object', description: 'Constant values as JANI expressions' },
          },
          required: ['source'],
        },
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      if (name === 'compile_model') {
        const parsed = CompileModelSchema.parse(args);
        const result = compileDescriptor(parsed.descriptor, parsed.charts ?? {});
        return jsonContent({ ...summarizeDiagnostics(result.errors), ...(result.model ? { model: result.model } : {}) });
      }

      if (name === 'parse_expression') {
        const parsed = ParseExpressionSchema.parse(args);
        const result = translateExpression(parsed.source, { expand: parsed.expand, constants: parsed.constants });
        return jsonContent({ ...summarizeDiagnostics(result.errors), ...(result.expression !== undefined ? { expression: result.expression } : {}) });
      }

      throw new Error(`Unknown tool: ${name}`);
    } catch (error) {
      if (error instanceof z.ZodError) {
        throw new Error(`Invalid arguments: ${error.message}`);
      }
      throw error;
    }
  });

  // Start server with stdio transport
  const transport = new StdioServerTransport();
  await server.connect(transport);

  // Log to stderr to avoid interfering with stdio transport
  console.error('chart2jani MCP server started');
}

startServer().catch((error) => {
  console.error('Failed to start MCP server:', error);
  process.exit(1);
});
