#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { renderDocument } from './core/document.js';
import { extractDiagramBlocks } from './core/markdown.js';

/**
 * MCP server exposing diagram rendering over stdio
 */

const RenderDiagramSchema = z.object({
  text: z.string().describe('Diagram text, or Markdown content with ```mermaid blocks'),
  maxWidth: z.number().int().positive().optional().describe('Maximum output width in columns'),
});

function jsonContent(value: unknown) {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

async function startServer() {
  const server = new Server(
    { name: 'ascii-diagrams', version: '0.1.0' },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: 'render_diagram',
        description:
          'Render a sequence diagram, flowchart/graph or ER diagram as Unicode box-drawing text for display in a ' +
          'terminal or code block. Accepts a single diagram (e.g. "graph TD\\nA-->B") or Markdown with ```mermaid ' +
          'code blocks, in which case every block is rendered. Returns the rendered text or the errors that prevented it.',
        inputSchema: {
          type: 'object',
          properties: {
            text: { type: 'string', description: 'Diagram text or Markdown content with ```mermaid blocks' },
            maxWidth: { type: 'integer', minimum: 1, description: 'Maximum output width in columns' },
          },
          required: ['text'],
        },
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    if (name !== 'render_diagram') throw new Error(`Unknown tool: ${name}`);

    const parsed = RenderDiagramSchema.safeParse(args);
    if (!parsed.success) throw new Error(`Invalid arguments: ${parsed.error.message}`);
    const { text, maxWidth } = parsed.data;

    const markdown = extractDiagramBlocks(text).length > 0;
    const diagrams = renderDocument(text, { maxWidth, markdown });
    if (!markdown) {
      const [d] = diagrams;
      return jsonContent(
        d.ok
          ? { ok: true, diagramType: d.type, output: d.output, warnings: d.warnings }
          : { ok: false, diagramType: d.type, errors: d.errors }
      );
    }
    return jsonContent({ ok: diagrams.every((d) => d.ok), diagramCount: diagrams.length, diagrams });
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  // stdout carries the protocol
  console.error('ascii-diagrams MCP server started');
}

startServer().catch((error) => {
  console.error('Failed to start MCP server:', error);
  process.exit(1);
});
