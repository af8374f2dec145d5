import { z } from 'zod';
import type { KnowledgeBase } from '../../core/kb/knowledgeBase.js';

type McpTextContent = { type: 'text'; text: string };

export function createGetIndexTool(knowledgeBase: KnowledgeBase) {
  return {
    name: 'get-index',
    description:
      'Return the knowledge base index: one entry per source with its identifier and a description.',
    inputSchema: z.object({
      format: z
        .enum(['text', 'entries'])
        .optional()
        .default('text')
        .describe('"text" for the raw index, "entries" for parsed JSON entries.'),
    }),
    execute: async ({ format }: { format?: 'text' | 'entries' }) => {
      try {
        console.error(`[MCP Tool] Received get-index request (format: ${format})`);
        const text =
          format === 'entries'
            ? JSON.stringify(await knowledgeBase.loadIndexEntries(), null, 2)
            : await knowledgeBase.loadIndexText();
        const responseContent: McpTextContent = {
          type: 'text' as const,
          text,
        };
        return { content: [responseContent] };
      } catch (error) {
        console.error('[MCP Tool] Error processing get-index request:', error);
        const errorMessage =
          error instanceof Error ? error.message : String(error);
        const errorContent: McpTextContent = {
          type: 'text' as const,
          text: JSON.stringify({ error: `Failed to load index: ${errorMessage}` }),
        };
        return { content: [errorContent], isError: true };
      }
    },
  };
}
