import { z } from 'zod';
import type { KnowledgeBase } from '../../core/kb/knowledgeBase.js';

type McpTextContent = { type: 'text'; text: string };

export function createReindexTool(knowledgeBase: KnowledgeBase) {
  return {
    name: 'reindex',
    description:
      'Run a full incremental update of the knowledge base and return the pass report.',
    inputSchema: z.object({
      force: z
        .boolean()
        .optional()
        .default(false)
        .describe('Re-summarize every source and ignore URL schedules.'),
    }),
    execute: async ({ force }: { force?: boolean }) => {
      try {
        console.error(`[MCP Tool] Received reindex request (force: ${force})`);
        const report = await knowledgeBase.update(
          { kind: 'full' },
          { force: force ?? false }
        );
        const responseContent: McpTextContent = {
          type: 'text' as const,
          text: JSON.stringify(report, null, 2),
        };
        return { content: [responseContent] };
      } catch (error) {
        console.error('[MCP Tool] Error processing reindex request:', error);
        const errorMessage =
          error instanceof Error ? error.message : String(error);
        const errorContent: McpTextContent = {
          type: 'text' as const,
          text: JSON.stringify({ error: `Reindex failed: ${errorMessage}` }),
        };
        return { content: [errorContent], isError: true };
      }
    },
  };
}
