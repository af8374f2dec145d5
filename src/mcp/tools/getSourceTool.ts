import { z } from 'zod';
import type { KnowledgeBase } from '../../core/kb/knowledgeBase.js';

type McpTextContent = { type: 'text'; text: string };

export function createGetSourceTool(knowledgeBase: KnowledgeBase) {
  return {
    name: 'get-source',
    description:
      'Retrieve the full text of a knowledge base source by its identifier (file path or URL).',
    inputSchema: z.object({
      sourceId: z
        .string()
        .min(1)
        .describe('The source identifier as listed in the index.'),
    }),
    execute: async ({ sourceId }: { sourceId: string }) => {
      try {
        console.error(
          `[MCP Tool] Received get-source request for: "${sourceId}"`
        );
        const source = await knowledgeBase.loadSourceContent(sourceId);
        const responseContent: McpTextContent = {
          type: 'text' as const,
          text: source.text,
        };
        return { content: [responseContent] };
      } catch (error) {
        console.error(
          `[MCP Tool] Error processing get-source request for "${sourceId}":`,
          error
        );
        const errorMessage =
          error instanceof Error ? error.message : String(error);
        const errorContent: McpTextContent = {
          type: 'text' as const,
          text: JSON.stringify({
            error: `Failed to get source: ${errorMessage}`,
          }),
        };
        return { content: [errorContent], isError: true };
      }
    },
  };
}
