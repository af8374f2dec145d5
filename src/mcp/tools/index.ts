import type { KnowledgeBase } from '../../core/kb/knowledgeBase.js';
import { createGetIndexTool } from './getIndexTool.js';
import { createGetSourceTool } from './getSourceTool.js';
import { createReindexTool } from './reindexTool.js';

// Function to create all tools, injecting dependencies
export function createAllMcpTools(knowledgeBase: KnowledgeBase) {
  return {
    getIndexTool: createGetIndexTool(knowledgeBase),
    getSourceTool: createGetSourceTool(knowledgeBase),
    reindexTool: createReindexTool(knowledgeBase),
  };
}
