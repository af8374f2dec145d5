// src/mcp/server.ts
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createKnowledgeBase } from '../adapters/index.js';
import { config } from '../config/index.js';
import { createAllMcpTools } from './tools/index.js';

export async function startMcpServer(): Promise<void> {
  // Log server start to stderr
  console.error('Starting Knowledge Base MCP Server...');

  const knowledgeBase = createKnowledgeBase(config);
  try {
    await knowledgeBase.start(config.watch);
  } catch (error) {
    console.error('Knowledge base startup sync failed:', error);
    console.error(
      'Serving the last committed index; the next trigger will retry the update.'
    );
  }

  const server = new McpServer(
    { name: config.serverName, version: '1.0.0' },
    { capabilities: { tools: { listChanged: false } } }
  );

  const mcpTools = createAllMcpTools(knowledgeBase);

  server.tool(
    mcpTools.getIndexTool.name,
    mcpTools.getIndexTool.description,
    mcpTools.getIndexTool.inputSchema.shape,
    (args) => mcpTools.getIndexTool.execute(args)
  );
  console.error(`Registered MCP tool: ${mcpTools.getIndexTool.name}`);

  server.tool(
    mcpTools.getSourceTool.name,
    mcpTools.getSourceTool.description,
    mcpTools.getSourceTool.inputSchema.shape,
    (args) => mcpTools.getSourceTool.execute(args)
  );
  console.error(`Registered MCP tool: ${mcpTools.getSourceTool.name}`);

  server.tool(
    mcpTools.reindexTool.name,
    mcpTools.reindexTool.description,
    mcpTools.reindexTool.inputSchema.shape,
    (args) => mcpTools.reindexTool.execute(args)
  );
  console.error(`Registered MCP tool: ${mcpTools.reindexTool.name}`);

  const transport = new StdioServerTransport();
  try {
    console.error('Attempting to connect transport...');
    await server.connect(transport);
    console.error(
      'MCP server transport connected successfully via stdio. Ready for requests.'
    );
  } catch (error) {
    console.error('Failed to connect MCP server transport:', error);
    process.exit(1);
  }

  const shutdown = async (signal: string): Promise<void> => {
    console.error(`\nReceived ${signal}, shutting down MCP server...`);
    await knowledgeBase.stop();
    await server.close();
    console.error('MCP server closed.');
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      });
    });
  }

  process.on('uncaughtException', (error, origin) => {
    console.error(`Uncaught Exception at: ${origin}`, error);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason, promise) => {
    console.error('Unhandled Rejection at:', promise, 'reason:', reason);
    process.exit(1);
  });
}
