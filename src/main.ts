#!/usr/bin/env node

// src/main.ts
import { startMcpServer } from './mcp/server.js';

async function main() {
  try {
    await startMcpServer();
    console.error(
      'MCP Server setup complete. Process waiting for transport closure or signals.'
    );
  } catch (error) {
    console.error('Fatal error starting the application:', error);
    process.exit(1);
  }
}

void main();
