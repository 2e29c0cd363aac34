#!/usr/bin/env node
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { ResearchOrchestrator } from './orchestrator.js';
import { createToolHandlers, registerResearchTools } from './tools.js';

// Note: process.env is populated by the MCP host at runtime from its server config
const config = loadConfig(process.env);
const orchestrator = new ResearchOrchestrator(config);

const server = new McpServer({
  name: 'research-report-mcp',
  version: '1.0.0',
});

registerResearchTools(server, createToolHandlers(orchestrator, config));

async function shutdown(): Promise<void> {
  console.error('\n[Research MCP] Shutting down...');
  const cancelled = orchestrator.cancelAll();
  if (cancelled > 0) {
    console.error(`[Research MCP] Cancelled ${cancelled} running session(s)`);
  }
  await orchestrator.whenIdle();
  await server.close();
  process.exit(0);
}

async function main() {
  console.error('[Research MCP] Starting server...');

  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error('[Research MCP] Server ready on stdio');
  console.error(`[Research MCP] Output: ${config.outputDir} | budget: ${config.budgetTier} | provider: ${config.provider ?? 'none'}`);
  if (!config.provider) {
    console.error('[Research MCP] No LLM key configured: only data profiling and citation steps can run');
  }

  process.on('SIGINT', () => {
    shutdown().catch(error => {
      console.error('[Research MCP] Shutdown failed:', error);
      process.exit(1);
    });
  });

  process.on('SIGTERM', () => {
    shutdown().catch(error => {
      console.error('[Research MCP] Shutdown failed:', error);
      process.exit(1);
    });
  });
}

main().catch((error) => {
  console.error('[Research MCP] Fatal error:', error);
  process.exit(1);
});
