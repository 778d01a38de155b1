#!/usr/bin/env node

/**
 * MCP (Model Context Protocol) server entry point for dart-fin-ratios.
 * Speaks over stdio; all logging goes to stderr.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createContainer } from './core/container.js';
import { buildMcpServer } from './mcp/build-server.js';

const container = createContainer();
const server = buildMcpServer(container);

process.on('SIGINT', () => {
  container.close();
  process.exit(0);
});

const transport = new StdioServerTransport();
await server.connect(transport);
