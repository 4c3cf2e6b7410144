/**
 * Stdio transport for Aladhan MCP Server
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { logger } from '../domain/logger.js';
import type { ServerConfig } from '../config/env.js';
import { createMcpServer } from '../server.js';

/**
 * Start the MCP server with stdio transport
 */
export async function startStdioServer(config: ServerConfig): Promise<McpServer> {
  logger.info('Initializing MCP server with stdio transport');

  const server = createMcpServer(config);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('MCP server connected via stdio transport');

  return server;
}
