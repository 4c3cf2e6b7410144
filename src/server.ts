/**
 * Shared MCP server factory
 * Creates the MCP server with all Aladhan tools registered.
 * Used by both stdio and HTTP transports.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { logger } from './domain/logger.js';
import type { ServerConfig } from './config/env.js';
import { AladhanClient } from './domain/aladhan-client.js';
import { TtlCache } from './domain/ttl-cache.js';
import type { ToolContext } from './tools/context.js';
import { registerDateConversionTools } from './tools/date-conversion.js';
import { registerPrayerTimesTools } from './tools/prayer-times.js';
import { registerQiblaTools } from './tools/qibla.js';
import { registerCalendarTools } from './tools/calendars.js';

/**
 * Build the tool context from configuration.
 * The methods cache lives as long as the returned context.
 */
export function createToolContext(config: ServerConfig): ToolContext {
  return {
    client: new AladhanClient({
      baseUrl: config.aladhanBaseUrl,
      timeoutMs: config.aladhanTimeoutMs,
      retryAttempts: config.retryAttempts,
      retryBaseDelayMs: config.retryBaseDelayMs,
    }),
    methodsCache: new TtlCache(),
    methodsCacheTtlSeconds: config.methodsCacheTtlSeconds,
    calendarTimeoutMs: config.aladhanCalendarTimeoutMs,
  };
}

/**
 * Create and configure the MCP server (not yet connected to any transport)
 */
export function createMcpServer(
  config: ServerConfig,
  context: ToolContext = createToolContext(config)
): McpServer {
  logger.info('Creating MCP server', {
    serverName: config.serverName,
    serverVersion: config.serverVersion,
  });

  const server = new McpServer(
    {
      name: config.serverName,
      version: config.serverVersion,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  registerDateConversionTools(server, context);
  registerPrayerTimesTools(server, context);
  registerQiblaTools(server, context);
  registerCalendarTools(server, context);

  logger.info('MCP server created successfully', { tools: 11 });

  return server;
}
