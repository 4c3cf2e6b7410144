/**
 * HTTP transport for Aladhan MCP Server
 * Handles communication via HTTP using StreamableHTTPServerTransport
 */

import type { Server } from 'node:http';
import express from 'express';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { logger } from '../domain/logger.js';
import { metrics } from '../domain/metrics.js';
import type { ServerConfig } from '../config/env.js';
import { createMcpServer, createToolContext } from '../server.js';

/**
 * Build the Express app serving /mcp, /health and /metrics
 *
 * Stateless mode: every POST gets its own server and transport, so JSON-RPC
 * ids from different clients never collide. The tool context (and with it the
 * methods cache) is shared across requests.
 */
export function createHttpApp(config: ServerConfig): express.Express {
  const context = createToolContext(config);

  const app = express();
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', transport: 'http' });
  });

  // Prometheus format
  app.get('/metrics', (_req, res) => {
    res.setHeader('Content-Type', 'text/plain; version=0.0.4');
    res.send(metrics.exportPrometheus());
  });

  app.post('/mcp', async (req, res) => {
    try {
      const server = createMcpServer(config, context);
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined,
        enableJsonResponse: true,
      });

      res.on('close', () => {
        Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
          logger.warn('Error closing MCP request transport', {
            error: error instanceof Error ? error.message : String(error),
          });
        });
      });

      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error('Error handling MCP request', {
        error: error instanceof Error ? error.message : String(error),
      });
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: {
            code: -32603,
            message: 'Internal server error',
          },
          id: null,
        });
      }
    }
  });

  return app;
}

/**
 * Start the MCP server with HTTP transport
 */
export function startHttpServer(config: ServerConfig): Server {
  const port = config.aladhanMcpPort;
  if (!port) {
    throw new Error('ALADHAN_MCP_PORT must be set for HTTP transport');
  }

  logger.info('Initializing MCP server with HTTP transport', { port });

  const app = createHttpApp(config);

  return app
    .listen(port, () => {
      logger.info('MCP server listening on HTTP transport', {
        port,
        endpoint: `http://localhost:${port}/mcp`,
        health: `http://localhost:${port}/health`,
        metrics: `http://localhost:${port}/metrics`,
      });
    })
    .on('error', (error) => {
      logger.error('HTTP server error', { error: error.message });
      process.exit(1);
    });
}
