/**
 * Tool Wrapper Utility
 * Wraps tool handlers with request context, logging, metrics and timing,
 * and turns thrown ToolError / ZodError values into MCP error results.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { runWithContext, generateRequestId } from './request-context.js';
import { toToolError } from './error-handler.js';
import { buildErrorResponse } from './response-builder.js';
import { logger } from './logger.js';
import { metrics } from './metrics.js';

/**
 * Tool handler function type
 */
export type ToolHandler = (args: unknown) => Promise<CallToolResult>;

/**
 * Wrap a tool handler with observability instrumentation
 *
 * Validation and upstream failures come back as `isError` results carrying
 * the error code. Anything else is logged and re-thrown for the SDK to report.
 */
export function wrapTool(toolName: string, handler: ToolHandler): ToolHandler {
  return async (args: unknown): Promise<CallToolResult> => {
    const requestId = generateRequestId();
    const startTime = Date.now();

    return runWithContext({ requestId, toolName, startTime }, async () => {
      logger.logToolStart(toolName, args, requestId);

      try {
        const result = await handler(args);
        const latencyMs = Date.now() - startTime;

        logger.logToolEnd(toolName, latencyMs, 'success', requestId);
        metrics.incrementToolCall(toolName, 'success');
        metrics.recordLatency(toolName, latencyMs);

        return result;
      } catch (error) {
        const latencyMs = Date.now() - startTime;
        metrics.incrementToolCall(toolName, 'error');
        metrics.recordLatency(toolName, latencyMs);

        const toolError = toToolError(error);
        if (toolError) {
          logger.logToolEnd(toolName, latencyMs, 'error', requestId, toolError.code);
          return buildErrorResponse(toolError.toPayload());
        }

        logger.logToolEnd(toolName, latencyMs, 'error', requestId, 'INTERNAL_ERROR');
        logger.logError(error instanceof Error ? error : new Error(String(error)), {
          requestId,
          toolName,
          context: 'tool_wrapper',
        });

        throw error;
      }
    });
  };
}
