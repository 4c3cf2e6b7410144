/**
 * Response builder for MCP tool responses
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ToolErrorPayload } from './types.js';
import { isRecord } from './envelope.js';

/**
 * Serialize a JSON payload as text content. Non-ASCII characters are kept as-is.
 *
 * Object payloads are also attached as structured content; arrays and scalars
 * are text only, since structured content must be an object.
 */
export function buildToolResponse(payload: unknown): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(payload),
      },
    ],
    ...(isRecord(payload) && { structuredContent: payload }),
  };
}

/**
 * Format a tool error into an MCP result flagged with isError
 */
export function buildErrorResponse(error: ToolErrorPayload): CallToolResult {
  const textSummary = error.details?.retryAfterSeconds
    ? `${error.message} Retry after ${error.details.retryAfterSeconds} seconds.`
    : error.message;

  return {
    content: [
      {
        type: 'text',
        text: textSummary,
      },
    ],
    structuredContent: {
      error,
    },
    isError: true,
  };
}
