/**
 * Common types for Aladhan MCP Server
 */

/**
 * Standard error codes for Aladhan tools
 */
export type ErrorCode =
  | 'INVALID_INPUT'
  | 'UPSTREAM_REJECTED'
  | 'RATE_LIMITED'
  | 'UPSTREAM_UNAVAILABLE'
  | 'INVALID_RESPONSE'
  | 'INTERNAL_ERROR';

/**
 * Error details attached to tool errors
 */
export interface ErrorDetails {
  upstreamStatus?: number;
  requestId?: string;
  retryAfterSeconds?: number;
  [key: string]: unknown;
}

/**
 * Structured error object returned in tool responses
 */
export interface ToolErrorPayload {
  code: ErrorCode;
  message: string;
  retryable: boolean;
  details?: ErrorDetails;
}

/**
 * Aladhan response envelope. `data` is endpoint specific and may be missing.
 */
export interface AladhanEnvelope {
  code?: unknown;
  status?: unknown;
  data?: unknown;
  [key: string]: unknown;
}

/**
 * Value accepted in an outgoing query string before serialization
 */
export type QueryValue = string | number | boolean;

/**
 * Query mapping; undefined entries are omitted
 */
export type QueryParams = Record<string, QueryValue | undefined>;

/**
 * Response from Aladhan client
 */
export interface UpstreamResponse<T = unknown> {
  data: T;
  status: number;
  attempts: number;
}
