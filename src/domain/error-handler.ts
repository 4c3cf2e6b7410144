/**
 * Error handling and mapping for Aladhan MCP Server
 */

import { ZodError } from 'zod';
import type { ErrorCode, ErrorDetails, ToolErrorPayload } from './types.js';
import { logger } from './logger.js';

/**
 * Error thrown by tool handlers and the Aladhan client
 */
export class ToolError extends Error implements ToolErrorPayload {
  readonly code: ErrorCode;
  readonly retryable: boolean;
  readonly details?: ErrorDetails;

  constructor(code: ErrorCode, message: string, details?: ErrorDetails) {
    super(message);
    this.name = 'ToolError';
    this.code = code;
    this.retryable = code === 'RATE_LIMITED' || code === 'UPSTREAM_UNAVAILABLE';
    this.details = details;
  }

  toPayload(): ToolErrorPayload {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      ...(this.details && { details: this.details }),
    };
  }
}

export function isToolError(error: unknown): error is ToolError {
  return error instanceof ToolError;
}

/**
 * Transport failures: any non-2xx status, connection failure or timeout.
 * These are the failures the retry wrapper re-attempts.
 */
export function isTransportError(error: unknown): boolean {
  return (
    isToolError(error) &&
    (error.code === 'UPSTREAM_REJECTED' ||
      error.code === 'RATE_LIMITED' ||
      error.code === 'UPSTREAM_UNAVAILABLE')
  );
}

/**
 * Map HTTP status codes to error codes
 */
export function mapHttpStatusToErrorCode(status: number): ErrorCode {
  if (status === 429) {
    return 'RATE_LIMITED';
  }
  if (status >= 500) {
    return 'UPSTREAM_UNAVAILABLE';
  }
  if (status >= 400) {
    return 'UPSTREAM_REJECTED';
  }
  return 'INTERNAL_ERROR';
}

/**
 * Create an error for a non-2xx upstream response
 */
export function handleHttpError(
  status: number,
  statusText: string,
  headers?: Headers,
  requestId?: string
): ToolError {
  const code = mapHttpStatusToErrorCode(status);

  let message: string;
  switch (code) {
    case 'UPSTREAM_REJECTED':
      message = `Aladhan API rejected the request (${status} ${statusText})`;
      break;
    case 'RATE_LIMITED':
      message = 'Aladhan API rate limit exceeded. Please try again later.';
      break;
    case 'UPSTREAM_UNAVAILABLE':
      message = `Aladhan API is currently unavailable (${status} ${statusText})`;
      break;
    default:
      message = `Unexpected response from Aladhan API (${status} ${statusText})`;
  }

  const details: ErrorDetails = {
    upstreamStatus: status,
  };

  if (requestId) {
    details.requestId = requestId;
  }

  if (code === 'RATE_LIMITED' && headers) {
    const retryAfter = headers.get('Retry-After');
    if (retryAfter) {
      const seconds = parseInt(retryAfter, 10);
      if (!isNaN(seconds)) {
        details.retryAfterSeconds = seconds;
      }
    }
  }

  logger.warn('HTTP error from Aladhan API', {
    status,
    statusText,
    code,
    requestId,
  });

  return new ToolError(code, message, details);
}

/**
 * Create an error for connection failures and timeouts
 */
export function handleNetworkError(error: Error, requestId?: string): ToolError {
  logger.error('Network error calling Aladhan API', {
    error: error.message,
    requestId,
  });

  return new ToolError(
    'UPSTREAM_UNAVAILABLE',
    `Unable to reach Aladhan API: ${error.message}`,
    {
      requestId,
      networkError: error.message,
    }
  );
}

/**
 * Create an error for a 2xx body that is not valid JSON
 */
export function createInvalidResponseError(
  url: string,
  requestId?: string
): ToolError {
  return new ToolError(
    'INVALID_RESPONSE',
    'Aladhan API returned a response that is not valid JSON',
    { requestId, url }
  );
}

/**
 * Turn zod issues into a single INVALID_INPUT error naming each field
 */
export function createValidationError(error: ZodError): ToolError {
  const issues = error.issues.map((issue) => {
    const field = issue.path.join('.');
    return field ? `${field}: ${issue.message}` : issue.message;
  });

  return new ToolError('INVALID_INPUT', `Invalid input: ${issues.join('; ')}`, {
    issues,
  });
}

/**
 * Normalize anything thrown from a tool handler into a ToolError,
 * or return undefined when it is not an error we know how to report.
 */
export function toToolError(error: unknown): ToolError | undefined {
  if (isToolError(error)) {
    return error;
  }
  if (error instanceof ZodError) {
    return createValidationError(error);
  }
  return undefined;
}
