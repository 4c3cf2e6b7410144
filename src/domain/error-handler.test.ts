/**
 * Unit tests for error-handler
 * Tests error mapping and structured error creation
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import {
  ToolError,
  createValidationError,
  handleHttpError,
  handleNetworkError,
  isTransportError,
  mapHttpStatusToErrorCode,
  toToolError,
} from './error-handler.js';

vi.mock('./logger.js', () => ({
  logger: {
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { logger } from './logger.js';

describe('mapHttpStatusToErrorCode', () => {
  it('should map 4xx to UPSTREAM_REJECTED', () => {
    expect(mapHttpStatusToErrorCode(400)).toBe('UPSTREAM_REJECTED');
    expect(mapHttpStatusToErrorCode(404)).toBe('UPSTREAM_REJECTED');
  });

  it('should map 429 to RATE_LIMITED', () => {
    expect(mapHttpStatusToErrorCode(429)).toBe('RATE_LIMITED');
  });

  it('should map 5xx to UPSTREAM_UNAVAILABLE', () => {
    expect(mapHttpStatusToErrorCode(500)).toBe('UPSTREAM_UNAVAILABLE');
    expect(mapHttpStatusToErrorCode(503)).toBe('UPSTREAM_UNAVAILABLE');
  });

  it('should map anything else to INTERNAL_ERROR', () => {
    expect(mapHttpStatusToErrorCode(302)).toBe('INTERNAL_ERROR');
  });
});

describe('ToolError', () => {
  it('should mark RATE_LIMITED and UPSTREAM_UNAVAILABLE as retryable', () => {
    expect(new ToolError('RATE_LIMITED', 'x').retryable).toBe(true);
    expect(new ToolError('UPSTREAM_UNAVAILABLE', 'x').retryable).toBe(true);
    expect(new ToolError('INVALID_INPUT', 'x').retryable).toBe(false);
    expect(new ToolError('UPSTREAM_REJECTED', 'x').retryable).toBe(false);
  });

  it('should be an Error with a plain payload', () => {
    const error = new ToolError('INVALID_INPUT', 'city is required');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ToolError');
    expect(error.toPayload()).toEqual({
      code: 'INVALID_INPUT',
      message: 'city is required',
      retryable: false,
    });
  });
});

describe('isTransportError', () => {
  it('should accept HTTP and network failures', () => {
    expect(isTransportError(new ToolError('UPSTREAM_REJECTED', 'x'))).toBe(true);
    expect(isTransportError(new ToolError('RATE_LIMITED', 'x'))).toBe(true);
    expect(isTransportError(new ToolError('UPSTREAM_UNAVAILABLE', 'x'))).toBe(true);
  });

  it('should reject malformed responses and foreign errors', () => {
    expect(isTransportError(new ToolError('INVALID_RESPONSE', 'x'))).toBe(false);
    expect(isTransportError(new Error('x'))).toBe(false);
  });
});

describe('handleHttpError', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should build an UPSTREAM_REJECTED error with status details', () => {
    const error = handleHttpError(400, 'Bad Request', undefined, 'req-1');

    expect(error.code).toBe('UPSTREAM_REJECTED');
    expect(error.message).toBe('Aladhan API rejected the request (400 Bad Request)');
    expect(error.details).toEqual({ upstreamStatus: 400, requestId: 'req-1' });
    expect(logger.warn).toHaveBeenCalledWith(
      'HTTP error from Aladhan API',
      expect.objectContaining({ status: 400, code: 'UPSTREAM_REJECTED' })
    );
  });

  it('should read Retry-After for rate limiting', () => {
    const error = handleHttpError(
      429,
      'Too Many Requests',
      new Headers({ 'Retry-After': '30' })
    );

    expect(error.code).toBe('RATE_LIMITED');
    expect(error.details).toEqual({ upstreamStatus: 429, retryAfterSeconds: 30 });
  });

  it('should ignore a non-numeric Retry-After', () => {
    const error = handleHttpError(
      429,
      'Too Many Requests',
      new Headers({ 'Retry-After': 'soon' })
    );

    expect(error.details).toEqual({ upstreamStatus: 429 });
  });
});

describe('handleNetworkError', () => {
  it('should wrap the cause as UPSTREAM_UNAVAILABLE', () => {
    const error = handleNetworkError(new Error('ECONNREFUSED'), 'req-2');

    expect(error.code).toBe('UPSTREAM_UNAVAILABLE');
    expect(error.message).toBe('Unable to reach Aladhan API: ECONNREFUSED');
    expect(error.details).toEqual({ requestId: 'req-2', networkError: 'ECONNREFUSED' });
    expect(logger.error).toHaveBeenCalled();
  });
});

describe('createValidationError', () => {
  it('should name each offending field', () => {
    const schema = z.object({
      city: z.string().min(1, 'city is required'),
      school: z.number().max(1, 'school must be 0 (Shafi) or 1 (Hanafi)'),
    });
    const result = schema.safeParse({ city: '', school: 2 });
    if (result.success) {
      throw new Error('expected validation to fail');
    }

    const error = createValidationError(result.error);

    expect(error.code).toBe('INVALID_INPUT');
    expect(error.message).toBe(
      'Invalid input: city: city is required; school: school must be 0 (Shafi) or 1 (Hanafi)'
    );
  });
});

describe('toToolError', () => {
  it('should pass ToolError through and convert ZodError', () => {
    const toolError = new ToolError('RATE_LIMITED', 'slow down');
    expect(toToolError(toolError)).toBe(toolError);

    const zodResult = z.number().safeParse('x');
    if (zodResult.success) {
      throw new Error('expected validation to fail');
    }
    expect(toToolError(zodResult.error)?.code).toBe('INVALID_INPUT');
  });

  it('should return undefined for unknown errors', () => {
    expect(toToolError(new TypeError('boom'))).toBeUndefined();
    expect(toToolError('boom')).toBeUndefined();
  });
});
