/**
 * HTTP client for the Aladhan REST API
 */

import { randomUUID } from 'node:crypto';
import type { QueryParams, UpstreamResponse } from './types.js';
import {
  createInvalidResponseError,
  handleHttpError,
  handleNetworkError,
  isToolError,
  isTransportError,
} from './error-handler.js';
import { buildQuery } from './query.js';
import { withRetry, DEFAULT_RETRY_ATTEMPTS, DEFAULT_RETRY_BASE_DELAY_MS } from './retry.js';
import { logger, redactUrl } from './logger.js';
import { metrics } from './metrics.js';
import { getRequestId } from './request-context.js';

export interface AladhanClientOptions {
  /** Base URL of the API (e.g., https://api.aladhan.com/v1) */
  baseUrl: string;
  /** Default timeout in milliseconds (default: 15000) */
  timeoutMs?: number;
  /** Total attempts per request (default: 3) */
  retryAttempts?: number;
  /** First backoff delay in milliseconds (default: 300) */
  retryBaseDelayMs?: number;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Options for a single GET
 */
export interface GetOptions {
  /** Request timeout in milliseconds, per attempt */
  timeout?: number;
  /** Request ID for tracking (taken from the request context, or generated) */
  requestId?: string;
}

export class AladhanClient {
  private readonly baseUrl: string;
  private readonly defaultTimeout: number;
  private readonly retryAttempts: number;
  private readonly retryBaseDelayMs: number;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(options: AladhanClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.defaultTimeout = options.timeoutMs ?? 15000;
    this.retryAttempts = options.retryAttempts ?? DEFAULT_RETRY_ATTEMPTS;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
    this.sleep = options.sleep;

    logger.info('AladhanClient initialized', {
      baseUrl: this.baseUrl,
      defaultTimeout: this.defaultTimeout,
      retryAttempts: this.retryAttempts,
    });
  }

  /**
   * Build the absolute URL for a path and query
   */
  buildUrl(path: string, query?: QueryParams): string {
    const search = buildQuery(query).toString();
    return `${this.baseUrl}${path}${search ? `?${search}` : ''}`;
  }

  /**
   * GET a JSON document, retrying transport failures with backoff
   *
   * @param path - API path (e.g., /timingsByCity/15-03-2024)
   * @param query - Query parameters; undefined entries are omitted
   * @throws ToolError once every attempt has failed
   */
  async get(
    path: string,
    query?: QueryParams,
    options: GetOptions = {}
  ): Promise<UpstreamResponse> {
    const requestId = options.requestId || getRequestId() || randomUUID();
    const timeout = options.timeout || this.defaultTimeout;
    const url = this.buildUrl(path, query);

    let attempts = 0;
    const result = await withRetry(
      (attempt) => {
        attempts = attempt;
        return this.fetchOnce(url, timeout, requestId, attempt);
      },
      {
        attempts: this.retryAttempts,
        baseDelayMs: this.retryBaseDelayMs,
        shouldRetry: isTransportError,
        sleep: this.sleep,
      }
    );

    return { ...result, attempts };
  }

  private async fetchOnce(
    url: string,
    timeout: number,
    requestId: string,
    attempt: number
  ): Promise<{ data: unknown; status: number }> {
    const startTime = Date.now();

    logger.debug('Upstream request starting', {
      requestId,
      url: redactUrl(url),
      attempt,
    });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });

      const latency = Date.now() - startTime;
      logger.logUpstreamCall(url, response.status, latency, attempt, requestId);
      metrics.incrementUpstreamCall(response.ok ? 'success' : 'http_error');

      if (!response.ok) {
        throw handleHttpError(
          response.status,
          response.statusText,
          response.headers,
          requestId
        );
      }

      const body = await response.text();
      let data: unknown;
      try {
        data = JSON.parse(body);
      } catch {
        throw createInvalidResponseError(redactUrl(url), requestId);
      }

      return { data, status: response.status };
    } catch (error) {
      if (isToolError(error)) {
        throw error;
      }

      const latency = Date.now() - startTime;
      metrics.incrementUpstreamCall('network_error');

      if (error instanceof Error) {
        logger.error('Upstream request failed', {
          requestId,
          url: redactUrl(url),
          error: error.message,
          latency,
          attempt,
        });

        if (error.name === 'AbortError') {
          throw handleNetworkError(
            new Error(`Request timeout after ${timeout}ms`),
            requestId
          );
        }

        throw handleNetworkError(error, requestId);
      }

      logger.error('Upstream request failed with unknown error', {
        requestId,
        url: redactUrl(url),
        error: String(error),
        latency,
        attempt,
      });

      throw handleNetworkError(new Error('Unknown error occurred'), requestId);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
