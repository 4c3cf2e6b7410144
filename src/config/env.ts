/**
 * Configuration management for Aladhan MCP Server
 * Loads and validates environment variables
 */

import type { LogLevel } from '../domain/logger.js';

export interface ServerConfig {
  // Upstream API configuration
  aladhanBaseUrl: string;
  aladhanTimeoutMs: number;
  aladhanCalendarTimeoutMs: number;

  // Retry configuration
  retryAttempts: number;
  retryBaseDelayMs: number;

  // Calculation methods cache
  methodsCacheTtlSeconds: number;

  // Server configuration
  aladhanMcpPort?: number;
  aladhanMcpLogLevel: LogLevel;

  // Server metadata
  serverName: string;
  serverVersion: string;
}

export const DEFAULT_ALADHAN_BASE_URL = 'https://api.aladhan.com/v1';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Parse a positive integer environment variable, falling back to a default
 */
function readPositiveInt(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid ${name}: ${raw} (expected a positive integer)`);
  }
  return value;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Load and validate configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const aladhanBaseUrl = env.ALADHAN_BASE_URL || DEFAULT_ALADHAN_BASE_URL;

  // Validate base URL format
  try {
    new URL(aladhanBaseUrl);
  } catch {
    throw new Error(`Invalid ALADHAN_BASE_URL: ${aladhanBaseUrl}`);
  }

  const aladhanTimeoutMs = readPositiveInt(env, 'ALADHAN_TIMEOUT_MS', 15000);
  const aladhanCalendarTimeoutMs = readPositiveInt(
    env,
    'ALADHAN_CALENDAR_TIMEOUT_MS',
    20000
  );

  const retryAttempts = readPositiveInt(env, 'ALADHAN_RETRY_ATTEMPTS', 3);
  const retryBaseDelayMs = readPositiveInt(env, 'ALADHAN_RETRY_BASE_DELAY_MS', 300);

  const methodsCacheTtlSeconds = readPositiveInt(
    env,
    'ALADHAN_METHODS_CACHE_TTL_SECONDS',
    86400
  );

  // Optional: HTTP transport port
  const aladhanMcpPort = env.ALADHAN_MCP_PORT
    ? readPositiveInt(env, 'ALADHAN_MCP_PORT', 0)
    : undefined;

  // Log level
  const aladhanMcpLogLevel = env.ALADHAN_MCP_LOG_LEVEL || 'info';
  if (!isLogLevel(aladhanMcpLogLevel)) {
    throw new Error(`Invalid ALADHAN_MCP_LOG_LEVEL: ${aladhanMcpLogLevel}`);
  }

  return {
    aladhanBaseUrl,
    aladhanTimeoutMs,
    aladhanCalendarTimeoutMs,
    retryAttempts,
    retryBaseDelayMs,
    methodsCacheTtlSeconds,
    aladhanMcpPort,
    aladhanMcpLogLevel,
    serverName: 'aladhan-mcp',
    serverVersion: '0.1.0',
  };
}

// Singleton config instance
let configInstance: ServerConfig | null = null;

/**
 * Get the current configuration (loads on first call)
 */
export function getConfig(): ServerConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}
