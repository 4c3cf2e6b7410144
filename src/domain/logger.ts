/**
 * Structured JSON logger for Aladhan MCP Server
 *
 * IMPORTANT: All logs go to stderr because stdout is reserved for MCP protocol communication
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

/**
 * Tool arguments that are safe to echo into logs
 */
const SAFE_INPUT_FIELDS = [
  'date',
  'lat',
  'lon',
  'city',
  'state',
  'country',
  'year',
  'month',
  'method',
  'school',
  'timezone',
  'calendarMethod',
] as const;

/**
 * Query parameters that must never reach the logs
 */
const SENSITIVE_QUERY_PARAMS = ['x7xapikey'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class Logger {
  private minLevel: LogLevel;
  private readonly levelPriority: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor(minLevel: LogLevel = 'info') {
    this.minLevel = minLevel;
  }

  /**
   * Set the minimum log level
   */
  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levelPriority[level] >= this.levelPriority[this.minLevel];
  }

  /**
   * Write a log entry to stderr
   */
  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(context && Object.keys(context).length > 0 ? { context } : {}),
    };

    console.error(JSON.stringify(entry));
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  /**
   * Log an error object with stack trace
   */
  logError(error: Error, context?: LogContext): void {
    this.error(error.message, {
      ...context,
      errorName: error.name,
      stack: error.stack,
    });
  }

  logToolStart(toolName: string, input: unknown, requestId?: string): void {
    this.info('Tool call started', {
      requestId,
      toolName,
      inputSummary: this.sanitizeInput(input),
    });
  }

  logToolEnd(
    toolName: string,
    latencyMs: number,
    outcome: 'success' | 'error',
    requestId?: string,
    errorCode?: string
  ): void {
    this.info('Tool call completed', {
      requestId,
      toolName,
      latencyMs,
      outcome,
      ...(errorCode && { errorCode }),
    });
  }

  /**
   * Log a single upstream attempt. The URL has sensitive query parameters masked.
   */
  logUpstreamCall(
    upstreamUrl: string,
    upstreamStatus: number,
    latencyMs: number,
    attempt: number,
    requestId?: string
  ): void {
    this.debug('Upstream API call', {
      requestId,
      upstreamUrl: redactUrl(upstreamUrl),
      upstreamStatus,
      latencyMs,
      attempt,
    });
  }

  /**
   * Only log safe summary fields
   */
  private sanitizeInput(input: unknown): Record<string, unknown> {
    if (!isRecord(input)) {
      return { type: typeof input };
    }

    const summary: Record<string, unknown> = {};
    for (const field of SAFE_INPUT_FIELDS) {
      if (field in input) {
        summary[field] = input[field];
      }
    }

    return summary;
  }
}

/**
 * Mask sensitive query parameters in a URL
 */
export function redactUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }

  for (const name of SENSITIVE_QUERY_PARAMS) {
    if (parsed.searchParams.has(name)) {
      parsed.searchParams.set(name, 'REDACTED');
    }
  }
  return parsed.toString();
}

// Singleton logger instance
const logger = new Logger();

export { logger };
