/**
 * Centralized Logger Utility for the Book Catalog API
 *
 * Provides context-aware, structured logging with support for:
 * - Multiple log levels (debug, info, warn, error)
 * - Configuration-driven behaviour (LOG_LEVEL, STRUCTURED_LOGGING, ENABLE_QUERY_LOGGING)
 * - Request-scoped and script-scoped contexts
 * - JSON or human-readable output formats
 *
 * @module lib/logger
 */

import type { AppConfig } from '../src/config.js';

/**
 * Log level type
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log level enumeration with priority values
 * Lower numbers = more verbose, higher numbers = less verbose
 */
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

/**
 * Logger switches, normally taken straight from {@link AppConfig}
 */
export type LoggerOptions = Pick<AppConfig, 'LOG_LEVEL' | 'STRUCTURED_LOGGING' | 'ENABLE_QUERY_LOGGING'>;

/**
 * Context metadata for logging
 */
interface LogContext {
  requestId?: string;
  script?: string;
  type?: 'http' | 'script' | 'startup';
  [key: string]: unknown;
}

/**
 * Log entry structure
 */
interface LogEntry extends LogContext {
  timestamp: string;
  level: LogLevel;
  message: string;
}

type LogData = Record<string, unknown>;

/**
 * Logger class for structured, context-aware logging
 */
export class Logger {
  private context: LogContext;
  private level: number;
  private structured: boolean;
  private queryLoggingEnabled: boolean;

  /**
   * @param options - Level and output switches
   * @param context - Contextual metadata (requestId, script, type, etc.)
   */
  constructor(options: LoggerOptions, context: LogContext = {}) {
    this.context = context;
    this.level = LOG_LEVELS[options.LOG_LEVEL];
    this.structured = options.STRUCTURED_LOGGING;
    this.queryLoggingEnabled = options.ENABLE_QUERY_LOGGING;
  }

  /**
   * Create a request-scoped logger tagged with the request id
   */
  static forRequest(options: LoggerOptions, requestId: string): Logger {
    return new Logger(options, { requestId, type: 'http' });
  }

  /**
   * Create a logger for one-off scripts (migrations, seeding)
   */
  static forScript(options: LoggerOptions, script: string): Logger {
    return new Logger(options, { script, type: 'script' });
  }

  private _log(level: LogLevel, message: string, data: LogData = {}): void {
    if (LOG_LEVELS[level] < this.level) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.context,
      ...data
    };

    if (this.structured) {
      console[level === 'debug' ? 'log' : level](JSON.stringify(entry));
    } else {
      const ctx = this.context.requestId ? `[req:${this.context.requestId}]` :
                  this.context.script ? `[${this.context.script}]` : '';
      const dataStr = Object.keys(data).length ? ` ${JSON.stringify(data)}` : '';
      console[level === 'debug' ? 'log' : level](`[${level.toUpperCase()}] ${ctx} ${message}${dataStr}`);
    }
  }

  debug(message: string, data?: LogData): void {
    this._log('debug', message, data);
  }

  info(message: string, data?: LogData): void {
    this._log('info', message, data);
  }

  warn(message: string, data?: LogData): void {
    this._log('warn', message, data);
  }

  /**
   * Log error message (least verbose, always logged)
   */
  error(message: string, data?: LogData): void {
    this._log('error', message, data);
  }

  /**
   * Log document store timings
   *
   * Only emitted when ENABLE_QUERY_LOGGING=true, at info level so it survives
   * the default LOG_LEVEL.
   *
   * @param operation - Store operation name (e.g., 'book_search', 'book_insert')
   * @param durationMs - Round trip duration in milliseconds
   * @param metadata - Additional metadata (e.g., result_count)
   */
  query(operation: string, durationMs: number, metadata: LogData = {}): void {
    if (!this.queryLoggingEnabled) return;
    this._log('info', `Query: ${operation}`, { duration_ms: durationMs, ...metadata });
  }
}
