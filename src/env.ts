import type { AppConfig } from './config.js';
import type { DocumentStore } from './services/types.js';

// Logger interface for type safety
export interface Logger {
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
  debug(msg: string, meta?: Record<string, unknown>): void;
  query(operation: string, durationMs: number, metadata?: Record<string, unknown>): void;
}

// Extend Hono Context with custom variables
export type Variables = {
  config: AppConfig;
  store: DocumentStore; // Repositories over the shared connection pool
  startTime: number;
  requestId: string; // Unique request ID for log tracing (x-request-id or UUID)
  logger: Logger;
};

// App type for OpenAPIHono
export type AppBindings = {
  Variables: Variables;
};
