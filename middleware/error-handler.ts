import type { ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { AppBindings, Logger } from '../src/env.js';
import {
  ErrorCode,
  type ErrorCodeType,
  ERROR_STATUS_MAP,
  APIError,
  buildMeta,
  type ErrorResponse,
} from '../src/schemas/response.js';
import { MAX_ERROR_MESSAGE_LENGTH } from '../src/lib/constants.js';

// =================================================================================
// Error Handler Middleware - Consistent Error Responses
// =================================================================================

const GENERIC_MESSAGE = 'An unexpected error occurred';

/**
 * Patterns to redact from error messages (security)
 */
const REDACT_PATTERNS = [
  /postgres(ql)?:\/\/[^\s]+/gi,      // Connection strings
  /password[=:][^\s&]+/gi,           // Passwords in URLs
  /api[_-]?key[=:][^\s&]+/gi,        // API keys
  /bearer\s+[^\s]+/gi,               // Bearer tokens
  /authorization[=:][^\s]+/gi,       // Auth headers
  /\/home\/[^\s]+/gi,                // File paths
  /at\s+[^\s]+\s+\([^)]+\)/gi,       // Stack trace lines
  /\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}/g,  // IP addresses
];

/**
 * Sanitize error message to prevent leaking sensitive information
 */
export function sanitizeMessage(message: string | undefined): string {
  if (!message) return GENERIC_MESSAGE;

  let sanitized = message;
  for (const pattern of REDACT_PATTERNS) {
    sanitized = sanitized.replace(pattern, '[REDACTED]');
  }

  // Truncate very long messages
  if (sanitized.length > MAX_ERROR_MESSAGE_LENGTH) {
    sanitized = sanitized.substring(0, MAX_ERROR_MESSAGE_LENGTH) + '...';
  }

  return sanitized;
}

/**
 * Categorize an error into an ErrorCode
 */
export function categorizeError(error: Error): ErrorCodeType {
  if (error instanceof APIError) {
    return error.code;
  }

  // Raised by hono itself, e.g. a body that is not valid JSON
  if (error instanceof HTTPException) {
    if (error.status === 404) return ErrorCode.NOT_FOUND;
    if (error.status < 500) return ErrorCode.INVALID_REQUEST;
    return ErrorCode.INTERNAL_ERROR;
  }

  if (error.name === 'ZodError') {
    return ErrorCode.VALIDATION_ERROR;
  }

  // Store timeouts arrive as APIErrors; this covers AbortSignal.timeout()
  if (error.name === 'TimeoutError') {
    return ErrorCode.DATABASE_TIMEOUT;
  }

  return ErrorCode.INTERNAL_ERROR;
}

/**
 * Hono error handler middleware
 * Catches errors and returns consistent JSON responses with envelope format
 */
export const errorHandler: ErrorHandler<AppBindings> = (error, c) => {
  const code = categorizeError(error);
  const status = ERROR_STATUS_MAP[code];
  const cause = error.cause instanceof Error ? error.cause.message : undefined;

  // Full error for operators, never for clients
  const logger: Pick<Logger, 'error' | 'warn'> = c.get('logger') ?? console;
  logger[status >= 500 ? 'error' : 'warn']('Error handler caught:', {
    code,
    name: error.name,
    message: error.message,
    ...(cause && { cause }),
    ...(status >= 500 && { stack: error.stack?.split('\n').slice(0, 3).join('\n') }),
    url: c.req.url,
    method: c.req.method,
  });

  // Unclassified failures may carry driver or runtime internals
  const message = code === ErrorCode.INTERNAL_ERROR ? GENERIC_MESSAGE : sanitizeMessage(error.message);
  const details = error instanceof APIError ? error.details : undefined;

  const response: ErrorResponse = {
    success: false,
    error: {
      code,
      message,
      ...(details && { details }),
    },
    meta: buildMeta(c),
  };

  return c.json(response, status);
};
