import { randomUUID } from 'node:crypto';
import { z } from '@hono/zod-openapi';
import type { Context, TypedResponse } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { JSONParsed } from 'hono/utils/types';
import type { AppBindings } from '../env.js';

// =================================================================================
// Error Codes - Machine-readable error identifiers
// =================================================================================

export const ErrorCode = {
  // Validation errors (4xx)
  INVALID_REQUEST: 'INVALID_REQUEST',
  MISSING_PARAMETER: 'MISSING_PARAMETER',
  VALIDATION_ERROR: 'VALIDATION_ERROR',

  // Resource errors (4xx)
  NOT_FOUND: 'NOT_FOUND',

  // Document store errors (5xx)
  DATABASE_ERROR: 'DATABASE_ERROR',
  DATABASE_TIMEOUT: 'DATABASE_TIMEOUT',

  // Generic errors (5xx)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
} as const;

export type ErrorCodeType = typeof ErrorCode[keyof typeof ErrorCode];

export const ErrorCodeSchema = z.enum([
  ErrorCode.INVALID_REQUEST,
  ErrorCode.MISSING_PARAMETER,
  ErrorCode.VALIDATION_ERROR,
  ErrorCode.NOT_FOUND,
  ErrorCode.DATABASE_ERROR,
  ErrorCode.DATABASE_TIMEOUT,
  ErrorCode.INTERNAL_ERROR,
  ErrorCode.SERVICE_UNAVAILABLE,
]).openapi('ErrorCode');

// =================================================================================
// Error Code to HTTP Status Mapping
// =================================================================================

export const ERROR_STATUS_MAP: Record<ErrorCodeType, ContentfulStatusCode> = {
  [ErrorCode.INVALID_REQUEST]: 400,
  [ErrorCode.MISSING_PARAMETER]: 400,
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.DATABASE_ERROR]: 503,
  [ErrorCode.DATABASE_TIMEOUT]: 504,
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.SERVICE_UNAVAILABLE]: 503,
};

// =================================================================================
// Response Meta Schema
// =================================================================================

export const ResponseMetaSchema = z.object({
  requestId: z.string().describe('Unique request identifier for tracing'),
  timestamp: z.string().datetime().describe('ISO-8601 timestamp'),
  latencyMs: z.number().int().nonnegative().optional().describe('Request processing time in milliseconds'),
}).openapi('ResponseMeta');

export type ResponseMeta = z.infer<typeof ResponseMetaSchema>;

// =================================================================================
// Error Response Schema
// =================================================================================

export const ErrorDetailsSchema = z.object({
  code: ErrorCodeSchema.describe('Machine-readable error code'),
  message: z.string().describe('Human-readable error message'),
  details: z.record(z.string(), z.unknown()).optional().describe('Additional error context'),
}).openapi('ErrorDetails');

export const ErrorResponseSchema = z.object({
  success: z.literal(false),
  error: ErrorDetailsSchema,
  meta: ResponseMetaSchema,
}).openapi('ErrorResponse');

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

// =================================================================================
// Success Response Schema Factory
// =================================================================================

/**
 * Creates a typed success response schema wrapping the provided data schema
 *
 * @example
 * const BookSuccessSchema = createSuccessSchema(BookSchema, 'BookSuccess');
 */
export function createSuccessSchema<T extends z.ZodTypeAny>(
  dataSchema: T,
  name: string
) {
  return z.object({
    success: z.literal(true),
    data: dataSchema,
    meta: ResponseMetaSchema,
  }).openapi(name);
}

// =================================================================================
// Response Helper Utilities
// =================================================================================

/**
 * Build response meta from Hono context
 */
export function buildMeta(c: Context<AppBindings>): ResponseMeta {
  const startTime = c.get('startTime');
  return {
    requestId: c.get('requestId') || randomUUID(),
    timestamp: new Date().toISOString(),
    latencyMs: startTime ? Date.now() - startTime : undefined,
  };
}

/**
 * Create a standardized success response
 *
 * @example
 * return createSuccessResponse(c, book, 201);
 */
export function createSuccessResponse<T>(
  c: Context<AppBindings>,
  data: T
): Response & TypedResponse<JSONParsed<{ success: true; data: T; meta: ResponseMeta }>, 200, 'json'>;
export function createSuccessResponse<T, S extends 200 | 201>(
  c: Context<AppBindings>,
  data: T,
  status: S
): Response & TypedResponse<JSONParsed<{ success: true; data: T; meta: ResponseMeta }>, S, 'json'>;
export function createSuccessResponse<T, S extends 200 | 201 = 200>(
  c: Context<AppBindings>,
  data: T,
  status?: S
) {
  const response = {
    success: true as const,
    data,
    meta: buildMeta(c),
  };

  return c.json(response, status ?? 200);
}

/**
 * Create a standardized error response
 *
 * @example
 * return createErrorResponse(c, ErrorCode.NOT_FOUND, 'Book not found');
 */
export function createErrorResponse(
  c: Context<AppBindings>,
  code: ErrorCodeType,
  message: string,
  details?: Record<string, unknown>
) {
  const response: ErrorResponse = {
    success: false,
    error: {
      code,
      message,
      ...(details && { details }),
    },
    meta: buildMeta(c),
  };

  return c.json(response, ERROR_STATUS_MAP[code]);
}

// =================================================================================
// API Error Class
// =================================================================================

/**
 * Custom error class for throwing typed API errors
 *
 * @example
 * throw new APIError(ErrorCode.NOT_FOUND, 'Book not found', { id });
 */
export class APIError extends Error {
  code: ErrorCodeType;
  details?: Record<string, unknown>;
  status: ContentfulStatusCode;

  constructor(
    code: ErrorCodeType,
    message: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'APIError';
    this.code = code;
    this.details = details;
    this.status = ERROR_STATUS_MAP[code];
  }
}

/**
 * Shorthand for the two domain failures every catalog operation can raise
 */
export const notFound = (resource: string, details?: Record<string, unknown>) =>
  new APIError(ErrorCode.NOT_FOUND, `${resource} not found`, details);

export const validationFailed = (message: string, details?: Record<string, unknown>) =>
  new APIError(ErrorCode.VALIDATION_ERROR, message, details);
