// =================================================================================
// Document Store Error Translation
// =================================================================================

import { APIError, ErrorCode } from '../schemas/response.js';

/**
 * Driver and socket codes raised when the store cannot be reached at all
 */
const CONNECTIVITY_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'CONNECT_TIMEOUT',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
]);

/**
 * SQLSTATEs meaning the server is up but refusing work
 * (admin_shutdown, crash_shutdown, cannot_connect_now, too_many_connections)
 */
const UNAVAILABLE_SQLSTATES = new Set(['57P01', '57P02', '57P03', '53300']);

// query_canceled, raised when statement_timeout fires
const TIMEOUT_SQLSTATE = '57014';

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Convert anything the store client throws into an APIError.
 * The original error is kept as `cause` for logging; its message never reaches clients.
 */
export function toStoreError(error: unknown): APIError {
  if (error instanceof APIError) return error;

  const code = errorCode(error);
  const details = code ? { store_code: code } : undefined;

  if (code === TIMEOUT_SQLSTATE) {
    return new APIError(ErrorCode.DATABASE_TIMEOUT, 'Document store request timed out', details, { cause: error });
  }

  // Class 08 covers every connection_exception
  if (code && (CONNECTIVITY_CODES.has(code) || UNAVAILABLE_SQLSTATES.has(code) || code.startsWith('08'))) {
    return new APIError(ErrorCode.SERVICE_UNAVAILABLE, 'Document store unavailable', details, { cause: error });
  }

  return new APIError(ErrorCode.DATABASE_ERROR, 'Document store request failed', details, { cause: error });
}

/**
 * Run a store call, translating its failures
 */
export async function withStoreErrors<T>(query: () => Promise<T>): Promise<T> {
  try {
    return await query();
  } catch (error) {
    throw toStoreError(error);
  }
}
