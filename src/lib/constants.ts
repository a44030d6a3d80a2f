/**
 * Book Catalog Constants
 *
 * Centralized limits shared by the request schemas and the services.
 *
 * @module lib/constants
 */

// =================================================================================
// Pagination
// =================================================================================

/**
 * Largest page a list or search request may ask for
 */
export const MAX_PAGE_SIZE = 500 as const;

/**
 * Highest page number accepted, so the computed offset stays a safe integer
 */
export const MAX_PAGE = Math.floor(Number.MAX_SAFE_INTEGER / MAX_PAGE_SIZE);

// =================================================================================
// Field Limits
// =================================================================================

export const MAX_TITLE_LENGTH = 500 as const;
export const MAX_AUTHOR_LENGTH = 300 as const;
export const MAX_SHORT_TEXT_LENGTH = 200 as const;
export const MAX_SUMMARY_LENGTH = 5000 as const;
export const MAX_COMMENT_LENGTH = 5000 as const;

/**
 * Review ratings are whole numbers on a 1-10 scale
 */
export const MIN_RATING = 1 as const;
export const MAX_RATING = 10 as const;

// =================================================================================
// Error Messages
// =================================================================================

/**
 * Sanitised messages longer than this are truncated before reaching clients
 */
export const MAX_ERROR_MESSAGE_LENGTH = 200 as const;
