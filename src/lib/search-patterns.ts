import type { SearchMatch } from '../schemas/books.js';

/**
 * Escape LIKE/ILIKE wildcards so user input is matched literally.
 * Backslash is the default escape character in PostgreSQL patterns.
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/**
 * Build the ILIKE pattern for a search criterion.
 *
 * @example
 * toLikePattern('dune', 'partial') // '%dune%'
 * toLikePattern('100%', 'exact')   // '100\\%'
 */
export function toLikePattern(value: string, match: SearchMatch): string {
  const escaped = escapeLikePattern(value);
  return match === 'exact' ? escaped : `%${escaped}%`;
}
