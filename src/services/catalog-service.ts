// =================================================================================
// Catalog Service - Business Logic for Book Operations
// =================================================================================

import {
  CreateBookSchema,
  UpdateBookSchema,
  type Book,
  type BookListData,
  type BookSearchData,
  type SearchMatch,
} from '../schemas/books.js';
import { DocumentIdSchema } from '../schemas/common.js';
import { APIError, ErrorCode, notFound } from '../schemas/response.js';
import { buildPagination, resolvePage, type PageParams } from '../lib/pagination.js';
import { parseOrThrow } from '../lib/validation.js';
import type { ServiceContext } from './context.js';

// =================================================================================
// Types
// =================================================================================

export interface SearchBooksParams extends PageParams {
  title?: string;
  author?: string;
  genre?: string;
  match?: SearchMatch;
}

const parseBookId = (id: string): string => parseOrThrow(DocumentIdSchema, id, 'Invalid book id');

// =================================================================================
// Operations
// =================================================================================

/**
 * Store a new book; the store assigns its id
 */
export async function createBook({ store, logger }: ServiceContext, input: unknown): Promise<Book> {
  const doc = parseOrThrow(CreateBookSchema, input, 'Invalid book');

  const start = Date.now();
  const book = await store.books.insert(doc);
  logger.query('book_insert', Date.now() - start);

  logger.info('Book created', { id: book.id });
  return book;
}

/**
 * List books in creation order, one page at a time
 */
export async function listBooks(
  { store, logger, defaultPageSize }: ServiceContext,
  params: PageParams
): Promise<BookListData> {
  const page = resolvePage(params, defaultPageSize);

  const start = Date.now();
  const { items, total } = await store.books.findPage({ limit: page.limit, offset: page.offset });
  logger.query('book_list', Date.now() - start, { result_count: items.length, total });

  return {
    books: items,
    pagination: buildPagination(page, total, items.length),
  };
}

export async function getBook({ store, logger }: ServiceContext, id: string): Promise<Book> {
  const bookId = parseBookId(id);

  const start = Date.now();
  const book = await store.books.findById(bookId);
  logger.query('book_find', Date.now() - start, { found: book !== null });

  if (!book) {
    throw notFound('Book', { id: bookId });
  }
  return book;
}

/**
 * Apply a partial update. Omitted fields keep their values; null clears an optional field.
 */
export async function updateBook({ store, logger }: ServiceContext, id: string, input: unknown): Promise<Book> {
  const bookId = parseBookId(id);
  const patch = parseOrThrow(UpdateBookSchema, input, 'Invalid book update');

  const start = Date.now();
  const book = await store.books.update(bookId, patch);
  logger.query('book_update', Date.now() - start, { found: book !== null });

  if (!book) {
    throw notFound('Book', { id: bookId });
  }

  logger.info('Book updated', { id: bookId, fields: Object.keys(patch) });
  return book;
}

/**
 * Permanently remove a book; its reviews go with it
 */
export async function deleteBook({ store, logger }: ServiceContext, id: string): Promise<void> {
  const bookId = parseBookId(id);

  const start = Date.now();
  const deleted = await store.books.delete(bookId);
  logger.query('book_delete', Date.now() - start, { deleted });

  if (!deleted) {
    throw notFound('Book', { id: bookId });
  }

  logger.info('Book deleted', { id: bookId });
}

/**
 * Find books whose title, author and genre match every supplied criterion.
 * Matching ignores case; 'partial' (the default) matches substrings, 'exact' the whole field.
 */
export async function searchBooks(
  { store, logger, defaultPageSize }: ServiceContext,
  params: SearchBooksParams
): Promise<BookSearchData> {
  // Blank criteria count as absent
  const title = params.title?.trim() || undefined;
  const author = params.author?.trim() || undefined;
  const genre = params.genre?.trim() || undefined;
  const match = params.match ?? 'partial';

  if (!title && !author && !genre) {
    throw new APIError(
      ErrorCode.MISSING_PARAMETER,
      'Please provide one of: title, author, or genre.'
    );
  }

  const page = resolvePage(params, defaultPageSize);
  logger.debug('Search request received', { title, author, genre, match, page: page.page, limit: page.limit });

  const start = Date.now();
  const { items, total } = await store.books.search(
    { title, author, genre, match },
    { limit: page.limit, offset: page.offset }
  );
  logger.query('book_search', Date.now() - start, { match, result_count: items.length, total });

  const query: BookSearchData['query'] = { match };
  if (title) query.title = title;
  if (author) query.author = author;
  if (genre) query.genre = genre;

  return {
    query,
    books: items,
    pagination: buildPagination(page, total, items.length),
  };
}
