// =================================================================================
// Catalog Service Tests
// =================================================================================

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  createBook,
  deleteBook,
  getBook,
  listBooks,
  searchBooks,
  updateBook,
} from '../catalog-service.js';
import { APIError, ErrorCode } from '../../schemas/response.js';
import type { ServiceContext } from '../context.js';
import { createMemoryStore, type MemoryStore } from '../../__tests__/helpers/memory-store.js';

const MISSING_ID = '00000000-0000-4000-8000-000000000000';

function createLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    query: vi.fn(),
  };
}

describe('Catalog Service', () => {
  let store: MemoryStore;
  let logger: ReturnType<typeof createLogger>;
  let ctx: ServiceContext;

  beforeEach(() => {
    store = createMemoryStore();
    logger = createLogger();
    ctx = { store, logger, defaultPageSize: 15 };
  });

  describe('createBook', () => {
    it('should trim text fields and log the store timing', async () => {
      const book = await createBook(ctx, { title: '  Dune ', author: 'Herbert' });

      expect(book.title).toBe('Dune');
      expect(logger.query).toHaveBeenCalledWith('book_insert', expect.any(Number));
      expect(logger.info).toHaveBeenCalledWith('Book created', { id: book.id });
    });

    it('should throw VALIDATION_ERROR with issue details', async () => {
      await expect(createBook(ctx, { title: 'Dune', author: 'Herbert', pages: -3 })).rejects.toMatchObject({
        code: ErrorCode.VALIDATION_ERROR,
        message: 'Invalid book',
        details: { issues: [{ path: 'pages', message: 'pages must be a positive integer' }] },
      });
      expect(store.bookCount()).toBe(0);
    });

    it('should reject a publication date in the future', async () => {
      await expect(
        createBook(ctx, { title: 'Dune', author: 'Herbert', published_date: '2999-01-01' })
      ).rejects.toMatchObject({
        details: { issues: [{ path: 'published_date', message: 'published_date must not be in the future' }] },
      });
    });
  });

  describe('getBook', () => {
    it('should throw NOT_FOUND for an unknown id', async () => {
      const error = await getBook(ctx, MISSING_ID).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(APIError);
      expect(error).toMatchObject({ code: ErrorCode.NOT_FOUND, status: 404, details: { id: MISSING_ID } });
    });

    it('should throw VALIDATION_ERROR for a malformed id without touching the store', async () => {
      const findById = vi.spyOn(store.books, 'findById');

      await expect(getBook(ctx, '42')).rejects.toMatchObject({
        code: ErrorCode.VALIDATION_ERROR,
        message: 'Invalid book id',
      });
      expect(findById).not.toHaveBeenCalled();
    });
  });

  describe('updateBook', () => {
    it('should merge the patch and drop nulled fields', async () => {
      const created = await createBook(ctx, { title: 'Dune', author: 'Herbert', genre: 'Sci-Fi', pages: 412 });

      const updated = await updateBook(ctx, created.id, { pages: 896, genre: null });

      expect(updated).toMatchObject({ title: 'Dune', author: 'Herbert', pages: 896 });
      expect(updated).not.toHaveProperty('genre');
      expect(logger.info).toHaveBeenCalledWith('Book updated', { id: created.id, fields: ['genre', 'pages'] });
    });

    it('should leave stored fields alone without re-checking them', async () => {
      const stored = await store.books.insert({ title: 'Dune', author: 'Herbert', published_date: '2999-01-01' });

      const updated = await updateBook(ctx, stored.id, { pages: 412 });

      expect(updated).toMatchObject({ published_date: '2999-01-01', pages: 412 });
    });

    it('should reject an empty patch', async () => {
      const created = await createBook(ctx, { title: 'Dune', author: 'Herbert' });

      await expect(updateBook(ctx, created.id, {})).rejects.toMatchObject({
        code: ErrorCode.VALIDATION_ERROR,
        message: 'Invalid book update',
      });
    });

    it('should throw NOT_FOUND for an unknown id', async () => {
      await expect(updateBook(ctx, MISSING_ID, { genre: 'Horror' })).rejects.toMatchObject({
        code: ErrorCode.NOT_FOUND,
      });
    });
  });

  describe('deleteBook', () => {
    it('should throw NOT_FOUND for an unknown id', async () => {
      await expect(deleteBook(ctx, MISSING_ID)).rejects.toMatchObject({ code: ErrorCode.NOT_FOUND });
    });
  });

  describe('listBooks', () => {
    it('should clamp the page to at least 1', async () => {
      await createBook(ctx, { title: 'Dune', author: 'Herbert' });

      const data = await listBooks(ctx, { page: 0 });

      expect(data.pagination).toEqual({ page: 1, limit: 15, total: 1, has_more: false, returned: 1 });
    });
  });

  describe('searchBooks', () => {
    it('should throw MISSING_PARAMETER when every criterion is blank', async () => {
      const error = await searchBooks(ctx, { title: '   ' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(APIError);
      expect(error).toMatchObject({ code: ErrorCode.MISSING_PARAMETER, status: 400 });
    });

    it('should pass trimmed criteria and the match mode to the store', async () => {
      const search = vi.spyOn(store.books, 'search');

      const data = await searchBooks(ctx, { author: ' Herbert ', match: 'exact', page: 2, limit: 5 });

      expect(search).toHaveBeenCalledWith(
        { title: undefined, author: 'Herbert', genre: undefined, match: 'exact' },
        { limit: 5, offset: 5 }
      );
      expect(data.query).toEqual({ author: 'Herbert', match: 'exact' });
    });

    it('should default to partial matching', async () => {
      await createBook(ctx, { title: 'Dune', author: 'Frank Herbert' });

      const data = await searchBooks(ctx, { author: 'herb' });

      expect(data.query.match).toBe('partial');
      expect(data.books).toHaveLength(1);
    });
  });
});
