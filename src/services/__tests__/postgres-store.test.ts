// =================================================================================
// PostgreSQL Document Store Tests
// =================================================================================

import { describe, it, expect, vi } from 'vitest';
import type { Sql } from 'postgres';
import { createPostgresStore } from '../postgres-store.js';
import { APIError, ErrorCode } from '../../schemas/response.js';

const CREATED = new Date('2025-01-02T03:04:05.000Z');
const UPDATED = new Date('2025-01-03T03:04:05.000Z');
const BOOK_ID = '3f0c6c1e-5b1a-4d8e-9a55-2b7f4c1d9e10';
const REVIEW_ID = '8a4e2f47-1c3b-4e6a-b0d2-5f9c7e1a2b34';

const bookRow = (doc: Record<string, unknown>, id = BOOK_ID) => ({ id, doc, created_at: CREATED, updated_at: UPDATED });

interface RecordedQuery {
  text: string;
  values: unknown[];
}

/**
 * Stand-in for the postgres tag: records each query as text with `?` placeholders
 * and answers through `respond`
 */
function createMockSql(respond: (text: string, values: unknown[]) => unknown) {
  const queries: RecordedQuery[] = [];
  const tag = vi.fn((strings: TemplateStringsArray, ...values: unknown[]) => {
    const text = strings.join('?').replace(/\s+/g, ' ').trim();
    queries.push({ text, values });
    return Promise.resolve().then(() => respond(text, values));
  });
  const end = vi.fn().mockResolvedValue(undefined);
  const json = vi.fn((value: unknown) => ({ json: value }));
  const sql = Object.assign(tag, { json, end }) as unknown as Sql;
  return { sql, queries, end };
}

const find = (queries: RecordedQuery[], fragment: string) => {
  const query = queries.find((q) => q.text.includes(fragment));
  if (!query) throw new Error(`No query containing "${fragment}"`);
  return query;
};

describe('PostgreSQL Document Store', () => {
  describe('books', () => {
    it('should insert the document as json and map the returned row', async () => {
      const { sql, queries } = createMockSql(() => [bookRow({ title: 'Dune', author: 'Herbert' })]);
      const store = createPostgresStore(sql);

      const book = await store.books.insert({ title: 'Dune', author: 'Herbert' });

      expect(book).toEqual({
        id: BOOK_ID,
        title: 'Dune',
        author: 'Herbert',
        created_at: '2025-01-02T03:04:05.000Z',
        updated_at: '2025-01-03T03:04:05.000Z',
      });
      const insert = find(queries, 'INSERT INTO books');
      expect(insert.values).toEqual([{ json: { title: 'Dune', author: 'Herbert' } }]);
    });

    it('should keep the row id when the document carries its own', async () => {
      const { sql } = createMockSql(() => [bookRow({ id: 'stale', title: 'Dune', author: 'Herbert' })]);
      const store = createPostgresStore(sql);

      const book = await store.books.findById(BOOK_ID);

      expect(book?.id).toBe(BOOK_ID);
    });

    it('should return null when no row matches', async () => {
      const { sql } = createMockSql(() => []);
      const store = createPostgresStore(sql);

      expect(await store.books.findById(BOOK_ID)).toBeNull();
      expect(await store.books.update(BOOK_ID, { genre: 'Horror' })).toBeNull();
    });

    it('should count and page in creation order', async () => {
      const { sql, queries } = createMockSql((text) =>
        text.includes('COUNT(*)') ? [{ total: 7 }] : [bookRow({ title: 'Dune', author: 'Herbert' })]
      );
      const store = createPostgresStore(sql);

      const page = await store.books.findPage({ limit: 5, offset: 5 });

      expect(page.total).toBe(7);
      expect(page.items).toHaveLength(1);
      const select = find(queries, 'ORDER BY created_at, id');
      expect(select.values).toEqual([5, 5]);
    });

    it('should search with escaped ILIKE patterns and leave unset criteria open', async () => {
      const { sql, queries } = createMockSql((text) =>
        text.includes('COUNT(*)') ? [{ total: 0 }] : []
      );
      const store = createPostgresStore(sql);

      await store.books.search({ title: '50%_off', match: 'partial' }, { limit: 15, offset: 0 });

      const where = queries.filter((q) => q.text.includes("doc->>'title' ILIKE"));
      expect(where).toHaveLength(2);
      expect(where[0]?.values).toEqual(['%50\\%\\_off%', '%50\\%\\_off%', null, null, null, null]);
    });

    it('should match the whole field in exact mode', async () => {
      const { sql, queries } = createMockSql((text) => (text.includes('COUNT(*)') ? [{ total: 1 }] : []));
      const store = createPostgresStore(sql);

      await store.books.search({ author: 'Herbert', match: 'exact' }, { limit: 15, offset: 0 });

      const where = find(queries, "doc->>'author' ILIKE");
      expect(where.values).toEqual([null, null, 'Herbert', 'Herbert', null, null]);
    });

    it('should strip nulls when merging a patch', async () => {
      const { sql, queries } = createMockSql(() => [bookRow({ title: 'Dune', author: 'Herbert' })]);
      const store = createPostgresStore(sql);

      await store.books.update(BOOK_ID, { genre: null });

      const update = find(queries, 'UPDATE books');
      expect(update.text).toContain('jsonb_strip_nulls(doc || ?)');
      expect(update.values).toEqual([{ json: { genre: null } }, BOOK_ID]);
    });

    it('should report whether a delete removed a row', async () => {
      let count = 1;
      const { sql } = createMockSql(() => Object.assign([], { count }));
      const store = createPostgresStore(sql);

      expect(await store.books.delete(BOOK_ID)).toBe(true);
      count = 0;
      expect(await store.books.delete(BOOK_ID)).toBe(false);
    });
  });

  describe('reviews', () => {
    it('should return null when inserting under a missing book', async () => {
      const { sql, queries } = createMockSql(() => []);
      const store = createPostgresStore(sql);

      const review = await store.reviews.insert(BOOK_ID, {
        rating: 8,
        comment: 'Good.',
        reviewer: { first_name: 'Ada', last_name: 'Reader' },
        review_date: '2025-01-01T00:00:00.000Z',
      });

      expect(review).toBeNull();
      expect(find(queries, 'INSERT INTO reviews').text).toContain('FROM books b WHERE b.id = ?');
    });

    it('should scope lookups to the book', async () => {
      const { sql, queries } = createMockSql(() => []);
      const store = createPostgresStore(sql);

      await store.reviews.findById(BOOK_ID, REVIEW_ID);

      expect(find(queries, 'FROM reviews').values).toEqual([REVIEW_ID, BOOK_ID]);
    });
  });

  describe('errors and lifecycle', () => {
    it('should translate a refused connection into SERVICE_UNAVAILABLE', async () => {
      const { sql } = createMockSql(() => {
        throw Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:5432'), { code: 'ECONNREFUSED' });
      });
      const store = createPostgresStore(sql);

      const error = await store.books.findById(BOOK_ID).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(APIError);
      expect(error).toMatchObject({
        code: ErrorCode.SERVICE_UNAVAILABLE,
        message: 'Document store unavailable',
        details: { store_code: 'ECONNREFUSED' },
      });
    });

    it('should ping with a trivial query and close the pool', async () => {
      const { sql, queries, end } = createMockSql(() => [{ '?column?': 1 }]);
      const store = createPostgresStore(sql);

      await store.ping();
      await store.close();

      expect(queries.map((q) => q.text)).toEqual(['SELECT 1']);
      expect(end).toHaveBeenCalledWith({ timeout: 5 });
    });
  });
});
