/**
 * In-process DocumentStore used by the API and service tests.
 *
 * Mirrors the PostgreSQL store: creation order, case-insensitive matching with
 * literal wildcards, null-stripping merges and cascading deletes.
 */

import { randomUUID } from 'node:crypto';
import type { Book, BookDocument, BookPatch } from '../../schemas/books.js';
import type { Review, ReviewDocument, ReviewPatch } from '../../schemas/reviews.js';
import type { BookCriteria, DocumentStore, Page, PageRequest } from '../../services/types.js';

interface Stored<T> {
  id: string;
  seq: number;
  doc: T;
  created_at: string;
  updated_at: string;
}

export interface MemoryStore extends DocumentStore {
  /** Number of stored books, bypassing pagination */
  bookCount(): number;
  reviewCount(): number;
}

function paginate<T>(items: T[], { limit, offset }: PageRequest): Page<T> {
  return { items: items.slice(offset, offset + limit), total: items.length };
}

function matches(value: unknown, criterion: string | undefined, match: BookCriteria['match']): boolean {
  if (criterion === undefined) return true;
  if (typeof value !== 'string') return false;
  const field = value.toLowerCase();
  const wanted = criterion.toLowerCase();
  return match === 'exact' ? field === wanted : field.includes(wanted);
}

const OPTIONAL_BOOK_FIELDS = [
  'genre',
  'published_date',
  'language',
  'isbn',
  'pages',
  'publisher',
  'edition',
  'cover_image',
  'summary',
] as const satisfies readonly (keyof BookDocument)[];

const mergeField = <T>(current: T | undefined, next: T | null | undefined): T | undefined =>
  next === null ? undefined : next ?? current;

// Same result as jsonb_strip_nulls(doc || patch): no re-validation of the merged document
function mergeBook(doc: BookDocument, patch: BookPatch): BookDocument {
  const merged: BookDocument = {
    title: patch.title ?? doc.title,
    author: patch.author ?? doc.author,
    genre: mergeField(doc.genre, patch.genre),
    published_date: mergeField(doc.published_date, patch.published_date),
    language: mergeField(doc.language, patch.language),
    isbn: mergeField(doc.isbn, patch.isbn),
    pages: mergeField(doc.pages, patch.pages),
    publisher: mergeField(doc.publisher, patch.publisher),
    edition: mergeField(doc.edition, patch.edition),
    cover_image: mergeField(doc.cover_image, patch.cover_image),
    summary: mergeField(doc.summary, patch.summary),
  };
  for (const key of OPTIONAL_BOOK_FIELDS) {
    if (merged[key] === undefined) delete merged[key];
  }
  return merged;
}

export function createMemoryStore(): MemoryStore {
  const books = new Map<string, Stored<BookDocument>>();
  const reviews = new Map<string, Stored<ReviewDocument> & { book_id: string }>();
  let seq = 0;

  const stamp = () => ({ seq: seq++, created_at: new Date().toISOString(), updated_at: new Date().toISOString() });

  const toBook = (row: Stored<BookDocument>): Book => ({
    ...row.doc,
    id: row.id,
    created_at: row.created_at,
    updated_at: row.updated_at,
  });

  const toReview = (row: Stored<ReviewDocument> & { book_id: string }): Review => ({
    ...row.doc,
    id: row.id,
    book_id: row.book_id,
    created_at: row.created_at,
    updated_at: row.updated_at,
  });

  const orderedBooks = () => [...books.values()].sort((a, b) => a.seq - b.seq);

  return {
    books: {
      insert: async (doc) => {
        const row = { id: randomUUID(), doc: { ...doc }, ...stamp() };
        books.set(row.id, row);
        return toBook(row);
      },

      findById: async (id) => {
        const row = books.get(id);
        return row ? toBook(row) : null;
      },

      findPage: async (page) => paginate(orderedBooks().map(toBook), page),

      search: async (criteria, page) => {
        const found = orderedBooks().filter(({ doc }) =>
          matches(doc.title, criteria.title, criteria.match) &&
          matches(doc.author, criteria.author, criteria.match) &&
          matches(doc.genre, criteria.genre, criteria.match)
        );
        return paginate(found.map(toBook), page);
      },

      update: async (id, patch: BookPatch) => {
        const row = books.get(id);
        if (!row) return null;
        const updated = { ...row, doc: mergeBook(row.doc, patch), updated_at: new Date().toISOString() };
        books.set(id, updated);
        return toBook(updated);
      },

      delete: async (id) => {
        if (!books.delete(id)) return false;
        for (const [reviewId, review] of reviews) {
          if (review.book_id === id) reviews.delete(reviewId);
        }
        return true;
      },
    },

    reviews: {
      insert: async (bookId, doc) => {
        if (!books.has(bookId)) return null;
        const row = { id: randomUUID(), book_id: bookId, doc: { ...doc }, ...stamp() };
        reviews.set(row.id, row);
        return toReview(row);
      },

      findById: async (bookId, reviewId) => {
        const row = reviews.get(reviewId);
        return row && row.book_id === bookId ? toReview(row) : null;
      },

      findPageByBook: async (bookId, page) => {
        const found = [...reviews.values()]
          .filter((row) => row.book_id === bookId)
          .sort((a, b) => a.seq - b.seq);
        return paginate(found.map(toReview), page);
      },

      update: async (bookId, reviewId, patch: ReviewPatch) => {
        const row = reviews.get(reviewId);
        if (!row || row.book_id !== bookId) return null;
        const updated = { ...row, doc: { ...row.doc, ...patch }, updated_at: new Date().toISOString() };
        reviews.set(reviewId, updated);
        return toReview(updated);
      },

      delete: async (bookId, reviewId) => {
        const row = reviews.get(reviewId);
        if (!row || row.book_id !== bookId) return false;
        return reviews.delete(reviewId);
      },
    },

    ping: async () => {},
    close: async () => {},
    bookCount: () => books.size,
    reviewCount: () => reviews.size,
  };
}
