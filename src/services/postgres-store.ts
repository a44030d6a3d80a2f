// =================================================================================
// PostgreSQL Document Store - jsonb documents keyed by store-assigned UUIDs
// =================================================================================

import postgres from 'postgres';
import type { Sql } from 'postgres';
import type { AppConfig } from '../config.js';
import type { Book, BookDocument, BookPatch } from '../schemas/books.js';
import type { Review, ReviewDocument, ReviewPatch } from '../schemas/reviews.js';
import { toLikePattern } from '../lib/search-patterns.js';
import { withStoreErrors } from './store-errors.js';
import type {
  BookCriteria,
  BookRepository,
  DocumentStore,
  Page,
  PageRequest,
  ReviewRepository,
} from './types.js';

// =================================================================================
// Row Types
// =================================================================================

interface DocumentRow<T> {
  id: string;
  doc: T;
  created_at: Date;
  updated_at: Date;
}

type BookRow = DocumentRow<BookDocument>;

interface ReviewRow extends DocumentRow<ReviewDocument> {
  book_id: string;
}

interface CountRow {
  total: number;
}

// Spread the document first so stored keys can never shadow the row identity
const toBook = (row: BookRow): Book => ({
  ...row.doc,
  id: row.id,
  created_at: row.created_at.toISOString(),
  updated_at: row.updated_at.toISOString(),
});

const toReview = (row: ReviewRow): Review => ({
  ...row.doc,
  id: row.id,
  book_id: row.book_id,
  created_at: row.created_at.toISOString(),
  updated_at: row.updated_at.toISOString(),
});

// =================================================================================
// Connection
// =================================================================================

/**
 * Open the shared connection pool. Called once at startup.
 */
export function createSqlClient(config: AppConfig): Sql {
  return postgres(config.DATABASE_URL, {
    max: config.DB_MAX_CONNECTIONS,
    connect_timeout: Math.ceil(config.DB_CONNECTION_TIMEOUT_MS / 1000),
    idle_timeout: Math.ceil(config.DB_IDLE_TIMEOUT_MS / 1000),
    onnotice: () => {}, // CREATE ... IF NOT EXISTS notices are expected during migrations
  });
}

// =================================================================================
// Books
// =================================================================================

export function createBookRepository(sql: Sql): BookRepository {
  return {
    insert: (doc) => withStoreErrors(async () => {
      const [row] = await sql<BookRow[]>`
        INSERT INTO books (doc)
        VALUES (${sql.json(doc)})
        RETURNING id, doc, created_at, updated_at
      `;
      return toBook(row);
    }),

    findById: (id) => withStoreErrors(async () => {
      const [row] = await sql<BookRow[]>`
        SELECT id, doc, created_at, updated_at
        FROM books
        WHERE id = ${id}
      `;
      return row ? toBook(row) : null;
    }),

    findPage: ({ limit, offset }) => withStoreErrors(async () => {
      const [countResult, rows] = await Promise.all([
        sql<CountRow[]>`SELECT COUNT(*)::int AS total FROM books`,
        sql<BookRow[]>`
          SELECT id, doc, created_at, updated_at
          FROM books
          ORDER BY created_at, id
          LIMIT ${limit}
          OFFSET ${offset}
        `,
      ]);
      return { items: rows.map(toBook), total: countResult[0]?.total ?? 0 };
    }),

    search: (criteria: BookCriteria, { limit, offset }: PageRequest): Promise<Page<Book>> =>
      withStoreErrors(async () => {
        const pattern = (value: string | undefined) =>
          value === undefined ? null : toLikePattern(value, criteria.match);
        const title = pattern(criteria.title);
        const author = pattern(criteria.author);
        const genre = pattern(criteria.genre);

        // Unset criteria collapse to TRUE; a fresh fragment per query
        const where = () => sql`
          (${title}::text IS NULL OR doc->>'title' ILIKE ${title})
          AND (${author}::text IS NULL OR doc->>'author' ILIKE ${author})
          AND (${genre}::text IS NULL OR doc->>'genre' ILIKE ${genre})
        `;

        const [countResult, rows] = await Promise.all([
          sql<CountRow[]>`SELECT COUNT(*)::int AS total FROM books WHERE ${where()}`,
          sql<BookRow[]>`
            SELECT id, doc, created_at, updated_at
            FROM books
            WHERE ${where()}
            ORDER BY created_at, id
            LIMIT ${limit}
            OFFSET ${offset}
          `,
        ]);
        return { items: rows.map(toBook), total: countResult[0]?.total ?? 0 };
      }),

    update: (id: string, patch: BookPatch) => withStoreErrors(async () => {
      const [row] = await sql<BookRow[]>`
        UPDATE books
        SET doc = jsonb_strip_nulls(doc || ${sql.json(patch)}),
            updated_at = now()
        WHERE id = ${id}
        RETURNING id, doc, created_at, updated_at
      `;
      return row ? toBook(row) : null;
    }),

    delete: (id) => withStoreErrors(async () => {
      const result = await sql`DELETE FROM books WHERE id = ${id}`;
      return result.count > 0;
    }),
  };
}

// =================================================================================
// Reviews
// =================================================================================

export function createReviewRepository(sql: Sql): ReviewRepository {
  return {
    // Inserts nothing when the book is missing, so no separate existence check is needed
    insert: (bookId: string, doc: ReviewDocument) => withStoreErrors(async () => {
      const [row] = await sql<ReviewRow[]>`
        INSERT INTO reviews (book_id, doc)
        SELECT b.id, ${sql.json(doc)}
        FROM books b
        WHERE b.id = ${bookId}
        RETURNING id, book_id, doc, created_at, updated_at
      `;
      return row ? toReview(row) : null;
    }),

    findById: (bookId, reviewId) => withStoreErrors(async () => {
      const [row] = await sql<ReviewRow[]>`
        SELECT id, book_id, doc, created_at, updated_at
        FROM reviews
        WHERE id = ${reviewId} AND book_id = ${bookId}
      `;
      return row ? toReview(row) : null;
    }),

    findPageByBook: (bookId, { limit, offset }) => withStoreErrors(async () => {
      const [countResult, rows] = await Promise.all([
        sql<CountRow[]>`SELECT COUNT(*)::int AS total FROM reviews WHERE book_id = ${bookId}`,
        sql<ReviewRow[]>`
          SELECT id, book_id, doc, created_at, updated_at
          FROM reviews
          WHERE book_id = ${bookId}
          ORDER BY created_at, id
          LIMIT ${limit}
          OFFSET ${offset}
        `,
      ]);
      return { items: rows.map(toReview), total: countResult[0]?.total ?? 0 };
    }),

    update: (bookId: string, reviewId: string, patch: ReviewPatch) => withStoreErrors(async () => {
      const [row] = await sql<ReviewRow[]>`
        UPDATE reviews
        SET doc = doc || ${sql.json(patch)},
            updated_at = now()
        WHERE id = ${reviewId} AND book_id = ${bookId}
        RETURNING id, book_id, doc, created_at, updated_at
      `;
      return row ? toReview(row) : null;
    }),

    delete: (bookId, reviewId) => withStoreErrors(async () => {
      const result = await sql`DELETE FROM reviews WHERE id = ${reviewId} AND book_id = ${bookId}`;
      return result.count > 0;
    }),
  };
}

// =================================================================================
// Store
// =================================================================================

export function createPostgresStore(sql: Sql): DocumentStore {
  return {
    books: createBookRepository(sql),
    reviews: createReviewRepository(sql),
    ping: () => withStoreErrors(async () => {
      await sql`SELECT 1`;
    }),
    close: async () => {
      await sql.end({ timeout: 5 });
    },
  };
}
