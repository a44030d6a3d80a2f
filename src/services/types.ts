// =================================================================================
// Type Definitions for the Document Store
// =================================================================================

import type { Book, BookDocument, BookPatch, SearchMatch } from '../schemas/books.js';
import type { Review, ReviewDocument, ReviewPatch } from '../schemas/reviews.js';

/**
 * Window into a collection, already translated from page/limit
 */
export interface PageRequest {
  limit: number;
  offset: number;
}

/**
 * One page of documents plus the size of the whole matching collection
 */
export interface Page<T> {
  items: T[];
  total: number;
}

/**
 * Field criteria for book search; every supplied field must match
 */
export interface BookCriteria {
  title?: string;
  author?: string;
  genre?: string;
  match: SearchMatch;
}

export interface BookRepository {
  insert(doc: BookDocument): Promise<Book>;
  findById(id: string): Promise<Book | null>;
  findPage(page: PageRequest): Promise<Page<Book>>;
  search(criteria: BookCriteria, page: PageRequest): Promise<Page<Book>>;
  /** Merges the patch into the stored document; null values remove the field */
  update(id: string, patch: BookPatch): Promise<Book | null>;
  /** Resolves false when no book had that id */
  delete(id: string): Promise<boolean>;
}

export interface ReviewRepository {
  /** Resolves null when the book does not exist */
  insert(bookId: string, doc: ReviewDocument): Promise<Review | null>;
  findById(bookId: string, reviewId: string): Promise<Review | null>;
  findPageByBook(bookId: string, page: PageRequest): Promise<Page<Review>>;
  update(bookId: string, reviewId: string, patch: ReviewPatch): Promise<Review | null>;
  delete(bookId: string, reviewId: string): Promise<boolean>;
}

/**
 * Everything the catalog needs from persistence, established once at startup
 */
export interface DocumentStore {
  books: BookRepository;
  reviews: ReviewRepository;
  /** Round trip used by the health check */
  ping(): Promise<void>;
  close(): Promise<void>;
}
