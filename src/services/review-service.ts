// =================================================================================
// Review Service - reader reviews attached to a book
// =================================================================================

import { CreateReviewSchema, UpdateReviewSchema, type Review, type ReviewListData } from '../schemas/reviews.js';
import { DocumentIdSchema } from '../schemas/common.js';
import { notFound } from '../schemas/response.js';
import { buildPagination, resolvePage, type PageParams } from '../lib/pagination.js';
import { parseOrThrow } from '../lib/validation.js';
import type { ServiceContext } from './context.js';

const parseBookId = (id: string): string => parseOrThrow(DocumentIdSchema, id, 'Invalid book id');
const parseReviewId = (id: string): string => parseOrThrow(DocumentIdSchema, id, 'Invalid review id');

const reviewNotFound = (bookId: string, reviewId: string) =>
  notFound('Review', { book_id: bookId, review_id: reviewId });

export async function createReview(
  { store, logger }: ServiceContext,
  bookId: string,
  input: unknown
): Promise<Review> {
  const parentId = parseBookId(bookId);
  const fields = parseOrThrow(CreateReviewSchema, input, 'Invalid review');

  const start = Date.now();
  const review = await store.reviews.insert(parentId, {
    ...fields,
    review_date: fields.review_date ?? new Date().toISOString(),
  });
  logger.query('review_insert', Date.now() - start, { created: review !== null });

  if (!review) {
    throw notFound('Book', { id: parentId });
  }

  logger.info('Review created', { id: review.id, book_id: parentId });
  return review;
}

/**
 * Reviews of one book, oldest first. A book without reviews is told apart
 * from a missing book with a second lookup only when the page comes back empty.
 */
export async function listReviews(
  { store, logger, defaultPageSize }: ServiceContext,
  bookId: string,
  params: PageParams
): Promise<ReviewListData> {
  const parentId = parseBookId(bookId);
  const page = resolvePage(params, defaultPageSize);

  const start = Date.now();
  const { items, total } = await store.reviews.findPageByBook(parentId, {
    limit: page.limit,
    offset: page.offset,
  });
  logger.query('review_list', Date.now() - start, { result_count: items.length, total });

  if (total === 0 && !(await store.books.findById(parentId))) {
    throw notFound('Book', { id: parentId });
  }

  return {
    reviews: items,
    pagination: buildPagination(page, total, items.length),
  };
}

export async function getReview(
  { store, logger }: ServiceContext,
  bookId: string,
  reviewId: string
): Promise<Review> {
  const parentId = parseBookId(bookId);
  const id = parseReviewId(reviewId);

  const start = Date.now();
  const review = await store.reviews.findById(parentId, id);
  logger.query('review_find', Date.now() - start, { found: review !== null });

  if (!review) {
    throw reviewNotFound(parentId, id);
  }
  return review;
}

/**
 * Partial update; book_id and id cannot change
 */
export async function updateReview(
  { store, logger }: ServiceContext,
  bookId: string,
  reviewId: string,
  input: unknown
): Promise<Review> {
  const parentId = parseBookId(bookId);
  const id = parseReviewId(reviewId);
  const patch = parseOrThrow(UpdateReviewSchema, input, 'Invalid review update');

  const start = Date.now();
  const review = await store.reviews.update(parentId, id, patch);
  logger.query('review_update', Date.now() - start, { found: review !== null });

  if (!review) {
    throw reviewNotFound(parentId, id);
  }

  logger.info('Review updated', { id, book_id: parentId, fields: Object.keys(patch) });
  return review;
}

export async function deleteReview(
  { store, logger }: ServiceContext,
  bookId: string,
  reviewId: string
): Promise<void> {
  const parentId = parseBookId(bookId);
  const id = parseReviewId(reviewId);

  const start = Date.now();
  const deleted = await store.reviews.delete(parentId, id);
  logger.query('review_delete', Date.now() - start, { deleted });

  if (!deleted) {
    throw reviewNotFound(parentId, id);
  }

  logger.info('Review deleted', { id, book_id: parentId });
}
