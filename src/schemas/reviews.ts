import { z } from '@hono/zod-openapi';
import { PaginationMetadataSchema } from './common.js';
import { createSuccessSchema } from './response.js';
import {
  MAX_COMMENT_LENGTH,
  MAX_RATING,
  MAX_SHORT_TEXT_LENGTH,
  MIN_RATING,
} from '../lib/constants.js';

// =================================================================================
// Field Validators
// =================================================================================

const name = (field: string) =>
  z.string({ required_error: `${field} is required` })
    .trim()
    .min(1, `${field} must not be empty`)
    .max(MAX_SHORT_TEXT_LENGTH);

export const ReviewerSchema = z.object({
  first_name: name('first_name'),
  last_name: name('last_name'),
}).strict().openapi('Reviewer');

const RatingSchema = z.number()
  .int('rating must be a whole number')
  .min(MIN_RATING, `rating must be between ${MIN_RATING} and ${MAX_RATING}`)
  .max(MAX_RATING, `rating must be between ${MIN_RATING} and ${MAX_RATING}`);

const CommentSchema = z.string({ required_error: 'comment is required' })
  .trim()
  .min(1, 'comment must not be empty')
  .max(MAX_COMMENT_LENGTH);

const ReviewDateSchema = z.string()
  .datetime({ offset: true, message: 'review_date must be an ISO-8601 timestamp' })
  .refine((val) => Date.parse(val) <= Date.now(), {
    message: 'review_date must not be in the future',
  });

// =================================================================================
// Request Schemas
// =================================================================================

export const CreateReviewSchema = z.object({
  rating: RatingSchema,
  comment: CommentSchema,
  reviewer: ReviewerSchema,
  review_date: ReviewDateSchema.optional().describe('Defaults to the time the review is stored'),
}).strict().openapi('CreateReviewRequest', {
  example: {
    rating: 9,
    comment: 'Dense, strange and worth every page.',
    reviewer: { first_name: 'Ada', last_name: 'Reader' },
  },
});

export const UpdateReviewSchema = z.object({
  rating: RatingSchema.optional(),
  comment: CommentSchema.optional(),
  reviewer: ReviewerSchema.optional(),
  review_date: ReviewDateSchema.optional(),
}).strict()
  .refine((patch) => Object.keys(patch).length > 0, {
    message: 'At least one field must be provided',
  })
  .openapi('UpdateReviewRequest', { example: { rating: 7 } });

// =================================================================================
// Response Schemas
// =================================================================================

export const ReviewSchema = z.object({
  id: z.string().uuid(),
  book_id: z.string().uuid(),
  rating: z.number(),
  comment: z.string(),
  reviewer: z.object({
    first_name: z.string(),
    last_name: z.string(),
  }),
  review_date: z.string(),
  created_at: z.string().datetime(),
  updated_at: z.string().datetime(),
}).openapi('Review');

export const ReviewListDataSchema = z.object({
  reviews: z.array(ReviewSchema),
  pagination: PaginationMetadataSchema,
}).openapi('ReviewListData');

export const ReviewSuccessSchema = createSuccessSchema(ReviewSchema, 'ReviewSuccess');
export const ReviewListSuccessSchema = createSuccessSchema(ReviewListDataSchema, 'ReviewListSuccess');

// =================================================================================
// Type Exports
// =================================================================================

export type CreateReviewInput = z.input<typeof CreateReviewSchema>;
export type ReviewPatch = z.output<typeof UpdateReviewSchema>;
export type Review = z.infer<typeof ReviewSchema>;
export type ReviewListData = z.infer<typeof ReviewListDataSchema>;

/**
 * Stored review body; review_date is always present once the service has filled its default
 */
export type ReviewDocument = Omit<z.output<typeof CreateReviewSchema>, 'review_date'> & {
  review_date: string;
};
