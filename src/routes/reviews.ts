/**
 * Reviews Routes - reader reviews nested under a book
 */

import { createRoute } from '@hono/zod-openapi';
import { createRouter } from '../openapi.js';
import {
  CreateReviewSchema,
  ReviewListSuccessSchema,
  ReviewSuccessSchema,
  UpdateReviewSchema,
} from '../schemas/reviews.js';
import { DeletedSuccessSchema } from '../schemas/books.js';
import { BookIdParamSchema, PaginationQuerySchema, ReviewIdParamSchema } from '../schemas/common.js';
import { createSuccessResponse, ErrorResponseSchema } from '../schemas/response.js';
import {
  createReview,
  deleteReview,
  getReview,
  listReviews,
  updateReview,
} from '../services/review-service.js';
import { getServiceContext } from '../services/context.js';

const errorContent = {
  'application/json': {
    schema: ErrorResponseSchema,
  },
};

// =================================================================================
// Route Definitions
// =================================================================================

const createReviewRoute = createRoute({
  method: 'post',
  path: '/api/books/{id}/reviews',
  tags: ['Reviews'],
  summary: 'Review a book',
  request: {
    params: BookIdParamSchema,
    body: {
      required: true,
      content: {
        'application/json': {
          schema: CreateReviewSchema,
        },
      },
    },
  },
  responses: {
    201: {
      description: 'Review created',
      content: {
        'application/json': {
          schema: ReviewSuccessSchema,
        },
      },
    },
    400: { description: 'Invalid review', content: errorContent },
    404: { description: 'Book not found', content: errorContent },
  },
});

const listReviewsRoute = createRoute({
  method: 'get',
  path: '/api/books/{id}/reviews',
  tags: ['Reviews'],
  summary: 'List reviews of a book',
  description: 'Oldest first, one page at a time.',
  request: {
    params: BookIdParamSchema,
    query: PaginationQuerySchema,
  },
  responses: {
    200: {
      description: 'A page of reviews',
      content: {
        'application/json': {
          schema: ReviewListSuccessSchema,
        },
      },
    },
    400: { description: 'Invalid parameters', content: errorContent },
    404: { description: 'Book not found', content: errorContent },
  },
});

const getReviewRoute = createRoute({
  method: 'get',
  path: '/api/books/{id}/reviews/{reviewId}',
  tags: ['Reviews'],
  summary: 'Get a review',
  request: {
    params: ReviewIdParamSchema,
  },
  responses: {
    200: {
      description: 'The review',
      content: {
        'application/json': {
          schema: ReviewSuccessSchema,
        },
      },
    },
    404: { description: 'Review not found', content: errorContent },
  },
});

const updateReviewRoute = createRoute({
  method: 'patch',
  path: '/api/books/{id}/reviews/{reviewId}',
  tags: ['Reviews'],
  summary: 'Update a review',
  request: {
    params: ReviewIdParamSchema,
    body: {
      required: true,
      content: {
        'application/json': {
          schema: UpdateReviewSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'The updated review',
      content: {
        'application/json': {
          schema: ReviewSuccessSchema,
        },
      },
    },
    400: { description: 'Invalid update', content: errorContent },
    404: { description: 'Review not found', content: errorContent },
  },
});

const deleteReviewRoute = createRoute({
  method: 'delete',
  path: '/api/books/{id}/reviews/{reviewId}',
  tags: ['Reviews'],
  summary: 'Delete a review',
  request: {
    params: ReviewIdParamSchema,
  },
  responses: {
    200: {
      description: 'Review deleted',
      content: {
        'application/json': {
          schema: DeletedSuccessSchema,
        },
      },
    },
    404: { description: 'Review not found', content: errorContent },
  },
});

// =================================================================================
// Route Handlers
// =================================================================================

const app = createRouter();

app.openapi(createReviewRoute, async (c) => {
  const { id } = c.req.valid('param');
  const review = await createReview(getServiceContext(c), id, c.req.valid('json'));
  return createSuccessResponse(c, review, 201);
});

app.openapi(listReviewsRoute, async (c) => {
  const { id } = c.req.valid('param');
  const data = await listReviews(getServiceContext(c), id, c.req.valid('query'));
  return createSuccessResponse(c, data);
});

app.openapi(getReviewRoute, async (c) => {
  const { id, reviewId } = c.req.valid('param');
  const review = await getReview(getServiceContext(c), id, reviewId);
  return createSuccessResponse(c, review);
});

app.openapi(updateReviewRoute, async (c) => {
  const { id, reviewId } = c.req.valid('param');
  const review = await updateReview(getServiceContext(c), id, reviewId, c.req.valid('json'));
  return createSuccessResponse(c, review);
});

app.openapi(deleteReviewRoute, async (c) => {
  const { id, reviewId } = c.req.valid('param');
  await deleteReview(getServiceContext(c), id, reviewId);
  return createSuccessResponse(c, { id: reviewId, deleted: true as const });
});

export default app;
