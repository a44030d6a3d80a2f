import { z } from '@hono/zod-openapi';
import { MAX_PAGE, MAX_PAGE_SIZE } from '../lib/constants.js';

// =================================================================================
// Pagination Schemas
// =================================================================================

// Limit default comes from DEFAULT_PAGE_SIZE at request time, so it stays optional here
export const PaginationQuerySchema = z.object({
  page: z.coerce.number().int().min(1).max(MAX_PAGE).optional().openapi({
    param: { name: 'page', in: 'query' },
    example: 1,
    description: `Page number, starting at 1 (at most ${MAX_PAGE})`,
  }),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).optional().openapi({
    param: { name: 'limit', in: 'query' },
    example: 15,
    description: `Page size (1-${MAX_PAGE_SIZE}, defaults to DEFAULT_PAGE_SIZE)`,
  }),
}).openapi('PaginationQuery');

export const PaginationMetadataSchema = z.object({
  page: z.number(),
  limit: z.number(),
  total: z.number().describe('Number of records matching the query across all pages'),
  has_more: z.boolean(),
  returned: z.number(),
}).openapi('PaginationMetadata');

// =================================================================================
// Identifier Schemas
// =================================================================================

export const DocumentIdSchema = z.string().uuid({ message: 'Must be a valid UUID' });

export const BookIdParamSchema = z.object({
  id: DocumentIdSchema.openapi({
    param: { name: 'id', in: 'path' },
    example: '3f0c6c1e-5b1a-4d8e-9a55-2b7f4c1d9e10',
  }),
});

export const ReviewIdParamSchema = BookIdParamSchema.extend({
  reviewId: DocumentIdSchema.openapi({
    param: { name: 'reviewId', in: 'path' },
    example: '8a4e2f47-1c3b-4e6a-b0d2-5f9c7e1a2b34',
  }),
});

// =================================================================================
// Type Exports
// =================================================================================

export type PaginationQuery = z.infer<typeof PaginationQuerySchema>;
export type PaginationMetadata = z.infer<typeof PaginationMetadataSchema>;
