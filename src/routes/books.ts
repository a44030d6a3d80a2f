/**
 * Books Routes - catalog CRUD and search
 *
 * Handlers only unpack the validated request and wrap the service result in the
 * response envelope; failures are thrown as APIErrors and rendered by the error handler.
 */

import { createRoute } from '@hono/zod-openapi';
import { createRouter } from '../openapi.js';
import {
  BookListSuccessSchema,
  BookSearchQuerySchema,
  BookSearchSuccessSchema,
  BookSuccessSchema,
  CreateBookSchema,
  DeletedSuccessSchema,
  UpdateBookSchema,
} from '../schemas/books.js';
import { BookIdParamSchema, PaginationQuerySchema } from '../schemas/common.js';
import { createSuccessResponse, ErrorResponseSchema } from '../schemas/response.js';
import {
  createBook,
  deleteBook,
  getBook,
  listBooks,
  searchBooks,
  updateBook,
} from '../services/catalog-service.js';
import { getServiceContext } from '../services/context.js';

// =================================================================================
// Shared Response Definitions
// =================================================================================

const errorContent = {
  'application/json': {
    schema: ErrorResponseSchema,
  },
};

// =================================================================================
// Route Definitions
// =================================================================================

const createBookRoute = createRoute({
  method: 'post',
  path: '/api/books',
  tags: ['Books'],
  summary: 'Create a book',
  description: 'Stores a new book. The id and timestamps are assigned by the store.',
  request: {
    body: {
      required: true,
      content: {
        'application/json': {
          schema: CreateBookSchema,
        },
      },
    },
  },
  responses: {
    201: {
      description: 'Book created',
      content: {
        'application/json': {
          schema: BookSuccessSchema,
        },
      },
    },
    400: { description: 'Invalid book', content: errorContent },
    503: { description: 'Document store unavailable', content: errorContent },
  },
});

const listBooksRoute = createRoute({
  method: 'get',
  path: '/api/books',
  tags: ['Books'],
  summary: 'List books',
  description: 'Returns books in creation order, one page at a time.',
  request: {
    query: PaginationQuerySchema,
  },
  responses: {
    200: {
      description: 'A page of books',
      content: {
        'application/json': {
          schema: BookListSuccessSchema,
        },
      },
    },
    400: { description: 'Invalid pagination parameters', content: errorContent },
    503: { description: 'Document store unavailable', content: errorContent },
  },
});

// Registered before /api/books/{id} so "search" is never read as an id
const searchBooksRoute = createRoute({
  method: 'get',
  path: '/api/books/search',
  tags: ['Books'],
  summary: 'Search books',
  description: 'Finds books matching every supplied criterion among title, author and genre. Matching ignores case.',
  request: {
    query: BookSearchQuerySchema,
  },
  responses: {
    200: {
      description: 'Matching books',
      content: {
        'application/json': {
          schema: BookSearchSuccessSchema,
        },
      },
    },
    400: { description: 'No criterion supplied, or invalid parameters', content: errorContent },
    503: { description: 'Document store unavailable', content: errorContent },
  },
});

const getBookRoute = createRoute({
  method: 'get',
  path: '/api/books/{id}',
  tags: ['Books'],
  summary: 'Get a book',
  request: {
    params: BookIdParamSchema,
  },
  responses: {
    200: {
      description: 'The book',
      content: {
        'application/json': {
          schema: BookSuccessSchema,
        },
      },
    },
    400: { description: 'Malformed id', content: errorContent },
    404: { description: 'Book not found', content: errorContent },
  },
});

const updateBookRoute = createRoute({
  method: 'patch',
  path: '/api/books/{id}',
  tags: ['Books'],
  summary: 'Update a book',
  description: 'Changes only the supplied fields. Setting an optional field to null removes it.',
  request: {
    params: BookIdParamSchema,
    body: {
      required: true,
      content: {
        'application/json': {
          schema: UpdateBookSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'The updated book',
      content: {
        'application/json': {
          schema: BookSuccessSchema,
        },
      },
    },
    400: { description: 'Invalid update', content: errorContent },
    404: { description: 'Book not found', content: errorContent },
  },
});

const deleteBookRoute = createRoute({
  method: 'delete',
  path: '/api/books/{id}',
  tags: ['Books'],
  summary: 'Delete a book',
  description: 'Permanently removes a book together with its reviews.',
  request: {
    params: BookIdParamSchema,
  },
  responses: {
    200: {
      description: 'Book deleted',
      content: {
        'application/json': {
          schema: DeletedSuccessSchema,
        },
      },
    },
    400: { description: 'Malformed id', content: errorContent },
    404: { description: 'Book not found', content: errorContent },
  },
});

// =================================================================================
// Route Handlers
// =================================================================================

const app = createRouter();

app.openapi(createBookRoute, async (c) => {
  const book = await createBook(getServiceContext(c), c.req.valid('json'));
  return createSuccessResponse(c, book, 201);
});

app.openapi(listBooksRoute, async (c) => {
  const data = await listBooks(getServiceContext(c), c.req.valid('query'));
  return createSuccessResponse(c, data);
});

app.openapi(searchBooksRoute, async (c) => {
  const data = await searchBooks(getServiceContext(c), c.req.valid('query'));
  return createSuccessResponse(c, data);
});

app.openapi(getBookRoute, async (c) => {
  const { id } = c.req.valid('param');
  const book = await getBook(getServiceContext(c), id);
  return createSuccessResponse(c, book);
});

app.openapi(updateBookRoute, async (c) => {
  const { id } = c.req.valid('param');
  const book = await updateBook(getServiceContext(c), id, c.req.valid('json'));
  return createSuccessResponse(c, book);
});

app.openapi(deleteBookRoute, async (c) => {
  const { id } = c.req.valid('param');
  await deleteBook(getServiceContext(c), id);
  return createSuccessResponse(c, { id, deleted: true as const });
});

export default app;
