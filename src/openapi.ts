import { OpenAPIHono } from '@hono/zod-openapi';
import type { OpenAPIV3_1 } from 'openapi-types';
import type { AppBindings } from './env.js';
import { createErrorResponse, ErrorCode } from './schemas/response.js';
import { toIssueDetails } from './lib/validation.js';

// =================================================================================
// OpenAPI Configuration
// =================================================================================

/**
 * OpenAPI document configuration
 * Used by both the doc endpoint and every sub-router's document
 */
export const openAPIConfig = {
  openapi: '3.1.0' as const,
  info: {
    title: 'Book Catalog API',
    version: '1.0.0',
    description: `Create, list, update and delete books, and search them by title, author or genre.

## Features
- **Catalog**: Books stored as JSON documents with store-assigned ids
- **Search**: Case-insensitive partial or exact matching, criteria combined with AND
- **Reviews**: Reader ratings (1-10) attached to each book

## Responses
Every response uses the \`{ success, data | error, meta }\` envelope.
`,
  },
  servers: [
    {
      url: 'http://localhost:8787',
      description: 'Local Development',
    },
  ],
  tags: [
    { name: 'System', description: 'Health checks and system status' },
    { name: 'Books', description: 'Book catalog and search endpoints' },
    { name: 'Reviews', description: 'Reader reviews for a book' },
  ],
};

/**
 * Creates an OpenAPI-enabled router whose request validation failures use the error envelope
 */
export const createRouter = () => {
  return new OpenAPIHono<AppBindings>({
    defaultHook: (result, c) => {
      if (!result.success) {
        return createErrorResponse(c, ErrorCode.VALIDATION_ERROR, 'Invalid request parameters', {
          issues: toIssueDetails(result.error.issues),
        });
      }
    },
  });
};

/**
 * Registers the OpenAPI documentation endpoint
 * Call this AFTER all routes are mounted
 *
 * Note: Due to @hono/zod-openapi limitation, sub-routers don't share OpenAPI registries.
 * We collect and merge OpenAPI specs from all sub-routers.
 */
export const registerOpenAPIDoc = (
  app: OpenAPIHono<AppBindings>,
  subRouters: OpenAPIHono<AppBindings>[]
) => {
  app.get('/openapi.json', (c) => {
    const logger = c.get('logger');
    const mergedDoc: OpenAPIV3_1.Document = {
      ...openAPIConfig,
      paths: {},
      components: {
        schemas: {},
      },
    };

    subRouters.forEach((router, i) => {
      try {
        const subDoc = router.getOpenAPI31Document(openAPIConfig);

        if (subDoc.paths) {
          logger.debug('OpenAPI router merged', { router: i, paths: Object.keys(subDoc.paths).length });
          Object.assign(mergedDoc.paths ?? {}, subDoc.paths);
        }

        if (subDoc.components?.schemas) {
          mergedDoc.components ??= { schemas: {} };
          Object.assign(mergedDoc.components.schemas ?? {}, subDoc.components.schemas);
        }
      } catch (e) {
        // Skip a router whose document fails to build
        logger.warn('OpenAPI router failed', { router: i, error: e instanceof Error ? e.message : String(e) });
      }
    });

    return c.json(mergedDoc);
  });
};
