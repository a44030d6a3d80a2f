import { createRoute, z } from '@hono/zod-openapi';
import { createRouter } from '../openapi.js';
import {
  APIError,
  createSuccessSchema,
  ErrorResponseSchema,
  createSuccessResponse,
  ErrorCode,
} from '../schemas/response.js';

// =================================================================================
// System Data Schemas
// =================================================================================

const RootDataSchema = z.object({
  message: z.string(),
}).openapi('RootData');

const HealthDataSchema = z.object({
  status: z.literal('ok'),
  database: z.literal('connected'),
  database_latency_ms: z.number(),
}).openapi('HealthData');

// Success responses with envelope
const RootSuccessSchema = createSuccessSchema(RootDataSchema, 'RootSuccess');
const HealthSuccessSchema = createSuccessSchema(HealthDataSchema, 'HealthSuccess');

// =================================================================================
// Route Definitions
// =================================================================================

const rootRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['System'],
  summary: 'Liveness message',
  responses: {
    200: {
      description: 'API is running',
      content: {
        'application/json': {
          schema: RootSuccessSchema,
        },
      },
    },
  },
});

const healthRoute = createRoute({
  method: 'get',
  path: '/health',
  tags: ['System'],
  summary: 'System health check',
  description: 'Returns API health status including document store connectivity.',
  responses: {
    200: {
      description: 'System is healthy',
      content: {
        'application/json': {
          schema: HealthSuccessSchema,
        },
      },
    },
    503: {
      description: 'Service unavailable - document store unreachable',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

// =================================================================================
// Route Handlers
// =================================================================================

const app = createRouter();

app.openapi(rootRoute, (c) => {
  return createSuccessResponse(c, { message: 'Book Catalog API is running.' });
});

app.openapi(healthRoute, async (c) => {
  const store = c.get('store');
  const start = Date.now();

  try {
    await store.ping();
  } catch (e) {
    c.get('logger').error('Health check store error', { error: e instanceof Error ? e.message : 'Unknown' });
    throw new APIError(ErrorCode.SERVICE_UNAVAILABLE, 'Document store connection failed', undefined, { cause: e });
  }

  return createSuccessResponse(c, {
    status: 'ok' as const,
    database: 'connected' as const,
    database_latency_ms: Date.now() - start,
  });
});

export default app;
