import { randomUUID } from 'node:crypto';
import { cors } from 'hono/cors';
import { secureHeaders } from 'hono/secure-headers';
import type { AppConfig } from './config.js';
import type { DocumentStore } from './services/types.js';
import { createRouter, registerOpenAPIDoc } from './openapi.js';
import { errorHandler } from '../middleware/error-handler.js';
import { Logger } from '../lib/logger.js';
import { createErrorResponse, ErrorCode } from './schemas/response.js';

// Route imports
import healthRoutes from './routes/health.js';
import booksRoutes from './routes/books.js';
import reviewsRoutes from './routes/reviews.js';

export interface AppDependencies {
  config: AppConfig;
  store: DocumentStore;
}

/**
 * Build the HTTP application around an already-open document store
 */
export function createApp({ config, store }: AppDependencies) {
  const app = createRouter();

  // =================================================================================
  // Global Middleware
  // =================================================================================

  // CORS
  app.use('*', cors({
    origin: config.CORS_ORIGINS.includes('*') ? '*' : config.CORS_ORIGINS,
    allowMethods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'X-Request-ID'],
    exposeHeaders: ['X-Request-ID', 'X-Response-Time'],
    maxAge: 86400,
  }));

  // Security headers
  app.use('*', secureHeaders());

  // Error handler
  app.onError(errorHandler);

  app.notFound((c) => createErrorResponse(c, ErrorCode.NOT_FOUND, `Route not found: ${c.req.method} ${c.req.path}`));

  // Request ID middleware
  app.use('*', async (c, next) => {
    const requestId = c.req.header('x-request-id') || randomUUID();
    c.set('requestId', requestId);
    c.set('startTime', Date.now());
    c.header('X-Request-ID', requestId);
    await next();
  });

  // Logger middleware
  app.use('*', async (c, next) => {
    const logger = Logger.forRequest(config, c.get('requestId'));
    c.set('logger', logger);
    await next();
    logger.debug('Request completed', { method: c.req.method, path: c.req.path, status: c.res.status });
  });

  // Response timing middleware
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    c.header('X-Response-Time', `${Date.now() - start}ms`);
  });

  // Shared dependencies
  app.use('*', async (c, next) => {
    c.set('config', config);
    c.set('store', store);
    await next();
  });

  // =================================================================================
  // Routes
  // =================================================================================

  // Collect sub-routers for OpenAPI document merging
  const subRouters = [healthRoutes, booksRoutes, reviewsRoutes];

  for (const router of subRouters) {
    app.route('/', router);
  }

  // Register OpenAPI documentation endpoint AFTER all routes are mounted
  registerOpenAPIDoc(app, subRouters);

  return app;
}

/**
 * App type for Hono RPC client integration
 *
 * @example
 * ```typescript
 * import { hc } from 'hono/client'
 * import type { BookCatalogAppType } from './app.js'
 *
 * const client = hc<BookCatalogAppType>('http://localhost:8787')
 * ```
 */
export type BookCatalogAppType = ReturnType<typeof createApp>;
