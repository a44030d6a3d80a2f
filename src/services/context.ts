import type { Context } from 'hono';
import type { AppBindings, Logger } from '../env.js';
import type { DocumentStore } from './types.js';

/**
 * Dependencies handed to every catalog and review operation
 */
export interface ServiceContext {
  store: DocumentStore;
  logger: Logger;
  defaultPageSize: number;
}

export function getServiceContext(c: Context<AppBindings>): ServiceContext {
  return {
    store: c.get('store'),
    logger: c.get('logger'),
    defaultPageSize: c.get('config').DEFAULT_PAGE_SIZE,
  };
}
