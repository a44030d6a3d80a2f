import { MAX_PAGE_SIZE } from './constants.js';
import type { PaginationMetadata } from '../schemas/common.js';

export interface PageParams {
  page?: number;
  limit?: number;
}

export interface ResolvedPage {
  page: number;
  limit: number;
  offset: number;
}

/**
 * Fill in pagination defaults and translate page/limit into an offset
 *
 * @example
 * resolvePage({ page: 3 }, 15) // { page: 3, limit: 15, offset: 30 }
 */
export function resolvePage(params: PageParams, defaultLimit: number): ResolvedPage {
  const page = Math.max(1, params.page ?? 1);
  const limit = Math.max(1, Math.min(MAX_PAGE_SIZE, params.limit ?? defaultLimit));
  return { page, limit, offset: (page - 1) * limit };
}

export function buildPagination(page: ResolvedPage, total: number, returned: number): PaginationMetadata {
  return {
    page: page.page,
    limit: page.limit,
    total,
    has_more: page.offset + returned < total,
    returned,
  };
}
