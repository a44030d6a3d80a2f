import { describe, it, expect } from 'vitest';
import { buildPagination, resolvePage } from '../src/lib/pagination.js';

describe('pagination', () => {
	describe('resolvePage', () => {
		it('uses the default limit on the first page', () => {
			expect(resolvePage({}, 15)).toEqual({ page: 1, limit: 15, offset: 0 });
		});

		it('computes the offset from page and limit', () => {
			expect(resolvePage({ page: 3, limit: 20 }, 15)).toEqual({ page: 3, limit: 20, offset: 40 });
		});

		it('clamps limit to 1-500', () => {
			expect(resolvePage({ limit: 0 }, 15).limit).toBe(1);
			expect(resolvePage({ limit: 9000 }, 15).limit).toBe(500);
		});
	});

	describe('buildPagination', () => {
		it('reports more results while the page ends before the total', () => {
			const page = resolvePage({ page: 1, limit: 2 }, 15);
			expect(buildPagination(page, 3, 2)).toEqual({ page: 1, limit: 2, total: 3, has_more: true, returned: 2 });
		});

		it('reports no more results on the last page', () => {
			const page = resolvePage({ page: 2, limit: 2 }, 15);
			expect(buildPagination(page, 3, 1).has_more).toBe(false);
		});

		it('handles a page past the end', () => {
			const page = resolvePage({ page: 5, limit: 2 }, 15);
			expect(buildPagination(page, 3, 0)).toEqual({ page: 5, limit: 2, total: 3, has_more: false, returned: 0 });
		});
	});
});
