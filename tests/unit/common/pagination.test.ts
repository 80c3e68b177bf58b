import { describe, it, expect } from 'vitest';

import {
  clampPageSize,
  countPages,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE,
  MAX_PAGE_SIZE,
  normalizePagination,
} from '@/common/constants/pagination.js';

describe('pagination helpers', () => {
  it('clamps page sizes to [1, MAX_PAGE_SIZE]', () => {
    expect(clampPageSize(undefined)).toBe(DEFAULT_PAGE_SIZE);
    expect(clampPageSize(null)).toBe(DEFAULT_PAGE_SIZE);
    expect(clampPageSize(50)).toBe(50);
    expect(clampPageSize(5000)).toBe(MAX_PAGE_SIZE);
    expect(clampPageSize(0)).toBe(1);
    expect(clampPageSize(-3)).toBe(1);
  });

  it('normalizes page and page size', () => {
    expect(normalizePagination({})).toEqual({ page: 1, pageSize: 100 });
    expect(normalizePagination({ page: 4, pageSize: 25 })).toEqual({ page: 4, pageSize: 25 });
    expect(normalizePagination({ page: -2, pageSize: 1001 })).toEqual({ page: 1, pageSize: 1000 });
  });

  it('caps the page so the row offset stays a safe integer', () => {
    const { page, pageSize } = normalizePagination({ page: 1e20, pageSize: 5000 });

    expect(page).toBe(MAX_PAGE);
    expect(Number.isSafeInteger((page - 1) * pageSize)).toBe(true);
  });

  it('counts pages', () => {
    expect(countPages(0, 100)).toBe(0);
    expect(countPages(100, 100)).toBe(1);
    expect(countPages(101, 100)).toBe(2);
  });
});
