/**
 * Pagination Constants
 *
 * Page limits shared by every paginated endpoint. Out-of-range values are
 * clamped, never rejected.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** First page number */
export const DEFAULT_PAGE = 1;

/** Highest page number; keeps the row offset a safe integer */
export const MAX_PAGE = 1_000_000;

/** Default number of records per page */
export const DEFAULT_PAGE_SIZE = 100;

/** Maximum allowed records per page */
export const MAX_PAGE_SIZE = 1000;

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Clamps a page size to [1, maxValue].
 *
 * @example
 * clampPageSize(undefined) // 100
 * clampPageSize(5000)      // 1000
 * clampPageSize(0)         // 1
 */
export function clampPageSize(
  pageSize: number | undefined | null,
  defaultValue: number = DEFAULT_PAGE_SIZE,
  maxValue: number = MAX_PAGE_SIZE
): number {
  if (pageSize === undefined || pageSize === null || !Number.isFinite(pageSize)) {
    return defaultValue;
  }
  return Math.min(Math.max(1, Math.trunc(pageSize)), maxValue);
}

/**
 * Validates and clamps pagination parameters.
 * page is clamped to [1, MAX_PAGE].
 */
export function normalizePagination(params: {
  page?: number | null | undefined;
  pageSize?: number | null | undefined;
}): { page: number; pageSize: number } {
  const page =
    params.page === undefined || params.page === null || !Number.isFinite(params.page)
      ? DEFAULT_PAGE
      : Math.min(Math.max(1, Math.trunc(params.page)), MAX_PAGE);

  return { page, pageSize: clampPageSize(params.pageSize) };
}

/**
 * Number of pages needed for `totalRecords` rows.
 */
export const countPages = (totalRecords: number, pageSize: number): number =>
  Math.ceil(totalRecords / pageSize);
