import { InvalidPageError } from '../errors/PersistenceError';

export interface Page<T> {
  totalCount: number;
  totalPages: number;
  page: number;
  size: number;
  data: T[];
}

/** Page window for a query; absent when results are not paginated. */
export interface PageWindow {
  size: number;
  page: number;
}

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

function isPositiveInt(n: number): boolean {
  return Number.isInteger(n) && n > 0;
}

function assertPositiveInt(name: string, n: number): void {
  if (!isPositiveInt(n)) {
    throw new InvalidPageError(`${name} must be a positive integer (got ${n})`);
  }
}

/** 0 for an empty result, otherwise ceil(totalCount / size). */
export function totalPages(totalCount: number, size: number): number {
  assertPositiveInt('size', size);
  if (!Number.isInteger(totalCount) || totalCount < 0) {
    throw new InvalidPageError(
      `totalCount must be a non-negative integer (got ${totalCount})`,
    );
  }
  if (totalCount === 0) return 0;
  return Math.ceil(totalCount / size);
}

/** Number of matches to skip before the first item of `page` (1-based). */
export function pageOffset(size: number, page: number): number {
  assertPositiveInt('size', size);
  assertPositiveInt('page', page);
  return size * (page - 1);
}

/**
 * Pagination applies only when both values are given.
 * Either one missing means the full result set.
 */
export function toPageWindow(size?: number, page?: number): PageWindow | undefined {
  if (size === undefined || page === undefined) return undefined;
  assertPositiveInt('size', size);
  assertPositiveInt('page', page);
  return { size, page };
}

/** Like `toPageWindow`, but anything other than two positive integers lists everything. */
export function pageWindowOf(size?: number, page?: number): PageWindow | undefined {
  if (size === undefined || page === undefined) return undefined;
  return isPositiveInt(size) && isPositiveInt(page) ? { size, page } : undefined;
}

export function buildPage<T>(
  totalCount: number,
  size: number,
  page: number,
  data: T[],
): Page<T> {
  return {
    totalCount,
    totalPages: totalPages(totalCount, size),
    page,
    size,
    data,
  };
}

/** Defaults for HTTP callers: page 1, size 20, size capped at 100. */
export function normPage(n?: number): number {
  return typeof n === 'number' && Number.isInteger(n) && n > 0 ? n : 1;
}

export function normPageSize(n?: number): number {
  if (typeof n === 'number' && Number.isInteger(n) && n > 0) {
    return Math.min(n, MAX_PAGE_SIZE);
  }
  return DEFAULT_PAGE_SIZE;
}
