export interface Page<T> {
  total: number;
  limit: number;
  offset: number;
  items: T[];
}

export interface PageQuery {
  limit?: number;
  offset?: number;
}

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export function normalizePage(query: PageQuery = {}): {
  limit: number;
  offset: number;
} {
  let limit = query.limit ?? DEFAULT_PAGE_SIZE;
  let offset = query.offset ?? 0;
  if (!Number.isFinite(limit) || limit <= 0) limit = DEFAULT_PAGE_SIZE;
  if (limit > MAX_PAGE_SIZE) limit = MAX_PAGE_SIZE;
  if (!Number.isFinite(offset) || offset < 0) offset = 0;
  return { limit: Math.floor(limit), offset: Math.floor(offset) };
}

export function toPage<T, R>(
  [rows, total]: [T[], number],
  page: { limit: number; offset: number },
  map: (row: T) => R,
): Page<R> {
  return { total, limit: page.limit, offset: page.offset, items: rows.map(map) };
}
