export const DEFAULT_PAGE_LIMIT = 50;
export const MAX_PAGE_LIMIT = 100;

export interface Pagination {
  limit: number;
  offset: number;
}

/**
 * Values outside the accepted range, including limits above the maximum,
 * fall back to the defaults
 */
export function resolvePagination(params: { limit?: number; offset?: number }): Pagination {
  let limit = DEFAULT_PAGE_LIMIT;
  if (
    params.limit !== undefined &&
    Number.isSafeInteger(params.limit) &&
    params.limit > 0 &&
    params.limit <= MAX_PAGE_LIMIT
  ) {
    limit = params.limit;
  }

  let offset = 0;
  if (params.offset !== undefined && Number.isSafeInteger(params.offset) && params.offset >= 0) {
    offset = params.offset;
  }

  return { limit, offset };
}
