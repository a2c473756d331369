export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export type SortOrder = 'asc' | 'desc';

export interface PageRequest {
  page: number;
  pageSize: number;
  offset: number;
}

export interface ListOptions<TSort extends string> {
  sort_by?: TSort;
  sort_order?: SortOrder;
  page?: number;
  page_size?: number;
}

export interface ListResult<T> {
  items: T[];
  total: number;
}

export interface Paginated<T> extends ListResult<T> {
  page: number;
  page_size: number;
  total_pages: number;
}

/**
 * Page numbers below 1 become 1. Page sizes below 1 fall back to the
 * default and are capped at MAX_PAGE_SIZE.
 */
export function normalizePage(
  page?: number,
  pageSize?: number,
  defaultPageSize = DEFAULT_PAGE_SIZE,
): PageRequest {
  const normalizedPage =
    page !== undefined && Number.isFinite(page) && page >= 1
      ? Math.floor(page)
      : 1;
  const requestedSize =
    pageSize !== undefined && Number.isFinite(pageSize) && pageSize >= 1
      ? Math.floor(pageSize)
      : defaultPageSize;
  const normalizedSize = Math.min(requestedSize, MAX_PAGE_SIZE);

  return {
    page: normalizedPage,
    pageSize: normalizedSize,
    offset: (normalizedPage - 1) * normalizedSize,
  };
}

export function totalPages(total: number, pageSize: number): number {
  return Math.ceil(total / pageSize);
}

export function paginate<T>(
  result: ListResult<T>,
  request: PageRequest,
): Paginated<T> {
  return {
    items: result.items,
    total: result.total,
    page: request.page,
    page_size: request.pageSize,
    total_pages: totalPages(result.total, request.pageSize),
  };
}
