/**
 * Success envelopes shared by every endpoint.
 *
 * Single entity: `{ message, <dataKey>: data, status: 'success' }`.
 * Lists add pagination and the query capabilities clients can discover.
 */

export interface SuccessEnvelope {
  message: string;
  status: 'success';
  [dataKey: string]: unknown;
}

export interface QueryCapabilities {
  available_filters: string[];
  available_search: string[];
  available_ordering: string[];
}

export interface PaginationMeta {
  count: number;
  page: number;
  page_size: number;
  total_pages: number;
  next_page: number | null;
  previous_page: number | null;
}

export function createSuccessEnvelope(message: string, dataKey: string, data: unknown): SuccessEnvelope {
  return { message, [dataKey]: data, status: 'success' };
}

export function createListEnvelope(
  message: string,
  dataKey: string,
  items: unknown[],
  pagination: PaginationMeta,
  capabilities?: QueryCapabilities
): SuccessEnvelope {
  return {
    message,
    ...pagination,
    [dataKey]: items,
    ...capabilities,
    status: 'success',
  };
}

export function buildPaginationMeta(total: number, page: number, pageSize: number): PaginationMeta {
  const totalPages = total === 0 ? 0 : Math.ceil(total / pageSize);
  return {
    count: total,
    page,
    page_size: pageSize,
    total_pages: totalPages,
    next_page: page < totalPages ? page + 1 : null,
    previous_page: page > 1 ? page - 1 : null,
  };
}
