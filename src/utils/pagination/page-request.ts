import { PaginationConfig } from '../../config/pagination-config.type';

export interface PageRequest {
  pageNumber: number;
  pageSize: number;
}

/**
 * Applies defaults and clamps the page size to the configured maximum.
 * Expects values that already passed ValidationGate.pageParams.
 */
export function toPageRequest(
  params: { pageNumber?: number; pageSize?: number },
  config: PaginationConfig,
): PageRequest {
  return {
    pageNumber: params.pageNumber ?? 1,
    pageSize: Math.min(
      params.pageSize ?? config.defaultPageSize,
      config.maxPageSize,
    ),
  };
}
