export type PaginationConfig = {
  defaultPageSize: number;
  maxPageSize: number;
};
