export interface PageSource<T> {
  count(): Promise<number>;
  slice(offset: number, limit: number): Promise<T[]>;
}

export interface PaginationMetadata {
  totalItemCount: number;
  totalPageCount: number;
  pageSize: number;
  currentPage: number;
}

/**
 * One page of an already filtered and sorted result set.
 *
 * Only the requested page is ever materialized; the total is counted once.
 * Callers reject non-positive page numbers and sizes before getting here.
 */
export class PagedList<T> {
  readonly items: readonly T[];
  readonly currentPage: number;
  readonly pageSize: number;
  readonly totalCount: number;
  readonly totalPages: number;

  constructor(
    items: T[],
    totalCount: number,
    pageNumber: number,
    pageSize: number,
  ) {
    this.items = Object.freeze([...items]);
    this.totalCount = totalCount;
    this.currentPage = pageNumber;
    this.pageSize = pageSize;
    this.totalPages = pageSize > 0 ? Math.ceil(totalCount / pageSize) : 0;
  }

  get hasPrevious(): boolean {
    return this.currentPage > 1;
  }

  get hasNext(): boolean {
    return this.currentPage < this.totalPages;
  }

  get count(): number {
    return this.items.length;
  }

  static async create<T>(
    source: PageSource<T>,
    pageNumber: number,
    pageSize: number,
  ): Promise<PagedList<T>> {
    PagedList.assertPageParams(pageNumber, pageSize);

    const totalCount = await source.count();
    const offset = (pageNumber - 1) * pageSize;
    const items =
      offset < totalCount ? await source.slice(offset, pageSize) : [];

    return new PagedList(items, totalCount, pageNumber, pageSize);
  }

  toPaginationMetadata(): PaginationMetadata {
    return {
      totalItemCount: this.totalCount,
      totalPageCount: this.totalPages,
      pageSize: this.pageSize,
      currentPage: this.currentPage,
    };
  }

  private static assertPageParams(pageNumber: number, pageSize: number): void {
    if (!Number.isInteger(pageNumber) || pageNumber < 1) {
      throw new RangeError('Page number must be greater than 0.');
    }
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new RangeError('Page size must be greater than 0.');
    }
  }
}
