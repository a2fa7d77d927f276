/**
 * Grid Pagination
 * Page index and item count for a paged grid
 */

export class GridPagination {
  readonly pageSize: number;
  private pageIndex = 0;
  private totalItems: number | undefined;

  constructor(pageSize: number) {
    if (!Number.isInteger(pageSize) || pageSize <= 0) {
      throw new Error(`Invalid page size: ${pageSize}`);
    }
    this.pageSize = pageSize;
  }

  get currentPageIndex(): number {
    return this.pageIndex;
  }

  /** Total item count reported by the last data refresh */
  get totalItemCount(): number | undefined {
    return this.totalItems;
  }

  /** Number of pages, or undefined before the first refresh */
  get pageCount(): number | undefined {
    if (this.totalItems === undefined) return undefined;
    return Math.max(1, Math.ceil(this.totalItems / this.pageSize));
  }

  /**
   * Move to a page (0-based)
   */
  setCurrentPage(pageIndex: number): void {
    if (!Number.isInteger(pageIndex) || pageIndex < 0) {
      throw new Error(`Invalid page index: ${pageIndex}`);
    }
    const lastPage = this.pageCount;
    this.pageIndex = lastPage === undefined ? pageIndex : Math.min(pageIndex, lastPage - 1);
  }

  setTotalItemCount(count: number): void {
    this.totalItems = count;
    const lastPage = this.pageCount;
    if (lastPage !== undefined && this.pageIndex > lastPage - 1) {
      this.pageIndex = lastPage - 1;
    }
  }
}
