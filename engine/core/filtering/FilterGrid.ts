/**
 * Filter Grid
 * Collects the active predicate of every filterable column, combines them and
 * drives data refreshes, pagination and the column options (filter editor).
 */

import type {
  ColumnFilterEvent,
  ColumnFilterHost,
  FilterListener,
  FilterValue,
} from './types.js';
import { ColumnFilter, type ColumnFilterConfig } from './ColumnFilter.js';
import { GridPagination } from './GridPagination.js';

/**
 * Page request sent to the query engine
 */
export interface GridDataRequest {
  /** Active predicates joined with &&, undefined when nothing is filtered */
  filter: string | undefined;
  pageIndex: number;
  /** Undefined when the grid is not paged */
  pageSize: number | undefined;
}

export interface GridDataResult<TRow> {
  items: TRow[];
  totalItemCount: number;
}

/**
 * Query engine executing combined predicates against the backing data
 */
export interface GridDataSource<TRow> {
  fetchRows(request: GridDataRequest): Promise<GridDataResult<TRow>>;
}

export interface FilterGridConfig<TRow> {
  dataSource: GridDataSource<TRow>;
  /** Default case sensitivity for text filters */
  caseSensitive?: boolean;
  /** Enables pagination with this page size */
  pageSize?: number;
}

export class FilterGrid<TRow> implements ColumnFilterHost {
  readonly caseSensitive: boolean | undefined;
  readonly pagination: GridPagination | undefined;

  private readonly dataSource: GridDataSource<TRow>;
  private readonly columns: Map<string, ColumnFilter> = new Map();
  private readonly predicates: Map<string, string> = new Map();
  private readonly listeners: Set<FilterListener> = new Set();
  private openColumnId: string | undefined;
  private rows: TRow[] = [];
  private refreshSequence = 0;
  private version = 0;

  constructor(config: FilterGridConfig<TRow>) {
    this.dataSource = config.dataSource;
    this.caseSensitive = config.caseSensitive;
    this.pagination = config.pageSize !== undefined ? new GridPagination(config.pageSize) : undefined;
  }

  // ===========================================================================
  // Columns
  // ===========================================================================

  /**
   * Create the filter state of a column, with this grid as its host
   */
  createColumnFilter(config: Omit<ColumnFilterConfig, 'host'>): ColumnFilter {
    if (this.columns.has(config.columnId)) {
      throw new Error(`Duplicate column id: ${config.columnId}`);
    }
    const filter = new ColumnFilter({ ...config, host: this });
    this.columns.set(config.columnId, filter);
    return filter;
  }

  getColumnFilter(columnId: string): ColumnFilter | undefined {
    return this.columns.get(columnId);
  }

  // ===========================================================================
  // Predicates
  // ===========================================================================

  /**
   * Predicate of one column, if filtered
   */
  getPredicate(columnId: string): string | undefined {
    return this.predicates.get(columnId);
  }

  /**
   * All active predicates joined with &&, in column registration order
   */
  getCombinedFilter(): string | undefined {
    const active: string[] = [];
    for (const columnId of this.columns.keys()) {
      const predicate = this.predicates.get(columnId);
      if (predicate !== undefined) {
        active.push(predicate);
      }
    }
    return active.length > 0 ? active.join(' && ') : undefined;
  }

  hasFilters(): boolean {
    return this.predicates.size > 0;
  }

  getFilterCount(): number {
    return this.predicates.size;
  }

  /**
   * Apply a column filter event: update the predicate map, return to the
   * first page, close the editor and refresh.
   */
  dispatch(event: ColumnFilterEvent): Promise<void> {
    if (event.type === 'committed') {
      this.predicates.set(event.columnId, event.predicate);
    } else {
      this.predicates.delete(event.columnId);
    }

    this.pagination?.setCurrentPage(0);
    if (this.openColumnId !== undefined && this.openColumnId !== event.columnId) {
      this.columns.get(this.openColumnId)?.resetToLastValue();
    }
    this.openColumnId = undefined;
    this.notifyListeners();

    return this.refreshData();
  }

  // ===========================================================================
  // Column Options (filter editor)
  // ===========================================================================

  get openColumn(): string | undefined {
    return this.openColumnId;
  }

  /**
   * Open a column's filter editor. Any other open editor is closed first,
   * discarding its unsubmitted edits.
   */
  showColumnOptions(columnId: string): void {
    const filter = this.columns.get(columnId);
    if (!filter) {
      throw new Error(`Unknown column: ${columnId}`);
    }
    if (this.openColumnId !== undefined && this.openColumnId !== columnId) {
      this.closeColumnOptions();
    }
    filter.openEditor();
    this.openColumnId = columnId;
    this.notifyListeners();
  }

  /**
   * Record an edit in a column's filter editor, opening it if needed
   */
  setPendingFilterValue(columnId: string, value: FilterValue | undefined): void {
    if (this.openColumnId !== columnId) {
      this.showColumnOptions(columnId);
    }
    this.columns.get(columnId)?.setPendingValue(value);
    this.notifyListeners();
  }

  /**
   * Close the open filter editor without submitting
   */
  closeColumnOptions(): void {
    if (this.openColumnId === undefined) {
      return;
    }
    this.columns.get(this.openColumnId)?.resetToLastValue();
    this.openColumnId = undefined;
    this.notifyListeners();
  }

  /**
   * Show a column's last submitted value again, closing its editor
   */
  resetFilterToLastValue(columnId: string): void {
    if (this.openColumnId === columnId) {
      this.closeColumnOptions();
      return;
    }
    const filter = this.columns.get(columnId);
    if (!filter) {
      throw new Error(`Unknown column: ${columnId}`);
    }
    filter.resetToLastValue();
    this.notifyListeners();
  }

  // ===========================================================================
  // Data
  // ===========================================================================

  /** Rows of the last completed refresh */
  getRows(): TRow[] {
    return this.rows;
  }

  /**
   * Fetch the current page with the combined filter. A refresh started later
   * supersedes this one: its result, or its failure, is dropped.
   */
  async refreshData(): Promise<void> {
    const sequence = ++this.refreshSequence;
    const request: GridDataRequest = {
      filter: this.getCombinedFilter(),
      pageIndex: this.pagination?.currentPageIndex ?? 0,
      pageSize: this.pagination?.pageSize,
    };

    let result: GridDataResult<TRow>;
    try {
      result = await this.dataSource.fetchRows(request);
    } catch (err) {
      if (sequence !== this.refreshSequence) {
        return;
      }
      throw err;
    }
    if (sequence !== this.refreshSequence) {
      return;
    }

    this.rows = result.items;
    this.pagination?.setTotalItemCount(result.totalItemCount);
    this.notifyListeners();
  }

  // ===========================================================================
  // React 18 Subscription
  // ===========================================================================

  /**
   * Subscribe to grid changes
   * Compatible with React 18's useSyncExternalStore
   */
  subscribe = (listener: FilterListener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  getSnapshot = (): number => {
    return this.version;
  };

  private notifyListeners(): void {
    this.version++;
    for (const listener of this.listeners) {
      listener();
    }
  }
}
