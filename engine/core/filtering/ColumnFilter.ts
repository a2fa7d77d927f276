/**
 * Column Filter
 *
 * Staged filter state for one column:
 * - pending: the value shown and edited in the filter editor
 * - current: the last value that compiled and was committed
 * - predicate: the fragment compiled from current
 *
 * Closing the editor without submitting copies current back into pending, so
 * reopening shows the last committed value. Pending and current never share a
 * mutable instance.
 *
 * The column does not touch the grid; it sends ColumnFilterEvents to its host.
 */

import type {
  ColumnFilterEvent,
  ColumnFilterHost,
  ColumnFilterState,
  FilterOperator,
  FilterValue,
} from './types.js';
import { compileFilter } from './FilterCompiler.js';
import { cloneFilterValue, type ValueTypeVariant } from './ValueTypes.js';

export interface ColumnFilterConfig {
  /** Column identity, used in events */
  columnId: string;
  /** Row property path the predicate compares */
  fieldPath: string;
  variant: ValueTypeVariant;
  /** Effective case sensitivity, read at compile time */
  caseSensitive: () => boolean;
  host: ColumnFilterHost;
}

export class ColumnFilter {
  readonly columnId: string;
  readonly fieldPath: string;
  readonly variant: ValueTypeVariant;

  private readonly caseSensitive: () => boolean;
  private readonly host: ColumnFilterHost;

  private current: FilterValue | undefined;
  private pending: FilterValue | undefined;
  private predicate: string | undefined;
  private editing = false;

  constructor(config: ColumnFilterConfig) {
    this.columnId = config.columnId;
    this.fieldPath = config.fieldPath;
    this.variant = config.variant;
    this.caseSensitive = config.caseSensitive;
    this.host = config.host;
  }

  // ===========================================================================
  // State
  // ===========================================================================

  get state(): ColumnFilterState {
    if (this.editing) return 'editing';
    return this.current === undefined ? 'empty' : 'committed';
  }

  get pendingValue(): FilterValue | undefined {
    return this.pending;
  }

  /** Copy of the committed value */
  get currentValue(): FilterValue | undefined {
    return cloneFilterValue(this.current);
  }

  /** Last compiled predicate, present iff a value is committed */
  get currentPredicate(): string | undefined {
    return this.predicate;
  }

  get isEditing(): boolean {
    return this.editing;
  }

  // ===========================================================================
  // Transitions
  // ===========================================================================

  /**
   * Open the editor on a copy of the committed value
   */
  openEditor(): void {
    this.pending = cloneFilterValue(this.current);
    this.editing = true;
  }

  /**
   * Record an in-progress edit
   */
  setPendingValue(value: FilterValue | undefined): void {
    this.pending = value;
    this.editing = true;
  }

  /**
   * Compile and commit a filter value.
   *
   * A null or undefined value is ignored. Compile errors are thrown before any
   * state changes.
   *
   * @returns Promise settled when the grid has refreshed its data
   */
  setFilterValue(value: FilterValue | null | undefined, operator: FilterOperator): Promise<void> {
    const predicate = compileFilter({
      fieldPath: this.fieldPath,
      variant: this.variant,
      caseSensitive: this.caseSensitive(),
      value,
      operator,
    });
    if (predicate === undefined || value === null || value === undefined) {
      return Promise.resolve();
    }

    this.pending = value;
    this.current = cloneFilterValue(value);
    this.predicate = predicate;
    this.editing = false;

    return this.send({ type: 'committed', columnId: this.columnId, predicate });
  }

  /**
   * Commit the pending value with an operator
   */
  submit(operator: FilterOperator): Promise<void> {
    return this.setFilterValue(this.pending, operator);
  }

  /**
   * Discard in-progress edits and close the editor
   */
  resetToLastValue(): void {
    this.pending = cloneFilterValue(this.current);
    this.editing = false;
  }

  /**
   * Clear the filter entirely
   */
  removeFilter(): Promise<void> {
    this.current = undefined;
    this.pending = undefined;
    this.predicate = undefined;
    this.editing = false;

    return this.send({ type: 'removed', columnId: this.columnId });
  }

  private send(event: ColumnFilterEvent): Promise<void> {
    return this.host.dispatch(event);
  }
}
