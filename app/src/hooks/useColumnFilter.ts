/**
 * useColumnFilter - Column filter editor hook
 *
 * Bridges a filter editor component and a column's staged filter state in
 * the engine's FilterGrid.
 *
 * Features:
 * - React 18 subscription to FilterGrid (useSyncExternalStore)
 * - Pending/current values and the committed predicate
 * - Operators the column's editor may offer
 * - Compile errors surfaced as state, keeping the editor open
 *
 * Usage:
 * ```tsx
 * const ageFilter = useColumnFilter({ grid, columnId: 'age' });
 *
 * ageFilter.open();
 * ageFilter.setPendingValue(30);
 * await ageFilter.submit('greaterThanOrEquals');
 * ```
 */

import { useCallback, useMemo, useState, useSyncExternalStore } from 'react';
import type { FilterGrid } from '../../../engine/core/filtering/FilterGrid';
import type { ColumnFilterState, FilterOperator, FilterValue } from '../../../engine/core/filtering/types';
import { CompatibilityClass } from '../../../engine/core/filtering/types';
import { FilterError } from '../../../engine/core/filtering/errors';
import { getOperatorsFor } from '../../../engine/core/filtering/FilterOperators';

// =============================================================================
// Types
// =============================================================================

export interface UseColumnFilterOptions<TRow> {
  /** Engine's filter grid (single source of truth) */
  grid: FilterGrid<TRow>;
  /** Filterable column to bind */
  columnId: string;
}

export interface UseColumnFilterResult {
  state: ColumnFilterState;
  /** Whether this column's editor is the open one */
  isOpen: boolean;
  pendingValue: FilterValue | undefined;
  currentValue: FilterValue | undefined;
  predicate: string | undefined;
  /** Operators the editor may offer for this column */
  operators: FilterOperator[];
  /** Message of the last rejected submission */
  error: string | null;

  open(): void;
  close(): void;
  setPendingValue(value: FilterValue | undefined): void;
  submit(operator: FilterOperator): Promise<void>;
  remove(): Promise<void>;
}

// =============================================================================
// Hook Implementation
// =============================================================================

export function useColumnFilter<TRow>(options: UseColumnFilterOptions<TRow>): UseColumnFilterResult {
  const { grid, columnId } = options;

  const filter = grid.getColumnFilter(columnId);
  if (!filter) {
    throw new Error(`Column '${columnId}' is not filterable`);
  }

  // Re-render on any grid change
  useSyncExternalStore(grid.subscribe, grid.getSnapshot);

  const [error, setError] = useState<string | null>(null);

  // Operators of the column's own type; date editors also submit ranges
  const operators = useMemo(() => {
    const variant = filter.variant;
    let classes: number = variant.typeClass ?? CompatibilityClass.String;
    if (variant.filterEditor === 'date') {
      classes |= CompatibilityClass.DateRange;
    }
    return getOperatorsFor(classes);
  }, [filter]);

  const open = useCallback(() => {
    setError(null);
    grid.showColumnOptions(columnId);
  }, [grid, columnId]);

  const close = useCallback(() => {
    setError(null);
    if (grid.openColumn === columnId) {
      grid.closeColumnOptions();
    }
  }, [grid, columnId]);

  const setPendingValue = useCallback(
    (value: FilterValue | undefined) => {
      grid.setPendingFilterValue(columnId, value);
    },
    [grid, columnId]
  );

  const submit = useCallback(
    async (operator: FilterOperator) => {
      let refresh: Promise<void>;
      try {
        refresh = filter.submit(operator);
      } catch (err) {
        if (err instanceof FilterError) {
          setError(err.message);
          return;
        }
        throw err;
      }
      setError(null);
      await refresh;
    },
    [filter]
  );

  const remove = useCallback(() => {
    setError(null);
    return filter.removeFilter();
  }, [filter]);

  return {
    state: filter.state,
    isOpen: grid.openColumn === columnId,
    pendingValue: filter.pendingValue,
    currentValue: filter.currentValue,
    predicate: filter.currentPredicate,
    operators,
    error,

    open,
    close,
    setPendingValue,
    submit,
    remove,
  };
}
