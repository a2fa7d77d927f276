/**
 * Column Filter Engine
 *
 * Turns a column's filter value and comparison operator into a validated
 * predicate fragment for the grid's query layer:
 * - Operator/type compatibility registry
 * - Type-directed value coercion with case folding and literal escaping
 * - Pending/current staged filter values per column
 * - Grid-side predicate combination, pagination reset and data refresh
 *
 * @example
 * ```typescript
 * import { FilterGrid, PropertyColumn } from 'column-filter-engine';
 *
 * const grid = new FilterGrid<Employee>({ dataSource, pageSize: 50 });
 * const age = new PropertyColumn(grid, { property: 'age', valueType: 'numeric', filterable: true });
 *
 * await age.setFilterValue(10, 'greaterThanOrEquals');
 * console.log(grid.getCombinedFilter()); // "age >= 10"
 * ```
 */

export * from './core/index.js';
