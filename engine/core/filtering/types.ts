/**
 * Filter System Types
 * Type definitions for the column filtering subsystem
 */

// =============================================================================
// Operators & Compatibility
// =============================================================================

/**
 * Comparison operators a column filter can use
 */
export type FilterOperator =
  // Equality
  | 'equals'
  | 'notEquals'
  // Ordering
  | 'lessThan'
  | 'lessThanOrEquals'
  | 'greaterThan'
  | 'greaterThanOrEquals'
  // Text
  | 'contains'
  | 'startsWith'
  | 'endsWith'
  | 'doesNotContain'
  // Null checks
  | 'isNull'
  | 'isNotNull'
  // Ranges
  | 'between'
  | 'betweenIncluding';

/**
 * Classes of values an operator can be compatible with (bit flags)
 */
export const CompatibilityClass = {
  String: 1,
  Numeric: 2,
  Boolean: 4,
  Date: 8,
  DateRange: 16,
  All: 255,
} as const;

export type CompatibilityClass = (typeof CompatibilityClass)[keyof typeof CompatibilityClass];

/**
 * Registry entry for a filter operator
 */
export interface OperatorDefinition {
  /** Predicate template: {0} is the field, {1} and {2} the operands */
  readonly template: string;
  /** Bitwise OR of the CompatibilityClass values this operator accepts */
  readonly compatible: number;
  /** Human-readable label for editor menus */
  readonly label: string;
}

// =============================================================================
// Values
// =============================================================================

/**
 * Two-endpoint date range. A missing endpoint is open.
 */
export class DateRange {
  start?: Date;
  end?: Date;

  constructor(start?: Date, end?: Date) {
    this.start = start;
    this.end = end;
  }

  clone(): DateRange {
    return new DateRange(
      this.start ? new Date(this.start.getTime()) : undefined,
      this.end ? new Date(this.end.getTime()) : undefined
    );
  }
}

/**
 * Values a filter editor can submit
 */
export type FilterValue = string | number | bigint | boolean | Date | DateRange;

/**
 * Runtime kind of a submitted filter value
 */
export type FilterValueKind = 'string' | 'numeric' | 'boolean' | 'date' | 'dateRange';

/**
 * Declared value type of a column
 */
export type ValueTypeName = 'string' | 'numeric' | 'boolean' | 'date' | 'other';

/**
 * Editor a filterable column asks the UI to render
 */
export type FilterEditorKind = 'string' | 'numeric' | 'boolean' | 'date';

/**
 * Result of coercing a filter value against a column
 */
export interface CoercedFilterValue {
  /** Class the operator is validated against */
  typeClass: CompatibilityClass;
  /** Literal operands, in placeholder order ({1}, {2}) */
  literals: string[];
  /** Wraps the field path, e.g. to case-fold it before comparison */
  fieldExpression: (fieldPath: string) => string;
}

// =============================================================================
// Staged State & Events
// =============================================================================

/**
 * Lifecycle state of a column filter
 */
export type ColumnFilterState = 'empty' | 'editing' | 'committed';

/**
 * Events a column filter sends to its host grid
 */
export type ColumnFilterEvent =
  | { type: 'committed'; columnId: string; predicate: string }
  | { type: 'removed'; columnId: string };

/**
 * Receives column filter events (implemented by the grid)
 */
export interface ColumnFilterHost {
  /** Grid-wide case sensitivity default, when set */
  readonly caseSensitive?: boolean;

  /**
   * Handle a filter event
   * @returns Promise settled when the resulting data refresh completes
   */
  dispatch(event: ColumnFilterEvent): Promise<void>;
}

/**
 * Filter event listener
 */
export type FilterListener = () => void;
