/**
 * Property Column
 *
 * A grid column whose cells display a single row property. Resolves its value
 * type variant, display format and filter editor once, at construction, and
 * owns the column's staged filter state when filterable.
 */

import type { FilterGrid } from '../filtering/FilterGrid.js';
import type { ColumnFilter } from '../filtering/ColumnFilter.js';
import { getValueTypeVariant, type ValueTypeVariant } from '../filtering/ValueTypes.js';
import { MisconfiguredFormatError } from '../filtering/errors.js';
import type {
  FilterEditorKind,
  FilterOperator,
  FilterValue,
  ValueTypeName,
} from '../filtering/types.js';
import { formatDate, formatNumber, parseCellFormat, CellFormatSyntaxError, type ParsedCellFormat } from './CellFormat.js';
import { fieldName, getFieldValue, type FieldPath } from './fieldPath.js';

export interface PropertyColumnOptions<TRow> {
  /** Column identity, defaults to the property path */
  id?: string;
  /** Row property displayed and filtered by this column */
  property: FieldPath<TRow>;
  /** Declared type of the property's values */
  valueType: ValueTypeName;
  /** Header title, defaults to the property name */
  title?: string;
  /**
   * Display format for cell values. Only numeric and date columns accept one.
   */
  format?: string;
  filterable?: boolean;
  /** Overrides the grid's case sensitivity for text filters */
  caseSensitive?: boolean;
  tooltipText?: (row: TRow) => string | undefined;
  /** Compares two cell values when sorting */
  comparer?: (a: unknown, b: unknown) => number;
}

export class PropertyColumn<TRow> {
  readonly id: string;
  readonly fieldPath: string;
  readonly title: string;
  readonly format: string | undefined;
  readonly filterable: boolean;
  readonly variant: ValueTypeVariant;

  private readonly grid: FilterGrid<TRow>;
  private readonly parsedFormat: ParsedCellFormat | undefined;
  private readonly tooltipText: ((row: TRow) => string | undefined) | undefined;
  private readonly comparer: (a: unknown, b: unknown) => number;
  private readonly filter: ColumnFilter | undefined;
  private caseSensitiveOverride: boolean | undefined;

  /**
   * @throws MisconfiguredFormatError if a format is given for a value type
   * that cannot be formatted with it
   */
  constructor(grid: FilterGrid<TRow>, options: PropertyColumnOptions<TRow>) {
    this.grid = grid;
    this.fieldPath = options.property;
    this.id = options.id ?? options.property;
    this.title = options.title ?? fieldName(options.property);
    this.format = options.format;
    this.filterable = options.filterable ?? false;
    this.variant = getValueTypeVariant(options.valueType);
    this.tooltipText = options.tooltipText;
    this.comparer = options.comparer ?? this.variant.compare;
    this.caseSensitiveOverride = options.caseSensitive;
    this.parsedFormat = options.format !== undefined ? this.resolveFormat(options.format) : undefined;

    this.filter = this.filterable
      ? grid.createColumnFilter({
          columnId: this.id,
          fieldPath: this.fieldPath,
          variant: this.variant,
          caseSensitive: () => this.caseSensitive,
        })
      : undefined;
  }

  // ===========================================================================
  // Configuration
  // ===========================================================================

  /**
   * Effective case sensitivity: column override, else grid default, else false
   */
  get caseSensitive(): boolean {
    return this.caseSensitiveOverride ?? this.grid.caseSensitive ?? false;
  }

  set caseSensitive(value: boolean) {
    this.caseSensitiveOverride = value;
  }

  /** Editor the UI renders for this column's filter */
  get filterEditor(): FilterEditorKind {
    return this.variant.filterEditor;
  }

  private resolveFormat(format: string): ParsedCellFormat {
    if (!this.variant.formattable) {
      throw new MisconfiguredFormatError(format, this.variant.name);
    }

    let parsed: ParsedCellFormat;
    try {
      parsed = parseCellFormat(format);
    } catch (error) {
      if (error instanceof CellFormatSyntaxError) {
        throw new MisconfiguredFormatError(format, this.variant.name, error.message);
      }
      throw error;
    }

    const expected = this.variant.name === 'date' ? 'date' : 'number';
    if (parsed.kind !== expected) {
      throw new MisconfiguredFormatError(format, this.variant.name, `it is a ${parsed.kind} format`);
    }
    return parsed;
  }

  // ===========================================================================
  // Cells
  // ===========================================================================

  getValue(row: TRow): unknown {
    return getFieldValue(row, this.fieldPath);
  }

  /**
   * Display text of a cell, formatted when the column has a format
   */
  getCellText(row: TRow): string {
    const value = this.getValue(row);
    if (value === null || value === undefined) {
      return '';
    }

    const format = this.parsedFormat;
    if (format?.kind === 'number' && (typeof value === 'number' || typeof value === 'bigint')) {
      return formatNumber(Number(value), format);
    }
    if (format?.kind === 'date' && value instanceof Date) {
      return formatDate(value, format);
    }
    if (value instanceof Date) {
      return value.toISOString();
    }
    return String(value);
  }

  getTooltipText(row: TRow): string {
    return this.tooltipText?.(row) ?? this.getCellText(row);
  }

  /**
   * Sort comparison of two rows by this column's values
   */
  compareRows(a: TRow, b: TRow): number {
    return this.comparer(this.getValue(a), this.getValue(b));
  }

  // ===========================================================================
  // Filtering
  // ===========================================================================

  get columnFilter(): ColumnFilter | undefined {
    return this.filter;
  }

  /**
   * Compile and commit a filter for this column.
   *
   * @throws IncompatibleOperatorError, UnsupportedConversionError
   */
  setFilterValue(value: FilterValue | null | undefined, operator: FilterOperator): Promise<void> {
    if (!this.filter) {
      throw new Error(`Column '${this.id}' is not filterable`);
    }
    return this.filter.setFilterValue(value, operator);
  }

  /**
   * Show the last submitted value in the editor again
   */
  resetFilterToLastValue(): void {
    if (this.filter) {
      this.grid.resetFilterToLastValue(this.id);
    }
  }

  removeFilter(): Promise<void> {
    return this.filter ? this.filter.removeFilter() : Promise.resolve();
  }
}
