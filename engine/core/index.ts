/**
 * Column Filter Engine - Core Module Exports
 *
 * This is the main entry point for the column filter engine.
 */

// Filtering: operators, coercion, compiler, staged state, grid
export * from './filtering/index.js';

// Columns
export { PropertyColumn } from './columns/PropertyColumn.js';
export type { PropertyColumnOptions } from './columns/PropertyColumn.js';
export {
  parseCellFormat,
  formatNumber,
  formatDate,
  CellFormatSyntaxError,
} from './columns/CellFormat.js';
export type { ParsedCellFormat, DateFormatToken } from './columns/CellFormat.js';
export { getFieldValue, fieldName } from './columns/fieldPath.js';
export type { FieldPath } from './columns/fieldPath.js';
