/**
 * Filtering Subsystem
 * Export all filtering-related types and classes
 */

export * from './types.js';
export * from './errors.js';
export * from './FilterOperators.js';
export * from './ValueTypes.js';
export * from './FilterCompiler.js';
export * from './ColumnFilter.js';
export * from './GridPagination.js';
export * from './FilterGrid.js';
