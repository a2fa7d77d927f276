/**
 * Filter Errors
 *
 * All compile errors are raised before any column state changes, so callers
 * can keep the editor open and let the user correct the input.
 */

import type { FilterOperator, FilterValueKind, ValueTypeName } from './types.js';

export type FilterErrorCode =
  | 'INCOMPATIBLE_OPERATOR'
  | 'UNSUPPORTED_CONVERSION'
  | 'MISCONFIGURED_FORMAT';

/**
 * Base class for filter errors
 */
export class FilterError extends Error {
  readonly code: FilterErrorCode;

  constructor(code: FilterErrorCode, message: string) {
    super(message);
    this.name = 'FilterError';
    this.code = code;
  }
}

/**
 * The operator is not legal for the resolved value class
 */
export class IncompatibleOperatorError extends FilterError {
  readonly operator: FilterOperator;

  constructor(operator: FilterOperator, typeClassName: string) {
    super(
      'INCOMPATIBLE_OPERATOR',
      `Operator '${operator}' is not compatible with ${typeClassName} values`
    );
    this.name = 'IncompatibleOperatorError';
    this.operator = operator;
  }
}

/**
 * The submitted value cannot be reconciled with the column's value type
 */
export class UnsupportedConversionError extends FilterError {
  constructor(valueKind: FilterValueKind | 'other', columnType: ValueTypeName, detail?: string) {
    super(
      'UNSUPPORTED_CONVERSION',
      `Cannot filter a ${columnType} column with a ${valueKind} value${detail ? `: ${detail}` : ''}`
    );
    this.name = 'UnsupportedConversionError';
  }
}

/**
 * A display format was given for a value type that cannot be formatted with
 * it. Raised when the column is configured.
 */
export class MisconfiguredFormatError extends FilterError {
  readonly format: string;

  constructor(format: string, columnType: ValueTypeName, reason?: string) {
    super(
      'MISCONFIGURED_FORMAT',
      `A format ('${format}') was supplied for a ${columnType} column, but ${
        reason ?? `${columnType} values cannot be formatted`
      }`
    );
    this.name = 'MisconfiguredFormatError';
    this.format = format;
  }
}
