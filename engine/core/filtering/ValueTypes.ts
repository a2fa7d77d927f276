/**
 * Column Value Types
 *
 * Each column declares one of a closed set of value-type variants. The variant
 * is resolved once when the column is configured and carries everything the
 * filter compiler needs: its compatibility class, the editor it asks for, and
 * how it renders a filter value of its own kind into predicate literals.
 *
 * Values of a different kind are coerced here too (date ranges and free text),
 * together with the per-kind copy used for pending/current isolation.
 */

import { CompatibilityClass, DateRange } from './types.js';
import type {
  CoercedFilterValue,
  FilterEditorKind,
  FilterValue,
  FilterValueKind,
  ValueTypeName,
} from './types.js';
import { UnsupportedConversionError } from './errors.js';

// =============================================================================
// Literals
// =============================================================================

/** Literal for an open range start */
export const MIN_DATE_LITERAL = 'DateTime(0001,01,01)';

/** Literal for an open range end */
export const MAX_DATE_LITERAL = 'DateTime(9999,12,31)';

const identity = (fieldPath: string): string => fieldPath;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

const ESCAPES: Readonly<Record<string, string>> = {
  '\\': '\\\\',
  '"': '\\"',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

/**
 * Quote a text literal, escaping backslashes, double quotes and line breaks/tabs
 */
export function quoteLiteral(text: string): string {
  return '"' + text.replace(/[\\"\n\r\t]/g, (ch) => ESCAPES[ch] ?? ch) + '"';
}

/**
 * Date-construction literal from the local calendar date (no time component)
 */
export function dateLiteral(date: Date): string {
  if (isNaN(date.getTime())) {
    throw new UnsupportedConversionError('date', 'date', 'invalid date');
  }
  return `DateTime(${pad(date.getFullYear(), 4)},${pad(date.getMonth() + 1, 2)},${pad(date.getDate(), 2)})`;
}

/**
 * Locale-independent numeric literal
 */
export function numericLiteral(value: number | bigint): string {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (!Number.isFinite(value)) {
    throw new UnsupportedConversionError('numeric', 'numeric', `${value} has no literal form`);
  }
  return String(value);
}

// =============================================================================
// Filter Value Kinds
// =============================================================================

/**
 * Classify a submitted filter value
 */
export function classifyFilterValue(value: FilterValue): FilterValueKind {
  if (typeof value === 'string') return 'string';
  if (typeof value === 'number' || typeof value === 'bigint') return 'numeric';
  if (typeof value === 'boolean') return 'boolean';
  if (value instanceof Date) return 'date';
  return 'dateRange';
}

/**
 * Independent copy of a filter value. Primitives are copied by value, dates
 * by timestamp, and ranges through their own clone().
 */
export function cloneFilterValue(value: FilterValue): FilterValue;
export function cloneFilterValue(value: FilterValue | undefined): FilterValue | undefined;
export function cloneFilterValue(value: FilterValue | undefined): FilterValue | undefined {
  if (value === undefined) return undefined;
  if (value instanceof Date) return new Date(value.getTime());
  if (value instanceof DateRange) return value.clone();
  return value;
}

// =============================================================================
// Column Variants
// =============================================================================

/**
 * Rendering of a filter value whose kind matches the column's own type
 */
interface SameKindRenderer {
  readonly kind: FilterValueKind;
  render(value: FilterValue, caseSensitive: boolean): CoercedFilterValue;
}

export interface ValueTypeVariant {
  readonly name: ValueTypeName;
  /** Whether cell values can be rendered through a display format */
  readonly formattable: boolean;
  /** Filter editor the UI renders for this column */
  readonly filterEditor: FilterEditorKind;
  /** Class used for same-kind filters, absent for 'other' */
  readonly typeClass?: CompatibilityClass;
  readonly sameKind?: SameKindRenderer;
  /** Natural sort order of two cell values */
  compare(a: unknown, b: unknown): number;
}

function compareNullsFirst(a: unknown, b: unknown, compare: () => number): number {
  const aMissing = a === null || a === undefined;
  const bMissing = b === null || b === undefined;
  if (aMissing || bMissing) {
    return aMissing === bMissing ? 0 : aMissing ? -1 : 1;
  }
  return compare();
}

function unexpected(value: FilterValue, column: ValueTypeName): UnsupportedConversionError {
  return new UnsupportedConversionError(classifyFilterValue(value), column);
}

const stringVariant: ValueTypeVariant = {
  name: 'string',
  formattable: false,
  filterEditor: 'string',
  typeClass: CompatibilityClass.String,
  sameKind: {
    kind: 'string',
    render(value, caseSensitive) {
      if (typeof value !== 'string') throw unexpected(value, 'string');
      return {
        typeClass: CompatibilityClass.String,
        literals: [quoteLiteral(caseSensitive ? value : value.toLowerCase())],
        fieldExpression: caseSensitive ? identity : (field) => `${field}.ToLower()`,
      };
    },
  },
  compare: (a, b) => compareNullsFirst(a, b, () => String(a).localeCompare(String(b))),
};

const numericVariant: ValueTypeVariant = {
  name: 'numeric',
  formattable: true,
  filterEditor: 'numeric',
  typeClass: CompatibilityClass.Numeric,
  sameKind: {
    kind: 'numeric',
    render(value) {
      if (typeof value !== 'number' && typeof value !== 'bigint') throw unexpected(value, 'numeric');
      return {
        typeClass: CompatibilityClass.Numeric,
        literals: [numericLiteral(value)],
        fieldExpression: identity,
      };
    },
  },
  compare: (a, b) => compareNullsFirst(a, b, () => Number(a) - Number(b)),
};

const booleanVariant: ValueTypeVariant = {
  name: 'boolean',
  formattable: false,
  filterEditor: 'boolean',
  typeClass: CompatibilityClass.Boolean,
  sameKind: {
    kind: 'boolean',
    render(value) {
      if (typeof value !== 'boolean') throw unexpected(value, 'boolean');
      return {
        typeClass: CompatibilityClass.Boolean,
        literals: [value ? 'true' : 'false'],
        fieldExpression: identity,
      };
    },
  },
  compare: (a, b) => compareNullsFirst(a, b, () => Number(Boolean(a)) - Number(Boolean(b))),
};

const dateVariant: ValueTypeVariant = {
  name: 'date',
  formattable: true,
  filterEditor: 'date',
  typeClass: CompatibilityClass.Date,
  sameKind: {
    kind: 'date',
    render(value) {
      if (!(value instanceof Date)) throw unexpected(value, 'date');
      return {
        typeClass: CompatibilityClass.Date,
        literals: [dateLiteral(value)],
        fieldExpression: identity,
      };
    },
  },
  compare: (a, b) =>
    compareNullsFirst(a, b, () => {
      const aTime = a instanceof Date ? a.getTime() : new Date(String(a)).getTime();
      const bTime = b instanceof Date ? b.getTime() : new Date(String(b)).getTime();
      return aTime - bTime;
    }),
};

const otherVariant: ValueTypeVariant = {
  name: 'other',
  formattable: false,
  filterEditor: 'string',
  compare: (a, b) => compareNullsFirst(a, b, () => String(a).localeCompare(String(b))),
};

const VARIANTS: Readonly<Record<ValueTypeName, ValueTypeVariant>> = Object.freeze({
  string: stringVariant,
  numeric: numericVariant,
  boolean: booleanVariant,
  date: dateVariant,
  other: otherVariant,
});

export function getValueTypeVariant(name: ValueTypeName): ValueTypeVariant {
  return VARIANTS[name];
}

// =============================================================================
// Coercion
// =============================================================================

/**
 * Turn a filter value into predicate literals for a column.
 *
 * Same-kind values go through the column variant. Otherwise a date range
 * always yields two date literals, and text is compared against the field's
 * text form. Anything else throws UnsupportedConversionError.
 */
export function coerceFilterValue(
  value: FilterValue,
  variant: ValueTypeVariant,
  caseSensitive: boolean
): CoercedFilterValue {
  const kind = classifyFilterValue(value);

  if (variant.sameKind && variant.sameKind.kind === kind) {
    return variant.sameKind.render(value, caseSensitive);
  }

  if (value instanceof DateRange) {
    return {
      typeClass: CompatibilityClass.DateRange,
      literals: [
        value.start ? dateLiteral(value.start) : MIN_DATE_LITERAL,
        value.end ? dateLiteral(value.end) : MAX_DATE_LITERAL,
      ],
      fieldExpression: identity,
    };
  }

  if (typeof value === 'string') {
    return {
      typeClass: CompatibilityClass.String,
      literals: [quoteLiteral(caseSensitive ? value : value.toLowerCase())],
      fieldExpression: caseSensitive
        ? (field) => `${field}.ToString()`
        : (field) => `${field}.ToString().ToLower()`,
    };
  }

  throw new UnsupportedConversionError(kind, variant.name);
}
