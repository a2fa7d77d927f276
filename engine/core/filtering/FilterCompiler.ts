/**
 * Filter Compiler
 * Validates an operator against a coerced filter value and renders the
 * predicate fragment the grid's query layer executes.
 */

import type { CoercedFilterValue, FilterOperator, FilterValue } from './types.js';
import {
  compatibilityClassName,
  getOperatorTemplate,
  isOperatorCompatible,
} from './FilterOperators.js';
import { coerceFilterValue, type ValueTypeVariant } from './ValueTypes.js';
import { IncompatibleOperatorError } from './errors.js';

/**
 * Column description the compiler needs
 */
export interface FilterCompileRequest {
  /** Path of the row property, substituted for {0} */
  fieldPath: string;
  variant: ValueTypeVariant;
  caseSensitive: boolean;
  value: FilterValue | null | undefined;
  operator: FilterOperator;
}

/**
 * Replace {n} placeholders in one pass, so operand text is never re-expanded
 */
function formatTemplate(template: string, args: string[]): string {
  return template.replace(/\{(\d+)\}/g, (placeholder, index: string) => {
    const arg = args[Number(index)];
    if (arg === undefined) {
      throw new Error(`Template '${template}' expects an operand for ${placeholder}`);
    }
    return arg;
  });
}

/**
 * Render a predicate fragment for a coerced value.
 *
 * @throws IncompatibleOperatorError if the operator does not accept the
 * value's resolved class
 */
export function compilePredicate(
  fieldPath: string,
  operator: FilterOperator,
  coerced: CoercedFilterValue
): string {
  if (!isOperatorCompatible(operator, coerced.typeClass)) {
    throw new IncompatibleOperatorError(operator, compatibilityClassName(coerced.typeClass));
  }

  return formatTemplate(getOperatorTemplate(operator), [
    coerced.fieldExpression(fieldPath),
    ...coerced.literals,
  ]);
}

/**
 * Coerce and compile a filter value for a column.
 *
 * @returns The predicate fragment, or undefined when there is no value
 */
export function compileFilter(request: FilterCompileRequest): string | undefined {
  const { fieldPath, variant, caseSensitive, value, operator } = request;
  if (value === null || value === undefined) {
    return undefined;
  }

  const coerced = coerceFilterValue(value, variant, caseSensitive);
  return compilePredicate(fieldPath, operator, coerced);
}
