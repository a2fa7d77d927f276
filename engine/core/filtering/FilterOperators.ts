/**
 * Filter Operator Registry
 * Templates and type compatibility for every filter operator
 */

import { CompatibilityClass } from './types.js';
import type { FilterOperator, OperatorDefinition } from './types.js';

const ORDERED = CompatibilityClass.Numeric | CompatibilityClass.Date;

/**
 * Operator table. Order is the order editors list operators in.
 */
export const FILTER_OPERATORS: Readonly<Record<FilterOperator, OperatorDefinition>> = Object.freeze({
  equals: { template: '{0} == {1}', compatible: CompatibilityClass.All, label: 'Equals' },
  notEquals: { template: '{0} != {1}', compatible: CompatibilityClass.All, label: 'Not equals' },
  lessThan: { template: '{0} < {1}', compatible: ORDERED, label: 'Less than' },
  lessThanOrEquals: { template: '{0} <= {1}', compatible: ORDERED, label: 'Less than or equals' },
  greaterThan: { template: '{0} > {1}', compatible: ORDERED, label: 'Greater than' },
  greaterThanOrEquals: { template: '{0} >= {1}', compatible: ORDERED, label: 'Greater than or equals' },
  contains: { template: '{0}.Contains({1})', compatible: CompatibilityClass.String, label: 'Contains' },
  startsWith: { template: '{0}.StartsWith({1})', compatible: CompatibilityClass.String, label: 'Starts with' },
  endsWith: { template: '{0}.EndsWith({1})', compatible: CompatibilityClass.String, label: 'Ends with' },
  doesNotContain: { template: '!({0}.Contains({1}))', compatible: CompatibilityClass.String, label: 'Does not contain' },
  isNull: { template: '{0} is null', compatible: CompatibilityClass.All, label: 'Is empty' },
  isNotNull: { template: '{0} is not null', compatible: CompatibilityClass.All, label: 'Is not empty' },
  between: { template: '{0} > {1} && {0} < {2}', compatible: CompatibilityClass.DateRange, label: 'Between' },
  betweenIncluding: {
    template: '{0} >= {1} && {0} <= {2}',
    compatible: CompatibilityClass.DateRange,
    label: 'Between (inclusive)',
  },
});

/**
 * Type guard for operator names coming from untyped sources (URLs, editors)
 */
export function isFilterOperator(name: string): name is FilterOperator {
  return Object.prototype.hasOwnProperty.call(FILTER_OPERATORS, name);
}

const OPERATOR_NAMES: FilterOperator[] = Object.keys(FILTER_OPERATORS).filter(isFilterOperator);

export function getOperatorTemplate(operator: FilterOperator): string {
  return FILTER_OPERATORS[operator].template;
}

export function getCompatibleClasses(operator: FilterOperator): number {
  return FILTER_OPERATORS[operator].compatible;
}

export function getOperatorLabel(operator: FilterOperator): string {
  return FILTER_OPERATORS[operator].label;
}

/**
 * Check whether an operator accepts values of the given class
 */
export function isOperatorCompatible(operator: FilterOperator, typeClass: CompatibilityClass): boolean {
  return (getCompatibleClasses(operator) & typeClass) !== 0;
}

/**
 * List the operators legal for any of the given classes, in table order
 * @param typeClasses - One class, or several OR-ed together
 */
export function getOperatorsFor(typeClasses: number): FilterOperator[] {
  return OPERATOR_NAMES.filter((operator) => (getCompatibleClasses(operator) & typeClasses) !== 0);
}

/**
 * Name of a single compatibility class, for messages
 */
export function compatibilityClassName(typeClass: CompatibilityClass): string {
  for (const [name, value] of Object.entries(CompatibilityClass)) {
    if (value === typeClass) {
      return name;
    }
  }
  return String(typeClass);
}
