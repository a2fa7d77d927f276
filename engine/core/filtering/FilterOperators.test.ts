/**
 * Filter Operator Registry Tests
 */

import { describe, it, expect } from 'vitest';
import {
  FILTER_OPERATORS,
  compatibilityClassName,
  getCompatibleClasses,
  getOperatorLabel,
  getOperatorTemplate,
  getOperatorsFor,
  isFilterOperator,
  isOperatorCompatible,
} from './FilterOperators';
import { CompatibilityClass } from './types';

describe('FilterOperators - Templates', () => {
  it('should expose the template of each operator', () => {
    expect(getOperatorTemplate('equals')).toBe('{0} == {1}');
    expect(getOperatorTemplate('doesNotContain')).toBe('!({0}.Contains({1}))');
    expect(getOperatorTemplate('isNotNull')).toBe('{0} is not null');
    expect(getOperatorTemplate('between')).toBe('{0} > {1} && {0} < {2}');
    expect(getOperatorTemplate('betweenIncluding')).toBe('{0} >= {1} && {0} <= {2}');
  });

  it('should expose labels for editor menus', () => {
    expect(getOperatorLabel('greaterThanOrEquals')).toBe('Greater than or equals');
    expect(getOperatorLabel('isNull')).toBe('Is empty');
  });

  it('should give every operator at least one compatible class', () => {
    for (const definition of Object.values(FILTER_OPERATORS)) {
      expect(definition.compatible).toBeGreaterThan(0);
    }
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(FILTER_OPERATORS)).toBe(true);
  });
});

describe('FilterOperators - Compatibility', () => {
  it('should accept equality and null checks for every class', () => {
    for (const typeClass of [
      CompatibilityClass.String,
      CompatibilityClass.Numeric,
      CompatibilityClass.Boolean,
      CompatibilityClass.Date,
      CompatibilityClass.DateRange,
    ]) {
      expect(isOperatorCompatible('equals', typeClass)).toBe(true);
      expect(isOperatorCompatible('notEquals', typeClass)).toBe(true);
      expect(isOperatorCompatible('isNull', typeClass)).toBe(true);
      expect(isOperatorCompatible('isNotNull', typeClass)).toBe(true);
    }
  });

  it('should restrict ordering to numbers and dates', () => {
    expect(getCompatibleClasses('lessThan')).toBe(CompatibilityClass.Numeric | CompatibilityClass.Date);
    expect(isOperatorCompatible('lessThan', CompatibilityClass.Boolean)).toBe(false);
    expect(isOperatorCompatible('greaterThan', CompatibilityClass.String)).toBe(false);
    expect(isOperatorCompatible('greaterThan', CompatibilityClass.Date)).toBe(true);
  });

  it('should restrict ranges to date ranges', () => {
    expect(isOperatorCompatible('between', CompatibilityClass.Date)).toBe(false);
    expect(isOperatorCompatible('between', CompatibilityClass.DateRange)).toBe(true);
    expect(isOperatorCompatible('betweenIncluding', CompatibilityClass.Numeric)).toBe(false);
  });

  it('should list operators for a class in table order', () => {
    expect(getOperatorsFor(CompatibilityClass.String)).toEqual([
      'equals',
      'notEquals',
      'contains',
      'startsWith',
      'endsWith',
      'doesNotContain',
      'isNull',
      'isNotNull',
    ]);
    expect(getOperatorsFor(CompatibilityClass.Boolean)).toEqual([
      'equals',
      'notEquals',
      'isNull',
      'isNotNull',
    ]);
  });

  it('should list operators for several classes at once', () => {
    expect(getOperatorsFor(CompatibilityClass.Date | CompatibilityClass.DateRange)).toEqual([
      'equals',
      'notEquals',
      'lessThan',
      'lessThanOrEquals',
      'greaterThan',
      'greaterThanOrEquals',
      'isNull',
      'isNotNull',
      'between',
      'betweenIncluding',
    ]);
  });
});

describe('FilterOperators - Helpers', () => {
  it('should recognise operator names', () => {
    expect(isFilterOperator('contains')).toBe(true);
    expect(isFilterOperator('like')).toBe(false);
    expect(isFilterOperator('toString')).toBe(false);
  });

  it('should name compatibility classes', () => {
    expect(compatibilityClassName(CompatibilityClass.DateRange)).toBe('DateRange');
    expect(compatibilityClassName(CompatibilityClass.Boolean)).toBe('Boolean');
  });
});
