/**
 * Filter Compiler Tests
 */

import { describe, it, expect } from 'vitest';
import { compileFilter, compilePredicate } from './FilterCompiler';
import type { FilterCompileRequest } from './FilterCompiler';
import { FILTER_OPERATORS, isFilterOperator } from './FilterOperators';
import { coerceFilterValue, getValueTypeVariant } from './ValueTypes';
import { CompatibilityClass, DateRange } from './types';
import type { CoercedFilterValue } from './types';
import { IncompatibleOperatorError, UnsupportedConversionError } from './errors';

function request(overrides: Partial<FilterCompileRequest>): FilterCompileRequest {
  return {
    fieldPath: 'name',
    variant: getValueTypeVariant('string'),
    caseSensitive: false,
    value: 'Anna',
    operator: 'contains',
    ...overrides,
  };
}

// ===========================================================================
// Predicate Rendering
// ===========================================================================

describe('FilterCompiler - Rendering', () => {
  it('should compile a numeric comparison', () => {
    const predicate = compileFilter(
      request({ fieldPath: 'age', variant: getValueTypeVariant('numeric'), value: 10, operator: 'greaterThanOrEquals' })
    );

    expect(predicate).toBe('age >= 10');
  });

  it('should compile a case-insensitive substring test', () => {
    expect(compileFilter(request({}))).toBe('name.ToLower().Contains("anna")');
  });

  it('should compile a case-sensitive substring test', () => {
    expect(compileFilter(request({ caseSensitive: true }))).toBe('name.Contains("Anna")');
  });

  it('should compile an exclusive date range', () => {
    const predicate = compileFilter(
      request({
        fieldPath: 'hireDate',
        variant: getValueTypeVariant('date'),
        value: new DateRange(new Date(2023, 0, 1), new Date(2023, 11, 31)),
        operator: 'between',
      })
    );

    expect(predicate).toBe('hireDate > DateTime(2023,01,01) && hireDate < DateTime(2023,12,31)');
  });

  it('should compile an inclusive date range', () => {
    const predicate = compileFilter(
      request({
        fieldPath: 'hireDate',
        variant: getValueTypeVariant('date'),
        value: new DateRange(new Date(2023, 0, 1), new Date(2023, 11, 31)),
        operator: 'betweenIncluding',
      })
    );

    expect(predicate).toBe('hireDate >= DateTime(2023,01,01) && hireDate <= DateTime(2023,12,31)');
  });

  it('should use only the range start with single-operand operators', () => {
    const predicate = compileFilter(
      request({
        fieldPath: 'hireDate',
        variant: getValueTypeVariant('date'),
        value: new DateRange(new Date(2023, 0, 1)),
        operator: 'equals',
      })
    );

    expect(predicate).toBe('hireDate == DateTime(2023,01,01)');
  });

  it('should compile a date comparison', () => {
    const predicate = compileFilter(
      request({
        fieldPath: 'hireDate',
        variant: getValueTypeVariant('date'),
        value: new Date(2020, 1, 29),
        operator: 'lessThan',
      })
    );

    expect(predicate).toBe('hireDate < DateTime(2020,02,29)');
  });

  it('should compile free text against a numeric field', () => {
    const predicate = compileFilter(
      request({ fieldPath: 'age', variant: getValueTypeVariant('numeric'), value: '4', operator: 'contains' })
    );

    expect(predicate).toBe('age.ToString().ToLower().Contains("4")');
  });

  it('should wrap negated text operators', () => {
    expect(compileFilter(request({ value: 'X', operator: 'doesNotContain' }))).toBe(
      '!(name.ToLower().Contains("x"))'
    );
  });

  it('should compile null checks', () => {
    const predicate = compileFilter(
      request({ fieldPath: 'age', variant: getValueTypeVariant('numeric'), value: 0, operator: 'isNull' })
    );

    expect(predicate).toBe('age is null');
  });

  it('should compile boolean equality', () => {
    const predicate = compileFilter(
      request({ fieldPath: 'active', variant: getValueTypeVariant('boolean'), value: true, operator: 'notEquals' })
    );

    expect(predicate).toBe('active != true');
  });

  it('should escape quotes in text operands', () => {
    expect(compileFilter(request({ value: 'Say "Hi"', operator: 'equals' }))).toBe(
      'name.ToLower() == "say \\"hi\\""'
    );
  });

  it('should not expand placeholders inside operands', () => {
    expect(compileFilter(request({ value: '{0}', operator: 'startsWith' }))).toBe(
      'name.ToLower().StartsWith("{0}")'
    );
  });

  it('should produce the same predicate for the same input', () => {
    expect(compileFilter(request({}))).toBe(compileFilter(request({})));
  });
});

// ===========================================================================
// Absent Values
// ===========================================================================

describe('FilterCompiler - Absent Values', () => {
  it('should skip null and undefined values', () => {
    expect(compileFilter(request({ value: null }))).toBeUndefined();
    expect(compileFilter(request({ value: undefined }))).toBeUndefined();
  });

  it('should compile an empty string', () => {
    expect(compileFilter(request({ value: '' }))).toBe('name.ToLower().Contains("")');
  });
});

// ===========================================================================
// Compatibility
// ===========================================================================

describe('FilterCompiler - Compatibility', () => {
  it('should reject ordering on booleans', () => {
    expect(() =>
      compileFilter(
        request({ fieldPath: 'active', variant: getValueTypeVariant('boolean'), value: true, operator: 'lessThan' })
      )
    ).toThrow(IncompatibleOperatorError);
  });

  it('should report the operator and class', () => {
    const coerced = coerceFilterValue(true, getValueTypeVariant('boolean'), false);

    expect(() => compilePredicate('active', 'lessThan', coerced)).toThrow(
      "Operator 'lessThan' is not compatible with Boolean values"
    );
  });

  it('should validate against the resolved class, not the column type', () => {
    const text = request({ fieldPath: 'age', variant: getValueTypeVariant('numeric'), value: '4' });

    expect(() => compileFilter({ ...text, operator: 'greaterThan' })).toThrow(IncompatibleOperatorError);
    expect(compileFilter({ ...text, operator: 'endsWith' })).toBe('age.ToString().ToLower().EndsWith("4")');
  });

  it('should reject ranges on single dates', () => {
    expect(() =>
      compileFilter(
        request({
          fieldPath: 'hireDate',
          variant: getValueTypeVariant('date'),
          value: new Date(2023, 0, 1),
          operator: 'between',
        })
      )
    ).toThrow(IncompatibleOperatorError);
  });

  it('should reject unsupported conversions', () => {
    expect(() =>
      compileFilter(request({ fieldPath: 'hireDate', variant: getValueTypeVariant('date'), value: 5, operator: 'equals' }))
    ).toThrow(UnsupportedConversionError);
  });

  it('should succeed exactly when the class is compatible', () => {
    const classes = [
      CompatibilityClass.String,
      CompatibilityClass.Numeric,
      CompatibilityClass.Boolean,
      CompatibilityClass.Date,
      CompatibilityClass.DateRange,
    ];

    for (const operator of Object.keys(FILTER_OPERATORS).filter(isFilterOperator)) {
      for (const typeClass of classes) {
        const coerced: CoercedFilterValue = {
          typeClass,
          literals: ['1', '2'],
          fieldExpression: (field) => field,
        };
        const compatible = (FILTER_OPERATORS[operator].compatible & typeClass) !== 0;

        if (compatible) {
          expect(compilePredicate('field', operator, coerced)).toContain('field');
        } else {
          expect(() => compilePredicate('field', operator, coerced)).toThrow(IncompatibleOperatorError);
        }
      }
    }
  });
});
