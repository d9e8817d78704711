import { describe, expect, it } from 'vitest';
import { InvalidFieldPathError } from '../errors/query-list-error.js';
import type { OperatorFn } from '../types/query.js';
import {
  BUILTIN_OPERATORS,
  isGreaterThan,
  isGreaterThanOrEqual,
  isLessThan,
  isLessThanOrEqual,
} from './operators.js';
import { Registry } from './registry.js';
import { parseSortSpec, parseTerm } from './term-parser.js';
import { isEqual } from './values.js';

const operators = new Registry<OperatorFn>('operator', BUILTIN_OPERATORS);

describe('parseTerm', () => {
  it.each<[string, string, string, OperatorFn]>([
    ['name', 'name', 'eq', isEqual],
    ['distance__lt', 'distance', 'lt', isLessThan],
    ['distance__lte', 'distance', 'lte', isLessThanOrEqual],
    ['distance__gt', 'distance', 'gt', isGreaterThan],
    ['distance__gte', 'distance', 'gte', isGreaterThanOrEqual],
    ['distance__greater_than', 'distance', 'greater_than', isGreaterThan],
    ['distance__meters', 'distance__meters', 'eq', isEqual],
    ['distance__meters__gte', 'distance__meters', 'gte', isGreaterThanOrEqual],
  ])('%s should parse to field %s with %s', (query, field, operator, compare) => {
    const term = parseTerm(query, operators);
    expect(term.field).toBe(field);
    expect(term.operator).toBe(operator);
    expect(term.compare).toBe(compare);
  });

  it('should keep a trailing getter in the field path', () => {
    expect(parseTerm('name__length', operators)).toMatchObject({
      field: 'name__length',
      operator: 'eq',
    });
  });

  it('should prefer the operator when a name is both operator and getter', () => {
    expect(parseTerm('name__len', operators)).toMatchObject({ field: 'name', operator: 'len' });
  });

  it('should split on the last separator only', () => {
    expect(parseTerm('a___gt', operators)).toMatchObject({ field: 'a_', operator: 'gt' });
  });

  it('should treat an unknown suffix as part of the path', () => {
    expect(parseTerm('name__inside', operators)).toMatchObject({
      field: 'name__inside',
      operator: 'eq',
    });
  });

  it('should use operators registered later', () => {
    const extended = new Registry<OperatorFn>('operator', BUILTIN_OPERATORS);
    const startsWith: OperatorFn = (a, b) => String(a).startsWith(String(b));
    extended.register('startswith', startsWith);
    expect(parseTerm('name__startswith', extended).compare).toBe(startsWith);
  });
});

describe('parseSortSpec', () => {
  it('should parse ascending and descending specs', () => {
    expect(parseSortSpec('number')).toEqual({ field: 'number', direction: 'asc' });
    expect(parseSortSpec('-name__len')).toEqual({ field: 'name__len', direction: 'desc' });
  });

  it('should reject specs without a field', () => {
    expect(() => parseSortSpec('')).toThrow(InvalidFieldPathError);
    expect(() => parseSortSpec('-')).toThrow("Invalid field path '-'");
  });
});
