/**
 * Built-in comparison operators.
 *
 * An operator is selected by the last segment of a field query:
 *
 * - `lt` / `less_than`, `lte` / `less_than_or_equal`
 * - `gt` / `greater_than`, `gte` / `greater_than_or_equal`
 * - `contains` - the expected value is a member of the field value
 * - `in` - the field value is a member of the expected value
 * - `len` / `length_equals` - the field value has the expected length
 *
 * Ordering operators are false when the two values cannot be ordered
 * against each other (see {@link compareOrdered}).
 *
 * @module query/operators
 */

import type { OperatorFn } from '../types/query.js';
import { compareOrdered, containsValue, sizeOf } from './values.js';

export function isLessThan(a: unknown, b: unknown): boolean {
  const order = compareOrdered(a, b);
  return order !== undefined && order < 0;
}

export function isLessThanOrEqual(a: unknown, b: unknown): boolean {
  const order = compareOrdered(a, b);
  return order !== undefined && order <= 0;
}

export function isGreaterThan(a: unknown, b: unknown): boolean {
  const order = compareOrdered(a, b);
  return order !== undefined && order > 0;
}

export function isGreaterThanOrEqual(a: unknown, b: unknown): boolean {
  const order = compareOrdered(a, b);
  return order !== undefined && order >= 0;
}

export function contains(container: unknown, item: unknown): boolean {
  return containsValue(container, item);
}

export function isIn(item: unknown, container: unknown): boolean {
  return containsValue(container, item);
}

export function hasLength(value: unknown, length: unknown): boolean {
  return sizeOf(value, 'length_equals') === length;
}

/**
 * Operators every {@link QueryList} starts with
 */
export const BUILTIN_OPERATORS: ReadonlyArray<readonly [string, OperatorFn]> = [
  ['lt', isLessThan],
  ['less_than', isLessThan],
  ['lte', isLessThanOrEqual],
  ['less_than_or_equal', isLessThanOrEqual],
  ['gt', isGreaterThan],
  ['greater_than', isGreaterThan],
  ['gte', isGreaterThanOrEqual],
  ['greater_than_or_equal', isGreaterThanOrEqual],
  ['contains', contains],
  ['in', isIn],
  ['len', hasLength],
  ['length_equals', hasLength],
];
