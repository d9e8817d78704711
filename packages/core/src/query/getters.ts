/**
 * Built-in attribute-getters: `len`/`length`, `bool`, `max`, `min`, `all`,
 * `any`, `abs`, `sum`.
 *
 * @module query/getters
 */

import { UnsupportedOperandError } from '../errors/query-list-error.js';
import type { AttributeGetterFn } from '../types/query.js';
import { compareOrdered, describeType, elementsOf, isTruthy, sizeOf } from './values.js';

export function lengthOf(value: unknown): number {
  return sizeOf(value, 'len');
}

export function maxOf(value: unknown): unknown {
  return extremeOf(value, 'max', 1);
}

export function minOf(value: unknown): unknown {
  return extremeOf(value, 'min', -1);
}

export function allOf(value: unknown): boolean {
  return elementsOf(value, 'all').every(isTruthy);
}

export function anyOf(value: unknown): boolean {
  return elementsOf(value, 'any').some(isTruthy);
}

export function absoluteOf(value: unknown): number | bigint {
  if (typeof value === 'number') return Math.abs(value);
  if (typeof value === 'bigint') return value < 0n ? -value : value;
  throw new UnsupportedOperandError('abs', `bad operand type '${describeType(value)}'`);
}

export function sumOf(value: unknown): number {
  let total = 0;
  for (const element of elementsOf(value, 'sum')) {
    if (typeof element !== 'number') {
      throw new UnsupportedOperandError('sum', `cannot add '${describeType(element)}' to a number`);
    }
    total += element;
  }
  return total;
}

function extremeOf(value: unknown, operation: string, sign: 1 | -1): unknown {
  const elements = elementsOf(value, operation);
  if (elements.length === 0) {
    throw new UnsupportedOperandError(operation, 'arg is an empty sequence');
  }

  let best = elements[0];
  for (const element of elements.slice(1)) {
    const order = compareOrdered(element, best);
    if (order === undefined) {
      throw new UnsupportedOperandError(
        operation,
        `cannot order '${describeType(element)}' against '${describeType(best)}'`
      );
    }
    if (order * sign > 0) best = element;
  }
  return best;
}

/**
 * Attribute-getters every {@link QueryList} starts with
 */
export const BUILTIN_ATTRIBUTE_GETTERS: ReadonlyArray<readonly [string, AttributeGetterFn]> = [
  ['len', lengthOf],
  ['length', lengthOf],
  ['bool', isTruthy],
  ['max', maxOf],
  ['min', minOf],
  ['all', allOf],
  ['any', anyOf],
  ['abs', absoluteOf],
  ['sum', sumOf],
];
