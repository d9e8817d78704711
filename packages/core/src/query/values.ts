/**
 * Value semantics shared by operators, attribute-getters and ordering:
 * equality, truthiness, ordering, size, iteration and membership.
 *
 * @module query/values
 */

import { UnsupportedOperandError } from '../errors/query-list-error.js';

/**
 * True for objects whose prototype is `Object.prototype` or `null`
 * (object literals, `JSON.parse` output, `Object.create(null)`).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Name used for a value's type in error messages: the constructor name for
 * objects, `typeof` for primitives.
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object' && typeof value !== 'function') return typeof value;
  const ctor: unknown = Reflect.get(value, 'constructor');
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'Object';
}

/**
 * Performs a deep equality check between two values.
 *
 * - **Primitives**: `Object.is`-style, except `0` equals `-0`
 * - **Date**: Compares timestamps
 * - **RegExp**: Compares string representations
 * - **Array**: Recursive element comparison (order matters)
 * - **Map / Set**: Same size, same keys, recursively equal values
 * - **Object**: Same prototype, same own keys, recursively equal values
 *
 * @example
 * ```typescript
 * isEqual({ a: 1 }, { a: 1 });      // true
 * isEqual([1, 2], [2, 1]);          // false (order matters)
 * isEqual(new Date(0), new Date(0)); // true
 * ```
 */
export function isEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a === 'number' && typeof b === 'number') return Number.isNaN(a) && Number.isNaN(b);
  if (a === null || b === null || typeof a !== 'object' || typeof b !== 'object') return false;
  if (Object.getPrototypeOf(a) !== Object.getPrototypeOf(b)) return false;

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }

  if (a instanceof RegExp && b instanceof RegExp) {
    return a.toString() === b.toString();
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    return a.every((item, index) => isEqual(item, b[index]));
  }

  if (a instanceof Map && b instanceof Map) {
    if (a.size !== b.size) return false;
    for (const [key, value] of a) {
      if (!b.has(key) || !isEqual(value, b.get(key))) return false;
    }
    return true;
  }

  if (a instanceof Set && b instanceof Set) {
    if (a.size !== b.size) return false;
    for (const value of a) {
      if (!setHas(b, value)) return false;
    }
    return true;
  }

  const aKeys = Object.keys(a);
  const bKeys = Object.keys(b);
  if (aKeys.length !== bKeys.length) return false;
  return aKeys.every(
    (key) => Object.prototype.hasOwnProperty.call(b, key) && isEqual(Reflect.get(a, key), Reflect.get(b, key))
  );
}

/**
 * Truthiness of a value. Empty containers are false, as are `0`, `NaN`,
 * `0n`, `''`, `false`, `null` and `undefined`.
 */
export function isTruthy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (value instanceof Map || value instanceof Set) return value.size > 0;
  if (isPlainObject(value)) return Object.keys(value).length > 0;
  return Boolean(value);
}

/**
 * Orders two values of a comparable kind.
 *
 * Numbers and bigints compare numerically with each other, strings by UTF-16
 * code unit, booleans `false` before `true`, Dates by timestamp, arrays
 * lexicographically element by element.
 *
 * @returns Negative, zero or positive, or `undefined` when the two values
 * cannot be ordered against each other (different kinds, `NaN`, nullish).
 */
export function compareOrdered(a: unknown, b: unknown): number | undefined {
  if (isNumeric(a) && isNumeric(b)) {
    if (Number.isNaN(a) || Number.isNaN(b)) return undefined;
    return a < b ? -1 : a > b ? 1 : 0;
  }

  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }

  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return a === b ? 0 : a ? 1 : -1;
  }

  if (a instanceof Date && b instanceof Date) {
    return compareOrdered(a.getTime(), b.getTime());
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    const shared = Math.min(a.length, b.length);
    for (let i = 0; i < shared; i++) {
      if (isEqual(a[i], b[i])) continue;
      return compareOrdered(a[i], b[i]);
    }
    return a.length - b.length;
  }

  return undefined;
}

/**
 * Size of a container: string and array length, Map/Set size, plain-object key count.
 *
 * @throws UnsupportedOperandError for values without a size
 */
export function sizeOf(value: unknown, operation = 'len'): number {
  if (typeof value === 'string' || Array.isArray(value)) return value.length;
  if (value instanceof Map || value instanceof Set) return value.size;
  if (isPlainObject(value)) return Object.keys(value).length;
  throw new UnsupportedOperandError(operation, `object of type '${describeType(value)}' has no length`);
}

/**
 * Elements of an iterable value: string characters, array items, Set values,
 * Map keys, plain-object keys.
 *
 * @throws UnsupportedOperandError for values that cannot be iterated
 */
export function elementsOf(value: unknown, operation: string): readonly unknown[] {
  if (typeof value === 'string') return Array.from(value);
  if (Array.isArray(value)) return value;
  if (value instanceof Set) return [...value.values()];
  if (value instanceof Map) return [...value.keys()];
  if (isPlainObject(value)) return Object.keys(value);
  throw new UnsupportedOperandError(operation, `'${describeType(value)}' object is not iterable`);
}

/**
 * Membership test using the container's own semantics.
 *
 * - string: substring search (a non-string item is never found)
 * - array: some element deep-equals the item
 * - Set: has the item, or an element deep-equals it
 * - Map / plain object: the item is a key
 * - anything else: the container equals the item
 *
 * @example
 * ```typescript
 * containsValue('Fido', 'ido');           // true
 * containsValue(['foo', 'Fido'], 'Fido'); // true
 * containsValue('Fido', 'Fido');          // true
 * ```
 */
export function containsValue(container: unknown, item: unknown): boolean {
  if (typeof container === 'string') {
    return typeof item === 'string' && container.includes(item);
  }

  if (Array.isArray(container)) {
    return container.some((element) => isEqual(element, item));
  }

  if (container instanceof Set) {
    return setHas(container, item);
  }

  if (container instanceof Map) {
    return container.has(item);
  }

  if (isPlainObject(container)) {
    return typeof item === 'string' && Object.prototype.hasOwnProperty.call(container, item);
  }

  return isEqual(container, item);
}

function isNumeric(value: unknown): value is number | bigint {
  return typeof value === 'number' || typeof value === 'bigint';
}

function setHas(set: ReadonlySet<unknown>, item: unknown): boolean {
  if (set.has(item)) return true;
  for (const element of set) {
    if (isEqual(element, item)) return true;
  }
  return false;
}
