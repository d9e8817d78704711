import { describe, expect, it } from 'vitest';
import { UnsupportedOperandError } from '../errors/query-list-error.js';
import {
  compareOrdered,
  containsValue,
  describeType,
  elementsOf,
  isEqual,
  isPlainObject,
  isTruthy,
  sizeOf,
} from './values.js';

class Dog {
  constructor(
    public name: string,
    public number: number
  ) {}
}

describe('isPlainObject', () => {
  it('should accept object literals and null-prototype objects', () => {
    expect(isPlainObject({ a: 1 })).toBe(true);
    expect(isPlainObject(Object.create(null))).toBe(true);
  });

  it('should reject class instances, arrays, maps and primitives', () => {
    expect(isPlainObject(new Dog('Fido', 1))).toBe(false);
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(new Map())).toBe(false);
    expect(isPlainObject('x')).toBe(false);
    expect(isPlainObject(null)).toBe(false);
  });
});

describe('describeType', () => {
  it('should name primitives by typeof and objects by constructor', () => {
    expect(describeType('Fido')).toBe('string');
    expect(describeType(1)).toBe('number');
    expect(describeType(undefined)).toBe('undefined');
    expect(describeType(null)).toBe('null');
    expect(describeType(new Dog('Fido', 1))).toBe('Dog');
    expect(describeType([])).toBe('Array');
    expect(describeType(Object.create(null))).toBe('Object');
  });
});

describe('isEqual', () => {
  it('should compare primitives strictly', () => {
    expect(isEqual(1, 1)).toBe(true);
    expect(isEqual(1, '1')).toBe(false);
    expect(isEqual(NaN, NaN)).toBe(true);
    expect(isEqual(null, undefined)).toBe(false);
  });

  it('should compare arrays and objects deeply', () => {
    expect(isEqual([1, { a: 2 }], [1, { a: 2 }])).toBe(true);
    expect(isEqual([1, 2], [2, 1])).toBe(false);
    expect(isEqual({ a: 1 }, { a: 1, b: 2 })).toBe(false);
  });

  it('should compare dates, maps and sets by content', () => {
    expect(isEqual(new Date(0), new Date(0))).toBe(true);
    expect(isEqual(new Map([['a', 1]]), new Map([['a', 1]]))).toBe(true);
    expect(isEqual(new Map([['a', 1]]), new Map([['a', 2]]))).toBe(false);
    expect(isEqual(new Set([[1]]), new Set([[1]]))).toBe(true);
  });

  it('should require the same prototype', () => {
    expect(isEqual(new Dog('Fido', 1), new Dog('Fido', 1))).toBe(true);
    expect(isEqual(new Dog('Fido', 1), { name: 'Fido', number: 1 })).toBe(false);
  });
});

describe('isTruthy', () => {
  it('should treat empty containers as false', () => {
    expect(isTruthy([])).toBe(false);
    expect(isTruthy({})).toBe(false);
    expect(isTruthy(new Set())).toBe(false);
    expect(isTruthy(new Map())).toBe(false);
    expect(isTruthy([0])).toBe(true);
  });

  it('should follow primitive truthiness', () => {
    expect(isTruthy(0)).toBe(false);
    expect(isTruthy('')).toBe(false);
    expect(isTruthy(0n)).toBe(false);
    expect(isTruthy(420)).toBe(true);
    expect(isTruthy(new Dog('Fido', 0))).toBe(true);
  });
});

describe('compareOrdered', () => {
  it('should order numbers, bigints and strings', () => {
    expect(compareOrdered(1, 2)).toBe(-1);
    expect(compareOrdered(2n, 1)).toBe(1);
    expect(compareOrdered('Biko', 'Buster')).toBe(-1);
    expect(compareOrdered('b', 'b')).toBe(0);
  });

  it('should order strings by code unit, not locale', () => {
    expect(compareOrdered('Z', 'a')).toBe(-1);
  });

  it('should order booleans and dates', () => {
    expect(compareOrdered(false, true)).toBe(-1);
    expect(compareOrdered(new Date(2000, 0, 1), new Date(1999, 0, 1))).toBe(1);
  });

  it('should order arrays lexicographically', () => {
    expect(compareOrdered([1, 2], [1, 3])).toBe(-1);
    expect(compareOrdered([1, 2], [1, 2, 0])).toBe(-1);
    expect(compareOrdered(['a', 2], ['a', 2])).toBe(0);
  });

  it('should return undefined for values that cannot be ordered', () => {
    expect(compareOrdered(1, '1')).toBeUndefined();
    expect(compareOrdered(null, 1)).toBeUndefined();
    expect(compareOrdered(NaN, 1)).toBeUndefined();
    expect(compareOrdered({}, {})).toBeUndefined();
  });
});

describe('sizeOf', () => {
  it('should measure strings, arrays, maps, sets and plain objects', () => {
    expect(sizeOf('Fido')).toBe(4);
    expect(sizeOf([1, 2, 3])).toBe(3);
    expect(sizeOf(new Set([1]))).toBe(1);
    expect(sizeOf(new Map([['a', 1], ['b', 2]]))).toBe(2);
    expect(sizeOf({ a: 1 })).toBe(1);
  });

  it('should reject values without a length', () => {
    expect(() => sizeOf(15.72)).toThrow(UnsupportedOperandError);
    expect(() => sizeOf(new Dog('Fido', 1))).toThrow("len: object of type 'Dog' has no length");
  });
});

describe('elementsOf', () => {
  it('should iterate characters, items, set values and keys', () => {
    expect(elementsOf('ab', 'max')).toEqual(['a', 'b']);
    expect(elementsOf([1, 2], 'max')).toEqual([1, 2]);
    expect(elementsOf(new Set([3]), 'max')).toEqual([3]);
    expect(elementsOf(new Map([['k', 1]]), 'max')).toEqual(['k']);
    expect(elementsOf({ x: 1, y: 2 }, 'max')).toEqual(['x', 'y']);
  });

  it('should reject non-iterable values', () => {
    expect(() => elementsOf(5, 'sum')).toThrow("sum: 'number' object is not iterable");
  });
});

describe('containsValue', () => {
  it('should search substrings', () => {
    expect(containsValue('Fido', 'ido')).toBe(true);
    expect(containsValue('Fido', 'foo')).toBe(false);
    expect(containsValue('15', 1)).toBe(false);
  });

  it('should search arrays and sets by deep equality', () => {
    expect(containsValue(['foo', 'Fido'], 'Fido')).toBe(true);
    expect(containsValue([{ a: 1 }], { a: 1 })).toBe(true);
    expect(containsValue(new Set([[1, 2]]), [1, 2])).toBe(true);
  });

  it('should search keys of maps and plain objects', () => {
    expect(containsValue(new Map([['a', 1]]), 'a')).toBe(true);
    expect(containsValue({ a: 1 }, 'a')).toBe(true);
    expect(containsValue({ a: 1 }, 'toString')).toBe(false);
  });

  it('should fall back to equality for scalars', () => {
    expect(containsValue(4, 4)).toBe(true);
    expect(containsValue(4, 5)).toBe(false);
  });
});
