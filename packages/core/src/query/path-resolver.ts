/**
 * Field path resolution.
 *
 * A field path is one or more segments joined by `__`. Each segment is either
 * a registered attribute-getter, which transforms the current value, or a
 * field name read from the current value:
 *
 * ```
 * friend__friend__name__len
 *   friend  → record.friend
 *   friend  → .friend
 *   name    → .name
 *   len     → getter: length of the name
 * ```
 *
 * @module query/path-resolver
 */

import {
  AttributeNotFoundError,
  InvalidFieldPathError,
  KeyNotFoundError,
} from '../errors/query-list-error.js';
import type { AttributeGetterFn } from '../types/query.js';
import type { FieldAccess } from '../types/record.js';
import type { ReadonlyRegistry } from './registry.js';
import { describeType, isPlainObject } from './values.js';

/** Separator between field path segments */
export const SEGMENT_SEPARATOR = '__';

/**
 * Splits a field path into its segments.
 *
 * @throws InvalidFieldPathError for an empty path or an empty segment
 */
export function splitPath(path: string): string[] {
  const segments = path.split(SEGMENT_SEPARATOR);
  if (segments.some((segment) => segment.length === 0)) {
    throw new InvalidFieldPathError(path);
  }
  return segments;
}

/**
 * Classifies how a value exposes its fields: plain objects and Maps are
 * mappings read by key, anything else is read by attribute.
 */
export function fieldAccessOf(value: unknown): FieldAccess {
  if (value instanceof Map || isPlainObject(value)) {
    return { kind: 'mapping', value };
  }
  return { kind: 'attributed', value };
}

/**
 * Reads one field from a value.
 *
 * @throws KeyNotFoundError when a mapping lacks the key
 * @throws AttributeNotFoundError when any other value lacks the attribute
 */
export function getField(value: unknown, name: string): unknown {
  const access = fieldAccessOf(value);

  if (access.kind === 'mapping') {
    const mapping = access.value;
    if (mapping instanceof Map) {
      if (!mapping.has(name)) throw new KeyNotFoundError(name);
      return mapping.get(name);
    }
    if (!Object.prototype.hasOwnProperty.call(mapping, name)) throw new KeyNotFoundError(name);
    return mapping[name];
  }

  const target = access.value;
  if (target === null || target === undefined) {
    throw new AttributeNotFoundError(describeType(target), name);
  }
  // primitives are boxed so that e.g. a string's methods resolve
  const holder: object = Object(target);
  if (!(name in holder)) {
    throw new AttributeNotFoundError(describeType(target), name);
  }
  return Reflect.get(holder, name);
}

/**
 * Resolves a field path against a record, applying attribute-getters where
 * a segment names one.
 *
 * @example
 * ```typescript
 * const getters = new Registry('attribute getter', BUILTIN_ATTRIBUTE_GETTERS);
 * const dog = { name: 'Fido', friend: { name: 'Biko', tags: [1, 2] } };
 *
 * resolvePath(dog, 'friend__name', getters);     // 'Biko'
 * resolvePath(dog, 'friend__tags__sum', getters); // 3
 * resolvePath(dog, 'owner', getters);            // throws KeyNotFoundError
 * ```
 */
export function resolvePath(
  record: unknown,
  path: string,
  getters: ReadonlyRegistry<AttributeGetterFn>
): unknown {
  let current = record;
  for (const segment of splitPath(path)) {
    const getter = getters.lookup(segment);
    current = getter ? getter(current) : getField(current, segment);
  }
  return current;
}
