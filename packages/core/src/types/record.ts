/**
 * Any non-null object can be a record in a {@link QueryList}.
 *
 * Plain objects and `Map`s are read by key; everything else (class
 * instances, arrays, boxed primitives) is read by attribute.
 */
export type QueryRecord = object;

/**
 * Key-value record read by key lookup
 */
export type MappingRecord = Record<string, unknown> | Map<string, unknown>;

/**
 * How a value exposes its fields to the path resolver
 */
export type FieldAccess =
  | { readonly kind: 'mapping'; readonly value: MappingRecord }
  | { readonly kind: 'attributed'; readonly value: unknown };
