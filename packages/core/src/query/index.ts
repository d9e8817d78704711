export { BUILTIN_ATTRIBUTE_GETTERS } from './getters.js';
export {
  BUILTIN_OPERATORS,
  contains,
  hasLength,
  isGreaterThan,
  isGreaterThanOrEqual,
  isIn,
  isLessThan,
  isLessThanOrEqual,
} from './operators.js';
export { SEGMENT_SEPARATOR, fieldAccessOf, getField, resolvePath, splitPath } from './path-resolver.js';
export { QueryList, compareSortValues, type QueryListOptions } from './query-list.js';
export { ClassRegistry, Registry, type ReadonlyRegistry } from './registry.js';
export { parseSortSpec, parseTerm } from './term-parser.js';
export {
  compareOrdered,
  containsValue,
  describeType,
  elementsOf,
  isEqual,
  isPlainObject,
  isTruthy,
  sizeOf,
} from './values.js';
