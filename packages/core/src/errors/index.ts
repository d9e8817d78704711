/**
 * QueryList Error System
 *
 * Every error raised by the engine is a {@link QueryListError} with a stable
 * code (QL_P100, QL_Q200, ...), a suggestion and a category.
 *
 * @example
 * ```typescript
 * import { QueryListError, ObjectNotFoundError } from '@querylist/core';
 *
 * try {
 *   dogs.get({ name: 'Rex' });
 * } catch (error) {
 *   if (error instanceof ObjectNotFoundError) {
 *     // no match
 *   } else if (QueryListError.isCategory(error, 'path')) {
 *     console.log(error.format());
 *   }
 * }
 * ```
 *
 * @module errors
 */

// Error codes
export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

// Error classes
export {
  AttributeNotFoundError,
  InvalidFieldPathError,
  InvalidInvocationError,
  InvalidRegistrationError,
  KeyNotFoundError,
  MultipleObjectsReturnedError,
  ObjectNotFoundError,
  QueryListError,
  UnsupportedOperandError,
  type QueryListErrorOptions,
  type SerializedQueryListError,
} from './query-list-error.js';
