/**
 * QueryListError - Enhanced error class with structured error information
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a QueryListError
 */
export interface QueryListErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
}

/**
 * Serialized format of a QueryListError
 */
export interface SerializedQueryListError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
}

/**
 * Base class of every error the query engine raises.
 *
 * @example
 * ```typescript
 * try {
 *   dogs.get({ name: 'Rex' });
 * } catch (error) {
 *   if (QueryListError.isCode(error, 'QL_Q200')) {
 *     console.log('No dog called Rex');
 *   } else if (QueryListError.isCategory(error, 'path')) {
 *     console.log(error.format());
 *   }
 * }
 * ```
 */
export class QueryListError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  constructor(options: QueryListErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message);

    this.name = 'QueryListError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};

    // Maintain proper stack trace for V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Check if an error is a QueryListError
   */
  static isQueryListError(error: unknown): error is QueryListError {
    return error instanceof QueryListError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: ErrorCode): error is QueryListError {
    return QueryListError.isQueryListError(error) && error.code === code;
  }

  /**
   * Check if an error matches a specific category
   */
  static isCategory(error: unknown, category: ErrorCategory): error is QueryListError {
    return QueryListError.isQueryListError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedQueryListError {
    const result: SerializedQueryListError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * A path segment names an attribute the value does not have
 */
export class AttributeNotFoundError extends QueryListError {
  /** The missing attribute */
  readonly attribute: string;
  /** Constructor name of the value that was searched */
  readonly typeName: string;

  constructor(typeName: string, attribute: string) {
    super({
      code: 'QL_P100',
      message: `'${typeName}' object has no attribute '${attribute}'`,
      context: { typeName, attribute },
    });

    this.name = 'AttributeNotFoundError';
    this.attribute = attribute;
    this.typeName = typeName;
  }
}

/**
 * A path segment names a key the mapping does not have
 */
export class KeyNotFoundError extends QueryListError {
  /** The missing key */
  readonly key: string;

  constructor(key: string) {
    super({
      code: 'QL_P101',
      message: `Key '${key}' not found`,
      context: { key },
    });

    this.name = 'KeyNotFoundError';
    this.key = key;
  }
}

/**
 * Empty field path or empty path segment
 */
export class InvalidFieldPathError extends QueryListError {
  readonly path: string;

  constructor(path: string) {
    super({
      code: 'QL_P102',
      message: `Invalid field path '${path}'`,
      context: { path },
    });

    this.name = 'InvalidFieldPathError';
    this.path = path;
  }
}

/**
 * get() matched no records
 */
export class ObjectNotFoundError extends QueryListError {
  constructor(terms: Record<string, unknown>) {
    super({
      code: 'QL_Q200',
      message: `No record matches ${describeTerms(terms)}`,
      context: { terms: Object.keys(terms) },
    });

    this.name = 'ObjectNotFoundError';
  }
}

/**
 * get() matched more than one record
 */
export class MultipleObjectsReturnedError extends QueryListError {
  /** How many records matched */
  readonly matched: number;

  constructor(terms: Record<string, unknown>, matched: number) {
    super({
      code: 'QL_Q201',
      message: `${matched} records match ${describeTerms(terms)}, expected exactly one`,
      context: { terms: Object.keys(terms), matched },
    });

    this.name = 'MultipleObjectsReturnedError';
    this.matched = matched;
  }
}

/**
 * A term-accepting method was called with something other than one terms object
 */
export class InvalidInvocationError extends QueryListError {
  constructor(method: string, received: string) {
    super({
      code: 'QL_Q202',
      message: `${method}() accepts a single terms object, received ${received}`,
      context: { method, received },
    });

    this.name = 'InvalidInvocationError';
  }
}

/**
 * An operator, getter or sort was applied to a value of the wrong kind
 */
export class UnsupportedOperandError extends QueryListError {
  constructor(operation: string, detail: string) {
    super({
      code: 'QL_Q203',
      message: `${operation}: ${detail}`,
      context: { operation },
    });

    this.name = 'UnsupportedOperandError';
  }
}

/**
 * Invalid operator or attribute-getter registration
 */
export class InvalidRegistrationError extends QueryListError {
  constructor(kind: string, name: string, reason: string) {
    super({
      code: 'QL_R300',
      message: `Cannot register ${kind} '${name}': ${reason}`,
      context: { kind, name },
    });

    this.name = 'InvalidRegistrationError';
  }
}

function describeTerms(terms: Record<string, unknown>): string {
  const keys = Object.keys(terms);
  return keys.length === 0 ? 'no terms' : `terms (${keys.join(', ')})`;
}
