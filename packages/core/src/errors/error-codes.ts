/**
 * QueryList Error Codes
 *
 * Error codes are structured as QL_[CATEGORY][NUMBER]:
 * - P: Field path errors (P100-P199)
 * - Q: Query errors (Q200-Q299)
 * - R: Registry errors (R300-R399)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Field path errors (P100-P199)
  QL_P100: {
    code: 'QL_P100',
    message: 'Attribute not found',
    suggestion: 'Check the attribute name against the objects in the list.',
  },
  QL_P101: {
    code: 'QL_P101',
    message: 'Key not found',
    suggestion: 'Check the key name against the mappings in the list.',
  },
  QL_P102: {
    code: 'QL_P102',
    message: 'Invalid field path',
    suggestion: 'Field paths are one or more non-empty segments joined by "__".',
  },

  // Query errors (Q200-Q299)
  QL_Q200: {
    code: 'QL_Q200',
    message: 'Object does not exist',
    suggestion: 'Use filter() and first() when a match is optional.',
  },
  QL_Q201: {
    code: 'QL_Q201',
    message: 'Multiple objects returned',
    suggestion: 'Add terms until exactly one record matches, or use filter().',
  },
  QL_Q202: {
    code: 'QL_Q202',
    message: 'Invalid invocation',
    suggestion: 'Pass terms as a single object, e.g. get({ name: "Fido" }).',
  },
  QL_Q203: {
    code: 'QL_Q203',
    message: 'Unsupported operand',
    suggestion: 'The operator or getter does not apply to this kind of value.',
  },

  // Registry errors (R300-R399)
  QL_R300: {
    code: 'QL_R300',
    message: 'Invalid registration',
    suggestion: 'Names must be non-empty, must not contain "__", and map to a function.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'path' | 'query' | 'registry';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(3);
  switch (letter) {
    case 'P':
      return 'path';
    case 'Q':
      return 'query';
    default:
      return 'registry';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
