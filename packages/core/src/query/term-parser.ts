import { InvalidFieldPathError } from '../errors/query-list-error.js';
import type { OperatorFn, ParsedTerm, SortSpec } from '../types/query.js';
import { SEGMENT_SEPARATOR } from './path-resolver.js';
import type { ReadonlyRegistry } from './registry.js';
import { isEqual } from './values.js';

/**
 * Splits a field query into the field path and its comparison.
 *
 * The text after the last `__` selects the operator when one is registered
 * under that name. Otherwise the whole query is the field path and the
 * comparison is equality, so `name__len` (a getter) and `friend__name` (a
 * nested field) both reach the resolver intact.
 *
 * @example
 * ```typescript
 * parseTerm('name', ops);                // { field: 'name', operator: 'eq' }
 * parseTerm('number__gte', ops);         // { field: 'number', operator: 'gte' }
 * parseTerm('distance__meters', ops);    // { field: 'distance__meters', operator: 'eq' }
 * parseTerm('name__len__lte', ops);      // { field: 'name__len', operator: 'lte' }
 * ```
 */
export function parseTerm(query: string, operators: ReadonlyRegistry<OperatorFn>): ParsedTerm {
  const index = query.lastIndexOf(SEGMENT_SEPARATOR);
  if (index !== -1) {
    const suffix = query.slice(index + SEGMENT_SEPARATOR.length);
    const compare = operators.lookup(suffix);
    if (compare) {
      return { field: query.slice(0, index), operator: suffix, compare };
    }
  }
  return { field: query, operator: 'eq', compare: isEqual };
}

/**
 * Parses an `orderBy` field spec; a leading `-` sorts that field descending.
 *
 * @throws InvalidFieldPathError when no field is named
 */
export function parseSortSpec(spec: string): SortSpec {
  const descending = spec.startsWith('-');
  const field = descending ? spec.slice(1) : spec;
  if (field.length === 0) {
    throw new InvalidFieldPathError(spec);
  }
  return { field, direction: descending ? 'desc' : 'asc' };
}
