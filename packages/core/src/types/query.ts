/**
 * Binary predicate selected by a trailing `__operator` segment.
 * `left` is the resolved field value, `right` the value supplied in the term.
 */
export type OperatorFn = (left: unknown, right: unknown) => boolean;

/**
 * Transform applied by a `__getter` segment in the middle or at the end of a path
 */
export type AttributeGetterFn = (value: unknown) => unknown;

/**
 * Named terms accepted by filter/exclude/get.
 *
 * Keys are field queries (`'owner'`, `'number__gt'`, `'name__len__lte'`),
 * values are what the resolved field is compared against.
 */
export type QueryTerms = Readonly<Record<string, unknown>>;

/**
 * A field query split into its path and comparison
 */
export interface ParsedTerm {
  /** Field path handed to the resolver */
  readonly field: string;
  /** Operator name, or `'eq'` when no registered operator ended the query */
  readonly operator: string;
  /** The comparison applied to (resolved value, expected value) */
  readonly compare: OperatorFn;
}

/**
 * Sort direction of one `orderBy` field
 */
export type SortDirection = 'asc' | 'desc';

/**
 * One parsed `orderBy` field spec (`'-number'` → `{ field: 'number', direction: 'desc' }`)
 */
export interface SortSpec {
  readonly field: string;
  readonly direction: SortDirection;
}
