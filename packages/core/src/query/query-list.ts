import {
  InvalidInvocationError,
  MultipleObjectsReturnedError,
  ObjectNotFoundError,
  UnsupportedOperandError,
} from '../errors/query-list-error.js';
import { createLogger, type QueryListLogger } from '../observability/logger.js';
import type {
  AttributeGetterFn,
  OperatorFn,
  ParsedTerm,
  QueryTerms,
  SortDirection,
  SortSpec,
} from '../types/query.js';
import type { QueryRecord } from '../types/record.js';
import { BUILTIN_ATTRIBUTE_GETTERS } from './getters.js';
import { BUILTIN_OPERATORS } from './operators.js';
import { resolvePath } from './path-resolver.js';
import { ClassRegistry, Registry, type ReadonlyRegistry } from './registry.js';
import { parseSortSpec, parseTerm } from './term-parser.js';
import { compareOrdered, describeType, isPlainObject } from './values.js';

const operatorRegistry = new ClassRegistry<OperatorFn>(
  new Registry('operator', BUILTIN_OPERATORS)
);

const getterRegistry = new ClassRegistry<AttributeGetterFn>(
  new Registry('attribute getter', BUILTIN_ATTRIBUTE_GETTERS)
);

/**
 * Options carried by a {@link QueryList} and every list derived from it
 */
export interface QueryListOptions {
  /** Logger for query diagnostics (default: {@link QueryList.logger}) */
  readonly logger?: QueryListLogger;
}

/**
 * An immutable list of records that can be filtered, excluded and ordered
 * with field queries, in the manner of an ORM queryset.
 *
 * Records are plain objects or `Map`s (read by key) or any other object
 * (read by attribute); one list may mix both. Field queries name nested
 * fields and attribute-getters with `__` and may end in an operator:
 *
 * @example
 * ```typescript
 * const dogs = new QueryList([
 *   { name: 'Fido', owner: 'Sam', number: 15.72 },
 *   { name: 'Muttley', owner: 'Robin', number: 31.44 },
 * ]);
 *
 * dogs.filter({ owner: 'Sam' }).first();           // Fido
 * dogs.filter({ number__gt: 20, name__len: 7 });   // [Muttley]
 * dogs.exclude({ name: 'Fido' }).count();          // 1
 * dogs.orderBy('-number').all();                   // [Muttley, Fido]
 * dogs.get({ name__contains: 'utt' });             // Muttley
 * ```
 *
 * ## Subclassing
 *
 * `filter`, `exclude` and `orderBy` return an instance of the receiver's own
 * class, so subclasses keep their extra behaviour through a chain. Each
 * subclass has its own operators and attribute-getters: registering on a
 * subclass never affects its parent or siblings. Subclass constructors must
 * accept `(records, options)`.
 *
 * ```typescript
 * class Dogs extends QueryList<Dog> {}
 * Dogs.registerOperation('icontains', (a, b) =>
 *   String(a).toLowerCase().includes(String(b).toLowerCase())
 * );
 *
 * new Dogs(records).filter({ name__icontains: 'FI' }); // Dogs [Fido]
 * ```
 */
export class QueryList<T extends QueryRecord = QueryRecord> implements Iterable<T> {
  /** Default logger for lists created without one, and for registrations */
  static logger: QueryListLogger = createLogger({ module: 'querylist' });

  protected readonly records: readonly T[];
  protected readonly options: QueryListOptions;
  protected readonly logger: QueryListLogger;

  constructor(records: Iterable<T> = [], options: QueryListOptions = {}) {
    this.records = Object.freeze([...records]);
    this.options = options;
    this.logger = options.logger ?? QueryList.logger;
  }

  // ── Registries ───────────────────────────────────────────────────────

  /** Operators in effect for this class */
  static get operations(): ReadonlyRegistry<OperatorFn> {
    return operatorRegistry.registryFor(this);
  }

  /** Attribute-getters in effect for this class */
  static get attributeGetters(): ReadonlyRegistry<AttributeGetterFn> {
    return getterRegistry.registryFor(this);
  }

  /**
   * Register an operator usable as the last segment of a field query on
   * this class and its subclasses.
   *
   * @example
   * ```typescript
   * Dogs.registerOperation('islongerthan', (value, n) => sizeOf(value) > Number(n));
   * dogs.filter({ name__islongerthan: 5 });
   * ```
   */
  static registerOperation(name: string, fn: OperatorFn): void {
    operatorRegistry.ownedBy(this).register(name, fn);
    QueryList.logger.debug('Operation registered', { name, owner: this.name });
  }

  /**
   * Register an attribute-getter usable as a segment of a field path on
   * this class and its subclasses.
   *
   * @example
   * ```typescript
   * Dogs.registerAttributeGetter('upper', (value) => String(value).toUpperCase());
   * dogs.filter({ name__upper: 'FIDO' });
   * ```
   */
  static registerAttributeGetter(name: string, fn: AttributeGetterFn): void {
    getterRegistry.ownedBy(this).register(name, fn);
    QueryList.logger.debug('Attribute getter registered', { name, owner: this.name });
  }

  // ── Field queries ────────────────────────────────────────────────────

  /** Split a field query into its field path and comparison */
  static parseTerm(query: string): ParsedTerm {
    return parseTerm(query, operatorRegistry.registryFor(this));
  }

  /** Resolve a field path against a record using this class's getters */
  static resolve(record: unknown, path: string): unknown {
    return resolvePath(record, path, getterRegistry.registryFor(this));
  }

  /** Whether a record satisfies every term */
  static matches(record: unknown, terms: QueryTerms): boolean {
    return compileTerms(this, 'matches', terms)(record);
  }

  // ── Chaining ─────────────────────────────────────────────────────────

  /** Records matching every term, in their original order */
  filter(...args: [terms?: QueryTerms]): this {
    const predicate = compileTerms(this.constructor, 'filter', termsOf('filter', args));
    return this.derive(this.records.filter((record) => predicate(record)));
  }

  /** Records not matching every term; the complement of {@link filter} */
  exclude(...args: [terms?: QueryTerms]): this {
    const predicate = compileTerms(this.constructor, 'exclude', termsOf('exclude', args));
    return this.derive(this.records.filter((record) => !predicate(record)));
  }

  /**
   * Stable sort by one or more field paths. Prefix a field with `-` to sort
   * it descending. `null` and `undefined` sort last in either direction.
   *
   * @throws UnsupportedOperandError when two values of a field cannot be ordered
   */
  orderBy(...fields: string[]): this {
    const specs = fields.map(parseSortSpec);
    const getters = getterRegistry.registryFor(this.constructor);
    const end = this.logger.time('orderBy');

    const keyed = this.records.map((record) => ({
      record,
      key: specs.map((spec) => resolvePath(record, spec.field, getters)),
    }));
    keyed.sort((a, b) => compareSortKeys(a.key, b.key, specs));

    end({ fields, count: keyed.length });
    return this.derive(keyed.map((entry) => entry.record));
  }

  // ── Reading ──────────────────────────────────────────────────────────

  /**
   * The single record matching every term.
   *
   * @throws ObjectNotFoundError when nothing matches
   * @throws MultipleObjectsReturnedError when more than one record matches
   */
  get(...args: [terms?: QueryTerms]): T {
    const terms = termsOf('get', args);
    const predicate = compileTerms(this.constructor, 'get', terms);
    const matched = this.records.filter((record) => predicate(record));

    const [first] = matched;
    if (first === undefined) {
      throw new ObjectNotFoundError(terms);
    }
    if (matched.length > 1) {
      throw new MultipleObjectsReturnedError(terms, matched.length);
    }
    return first;
  }

  /** The records as a new plain array; the records themselves are shared with the list */
  all(): T[] {
    return [...this.records];
  }

  exists(): boolean {
    return this.records.length > 0;
  }

  first(): T | undefined {
    return this.records[0];
  }

  last(): T | undefined {
    return this.records[this.records.length - 1];
  }

  count(): number {
    return this.records.length;
  }

  get length(): number {
    return this.records.length;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.records[Symbol.iterator]();
  }

  /** New list of the same class and options */
  protected derive(records: readonly T[]): this {
    return Reflect.construct(this.constructor, [records, this.options]);
  }
}

/** The single terms argument of a chaining or reading call, `{}` when omitted */
function termsOf(method: string, args: readonly unknown[]): QueryTerms {
  if (args.length > 1) {
    throw new InvalidInvocationError(method, `${args.length} arguments`);
  }
  const [terms = {}] = args;
  assertTerms(method, terms);
  return terms;
}

function assertTerms(method: string, terms: unknown): asserts terms is QueryTerms {
  if (!isPlainObject(terms)) {
    throw new InvalidInvocationError(method, describeType(terms));
  }
}

/**
 * Parses every term once and returns a predicate over records. Terms are
 * checked in order and the first failing term ends the check.
 */
function compileTerms(
  owner: object,
  method: string,
  terms: unknown
): (record: unknown) => boolean {
  assertTerms(method, terms);
  const operators = operatorRegistry.registryFor(owner);
  const getters = getterRegistry.registryFor(owner);

  const compiled = Object.entries(terms).map(([query, expected]) => ({
    term: parseTerm(query, operators),
    expected,
  }));

  return (record) =>
    compiled.every(({ term, expected }) =>
      term.compare(resolvePath(record, term.field, getters), expected)
    );
}

function compareSortKeys(
  a: readonly unknown[],
  b: readonly unknown[],
  specs: readonly SortSpec[]
): number {
  for (let i = 0; i < specs.length; i++) {
    const comparison = compareSortValues(a[i], b[i], specs[i]!.direction);
    if (comparison !== 0) return comparison;
  }
  return 0;
}

/**
 * Compares two sort values; nullish values sort last regardless of direction.
 */
export function compareSortValues(a: unknown, b: unknown, direction: SortDirection): number {
  const aMissing = a === null || a === undefined;
  const bMissing = b === null || b === undefined;
  if (aMissing || bMissing) {
    return aMissing === bMissing ? 0 : aMissing ? 1 : -1;
  }

  const order = compareOrdered(a, b);
  if (order === undefined) {
    throw new UnsupportedOperandError(
      'orderBy',
      `cannot order '${describeType(a)}' against '${describeType(b)}'`
    );
  }
  return direction === 'asc' ? order : -order;
}
