import { InvalidRegistrationError } from '../errors/query-list-error.js';
import { SEGMENT_SEPARATOR } from './path-resolver.js';

/**
 * Read-only view of a {@link Registry}
 */
export interface ReadonlyRegistry<F> extends Iterable<readonly [string, F]> {
  /** What the registry holds, e.g. `'operator'` */
  readonly kind: string;
  /** Number of registrations, duplicates included */
  readonly size: number;
  has(name: string): boolean;
  /** Most recent registration under `name` */
  lookup(name: string): F | undefined;
  /** Distinct names, in first-registration order */
  names(): string[];
}

/**
 * Ordered, append-only list of named functions.
 *
 * Registering a name again never replaces the earlier entry; lookups scan
 * from the back, so the latest registration wins.
 *
 * @example
 * ```typescript
 * const ops = new Registry<OperatorFn>('operator', BUILTIN_OPERATORS);
 * ops.register('startswith', (a, b) => String(a).startsWith(String(b)));
 * ops.lookup('startswith')?.('Fido', 'Fi'); // true
 * ```
 */
export class Registry<F extends (...args: never[]) => unknown> implements ReadonlyRegistry<F> {
  private readonly entries: Array<readonly [string, F]>;

  constructor(
    readonly kind: string,
    entries: Iterable<readonly [string, F]> = []
  ) {
    this.entries = [...entries];
  }

  get size(): number {
    return this.entries.length;
  }

  register(name: string, fn: F): void {
    if (typeof name !== 'string' || name.length === 0) {
      throw new InvalidRegistrationError(this.kind, String(name), 'name must be a non-empty string');
    }
    if (name.includes(SEGMENT_SEPARATOR)) {
      throw new InvalidRegistrationError(
        this.kind,
        name,
        `name must not contain "${SEGMENT_SEPARATOR}"`
      );
    }
    if (typeof fn !== 'function') {
      throw new InvalidRegistrationError(this.kind, name, 'expected a function');
    }
    this.entries.push([name, fn]);
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  lookup(name: string): F | undefined {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const entry = this.entries[i]!;
      if (entry[0] === name) return entry[1];
    }
    return undefined;
  }

  names(): string[] {
    return [...new Set(this.entries.map(([name]) => name))];
  }

  /** Independent copy holding the same entries */
  clone(): Registry<F> {
    return new Registry(this.kind, this.entries);
  }

  [Symbol.iterator](): Iterator<readonly [string, F]> {
    return this.entries[Symbol.iterator]();
  }
}

/**
 * One registry per class in a hierarchy.
 *
 * A class reads the registry of its nearest ancestor that owns one, falling
 * back to the root. The first write through {@link ownedBy} copies that
 * inherited registry into one owned by the class, so ancestors and siblings
 * never see the class's registrations.
 */
export class ClassRegistry<F extends (...args: never[]) => unknown> {
  private readonly owned = new WeakMap<object, Registry<F>>();

  constructor(private readonly root: Registry<F>) {}

  /** Registry in effect for `ctor` */
  registryFor(ctor: object): ReadonlyRegistry<F> {
    let current: unknown = ctor;
    while (typeof current === 'function') {
      const registry = this.owned.get(current);
      if (registry) return registry;
      current = Object.getPrototypeOf(current);
    }
    return this.root;
  }

  /** Registry owned by `ctor`, created on first use from the inherited one */
  ownedBy(ctor: object): Registry<F> {
    const existing = this.owned.get(ctor);
    if (existing) return existing;

    const inherited = this.registryFor(ctor);
    const registry = new Registry<F>(inherited.kind, inherited);
    this.owned.set(ctor, registry);
    return registry;
  }
}
