/**
 * @module scope
 * @description Named variable bindings that a block can reach into by name.
 * A block created with a scope may bind any of its variables through
 * `upvar`, read them and write them back; the writes are visible to the
 * code that owns the scope once the operation returns.
 *
 * @example
 * ```typescript
 * const state = new Scope({ total: 0 });
 * each([1, 2, 3], block(['n'], (ctx, n: number) => {
 *   const total = ctx.upvar('total');
 *   total.set(total.get() + n);
 * }, state));
 * state.get('total'); // => 6
 * ```
 *
 * @category Core
 * @since 2025-07-03
 */

/**
 * A readable, writable handle on a single variable.
 *
 * @category Types
 */
export interface Ref<T> {
  get(): T;
  /** Stores `value` and returns it. */
  set(value: T): T;
}

/**
 * Plain variable map a scope is created from.
 *
 * @category Types
 */
export type Bindings = Record<string, unknown>;

/**
 * Creates a standalone reference cell.
 *
 * @category Constructors
 * @example
 * const list = ref([1, 2, 3]);
 * push(list, 4);
 * list.get(); // => [1, 2, 3, 4]
 */
export const ref = <T,>(initial: T): Ref<T> => {
  let current = initial;
  return {
    get: () => current,
    set: (value) => (current = value),
  };
};

/**
 * A named set of variables.
 *
 * @template S - names and types of the variables
 * @category Core
 */
export class Scope<S extends Bindings = Bindings> {
  readonly #vars: S;

  constructor(
    initial: S,
    readonly name = "scope",
  ) {
    this.#vars = { ...initial };
  }

  has(name: string): boolean {
    return Object.hasOwn(this.#vars, name);
  }

  /**
   * Reads a variable. Reading a name that was never set throws a
   * `ReferenceError`.
   */
  get<K extends keyof S & string>(name: K): S[K] {
    if (!this.has(name)) {
      throw new ReferenceError(`can't read "${name}": no such variable`);
    }
    return this.#vars[name];
  }

  set<K extends keyof S & string>(name: K, value: S[K]): S[K] {
    this.#vars[name] = value;
    return value;
  }

  /**
   * A reference bound to `name` in this scope.
   */
  ref<K extends keyof S & string>(name: K): Ref<S[K]> {
    return {
      get: () => this.get(name),
      set: (value) => this.set(name, value),
    };
  }

  /** Shallow copy of every variable. */
  snapshot(): Readonly<S> {
    return { ...this.#vars };
  }
}
