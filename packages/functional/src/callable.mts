/**
 * @module callable
 * @description The two kinds of callable the library invokes: a named
 * procedure wrapping a plain function, and an anonymous block with declared
 * parameter names and an optional scope it can bind variables from.
 *
 * Either kind may finish normally or with any outcome signal. Blocks are how
 * a caller gets `break`, `continue` and early `return` out of an iteration.
 *
 * @example
 * ```typescript
 * const square = procedure('square', (n: number) => n * n);
 * const firstBig = block(['n'], (_ctx, n: number) =>
 *   n > 10 ? Outcome.loopBreak(n) : n,
 * );
 * ```
 *
 * @category Core
 * @since 2025-07-03
 */

import type { Outcome } from "./outcome.mjs";
import type { Bindings, Ref, Scope } from "./scope.mjs";

/**
 * What a block body sees besides its arguments.
 *
 * @template S - variables of the scope the block was created with
 * @category Types
 */
export interface BlockContext<S extends Bindings = Bindings> {
  /** Parameters of this invocation, bound by name. */
  readonly locals: Scope;
  /**
   * Binds a variable of the scope the block was created with. Throws
   * `ReferenceError` when there is no such scope or variable.
   */
  upvar<K extends keyof S & string>(name: K): Ref<S[K]>;
}

/**
 * @template A - argument tuple
 * @template R - normal result
 * @template B - value carried by a loop break
 * @template E - value carried by an early return
 * @category Types
 */
export interface NamedProcedure<A extends unknown[], R, B = never, E = never> {
  readonly kind: "procedure";
  readonly name: string;
  readonly impl: (...args: A) => R | Outcome<R, B, E>;
}

/**
 * @category Types
 */
export interface AnonymousBlock<A extends unknown[], R, B = never, E = never> {
  readonly kind: "block";
  readonly params: readonly string[];
  /** The last parameter, written `...name`, collects the surplus arguments. */
  readonly variadic: boolean;
  readonly scopeName: string | undefined;
  readonly enter: (locals: Scope, ...args: A) => R | Outcome<R, B, E>;
}

/**
 * @category Types
 */
export type Callable<A extends unknown[], R, B = never, E = never> =
  | NamedProcedure<A, R, B, E>
  | AnonymousBlock<A, R, B, E>;

/**
 * Wraps a function under a name. Whatever it throws becomes a failure
 * attributed to `name`.
 *
 * @category Constructors
 * @example
 * const add = procedure('add', (a: number, b: number) => a + b);
 * reduce([1, 2, 3], add); // => { tag: 'normal', value: 6 }
 */
export const procedure = <A extends unknown[], R, B = never, E = never>(
  name: string,
  impl: (...args: A) => R | Outcome<R, B, E>,
): NamedProcedure<A, R, B, E> => {
  const callable: NamedProcedure<A, R, B, E> = {
    kind: "procedure",
    name,
    impl,
  };
  return Object.freeze(callable);
};

/**
 * Creates an anonymous block. The invoker checks the argument count against
 * `params` and binds each argument in `ctx.locals` before calling `body`.
 *
 * @category Constructors
 * @example
 * const state = new Scope<{ seen: string[] }>({ seen: [] });
 * const remember = block(['word'], (ctx, word: string) => {
 *   const seen = ctx.upvar('seen');
 *   seen.set([...seen.get(), word]);
 * }, state);
 */
export function block<
  A extends unknown[],
  R,
  B = never,
  E = never,
  S extends Bindings = Bindings,
>(
  params: readonly string[],
  body: (ctx: BlockContext<S>, ...args: A) => R | Outcome<R, B, E>,
  scope?: Scope<S>,
): AnonymousBlock<A, R, B, E> {
  const upvar = <K extends keyof S & string>(name: K): Ref<S[K]> => {
    if (scope === undefined) {
      throw new ReferenceError(`can't upvar "${name}": block has no scope`);
    }
    if (!scope.has(name)) {
      throw new ReferenceError(`can't read "${name}": no such variable`);
    }
    return scope.ref(name);
  };

  const callable: AnonymousBlock<A, R, B, E> = {
    kind: "block",
    params: Object.freeze([...params]),
    variadic: params.at(-1)?.startsWith("...") ?? false,
    scopeName: scope?.name,
    enter: (locals, ...args) => body({ locals, upvar }, ...args),
  };
  return Object.freeze(callable);
}

/**
 * Name used for a callable in diagnostics: the procedure name, or
 * `block(p1, p2)` for a block.
 *
 * @category Utilities
 */
export const describeCallable = <A extends unknown[], R, B, E>(
  callable: Callable<A, R, B, E>,
): string =>
  callable.kind === "procedure"
    ? callable.name
    : `block(${callable.params.join(", ")})`;

/**
 * Returns its single argument. Default iterator of the predicate and
 * extremum operations.
 *
 * @category Constructors
 */
export const identity: Callable<[value: unknown], unknown> = procedure(
  "identity",
  (value: unknown) => value,
);
