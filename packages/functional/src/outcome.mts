/**
 * @module outcome
 * @description The completion record of invoking a callable. An outcome is
 * either a normal value or one of four signals: an early return out of the
 * enclosing host function, a loop break carrying a value, a loop continue,
 * or a failure carrying a tagged error and the number of invocation hops it
 * has crossed.
 *
 * Outcomes are threaded explicitly through every invocation boundary rather
 * than thrown. Each hop relays the outcome once: failures gain one level,
 * every other tag passes through untouched.
 *
 * @example
 * ```typescript
 * import { Outcome } from './outcome.mjs';
 *
 * const half = (n: number): Outcome<number> =>
 *   n % 2 === 0
 *     ? Outcome.normal(n / 2)
 *     : Outcome.failure(createInvalidArgumentError('odd input', 'n'));
 *
 * Outcome.map((x: number) => x + 1)(half(8));
 * // => { tag: 'normal', value: 5 }
 * ```
 *
 * @category Core
 * @since 2025-07-03
 */

import {
  BlockError,
  createInvalidArgumentError,
} from "@blockwise/functional-errors";

import type { ErrorType } from "@blockwise/functional-errors";

/**
 * Brand carried by every outcome. Values are recognised as outcomes by this
 * brand alone, never by their shape.
 *
 * @category Types
 */
export const OUTCOME: unique symbol = Symbol("blockwise.outcome");

interface Branded {
  readonly [OUTCOME]: true;
}

/**
 * The callable completed and produced a value.
 *
 * @category Types
 */
export interface Normal<T> extends Branded {
  readonly tag: "normal";
  readonly value: T;
}

/**
 * Return out of the enclosing host function, skipping every operation in
 * between.
 *
 * @category Types
 */
export interface EarlyReturn<E = unknown> extends Branded {
  readonly tag: "return";
  readonly value: E;
}

/**
 * Stop the nearest enclosing iteration.
 *
 * @category Types
 */
export interface LoopBreak<B = unknown> extends Branded {
  readonly tag: "break";
  readonly value: B;
}

/**
 * Skip to the next step of the nearest enclosing iteration.
 *
 * @category Types
 */
export interface LoopContinue extends Branded {
  readonly tag: "continue";
}

/**
 * The callable failed. `level` counts the invocation hops crossed so far.
 *
 * @category Types
 */
export interface Failure extends Branded {
  readonly tag: "failure";
  readonly error: ErrorType;
  readonly level: number;
}

/**
 * Every non-normal outcome.
 *
 * @template B - value carried by a loop break
 * @template E - value carried by an early return
 * @category Types
 */
export type Signal<B = never, E = never> =
  | EarlyReturn<E>
  | LoopBreak<B>
  | LoopContinue
  | Failure;

/**
 * Tagged result of an invocation.
 *
 * @template T - the normal value
 * @template B - value carried by a loop break
 * @template E - value carried by an early return
 * @category Types
 * @example
 * ```typescript
 * const done: Outcome<number> = Outcome.normal(42);
 * const stop: Outcome<number, string> = Outcome.loopBreak('enough');
 * ```
 */
export type Outcome<T, B = never, E = never> = Normal<T> | Signal<B, E>;

function earlyReturn(): EarlyReturn<undefined>;
function earlyReturn<E>(value: E): EarlyReturn<E>;
function earlyReturn<E>(value?: E): EarlyReturn<E | undefined> {
  const outcome: EarlyReturn<E | undefined> = {
    [OUTCOME]: true,
    tag: "return",
    value,
  };
  return Object.freeze(outcome);
}

function loopBreak(): LoopBreak<undefined>;
function loopBreak<B>(value: B): LoopBreak<B>;
function loopBreak<B>(value?: B): LoopBreak<B | undefined> {
  const outcome: LoopBreak<B | undefined> = {
    [OUTCOME]: true,
    tag: "break",
    value,
  };
  return Object.freeze(outcome);
}

function isOutcome<T, B, E>(
  value: T | Outcome<T, B, E>,
): value is Outcome<T, B, E> {
  return typeof value === "object" && value !== null && OUTCOME in value;
}

const describeStray = (tag: Signal["tag"], where: string): ErrorType =>
  createInvalidArgumentError(`invoked "${tag}" outside of ${where}`, "outcome");

/**
 * Outcome utility functions.
 * @description Constructors, guards and combinators for outcomes. All
 * combinators are curried in the same way as the rest of the library.
 *
 * @category Utilities
 * @since 2025-07-03
 */
export const Outcome = {
  /**
   * Wraps a normal value.
   *
   * @category Constructors
   * @example
   * Outcome.normal(42);
   * // => { tag: 'normal', value: 42 }
   */
  normal: <T,>(value: T): Normal<T> => {
    const outcome: Normal<T> = { [OUTCOME]: true, tag: "normal", value };
    return Object.freeze(outcome);
  },

  /**
   * Signals a return out of the enclosing host function.
   *
   * @category Constructors
   * @example
   * // inside a block: stop everything and make the host function return 'done'
   * return Outcome.earlyReturn('done');
   */
  earlyReturn,

  /**
   * Signals a break of the nearest enclosing iteration, optionally carrying
   * a value (`map` returns it in place of its result).
   *
   * @category Constructors
   */
  loopBreak,

  /**
   * Signals a skip to the next iteration step.
   *
   * @category Constructors
   */
  loopContinue: (): LoopContinue => {
    const outcome: LoopContinue = { [OUTCOME]: true, tag: "continue" };
    return Object.freeze(outcome);
  },

  /**
   * Wraps a tagged error.
   *
   * @category Constructors
   */
  failure: (error: ErrorType, level = 0): Failure => {
    const outcome: Failure = { [OUTCOME]: true, tag: "failure", error, level };
    return Object.freeze(outcome);
  },

  /**
   * Checks the outcome brand.
   *
   * @category Type Guards
   */
  isOutcome,

  /** @category Type Guards */
  isNormal: <T, B, E>(outcome: Outcome<T, B, E>): outcome is Normal<T> =>
    outcome.tag === "normal",

  /** @category Type Guards */
  isFailure: <T, B, E>(outcome: Outcome<T, B, E>): outcome is Failure =>
    outcome.tag === "failure",

  /** @category Type Guards */
  isEarlyReturn: <T, B, E>(
    outcome: Outcome<T, B, E>,
  ): outcome is EarlyReturn<E> => outcome.tag === "return",

  /** @category Type Guards */
  isLoopBreak: <T, B, E>(outcome: Outcome<T, B, E>): outcome is LoopBreak<B> =>
    outcome.tag === "break",

  /** @category Type Guards */
  isLoopContinue: <T, B, E>(
    outcome: Outcome<T, B, E>,
  ): outcome is LoopContinue => outcome.tag === "continue",

  /**
   * One invocation hop: a failure gains one level, everything else passes
   * through unchanged.
   *
   * @category Combinators
   * @example
   * Outcome.relay(Outcome.failure(error, 1)).level; // => 2
   * Outcome.relay(Outcome.loopBreak('x'));          // => same break
   */
  relay: <T, B, E>(outcome: Outcome<T, B, E>): Outcome<T, B, E> =>
    outcome.tag === "failure"
      ? Outcome.failure(outcome.error, outcome.level + 1)
      : outcome,

  /**
   * Transforms a normal value; signals pass through.
   *
   * @category Transformations
   * @example
   * Outcome.map((n: number) => n * 2)(Outcome.normal(21));
   * // => { tag: 'normal', value: 42 }
   */
  map:
    <T, U>(f: (value: T) => U) =>
    <B, E>(outcome: Outcome<T, B, E>): Outcome<U, B, E> =>
      outcome.tag === "normal" ? Outcome.normal(f(outcome.value)) : outcome,

  /**
   * Chains outcome-producing steps; signals short-circuit.
   *
   * @category Combinators
   */
  flatMap:
    <T, U, B, E>(f: (value: T) => Outcome<U, B, E>) =>
    (outcome: Outcome<T, B, E>): Outcome<U, B, E> =>
      outcome.tag === "normal" ? f(outcome.value) : outcome,

  /**
   * Folds an outcome into a single value, one handler per tag.
   *
   * @category Pattern Matching
   * @example
   * Outcome.match({
   *   normal: (v: number) => `got ${v}`,
   *   earlyReturn: (v) => `returned ${String(v)}`,
   *   loopBreak: (v) => `broke with ${String(v)}`,
   *   loopContinue: () => 'skipped',
   *   failure: (e) => e.message,
   * })(outcome);
   */
  match:
    <T, B, E, U>(handlers: {
      normal: (value: T) => U;
      earlyReturn: (value: E) => U;
      loopBreak: (value: B) => U;
      loopContinue: () => U;
      failure: (error: ErrorType, level: number) => U;
    }) =>
    (outcome: Outcome<T, B, E>): U => {
      switch (outcome.tag) {
        case "normal":
          return handlers.normal(outcome.value);
        case "return":
          return handlers.earlyReturn(outcome.value);
        case "break":
          return handlers.loopBreak(outcome.value);
        case "continue":
          return handlers.loopContinue();
        case "failure":
          return handlers.failure(outcome.error, outcome.level);
      }
    },

  /**
   * Extracts a normal value, throwing `BlockError` for anything else. A
   * failure is thrown with its own error and level; a stray control signal
   * is thrown as an invalid-argument error.
   *
   * @category Unwrapping
   * @example
   * Outcome.unwrap(reduce([1, 2, 3], add)); // => 6
   * Outcome.unwrap(reduce([], add));        // throws 'Reduce of empty list with no initial value'
   */
  unwrap: <T, B, E>(outcome: Outcome<T, B, E>): T => {
    switch (outcome.tag) {
      case "normal":
        return outcome.value;
      case "failure":
        throw new BlockError(outcome.error, outcome.level);
      case "return":
        throw new BlockError(describeStray(outcome.tag, "a host function"));
      case "break":
      case "continue":
        throw new BlockError(describeStray(outcome.tag, "a loop"));
    }
  },

  /**
   * Like `unwrap`, but substitutes `fallback` for any non-normal outcome.
   *
   * @category Unwrapping
   */
  getOrElse:
    <T,>(fallback: T) =>
    <B, E>(outcome: Outcome<T, B, E>): T =>
      outcome.tag === "normal" ? outcome.value : fallback,
} as const;
