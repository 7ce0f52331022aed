/**
 * @module invoker
 * @description Calls a callable and turns however it finished into an
 * outcome. This is the one place where plain JavaScript control flow
 * (returns and throws) meets outcome signals.
 *
 * - A plain return value becomes `normal`.
 * - A returned outcome is relayed one hop: failures gain a level, other
 *   signals pass through.
 * - A thrown value becomes a `callable-failure` naming the callable; a
 *   thrown `BlockError` keeps its own error and level.
 *
 * `hostFunction` is the opposite boundary: it turns an outcome-producing
 * body back into a plain function that returns or throws.
 *
 * @category Core
 * @since 2025-07-03
 */

import {
  BlockError,
  createCallableFailureError,
  createInvalidArgumentError,
  isBlockError,
  messageOf,
  toLoggableFormat,
} from "@blockwise/functional-errors";

import { describeCallable } from "./callable.mjs";
import { Outcome } from "./outcome.mjs";
import { getRuntime } from "./runtime.mjs";
import { Scope } from "./scope.mjs";

import type { AnonymousBlock, Callable } from "./callable.mjs";
import type { Failure } from "./outcome.mjs";
import type { Bindings } from "./scope.mjs";

const arityFailure = (
  params: readonly string[],
  origin: string,
  received: number,
): Failure =>
  Outcome.failure(
    createCallableFailureError(
      `wrong # args: should be "${params.join(" ")}"`,
      origin,
      undefined,
      { params, received },
    ),
  );

const enterBlock = <A extends unknown[], R, B, E>(
  callable: AnonymousBlock<A, R, B, E>,
  origin: string,
  args: A,
): R | Outcome<R, B, E> => {
  const fixed = callable.variadic
    ? callable.params.length - 1
    : callable.params.length;
  if (args.length < fixed || (!callable.variadic && args.length > fixed)) {
    return arityFailure(callable.params, origin, args.length);
  }
  const locals = new Scope<Bindings>({}, "locals");
  callable.params.forEach((param, index) => {
    if (callable.variadic && index === fixed) {
      locals.set(param.slice("...".length), args.slice(fixed));
    } else {
      locals.set(param, args[index]);
    }
  });
  return callable.enter(locals, ...args);
};

/**
 * Invokes `callable` with `args`.
 *
 * @example
 * invoke(procedure('double', (n: number) => n * 2), 21);
 * // => { tag: 'normal', value: 42 }
 *
 * invoke(block(['n'], (_ctx, n: number) => Outcome.loopBreak(n)), 7);
 * // => { tag: 'break', value: 7 }
 *
 * invoke(procedure('boom', () => { throw new Error('boom'); }));
 * // => { tag: 'failure', error: { tag: 'callable-failure', message: 'boom', origin: 'boom' }, level: 1 }
 */
export const invoke = <A extends unknown[], R, B, E>(
  callable: Callable<A, R, B, E>,
  ...args: A
): Outcome<R, B, E> => {
  const origin = describeCallable(callable);
  const { logger } = getRuntime();

  let result: R | Outcome<R, B, E>;
  try {
    result =
      callable.kind === "procedure"
        ? callable.impl(...args)
        : enterBlock(callable, origin, args);
  } catch (thrown) {
    const failure = isBlockError(thrown)
      ? Outcome.failure(thrown.error, thrown.level + 1)
      : Outcome.failure(
          createCallableFailureError(messageOf(thrown), origin, thrown),
          1,
        );
    logger.debug("callable failed", {
      ...toLoggableFormat(failure.error),
      callable: origin,
      level: failure.level,
    });
    return failure;
  }

  if (!Outcome.isOutcome(result)) {
    return Outcome.normal(result);
  }
  if (result.tag === "failure") {
    logger.debug("relaying failure", {
      ...toLoggableFormat(result.error),
      callable: origin,
      level: result.level + 1,
    });
  } else if (result.tag !== "normal") {
    logger.trace("relaying signal", { tag: result.tag, callable: origin });
  }
  return Outcome.relay(result);
};

/**
 * Wraps an outcome-producing body as a plain function, the boundary at which
 * an early return takes effect.
 *
 * - `normal` and `return` both give their value back to the caller.
 * - `failure` is thrown as a `BlockError` with its error and level.
 * - A `break` or `continue` that reached this far had no loop to stop, and
 *   is thrown as an invalid-argument `BlockError`.
 *
 * @example
 * const firstNegative = hostFunction('firstNegative', (list: number[]) =>
 *   each(list, block(['n'], (_ctx, n: number) =>
 *     n < 0 ? Outcome.earlyReturn(n) : undefined,
 *   )),
 * );
 * firstNegative([3, -1, -5]); // => -1
 * firstNegative([3, 4]);      // => [3, 4]
 */
export const hostFunction =
  <A extends unknown[], R, E = never>(
    name: string,
    body: (...args: A) => R | Outcome<R, unknown, E>,
  ) =>
  (...args: A): R | E => {
    const result = body(...args);
    if (!Outcome.isOutcome(result)) {
      return result;
    }
    switch (result.tag) {
      case "normal":
      case "return":
        return result.value;
      case "failure":
        getRuntime().logger.debug("host function failed", {
          ...toLoggableFormat(result.error),
          host: name,
          level: result.level,
        });
        throw new BlockError(result.error, result.level);
      case "break":
      case "continue":
        getRuntime().logger.warn(`stray "${result.tag}" reached ${name}`, {
          tag: result.tag,
          host: name,
        });
        throw new BlockError(
          createInvalidArgumentError(
            `invoked "${result.tag}" outside of a loop`,
            name,
          ),
        );
    }
  };
