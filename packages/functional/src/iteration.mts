/**
 * @module iteration
 * @description Single left-to-right passes that invoke a callable for its
 * effect. Each returns the sequence it was given (for chaining) wrapped in a
 * normal outcome; a break ends the pass early, a continue skips ahead, an
 * early return or failure aborts the pass and comes back out unchanged.
 *
 * @example
 * ```typescript
 * const seen = new Scope<{ words: string[] }>({ words: [] });
 * each(['a', 'b', 'stop', 'c'], block(['w'], (ctx, w: string) => {
 *   if (w === 'stop') return Outcome.loopBreak();
 *   push(ctx.upvar('words'), w);
 * }, seen));
 * seen.get('words'); // => ['a', 'b']
 * ```
 *
 * @category Iteration
 * @since 2025-07-03
 */

import { createInvalidArgumentError } from "@blockwise/functional-errors";

import { block } from "./callable.mjs";
import { invoke } from "./invoker.mjs";
import { ignore, loop, truthy } from "./loop.mjs";
import { push } from "./mutation.mjs";
import { Outcome } from "./outcome.mjs";
import { Scope } from "./scope.mjs";

import type { Callable } from "./callable.mjs";

/**
 * Invokes `iterator` with every element.
 *
 * @category Iteration
 */
export const each = <T, R, B, E>(
  list: readonly T[],
  iterator: Callable<[T], R, B, E>,
): Outcome<readonly T[], never, E> =>
  Outcome.map(() => list)(
    loop(list, (item) => invoke(iterator, item), ignore),
  );

/**
 * Invokes `iterator` with every element and its index.
 *
 * @category Iteration
 * @example
 * eachIndex(['a', 'b'], procedure('log', (item: string, index: number) =>
 *   console.log(index, item),
 * ));
 */
export const eachIndex = <T, R, B, E>(
  list: readonly T[],
  iterator: Callable<[T, number], R, B, E>,
): Outcome<readonly T[], never, E> =>
  Outcome.map(() => list)(
    loop(list, (item, index) => invoke(iterator, item, index), ignore),
  );

const runsOf = <T,>(list: readonly T[], size: number): T[][] => {
  const runs: T[][] = [];
  for (let start = 0; start < list.length; start += size) {
    runs.push(list.slice(start, start + size));
  }
  return runs;
};

const isCount = (size: number): boolean => Number.isInteger(size) && size >= 1;

/**
 * Invokes `iterator` once per contiguous run of `size` elements; the last
 * run may be shorter. Fails with an invalid-argument error when `size` is
 * not a whole number of at least 1.
 *
 * @category Iteration
 * @example
 * eachSlice([1, 2, 3, 4, 5], 2, iterator);
 * // iterator sees [1, 2], then [3, 4], then [5]
 */
export const eachSlice = <T, R, B, E>(
  list: readonly T[],
  size: number,
  iterator: Callable<[T[]], R, B, E>,
): Outcome<readonly T[], never, E> => {
  if (!isCount(size)) {
    return Outcome.failure(
      createInvalidArgumentError(
        "slice size must be equal to or greater than 1",
        "size",
        { size },
      ),
    );
  }
  return Outcome.map(() => list)(
    loop(runsOf(list, size), (run) => invoke(iterator, run), ignore),
  );
};

/**
 * Splits `list` into runs of `size`.
 *
 * @category Iteration
 * @example
 * chunk([1, 2, 3, 4, 5], 2); // => { tag: 'normal', value: [[1, 2], [3, 4], [5]] }
 */
export const chunk = <T,>(
  list: readonly T[],
  size = 1,
): Outcome<T[][]> => {
  if (!isCount(size)) {
    return Outcome.failure(
      createInvalidArgumentError(
        "chunk size must be equal to or greater than 1",
        "size",
        { size },
      ),
    );
  }
  const state = new Scope<{ result: T[][] }>({ result: [] }, "chunk");
  const collect = block(
    ["run"],
    (ctx, run: T[]) => push(ctx.upvar("result"), run),
    state,
  );
  return Outcome.map(() => state.get("result"))(
    eachSlice(list, size, collect),
  );
};

/**
 * Invokes `iterator` with 0, 1, … `n - 1`.
 *
 * @category Iteration
 */
export const times = <R, B, E>(
  n: number,
  iterator: Callable<[number], R, B, E>,
): Outcome<undefined, never, E> => {
  const indexes = Array.from({ length: Math.max(Math.floor(n), 0) }, (_, i) => i);
  return Outcome.map(() => undefined)(
    loop(indexes, (index) => invoke(iterator, index), ignore),
  );
};

/**
 * Keyword accepted by `doLoop`.
 *
 * @category Iteration
 */
export type DoKeyword = "while" | "until";

const isDoKeyword = (keyword: string): keyword is DoKeyword =>
  keyword === "while" || keyword === "until";

/**
 * Runs `body` at least once, then again for as long as `condition` holds
 * (`"while"`) or until it holds (`"until"`). A break from either callable
 * ends the loop; a continue from the body goes straight to the condition.
 *
 * @category Iteration
 * @example
 * const counter = new Scope({ i: 0 });
 * doLoop(
 *   block([], (ctx) => { const i = ctx.upvar('i'); i.set(i.get() + 1); }, counter),
 *   'until',
 *   block([], (ctx) => ctx.upvar('i').get() >= 3, counter),
 * );
 * counter.get('i'); // => 3
 */
export const doLoop = <R, C, B, E>(
  body: Callable<[], R, B, E>,
  keyword: string,
  condition: Callable<[], C, B, E>,
): Outcome<undefined, never, E> => {
  if (!isDoKeyword(keyword)) {
    return Outcome.failure(
      createInvalidArgumentError(
        `unknown keyword "${keyword}": must be until or while`,
        "keyword",
        { keyword },
      ),
    );
  }
  for (;;) {
    const step = invoke(body);
    switch (step.tag) {
      case "break":
        return Outcome.normal(undefined);
      case "return":
      case "failure":
        return step;
      case "normal":
      case "continue":
        break;
    }

    const check = invoke(condition);
    switch (check.tag) {
      case "normal":
        if (truthy(check.value) !== (keyword === "while")) {
          return Outcome.normal(undefined);
        }
        break;
      case "break":
        return Outcome.normal(undefined);
      case "continue":
        break;
      case "return":
      case "failure":
        return check;
    }
  }
};
