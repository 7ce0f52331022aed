/**
 * @module predicates
 * @description Operations that ask a callable a yes/no question about each
 * element. Results are read with JavaScript truthiness. `all` and `any` use
 * the element itself as the answer when no callable is given.
 *
 * ### Decision Tree
 * - Does every / any element pass? `all` / `any`.
 * - First passing element or its index? `detect` / `findIndex`.
 * - Every passing index? `findIndexes`.
 * - Keep or drop the passing elements? `select` / `reject`.
 * - Drop them from a caller-owned list? `remove`.
 * - Longest passing prefix (or suffix)? `takeWhile`.
 *
 * @example
 * ```typescript
 * const isEven = procedure('isEven', (n: number) => n % 2 === 0);
 * select([1, 2, 3, 4], isEven);  // => { tag: 'normal', value: [2, 4] }
 * findIndex([1, 3, 4], isEven);  // => { tag: 'normal', value: 2 }
 * all([2, 4], isEven);           // => { tag: 'normal', value: true }
 * ```
 *
 * @category Predicates
 * @since 2025-07-03
 */

import { block, identity } from "./callable.mjs";
import { invoke } from "./invoker.mjs";
import { eachIndex } from "./iteration.mjs";
import { loop, truthy } from "./loop.mjs";
import { push } from "./mutation.mjs";
import { Outcome } from "./outcome.mjs";
import { Scope } from "./scope.mjs";
import { difference } from "./sets.mjs";

import type { Callable } from "./callable.mjs";
import type { Ref } from "./scope.mjs";

const startOf = (length: number, start: number): number =>
  start < 0 ? Math.max(length + start, 0) : start;

/**
 * Whether `iterator` answers truthy for every element; stops at the first
 * falsy answer.
 *
 * @category Predicates
 */
export const all = <T, B = never, E = never>(
  list: readonly T[],
  iterator: Callable<[T], unknown, B, E> = identity,
): Outcome<boolean, never, E> => {
  let result = true;
  return Outcome.map(() => result)(
    loop(
      list,
      (item) => invoke(iterator, item),
      (answer) => {
        if (!truthy(answer)) {
          result = false;
        }
        return result;
      },
    ),
  );
};

/**
 * Whether `iterator` answers truthy for some element; stops at the first
 * truthy answer.
 *
 * @category Predicates
 */
export const any = <T, B = never, E = never>(
  list: readonly T[],
  iterator: Callable<[T], unknown, B, E> = identity,
): Outcome<boolean, never, E> => {
  let result = false;
  return Outcome.map(() => result)(
    loop(
      list,
      (item) => invoke(iterator, item),
      (answer) => {
        if (truthy(answer)) {
          result = true;
        }
        return !result;
      },
    ),
  );
};

/**
 * Index of the first element at or after `start` that `iterator` answers
 * truthy for, or -1. A negative `start` counts from the end.
 *
 * @category Predicates
 */
export const findIndex = <T, R, B, E>(
  list: readonly T[],
  iterator: Callable<[T], R, B, E>,
  start = 0,
): Outcome<number, never, E> => {
  const offset = startOf(list.length, start);
  let found = -1;
  return Outcome.map(() => found)(
    loop(
      list.slice(offset),
      (item) => invoke(iterator, item),
      (answer, _item, index) => {
        if (!truthy(answer)) {
          return true;
        }
        found = offset + index;
        return false;
      },
    ),
  );
};

/**
 * The first element at or after `start` that `iterator` answers truthy for,
 * or `undefined`.
 *
 * @category Predicates
 * @example
 * detect([1, 2, 3, 4, 5], procedure('big', (n: number) => n > 2));
 * // => { tag: 'normal', value: 3 }
 */
export const detect = <T, R, B, E>(
  list: readonly T[],
  iterator: Callable<[T], R, B, E>,
  start = 0,
): Outcome<T | undefined, never, E> =>
  Outcome.map((index: number) => (index < 0 ? undefined : list[index]))(
    findIndex(list, iterator, start),
  );

/**
 * Every index whose element `iterator` answers truthy for, in order.
 *
 * @category Predicates
 * @example
 * findIndexes([1, 9, 2, 8, 3, 7, 4, 6, 5, 10], procedure('small', (n: number) => n < 5));
 * // => { tag: 'normal', value: [0, 2, 4, 6] }
 */
export const findIndexes = <T, R, B, E>(
  list: readonly T[],
  iterator: Callable<[T], R, B, E>,
): Outcome<number[], never, E> => {
  const state = new Scope<{ result: number[]; iterator: Callable<[T], R, B, E> }>(
    { result: [], iterator },
    "findIndexes",
  );
  const collect = block(
    ["item", "index"],
    (ctx, item: T, index: number): Outcome<undefined, B, E> | undefined => {
      const answer = invoke(ctx.upvar("iterator").get(), item);
      if (answer.tag !== "normal") {
        return answer;
      }
      if (truthy(answer.value)) {
        push(ctx.upvar("result"), index);
      }
      return undefined;
    },
    state,
  );
  return Outcome.map(() => state.get("result"))(eachIndex(list, collect));
};

const partitionBy = <T, R, B, E>(
  list: readonly T[],
  iterator: Callable<[T], R, B, E>,
): Outcome<[T[], T[]], never, E> => {
  const matching: T[] = [];
  const others: T[] = [];
  return Outcome.map((): [T[], T[]] => [matching, others])(
    loop(
      list,
      (item) => invoke(iterator, item),
      (answer, item) => {
        (truthy(answer) ? matching : others).push(item);
      },
    ),
  );
};

/**
 * Elements `iterator` answers truthy for, in order.
 *
 * @category Predicates
 */
export const select = <T, R, B, E>(
  list: readonly T[],
  iterator: Callable<[T], R, B, E>,
): Outcome<T[], never, E> =>
  Outcome.map(([matching]: [T[], T[]]) => matching)(partitionBy(list, iterator));

/**
 * Elements `iterator` answers falsy for, in order.
 *
 * @category Predicates
 */
export const reject = <T, R, B, E>(
  list: readonly T[],
  iterator: Callable<[T], R, B, E>,
): Outcome<T[], never, E> =>
  Outcome.map(([, others]: [T[], T[]]) => others)(partitionBy(list, iterator));

/**
 * Splits `list` into the elements `iterator` answers truthy for and the
 * rest, both in order.
 *
 * @category Predicates
 * @example
 * partition([1, 2, 3, 4, 5, 6], isEven);
 * // => { tag: 'normal', value: [[2, 4, 6], [1, 3, 5]] }
 */
export const partition = partitionBy;

/**
 * Leaves the caller's list holding only the elements `iterator` answers
 * falsy for and returns the removed ones.
 *
 * The removed elements are worked out as `difference(original, remaining)`
 * rather than collected while scanning, so a value that occurs more than
 * once in the original list is not reported as removed.
 *
 * @category Predicates
 * @example
 * const l = ref([1, 2, 3, 4]);
 * remove(l, isEven); // => { tag: 'normal', value: [2, 4] }
 * l.get();           // => [1, 3]
 */
export const remove = <T, R, B, E>(
  list: Ref<T[]>,
  iterator: Callable<[T], R, B, E>,
): Outcome<T[], never, E> => {
  const original = list.get();
  return Outcome.map((remaining: T[]) => {
    list.set(remaining);
    return difference(original, remaining);
  })(reject(original, iterator));
};

/**
 * The longest prefix whose elements `iterator` answers truthy for. With
 * `reverse`, the longest such suffix, scanned from the end.
 *
 * @category Predicates
 * @example
 * takeWhile([1, 2, 3, 4, 5], procedure('small', (n: number) => n < 3));
 * // => { tag: 'normal', value: [1, 2] }
 */
export const takeWhile = <T, R, B, E>(
  list: readonly T[],
  iterator: Callable<[T], R, B, E>,
  reverse = false,
): Outcome<T[], never, E> => {
  const taken: T[] = [];
  const scan = reverse ? [...list].reverse() : list;
  return Outcome.map(() => (reverse ? taken.reverse() : taken))(
    loop(
      scan,
      (item) => invoke(iterator, item),
      (answer, item) => {
        if (!truthy(answer)) {
          return false;
        }
        taken.push(item);
        return true;
      },
    ),
  );
};
