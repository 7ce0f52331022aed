/**
 * @module collection
 * @description Higher-order operations that build a new value from what a
 * callable returns for each element. None of them alter their input.
 *
 * ### Decision Tree
 * - One result per element? `map` (a break hands back its own value instead).
 * - Fold into a single value? `reduce` / `reduceRight`.
 * - Order by a computed key? `sortBy`.
 * - Bucket by a computed key? `groupBy`.
 * - Largest / smallest by a computed key? `max` / `min`.
 * - Random order? `shuffle`.
 *
 * @example
 * ```typescript
 * const length = procedure('length', (s: string) => s.length);
 * sortBy(['testings', 'len', 'of', 'strings', 'sort'], length);
 * // => { tag: 'normal', value: ['of', 'len', 'sort', 'strings', 'testings'] }
 *
 * const add = procedure('add', (a: number, b: number) => a + b);
 * reduce([2, 4, 6, 8, 10], add); // => { tag: 'normal', value: 30 }
 * ```
 *
 * @category Collections
 * @since 2025-07-03
 */

import { createEmptyInputError } from "@blockwise/functional-errors";

import { identity } from "./callable.mjs";
import { invoke } from "./invoker.mjs";
import { loop } from "./loop.mjs";
import { Outcome } from "./outcome.mjs";
import { getRuntime } from "./runtime.mjs";
import { isEqual } from "./sequence.mjs";

import type { Callable } from "./callable.mjs";

/**
 * Invokes `iterator` with every element and collects the results. A
 * continue leaves an `undefined` slot, so the result keeps the input's
 * length; a break discards everything collected so far and `map` returns
 * the break's value instead.
 *
 * @category Collections
 * @example
 * map([1, 2, 3], procedure('double', (n: number) => n * 2));
 * // => { tag: 'normal', value: [2, 4, 6] }
 *
 * map([1, 2, 3], block(['n'], (_ctx, n: number) =>
 *   n === 2 ? Outcome.loopBreak('stopped') : n,
 * ));
 * // => { tag: 'normal', value: 'stopped' }
 */
export const map = <T, R, B, E>(
  list: readonly T[],
  iterator: Callable<[T], R, B, E>,
): Outcome<(R | undefined)[] | B, never, E> => {
  const result: (R | undefined)[] = [];
  const step = (item: T): Outcome<R | undefined, B, E> => {
    const outcome = invoke(iterator, item);
    return outcome.tag === "continue" ? Outcome.normal(undefined) : outcome;
  };
  const pass = loop(
    list,
    step,
    (value) => {
      result.push(value);
    },
  );
  if (pass.tag !== "normal") {
    return pass;
  }
  const exit = pass.value;
  return Outcome.normal(exit.broken ? exit.value : result);
};

const numeric = (value: unknown): number | undefined => {
  if (typeof value === "number") {
    return Number.isNaN(value) ? undefined : value;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  return undefined;
};

/**
 * Natural ordering of computed keys: numeric when both keys are numbers or
 * numeric strings, otherwise by UTF-16 code unit of their string forms.
 *
 * @category Comparison
 * @example
 * compareNatural('10', 9);  // => 1
 * compareNatural('b', 'a'); // => 1
 */
export const compareNatural = (a: unknown, b: unknown): number => {
  const x = numeric(a);
  const y = numeric(b);
  if (x !== undefined && y !== undefined) {
    return x === y ? 0 : x < y ? -1 : 1;
  }
  const s = String(a);
  const t = String(b);
  return s === t ? 0 : s < t ? -1 : 1;
};

/**
 * Stable sort by the key `iterator` computes for each element; elements with
 * equal keys keep their original order. With `reverse` the sorted result is
 * reversed as a whole. A break stops computing keys and only the elements
 * keyed so far are sorted.
 *
 * @category Collections
 */
export const sortBy = <T, R, B, E>(
  list: readonly T[],
  iterator: Callable<[T], R, B, E>,
  reverse = false,
): Outcome<T[], never, E> => {
  const decorated: { key: R; item: T }[] = [];
  return Outcome.map(() => {
    const sorted = decorated
      .sort((p, q) => compareNatural(p.key, q.key))
      .map(({ item }) => item);
    return reverse ? sorted.reverse() : sorted;
  })(
    loop(
      list,
      (item) => invoke(iterator, item),
      (key, item) => {
        decorated.push({ key, item });
      },
    ),
  );
};

/**
 * Buckets elements by the key `iterator` computes, keys in first-seen order.
 * Keys are compared structurally: the first key seen stands for every key
 * equal to it.
 *
 * @category Collections
 * @example
 * groupBy([1.3, 2.1, 2.4], procedure('floor', Math.floor));
 * // => { tag: 'normal', value: Map { 1 => [1.3], 2 => [2.1, 2.4] } }
 */
export const groupBy = <T, R, B, E>(
  list: readonly T[],
  iterator: Callable<[T], R, B, E>,
): Outcome<Map<R, T[]>, never, E> => {
  const groups = new Map<R, T[]>();
  return Outcome.map(() => groups)(
    loop(
      list,
      (item) => invoke(iterator, item),
      (key, item) => {
        const seen = [...groups.keys()].find((existing) => isEqual(existing, key));
        const slot = seen === undefined ? key : seen;
        groups.set(slot, [...(groups.get(slot) ?? []), item]);
      },
    ),
  );
};

const fold = <T, A, B, E>(
  items: readonly T[],
  iterator: Callable<[A | T, T], A | T, B, E>,
  seed: [A] | [],
  operation: string,
): Outcome<A | T, never, E> => {
  if (seed.length === 0 && items.length === 0) {
    return Outcome.failure(
      createEmptyInputError(
        "Reduce of empty list with no initial value",
        operation,
      ),
    );
  }
  let memo: A | T = seed.length === 1 ? seed[0] : items[0];
  const remaining = seed.length === 1 ? items : items.slice(1);
  return Outcome.map(() => memo)(
    loop(
      remaining,
      (item) => invoke(iterator, memo, item),
      (value) => {
        memo = value;
      },
    ),
  );
};

/**
 * Left-to-right fold: `memo = iterator(memo, element)`. Without a seed the
 * first element is the seed; an empty list without a seed fails with an
 * empty-input error.
 *
 * @category Collections
 * @example
 * reduce([2, 4, 6, 8, 10], add);     // => { tag: 'normal', value: 30 }
 * reduce(['a', 'b'], concat, '>');   // => { tag: 'normal', value: '>ab' }
 */
export function reduce<T, B = never, E = never>(
  list: readonly T[],
  iterator: Callable<[T, T], T, B, E>,
): Outcome<T, never, E>;
export function reduce<T, A, B = never, E = never>(
  list: readonly T[],
  iterator: Callable<[A, T], A, B, E>,
  seed: A,
): Outcome<A, never, E>;
export function reduce<T, A, B, E>(
  list: readonly T[],
  iterator: Callable<[A | T, T], A | T, B, E>,
  ...seed: [A] | []
): Outcome<A | T, never, E> {
  return fold(list, iterator, seed, "reduce");
}

/**
 * Right-to-left fold; without a seed the last element is the seed.
 *
 * @category Collections
 * @example
 * reduceRight([2, 5, 10, 200], divide); // => { tag: 'normal', value: 2 }
 */
export function reduceRight<T, B = never, E = never>(
  list: readonly T[],
  iterator: Callable<[T, T], T, B, E>,
): Outcome<T, never, E>;
export function reduceRight<T, A, B = never, E = never>(
  list: readonly T[],
  iterator: Callable<[A, T], A, B, E>,
  seed: A,
): Outcome<A, never, E>;
export function reduceRight<T, A, B, E>(
  list: readonly T[],
  iterator: Callable<[A | T, T], A | T, B, E>,
  ...seed: [A] | []
): Outcome<A | T, never, E> {
  return fold([...list].reverse(), iterator, seed, "reduceRight");
}

const extremum = <T, B, E>(
  list: readonly T[],
  iterator: Callable<[T], unknown, B, E>,
  operation: "max" | "min",
): Outcome<T, never, E> => {
  const direction = operation === "max" ? 1 : -1;
  const state: { best?: { key: unknown; item: T } } = {};
  const pass = loop(list, (item) => invoke(iterator, item), (key, item) => {
    if (state.best === undefined || compareNatural(key, state.best.key) * direction > 0) {
      state.best = { key, item };
    }
  });
  if (pass.tag !== "normal") {
    return pass;
  }
  if (state.best === undefined) {
    return Outcome.failure(
      createEmptyInputError(
        `cannot get the ${operation} of an empty list`,
        operation,
      ),
    );
  }
  return Outcome.normal(state.best.item);
};

/**
 * The element with the largest computed key (the element itself by
 * default); the first one wins a tie.
 *
 * @category Collections
 * @example
 * const cats = [{ name: 'Buffy', age: 16 }, { name: 'Jessie', age: 17 }];
 * max(cats, procedure('age', (cat: { age: number }) => cat.age));
 * // => { tag: 'normal', value: { name: 'Jessie', age: 17 } }
 */
export const max = <T, B = never, E = never>(
  list: readonly T[],
  iterator: Callable<[T], unknown, B, E> = identity,
): Outcome<T, never, E> => extremum(list, iterator, "max");

/**
 * The element with the smallest computed key.
 *
 * @category Collections
 */
export const min = <T, B = never, E = never>(
  list: readonly T[],
  iterator: Callable<[T], unknown, B, E> = identity,
): Outcome<T, never, E> => extremum(list, iterator, "min");

/**
 * A shuffled copy of `list`, drawing from the runtime random source.
 *
 * @category Collections
 * @example
 * configureRuntime({ random: () => 0 });
 * shuffle(['a', 'b', 'c', 'd']); // => ['d', 'a', 'b', 'c']
 */
export const shuffle = <T,>(list: readonly T[]): T[] => {
  const { random } = getRuntime();
  const result = [...list];
  for (let i = 0; i < result.length; i++) {
    const j = Math.floor(random() * (i + 1));
    if (j !== i) {
      [result[i], result[j]] = [result[j], result[i]];
    }
  }
  return result;
};
