/**
 * @module sequence
 * @description Index arithmetic over sequences. Every slicing helper in this
 * module derives its bounds through `baseSlice`, so negative and
 * out-of-range indices behave the same way everywhere: a negative start
 * counts from the end, a stop of zero or less is an offset from the end, and
 * nothing ever fails on an index that is out of range.
 *
 * Equality is structural (remeda `isDeepEqual`), so nested sequences and
 * records are found by value.
 *
 * @example
 * ```typescript
 * const five = [1, 2, 3, 4, 5];
 * slice(five, -2);    // => [4, 5]
 * slice(five, 1, -1); // => [2, 3, 4]
 * take(five, 2);      // => [1, 2]
 * dropRight(five, 2); // => [1, 2, 3]
 * indexOf([[1], [2]], [2]); // => 1
 * ```
 *
 * @category Sequences
 * @since 2025-07-03
 */

import { isDeepEqual } from "remeda";

/**
 * Structural equality used by every lookup in the library.
 *
 * @category Comparison
 */
export const isEqual = (a: unknown, b: unknown): boolean => isDeepEqual(a, b);

/**
 * The single bound normalization behind the slice family. Returns
 * `list[start, stop)` after mapping a negative `start` to `length + start`
 * (0 when it overflows) and a `stop` of zero or less to `length + stop`.
 *
 * @category Slicing
 * @example
 * baseSlice([1, 2, 3, 4, 5], -2);    // => [4, 5]
 * baseSlice([1, 2, 3, 4, 5], 1, -1); // => [2, 3, 4]
 * baseSlice([1, 2, 3], 1);           // => [2, 3]
 */
export const baseSlice = <T,>(
  list: readonly T[],
  start = 0,
  stop = 0,
): T[] => {
  const length = list.length;
  const from = start < 0 ? Math.max(length + start, 0) : start;
  const to = stop <= 0 ? Math.max(length + stop, 0) : stop;
  return list.slice(from, to);
};

/**
 * Same as `baseSlice`.
 *
 * @category Slicing
 */
export const slice = <T,>(list: readonly T[], start = 0, stop = 0): T[] =>
  baseSlice(list, start, stop);

/**
 * @category Slicing
 * @example
 * first(['a', 'b']); // => 'a'
 * first([]);         // => undefined
 */
export const first = <T,>(list: readonly T[]): T | undefined =>
  baseSlice(list, 0, 1)[0];

/**
 * @category Slicing
 */
export const last = <T,>(list: readonly T[]): T | undefined =>
  baseSlice(list, list.length - 1, list.length)[0];

/**
 * Every element but the last. A derived stop of 0 means nothing is left,
 * not "up to the end".
 *
 * @category Slicing
 * @example
 * initial([1, 2, 3]); // => [1, 2]
 * initial([1]);       // => []
 */
export const initial = <T,>(list: readonly T[]): T[] =>
  list.length <= 1 ? [] : baseSlice(list, 0, list.length - 1);

/**
 * Drops `n` elements from the front; a negative `n` drops nothing.
 *
 * @category Slicing
 */
export const drop = <T,>(list: readonly T[], n = 1): T[] =>
  baseSlice(list, Math.max(n, 0));

/**
 * Every element but the first.
 *
 * @category Slicing
 */
export const rest = <T,>(list: readonly T[]): T[] => drop(list);

/**
 * Drops `n` elements from the end.
 *
 * @category Slicing
 * @example
 * dropRight([1, 2, 3], 2); // => [1]
 * dropRight([1, 2, 3], 5); // => []
 */
export const dropRight = <T,>(list: readonly T[], n = 1): T[] => {
  const stop = list.length - Math.max(n, 0);
  return stop <= 0 ? [] : baseSlice(list, 0, stop);
};

/**
 * The first `n` elements. A negative `n` is a stop counted from the end, as
 * in `baseSlice`; an `n` of 0 takes nothing.
 *
 * @category Slicing
 * @example
 * take([1, 2, 3], 2);  // => [1, 2]
 * take([1, 2, 3], -1); // => [1, 2]
 * take([1, 2, 3], 0);  // => []
 */
export const take = <T,>(list: readonly T[], n = 1): T[] =>
  n === 0 ? [] : baseSlice(list, 0, n);

/**
 * The last `n` elements; a count past the length takes the whole list.
 *
 * @category Slicing
 * @example
 * takeRight([1, 2, 3], 2); // => [2, 3]
 * takeRight([1, 2, 3], 9); // => [1, 2, 3]
 */
export const takeRight = <T,>(list: readonly T[], n = 1): T[] =>
  n <= 0 ? [] : baseSlice(list, Math.max(list.length - n, 0));

const normalizeFrom = (length: number, from: number): number =>
  from < 0 ? Math.max(length + from, 0) : from;

/**
 * Index of the first element equal to `value` at or after `from`, or -1. A
 * negative `from` counts from the end.
 *
 * @category Searching
 */
export const indexOf = <T,>(
  list: readonly T[],
  value: T,
  from = 0,
): number => {
  for (let index = normalizeFrom(list.length, from); index < list.length; index++) {
    if (isEqual(list[index], value)) {
      return index;
    }
  }
  return -1;
};

/**
 * @category Searching
 * @example
 * includes([1, 2, 3], 2);    // => true
 * includes([1, 2, 3], 1, 1); // => false
 */
export const includes = <T,>(
  list: readonly T[],
  value: T,
  from = 0,
): boolean => indexOf(list, value, from) >= 0;

/**
 * The elements at `indexes`, in the order given. Negative indexes count
 * from the end; indexes out of range give `undefined`.
 *
 * @category Searching
 * @example
 * at(['a', 'b', 'c'], [2, 0, -1, 7]); // => ['c', 'a', 'c', undefined]
 */
export const at = <T,>(
  list: readonly T[],
  indexes: readonly number[],
): (T | undefined)[] => indexes.map((index) => list.at(index));

/**
 * Whether `n` lies in `[start, stop)`. With a single bound the range is
 * `[0, start)`; bounds given in descending order are swapped.
 *
 * @category Comparison
 * @example
 * inRange(3, 2, 4); // => true
 * inRange(4, 8);    // => true
 * inRange(-3, -2, -6); // => true
 */
export const inRange = (n: number, start: number, stop?: number): boolean => {
  const [low, high] =
    stop === undefined
      ? [Math.min(0, start), Math.max(0, start)]
      : [Math.min(start, stop), Math.max(start, stop)];
  return n >= low && n < high;
};

/**
 * Inserts `injection` before the first element equal to `locate`, or after
 * it when `after` is set. The list is returned unchanged when nothing
 * matches.
 *
 * @category Searching
 * @example
 * findMap([1, 2, 3, 4], 4, 5);          // => [1, 2, 3, 5, 4]
 * findMap([1, 2, 3, 4], 4, 5, 0, true); // => [1, 2, 3, 4, 5]
 */
export const findMap = <T,>(
  list: readonly T[],
  locate: T,
  injection: T,
  start = 0,
  after = false,
): T[] => {
  const index = indexOf(list, locate, start);
  if (index < 0) {
    return [...list];
  }
  const position = after ? index + 1 : index;
  return [...list.slice(0, position), injection, ...list.slice(position)];
};
