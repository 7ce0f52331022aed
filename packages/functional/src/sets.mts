/**
 * @module sets
 * @description Set and shape operations. None of them invoke a callable and
 * none can fail. Membership is decided by structural equality.
 *
 * ### Decision Tree
 * - Drop repeats, keep first occurrences? `uniq`.
 * - Concatenate several lists? `merge` keeps repeats, `union` drops them.
 * - Keep what every list has? `intersection`.
 * - Keep what occurs exactly once across all lists? `difference`.
 * - Nested lists? `flatten` (one level), `flattenDepth(list, n)`,
 *   `flattenDeep` (all levels).
 * - Rows to columns? `zip` / `unzip`.
 *
 * @category Sets
 * @since 2025-07-03
 */

import { includes, isEqual } from "./sequence.mjs";

/**
 * A value or arbitrarily nested sequences of it.
 *
 * @category Types
 */
export type Nested<T> = T | readonly Nested<T>[];

const isNested = <T,>(value: Nested<T>): value is readonly Nested<T>[] =>
  Array.isArray(value);

const isFlatList = <T,>(value: T | readonly T[]): value is readonly T[] =>
  Array.isArray(value);

/**
 * Whether `value` is a sequence.
 *
 * @category Shape
 */
export const isSequence = (value: unknown): value is readonly unknown[] =>
  Array.isArray(value);

/**
 * First-seen-wins de-duplication.
 *
 * @category Sets
 * @example
 * uniq([2, 1, 4, 4, 2, 5]); // => [2, 1, 4, 5]
 */
export const uniq = <T,>(list: readonly T[]): T[] =>
  list.reduce<T[]>(
    (result, item) => (includes(result, item) ? result : [...result, item]),
    [],
  );

/**
 * Concatenates lists, keeping repeats.
 *
 * @category Sets
 */
export const merge = <T,>(...lists: readonly (readonly T[])[]): T[] =>
  lists.flatMap((list) => [...list]);

/**
 * `uniq` of `merge`.
 *
 * @category Sets
 * @example
 * union([1, 2], [4, 7], [7, 1]); // => [1, 2, 4, 7]
 */
export const union = <T,>(...lists: readonly (readonly T[])[]): T[] =>
  uniq(merge(...lists));

/**
 * The de-duplicated elements of the first list that every other list also
 * contains, in the first list's order.
 *
 * @category Sets
 * @example
 * intersection([1, 2], [4, 2], [2, 1]); // => [2]
 */
export const intersection = <T,>(...lists: readonly (readonly T[])[]): T[] => {
  const [head = [], ...others] = lists;
  return uniq(head).filter((item) => others.every((list) => includes(list, item)));
};

/**
 * Elements that occur exactly once across all the lists merged together.
 * An element repeated anywhere, even inside a single list, is left out
 * entirely.
 *
 * @category Sets
 * @example
 * difference([1, 2], [4, 2], [2, 1], [7, 7]); // => [4]
 */
export const difference = <T,>(...lists: readonly (readonly T[])[]): T[] => {
  const merged = merge(...lists);
  return merged.filter(
    (item) => merged.filter((other) => isEqual(other, item)).length === 1,
  );
};

const baseFlatten = <T,>(
  list: readonly Nested<T>[],
  depth: number,
  result: Nested<T>[],
): Nested<T>[] => {
  for (const item of list) {
    if (depth > 0 && isNested(item)) {
      baseFlatten(item, depth - 1, result);
    } else {
      result.push(item);
    }
  }
  return result;
};

/**
 * Flattens `depth` levels of nesting.
 *
 * @category Shape
 * @example
 * flattenDepth([1, [2, [3, [4]]]], 2); // => [1, 2, 3, [4]]
 */
export const flattenDepth = <T,>(
  list: readonly Nested<T>[],
  depth = 1,
): Nested<T>[] => baseFlatten(list, depth, []);

/**
 * Flattens one level of nesting.
 *
 * @category Shape
 * @example
 * flatten([1, [2, 3], [[4]]]); // => [1, 2, 3, [4]]
 */
export const flatten = <T,>(list: readonly (T | readonly T[])[]): T[] => {
  const result: T[] = [];
  for (const item of list) {
    if (isFlatList(item)) {
      result.push(...item);
    } else {
      result.push(item);
    }
  }
  return result;
};

/**
 * Flattens every level of nesting.
 *
 * @category Shape
 * @example
 * flattenDeep([1, [2, [3, [4]]]]); // => [1, 2, 3, 4]
 */
export const flattenDeep = <T,>(list: readonly Nested<T>[]): T[] => {
  const result: T[] = [];
  const visit = (value: Nested<T>): void => {
    if (isNested(value)) {
      for (const inner of value) {
        visit(inner);
      }
    } else {
      result.push(value);
    }
  };
  list.forEach(visit);
  return result;
};

/**
 * Whether `value` is a sequence with at least one sequence inside it.
 *
 * @category Shape
 */
export const hasDepth = (value: unknown): boolean =>
  isSequence(value) && value.some(isSequence);

/**
 * How many levels of nesting `list` has; 0 for a flat list.
 *
 * @category Shape
 * @example
 * depth([1, 2]);       // => 0
 * depth([1, [2, [3]]]); // => 2
 */
export const depth = (list: readonly unknown[]): number => {
  let levels = 0;
  let current: readonly unknown[] = list;
  while (hasDepth(current)) {
    levels++;
    current = flattenDepth<unknown>(current);
  }
  return levels;
};

/**
 * Transposes a list of lists. Ragged lists are padded with `undefined` up to
 * the longest one.
 *
 * @category Shape
 * @example
 * unzip([['a', 1], ['b', 2]]); // => [['a', 'b'], [1, 2]]
 * unzip([[1, 2], [3]]);        // => [[1, 3], [2, undefined]]
 */
export const unzip = <T,>(lists: readonly (readonly T[])[]): (T | undefined)[][] => {
  const width = Math.max(0, ...lists.map((list) => list.length));
  return Array.from({ length: width }, (_, column) =>
    lists.map((list) => list.at(column)),
  );
};

/**
 * Groups the n-th elements of every list together.
 *
 * @category Shape
 * @example
 * zip(['a', 'b'], [1, 2], [true, false]);
 * // => [['a', 1, true], ['b', 2, false]]
 */
export const zip = <T,>(
  first: readonly T[],
  ...rest: readonly (readonly T[])[]
): (T | undefined)[][] => unzip([first, ...rest]);

/**
 * The value at `key` of every record that has it, even when that value is
 * `undefined`.
 *
 * @category Shape
 * @example
 * pluck([{ name: 'Buffy' }, { age: 3 }, { name: 'Jessie' }], 'name');
 * // => ['Buffy', 'Jessie']
 */
export const pluck = <K extends string, V>(
  collection: readonly Partial<Record<K, V>>[],
  key: K,
): (V | undefined)[] =>
  collection
    .filter((record) => Object.hasOwn(record, key))
    .map((record) => record[key]);

/**
 * Whether `value` is empty: `undefined`, `null`, a blank string, or an
 * empty sequence, map, set or plain record.
 *
 * @category Shape
 */
export const empty = (value: unknown): boolean => {
  if (value === undefined || value === null) {
    return true;
  }
  if (typeof value === "string") {
    return value.trim() === "";
  }
  if (isSequence(value)) {
    return value.length === 0;
  }
  if (value instanceof Map || value instanceof Set) {
    return value.size === 0;
  }
  if (typeof value === "object" && Object.getPrototypeOf(value) === Object.prototype) {
    return Object.keys(value).length === 0;
  }
  return false;
};

const LOOSE_BOOLEAN = /^(true|false|0|1)$/i;
const STRICT_BOOLEAN =
  /^(t|tr|tru|true|f|fa|fal|fals|false|y|ye|yes|n|no|on|of|off|0|1)$/i;
const TRUE_WORD = /^(t|tr|tru|true|y|ye|yes|on|1)$/i;

/**
 * Whether `value` reads as a boolean. Loosely, `true`, `false`, 0, 1 and
 * the strings "true", "false", "0" and "1" in any case count. Strictly, the
 * whole boolean vocabulary counts: also yes/no, on/off and the unambiguous
 * prefixes of true, false and yes ("t", "fa", "y", "of", ...).
 *
 * @category Shape
 * @example
 * isBoolean('of');       // => false
 * isBoolean('of', true); // => true
 */
export const isBoolean = (value: unknown, strict = false): boolean => {
  if (typeof value === "boolean") {
    return true;
  }
  if (typeof value !== "number" && typeof value !== "string") {
    return false;
  }
  return (strict ? STRICT_BOOLEAN : LOOSE_BOOLEAN).test(String(value));
};

const isTrue = (value: unknown): boolean => TRUE_WORD.test(String(value));

/**
 * Drops empty values and false booleans (see `empty` and `isBoolean`).
 *
 * @category Shape
 * @example
 * compact([0, 1, false, 2, '', 3, 'a', null, []]);           // => [1, 2, 3, 'a']
 * compact(['the', 0, 1, 'of', true, 'no', 'string'], true); // => ['the', 1, true, 'string']
 */
export const compact = <T,>(list: readonly T[], strict = false): T[] =>
  list.filter(
    (item) => !empty(item) && (!isBoolean(item, strict) || isTrue(item)),
  );
