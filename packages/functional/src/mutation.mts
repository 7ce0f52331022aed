/**
 * @module mutation
 * @description Operations that update a caller-owned sequence in place. The
 * caller passes the binding itself (a `Ref`, typically from `ref()` or
 * `scope.ref(name)`), never a copy; the operation builds the new sequence
 * and commits it back to that binding before returning.
 *
 * @example
 * ```typescript
 * const queue = ref([1, 2, 3, 4, 5]);
 * pop(queue);      // => [5]
 * shift(queue, 2); // => [1, 2]
 * queue.get();     // => [3, 4]
 * ```
 *
 * @category Mutation
 * @since 2025-07-03
 */

import { includes } from "./sequence.mjs";
import { intersection } from "./sets.mjs";

import type { Ref } from "./scope.mjs";

const clampCount = (count: number, length: number): number =>
  Math.min(Math.max(Math.floor(count), 0), length);

const normalizeIndex = (index: number, length: number): number =>
  index < 0 ? Math.max(length + index, 0) : index;

/**
 * Appends `items`; returns the new list.
 *
 * @category Mutation
 */
export const push = <T,>(list: Ref<T[]>, ...items: T[]): T[] =>
  list.set([...list.get(), ...items]);

/**
 * Prepends `items`; returns the new list.
 *
 * @category Mutation
 */
export const unshift = <T,>(list: Ref<T[]>, ...items: T[]): T[] =>
  list.set([...items, ...list.get()]);

/**
 * Removes the last `count` elements and returns them.
 *
 * @category Mutation
 * @example
 * const l = ref([1, 2, 3, 4, 5]);
 * pop(l, 2); // => [4, 5]
 * l.get();   // => [1, 2, 3]
 */
export const pop = <T,>(list: Ref<T[]>, count = 1): T[] => {
  const current = list.get();
  const keep = current.length - clampCount(count, current.length);
  list.set(current.slice(0, keep));
  return current.slice(keep);
};

/**
 * Removes the first `count` elements and returns them.
 *
 * @category Mutation
 */
export const shift = <T,>(list: Ref<T[]>, count = 1): T[] => {
  const current = list.get();
  const taken = clampCount(count, current.length);
  list.set(current.slice(taken));
  return current.slice(0, taken);
};

/**
 * Removes `count` elements at `start` (all of them to the end when `count`
 * is omitted or negative), inserts `items` in their place and returns the
 * removed run. A negative `start` counts from the end.
 *
 * @category Mutation
 * @example
 * const l = ref([1, 2, 3, 4, 5, 6]);
 * splice(l, 1, 2);          // => [2, 3]
 * l.get();                  // => [1, 4, 5, 6]
 * splice(l, 2, 1, 87, 78);  // => [5]
 * l.get();                  // => [1, 4, 87, 78, 6]
 */
export const splice = <T,>(
  list: Ref<T[]>,
  start: number,
  count?: number,
  ...items: T[]
): T[] => {
  const next = [...list.get()];
  const from = normalizeIndex(start, next.length);
  const removed = next.splice(
    from,
    count === undefined || count < 0 ? next.length : count,
    ...items,
  );
  list.set(next);
  return removed;
};

/**
 * Removes every element equal to one of `values`; returns
 * `intersection(list, values)`.
 *
 * @category Mutation
 * @example
 * const l = ref([1, 2, 3, 2, 4]);
 * pull(l, [2, 4, 9]); // => [2, 4]
 * l.get();            // => [1, 3]
 */
export const pull = <T,>(list: Ref<T[]>, values: readonly T[]): T[] => {
  const pulled = intersection(list.get(), values);
  list.set(list.get().filter((item) => !includes(pulled, item)));
  return pulled;
};

/**
 * Removes the elements at `indexes` and returns them in the order the
 * indexes were given. Negative indexes count from the end; indexes out of
 * range are ignored.
 *
 * @category Mutation
 * @example
 * const l = ref(['a', 'b', 'c', 'd']);
 * pullAt(l, [3, 0]); // => ['d', 'a']
 * l.get();           // => ['b', 'c']
 */
export const pullAt = <T,>(list: Ref<T[]>, indexes: readonly number[]): T[] => {
  const current = list.get();
  const positions = [
    ...new Set(
      indexes
        .map((index) => (index < 0 ? current.length + index : index))
        .filter((index) => index >= 0 && index < current.length),
    ),
  ];
  list.set(current.filter((_, index) => !positions.includes(index)));
  return positions.map((index) => current[index]);
};

/**
 * Writes `value` into positions `start` up to `stop`, growing the list when
 * `stop` lies past its end; returns the new list.
 *
 * @category Mutation
 * @example
 * const l = ref([4, 6, 8]);
 * fill(l, 0, 1, 2); // => [4, 0, 8]
 * fill(l, 1, 2, 5); // => [4, 0, 1, 1, 1]
 */
export const fill = <T,>(
  list: Ref<T[]>,
  value: T,
  start = 0,
  stop?: number,
): T[] => {
  const next = [...list.get()];
  const end = stop === undefined ? next.length : normalizeIndex(stop, next.length);
  for (let index = normalizeIndex(start, next.length); index < end; index++) {
    if (index < next.length) {
      next[index] = value;
    } else {
      next.push(value);
    }
  }
  return list.set(next);
};
