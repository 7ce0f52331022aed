import { describe, it, expect } from 'vitest';
import {
  at,
  baseSlice,
  drop,
  dropRight,
  findMap,
  first,
  inRange,
  includes,
  indexOf,
  initial,
  isEqual,
  last,
  rest,
  slice,
  take,
  takeRight
} from './sequence.mjs';

const five = [1, 2, 3, 4, 5];

describe('baseSlice and slice', () => {
  it('should count a negative start from the end', () => {
    expect(slice(five, -2)).toEqual([4, 5]);
    expect(slice(five, -9)).toEqual([1, 2, 3, 4, 5]);
  });

  it('should read a stop of zero or less relative to the end', () => {
    expect(slice(five, 1, -1)).toEqual([2, 3, 4]);
    expect(slice(five, 2, 0)).toEqual([3, 4, 5]);
    expect(baseSlice(five, 0, -9)).toEqual([]);
  });

  it('should take a positive stop as is', () => {
    expect(baseSlice(five, 1, 3)).toEqual([2, 3]);
  });

  it('should not alter the input', () => {
    const list = [1, 2, 3];
    slice(list, 1);

    expect(list).toEqual([1, 2, 3]);
  });
});

describe('first and last', () => {
  it('should return the end elements', () => {
    expect(first(five)).toBe(1);
    expect(last(five)).toBe(5);
  });

  it('should return undefined for an empty list', () => {
    expect(first([])).toBeUndefined();
    expect(last([])).toBeUndefined();
  });
});

describe('initial, drop and rest', () => {
  it('should drop the last element', () => {
    expect(initial([1, 2, 3])).toEqual([1, 2]);
    expect(initial([1])).toEqual([]);
    expect(initial([])).toEqual([]);
  });

  it('should drop from the front', () => {
    expect(drop(five)).toEqual([2, 3, 4, 5]);
    expect(drop(five, 3)).toEqual([4, 5]);
    expect(drop(five, 9)).toEqual([]);
    expect(drop(five, -1)).toEqual([1, 2, 3, 4, 5]);
    expect(rest(['a', 'b'])).toEqual(['b']);
  });
});

describe('dropRight', () => {
  it('should drop from the end', () => {
    expect(dropRight([1, 2, 3])).toEqual([1, 2]);
    expect(dropRight([1, 2, 3], 2)).toEqual([1]);
  });

  it('should leave nothing when dropping the whole list or more', () => {
    expect(dropRight([1, 2, 3], 3)).toEqual([]);
    expect(dropRight([1, 2, 3], 5)).toEqual([]);
  });
});

describe('take and takeRight', () => {
  it('should take from the front', () => {
    expect(take(five)).toEqual([1]);
    expect(take(five, 2)).toEqual([1, 2]);
    expect(take(five, 9)).toEqual([1, 2, 3, 4, 5]);
    expect(take(five, 0)).toEqual([]);
  });

  it('should read a negative count as a stop from the end', () => {
    expect(take(five, -1)).toEqual([1, 2, 3, 4]);
    expect(take(five, -9)).toEqual([]);
  });

  it('should take from the end', () => {
    expect(takeRight([1, 2, 3], 2)).toEqual([2, 3]);
    expect(takeRight([1, 2, 3], 9)).toEqual([1, 2, 3]);
    expect(takeRight([1, 2, 3], 0)).toEqual([]);
  });
});

describe('indexOf and includes', () => {
  it('should compare elements structurally', () => {
    expect(indexOf([{ a: 1 }, { a: 2 }], { a: 2 })).toBe(1);
    expect(includes([[1, 2], [3]], [3])).toBe(true);
    expect(isEqual({ a: [1] }, { a: [1] })).toBe(true);
  });

  it('should search from a given index', () => {
    expect(indexOf([1, 2, 1], 1, 1)).toBe(2);
    expect(indexOf([1, 2, 1, 2], 2, -1)).toBe(3);
    expect(includes([1, 2, 3], 1, 1)).toBe(false);
  });

  it('should return -1 when the value is absent', () => {
    expect(indexOf([1, 2], 3)).toBe(-1);
  });
});

describe('at', () => {
  it('should pick elements in the order given', () => {
    expect(at(['a', 'b', 'c'], [2, 0, -1, 7])).toEqual(['c', 'a', 'c', undefined]);
  });
});

describe('inRange', () => {
  it('should include the start and exclude the stop', () => {
    expect(inRange(3, 2, 4)).toBe(true);
    expect(inRange(2, 2, 4)).toBe(true);
    expect(inRange(4, 2, 4)).toBe(false);
  });

  it('should read a single bound as the stop from zero', () => {
    expect(inRange(4, 8)).toBe(true);
    expect(inRange(8, 8)).toBe(false);
    expect(inRange(-1, 8)).toBe(false);
  });

  it('should swap bounds given in descending order', () => {
    expect(inRange(-3, -2, -6)).toBe(true);
    expect(inRange(5, 10, 2)).toBe(true);
  });
});

describe('findMap', () => {
  it('should insert before the located element', () => {
    expect(findMap([1, 2, 3, 4], 4, 5)).toEqual([1, 2, 3, 5, 4]);
  });

  it('should insert after the located element when asked', () => {
    expect(findMap([1, 2, 3, 4], 4, 5, 0, true)).toEqual([1, 2, 3, 4, 5]);
  });

  it('should return an unchanged copy when nothing matches', () => {
    const list = [1, 2];
    const result = findMap(list, 9, 0);

    expect(result).toEqual([1, 2]);
    expect(result).not.toBe(list);
  });
});
