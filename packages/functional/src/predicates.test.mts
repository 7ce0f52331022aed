import { describe, it, expect } from 'vitest';
import { block, procedure } from './callable.mjs';
import { Outcome } from './outcome.mjs';
import {
  all,
  any,
  detect,
  findIndex,
  findIndexes,
  partition,
  reject,
  remove,
  select,
  takeWhile
} from './predicates.mjs';
import { ref } from './scope.mjs';

const isEven = procedure('isEven', (n: number) => n % 2 === 0);
const below = (limit: number) => procedure('below', (n: number) => n < limit);

describe('all', () => {
  it('should hold when every answer is truthy', () => {
    expect(Outcome.unwrap(all([2, 4, 6], isEven))).toBe(true);
    expect(Outcome.unwrap(all([2, 3, 6], isEven))).toBe(false);
  });

  it('should stop at the first falsy answer', () => {
    const seen: number[] = [];
    const track = procedure('track', (n: number) => {
      seen.push(n);
      return n < 2;
    });

    expect(Outcome.unwrap(all([1, 2, 3, 4], track))).toBe(false);
    expect(seen).toEqual([1, 2]);
  });

  it('should read the elements themselves without a callable', () => {
    expect(Outcome.unwrap(all([1, 'a', true]))).toBe(true);
    expect(Outcome.unwrap(all([1, 0]))).toBe(false);
  });

  it('should hold vacuously for an empty list', () => {
    expect(Outcome.unwrap(all([]))).toBe(true);
  });
});

describe('any', () => {
  it('should hold when some answer is truthy', () => {
    expect(Outcome.unwrap(any([1, 3, 4], isEven))).toBe(true);
    expect(Outcome.unwrap(any([1, 3, 5], isEven))).toBe(false);
  });

  it('should stop at the first truthy answer', () => {
    const seen: number[] = [];
    const track = procedure('track', (n: number) => {
      seen.push(n);
      return n > 1;
    });

    any([1, 2, 3], track);

    expect(seen).toEqual([1, 2]);
  });

  it('should read the elements themselves without a callable', () => {
    expect(Outcome.unwrap(any([0, '', 3]))).toBe(true);
    expect(Outcome.unwrap(any([0, '', null]))).toBe(false);
    expect(Outcome.unwrap(any([]))).toBe(false);
  });
});

describe('findIndex', () => {
  it('should return the index of the first match', () => {
    expect(Outcome.unwrap(findIndex([1, 3, 4, 6], isEven))).toBe(2);
  });

  it('should return -1 when nothing matches', () => {
    expect(Outcome.unwrap(findIndex([1, 3], isEven))).toBe(-1);
  });

  it('should start at a given index, counting from the end when negative', () => {
    expect(Outcome.unwrap(findIndex([2, 3, 4, 5, 6], isEven, 1))).toBe(2);
    expect(Outcome.unwrap(findIndex([2, 3, 4, 5, 6], isEven, -2))).toBe(4);
  });
});

describe('detect', () => {
  it('should return the first matching element', () => {
    expect(Outcome.unwrap(detect([1, 2, 3, 4, 5], procedure('big', (n: number) => n > 2)))).toBe(3);
  });

  it('should return undefined when nothing matches', () => {
    expect(Outcome.unwrap(detect([1, 3], isEven))).toBeUndefined();
  });
});

describe('findIndexes', () => {
  it('should collect every matching index in order', () => {
    expect(Outcome.unwrap(findIndexes([1, 9, 2, 8, 3, 7, 4, 6, 5, 10], below(5)))).toEqual([
      0, 2, 4, 6
    ]);
  });

  it('should return an empty list when nothing matches', () => {
    expect(Outcome.unwrap(findIndexes([1, 3], isEven))).toEqual([]);
  });

  it('should relay a failure of the iterator through the inner block', () => {
    const picky = procedure('picky', (n: number) => {
      if (n === 3) {
        throw new Error('three is not allowed');
      }
      return true;
    });

    expect(findIndexes([1, 2, 3], picky)).toMatchObject({
      tag: 'failure',
      level: 2,
      error: { tag: 'callable-failure', message: 'three is not allowed', origin: 'picky' }
    });
  });
});

describe('partition, select and reject', () => {
  it('should split into matching and other elements', () => {
    expect(Outcome.unwrap(partition([1, 2, 3, 4, 5, 6], isEven))).toEqual([
      [2, 4, 6],
      [1, 3, 5]
    ]);
  });

  it('should keep the matching elements', () => {
    expect(Outcome.unwrap(select([1, 2, 3, 4], isEven))).toEqual([2, 4]);
  });

  it('should keep the other elements', () => {
    expect(Outcome.unwrap(reject([1, 2, 3, 4], isEven))).toEqual([1, 3]);
  });

  it('should stop at a break and keep what was partitioned so far', () => {
    const stopAtFour = block(['n'], (_ctx, n: number) =>
      n === 4 ? Outcome.loopBreak() : n % 2 === 0
    );

    expect(Outcome.unwrap(select([1, 2, 3, 4, 5, 6], stopAtFour))).toEqual([2]);
  });
});

describe('remove', () => {
  it('should leave the rejected elements and return the removed ones', () => {
    const list = ref([1, 2, 3, 4]);

    expect(Outcome.unwrap(remove(list, isEven))).toEqual([2, 4]);
    expect(list.get()).toEqual([1, 3]);
  });

  it('should not report a repeated value as removed', () => {
    const list = ref([2, 2, 3]);

    expect(Outcome.unwrap(remove(list, isEven))).toEqual([]);
    expect(list.get()).toEqual([3]);
  });

  it('should leave the list untouched when the iterator fails', () => {
    const list = ref([1, 2]);
    const broken = procedure('broken', () => {
      throw new Error('nope');
    });

    expect(remove(list, broken).tag).toBe('failure');
    expect(list.get()).toEqual([1, 2]);
  });
});

describe('takeWhile', () => {
  it('should take the longest passing prefix', () => {
    expect(Outcome.unwrap(takeWhile([1, 2, 3, 4, 5], below(3)))).toEqual([1, 2]);
  });

  it('should take the longest passing suffix in natural order when reversed', () => {
    const above = procedure('above', (n: number) => n > 3);

    expect(Outcome.unwrap(takeWhile([1, 2, 3, 4, 5], above, true))).toEqual([4, 5]);
  });

  it('should take nothing when the first element fails', () => {
    expect(Outcome.unwrap(takeWhile([5, 1], below(3)))).toEqual([]);
  });
});
