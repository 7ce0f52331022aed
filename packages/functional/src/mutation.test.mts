import { describe, it, expect } from 'vitest';
import { fill, pop, pull, pullAt, push, shift, splice, unshift } from './mutation.mjs';
import { Scope, ref } from './scope.mjs';

describe('push and unshift', () => {
  it('should add to either end and return the new list', () => {
    const list = ref([2]);

    expect(push(list, 3, 4)).toEqual([2, 3, 4]);
    expect(unshift(list, 0, 1)).toEqual([0, 1, 2, 3, 4]);
    expect(list.get()).toEqual([0, 1, 2, 3, 4]);
  });

  it('should write through a scope binding', () => {
    const scope = new Scope({ names: ['a'] });
    push(scope.ref('names'), 'b');

    expect(scope.get('names')).toEqual(['a', 'b']);
  });

  it('should replace the list rather than mutate it', () => {
    const original = [1];
    const list = ref(original);
    push(list, 2);

    expect(original).toEqual([1]);
  });
});

describe('pop and shift', () => {
  it('should remove from the end', () => {
    const list = ref([1, 2, 3, 4, 5]);

    expect(pop(list)).toEqual([5]);
    expect(pop(list, 2)).toEqual([3, 4]);
    expect(list.get()).toEqual([1, 2]);
  });

  it('should remove from the front', () => {
    const list = ref([1, 2, 3, 4, 5]);

    expect(shift(list)).toEqual([1]);
    expect(shift(list, 2)).toEqual([2, 3]);
    expect(list.get()).toEqual([4, 5]);
  });

  it('should clamp the count to the list', () => {
    const list = ref([1, 2]);

    expect(pop(list, 0)).toEqual([]);
    expect(shift(list, 9)).toEqual([1, 2]);
    expect(list.get()).toEqual([]);
    expect(pop(list)).toEqual([]);
  });
});

describe('splice', () => {
  it('should remove a run and insert in its place', () => {
    const list = ref([1, 2, 3, 4, 5, 6]);

    expect(splice(list, 1, 2)).toEqual([2, 3]);
    expect(list.get()).toEqual([1, 4, 5, 6]);
    expect(splice(list, 2, 1, 87, 78)).toEqual([5]);
    expect(list.get()).toEqual([1, 4, 87, 78, 6]);
  });

  it('should remove to the end without a count', () => {
    const list = ref(['a', 'b', 'c', 'd']);

    expect(splice(list, -2)).toEqual(['c', 'd']);
    expect(list.get()).toEqual(['a', 'b']);
  });

  it('should remove to the end with a negative count', () => {
    const list = ref([1, 2, 3]);

    expect(splice(list, 1, -1)).toEqual([2, 3]);
    expect(list.get()).toEqual([1]);
  });
});

describe('pull', () => {
  it('should remove every occurrence of the given values', () => {
    const list = ref([1, 2, 3, 2, 4]);

    expect(pull(list, [2, 4, 9])).toEqual([2, 4]);
    expect(list.get()).toEqual([1, 3]);
  });

  it('should match values structurally', () => {
    const list = ref([{ id: 1 }, { id: 2 }]);
    pull(list, [{ id: 1 }]);

    expect(list.get()).toEqual([{ id: 2 }]);
  });
});

describe('pullAt', () => {
  it('should remove by index and return in the order given', () => {
    const list = ref(['a', 'b', 'c', 'd']);

    expect(pullAt(list, [3, 0])).toEqual(['d', 'a']);
    expect(list.get()).toEqual(['b', 'c']);
  });

  it('should count negative indexes from the end and ignore the rest', () => {
    const list = ref(['a', 'b', 'c', 'd']);

    expect(pullAt(list, [-1, 9, -1])).toEqual(['d']);
    expect(list.get()).toEqual(['a', 'b', 'c']);
  });
});

describe('fill', () => {
  it('should overwrite a range', () => {
    const list = ref([4, 6, 8]);

    expect(fill(list, 0, 1, 2)).toEqual([4, 0, 8]);
  });

  it('should grow the list past its end', () => {
    const list = ref([4, 0, 8]);

    expect(fill(list, 1, 2, 5)).toEqual([4, 0, 1, 1, 1]);
    expect(list.get()).toEqual([4, 0, 1, 1, 1]);
  });

  it('should fill everything by default', () => {
    expect(fill(ref([1, 2, 3]), 7)).toEqual([7, 7, 7]);
  });
});
