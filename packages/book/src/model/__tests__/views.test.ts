import { describe, it, expect, jest } from '@jest/globals';
import { RecordList, findDuplicate } from '../record-list';
import { FilteredView, SortedView, reversed } from '../views';

const byValue = (a: number, b: number): number => a - b;

function numbers(...items: number[]): RecordList<number> {
  const list = new RecordList<number>((item) => String(item));
  list.setAll(items);
  return list;
}

describe('RecordList', () => {
  it('rejects duplicate items', () => {
    const list = numbers(1, 2);
    expect(() => list.setAll([3, 3])).toThrow(RangeError);
    expect(list.toArray()).toEqual([1, 2]);
  });

  it('emits changed only for a new array', () => {
    const list = numbers(1);
    const listener = jest.fn();
    list.subscribe(listener);

    list.setAll(list.toArray());
    expect(listener).not.toHaveBeenCalled();

    list.setAll([1, 2]);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('stops notifying after unsubscribe', () => {
    const list = numbers();
    const listener = jest.fn();
    const unsubscribe = list.subscribe(listener);
    unsubscribe();
    list.setAll([5]);
    expect(listener).not.toHaveBeenCalled();
  });

  it('looks items up by key', () => {
    const list = numbers(4, 8);
    expect(list.indexOf(8)).toBe(1);
    expect(list.contains(9)).toBe(false);
    expect(list.get(2)).toBeUndefined();
    expect(list.get(-1)).toBeUndefined();
    expect([...list]).toEqual([4, 8]);
  });
});

describe('findDuplicate', () => {
  it('returns the first repeated item', () => {
    expect(findDuplicate(['a', 'b', 'a'], (item) => item)).toBe('a');
    expect(findDuplicate(['a', 'b'], (item) => item)).toBeUndefined();
  });
});

describe('FilteredView', () => {
  it('follows its source', () => {
    const list = numbers(1, 2, 3, 4);
    const evens = new FilteredView(list, (item) => item % 2 === 0);
    expect(evens.toArray()).toEqual([2, 4]);

    list.setAll([1, 2, 3, 4, 6]);
    expect(evens.toArray()).toEqual([2, 4, 6]);
    expect(evens.size).toBe(3);
  });

  it('shows everything by default and after a predicate change', () => {
    const list = numbers(1, 2, 3);
    const view = new FilteredView(list);
    expect(view.size).toBe(3);

    const listener = jest.fn();
    view.subscribe(listener);
    view.setPredicate((item) => item > 2);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(view.toArray()).toEqual([3]);
  });

  it('keeps references to the source items', () => {
    const first = { id: 'a' };
    const list = new RecordList<{ id: string }>((item) => item.id);
    list.setAll([first]);
    const view = new FilteredView(list);
    expect(view.get(0)).toBe(first);
  });
});

describe('SortedView', () => {
  it('sorts and re-sorts on source changes', () => {
    const list = numbers(3, 1, 2);
    const sorted = new SortedView(list, byValue);
    expect(sorted.toArray()).toEqual([1, 2, 3]);

    list.setAll([3, 1, 2, 0]);
    expect(sorted.toArray()).toEqual([0, 1, 2, 3]);
  });

  it('is stable for equal items', () => {
    const list = new RecordList<{ id: string; rank: number }>((item) => item.id);
    list.setAll([
      { id: 'x', rank: 1 },
      { id: 'y', rank: 0 },
      { id: 'z', rank: 1 },
    ]);
    const sorted = new SortedView(list, (a, b) => a.rank - b.rank);
    expect(sorted.toArray().map((item) => item.id)).toEqual(['y', 'x', 'z']);
  });

  it('composes on a filtered view', () => {
    const list = numbers(5, 2, 8, 1);
    const filtered = new FilteredView(list, (item) => item > 1);
    const sorted = new SortedView(filtered, reversed(byValue));
    expect(sorted.toArray()).toEqual([8, 5, 2]);

    const listener = jest.fn();
    sorted.subscribe(listener);
    filtered.setPredicate((item) => item < 6);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(sorted.toArray()).toEqual([5, 2, 1]);
  });
});
