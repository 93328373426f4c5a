import { describe, expect, it } from 'vitest';

import { SortedMap } from '../sorted-map';

const box = (n: number) => ({ n });

describe('SortedMap', () => {
  it('iterates keys in ascending code unit order', () => {
    const map = new SortedMap<{ n: number }>();
    map.set('b', box(2)).set('a', box(1)).set('C', box(3)).set('aa', box(4));

    expect(map.keys()).toEqual(['C', 'a', 'aa', 'b']);
    expect([...map].map(([key, value]) => `${key}=${value.n}`)).toEqual([
      'C=3',
      'a=1',
      'aa=4',
      'b=2',
    ]);
  });

  it('replaces values without duplicating keys', () => {
    const map = new SortedMap([
      ['x', box(1)],
      ['x', box(2)],
    ]);
    expect(map.size).toBe(1);
    expect(map.get('x')).toEqual({ n: 2 });
  });

  it('deletes and clears', () => {
    const map = new SortedMap([
      ['a', box(1)],
      ['b', box(2)],
      ['c', box(3)],
    ]);

    expect(map.delete('b')).toBe(true);
    expect(map.delete('b')).toBe(false);
    expect(map.keys()).toEqual(['a', 'c']);
    expect(map.has('b')).toBe(false);

    map.clear();
    expect(map.size).toBe(0);
    expect(map.entries()).toEqual([]);
  });

  it('tolerates mutation while iterating', () => {
    const map = new SortedMap([
      ['a', box(1)],
      ['b', box(2)],
    ]);
    for (const [key] of map) map.delete(key);
    expect(map.size).toBe(0);
  });

  it('returns key snapshots', () => {
    const map = new SortedMap([['a', box(1)]]);
    const keys = map.keys();
    map.set('b', box(2));
    expect(keys).toEqual(['a']);
  });
});
