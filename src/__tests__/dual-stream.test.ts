import { describe, expect, it } from 'vitest';
import { Cursor } from '../cursor.js';
import { spigotConfig } from '../digits.js';
import { DualStream } from '../dual-stream.js';
import { SnipRangeError } from '../errors.js';
import { finiteSource } from './helpers.js';

const PI = spigotConfig('pi', 10);
const E = spigotConfig('e', 10);

function piVsE(): DualStream {
  return DualStream.fromConfigs(PI, E);
}

describe('DualStream zip', () => {
  it('pairs π and e from their first digits', () => {
    expect(piVsE().zipTake(1)).toEqual([[3, 2]]);
  });

  it.each([0, 1, 7, 40])('zipTake(%i) advances both sides by n and matches n zipNext calls', (n) => {
    const a = piVsE();
    const b = piVsE();
    const batch = a.zipTake(n);
    const single = Array.from({ length: n }, () => b.zipNext());
    expect(batch).toEqual(single);
    expect(a.leftPos()).toBe(n);
    expect(a.rightPos()).toBe(n);
  });

  it('zips sides at independent positions', () => {
    const stream = DualStream.fromConfigs(spigotConfig('pi', 16), spigotConfig('e', 2));
    stream.left().drop(5);
    expect(stream.zipNext()).toEqual([6, 1]);
    expect(stream.leftPos()).toBe(6);
    expect(stream.rightPos()).toBe(1);
  });

  it('folds pairs in stream order', () => {
    const text = piVsE().zipFoldN(3, '', (acc, [l, r]) => `${acc}${l}${r}`);
    expect(text).toBe('327141');
  });

  it('independent streams from one configuration pair agree', () => {
    expect(piVsE().zipTake(64)).toEqual(piVsE().zipTake(64));
  });

  it('returns fewer pairs once a side is exhausted', () => {
    const stream = new DualStream(new Cursor(PI, finiteSource([1, 2])), new Cursor(E, finiteSource([5, 6, 7])));
    expect(stream.zipTake(5)).toEqual([
      [1, 5],
      [2, 6],
    ]);
    expect(stream.zipNext()).toBeUndefined();
    expect(stream.leftPos()).toBe(2);
    expect(stream.rightPos()).toBe(2);
  });

  it('rejects a negative batch size', () => {
    expect(() => piVsE().zipTake(-1)).toThrow(RangeError);
  });
});

describe('DualStream side access', () => {
  it('advancing one side leaves the other in place', () => {
    const stream = piVsE();
    expect(stream.right().take(3)).toEqual([2, 7, 1]);
    expect(stream.leftPos()).toBe(0);
    expect(stream.rightPos()).toBe(3);
  });
});

describe('DualStream twist', () => {
  it('moves configuration, position and source state together', () => {
    const stream = piVsE();
    stream.left().drop(2);
    stream.twist();

    expect(stream.leftConfig()).toEqual(E);
    expect(stream.rightConfig()).toEqual(PI);
    expect(stream.leftPos()).toBe(0);
    expect(stream.rightPos()).toBe(2);
    expect(stream.right().next()).toBe(4);
    expect(stream.left().next()).toBe(2);
  });

  it('is its own inverse', () => {
    const stream = piVsE();
    stream.left().drop(3);
    stream.right().drop(8);
    stream.twist();
    stream.twist();
    expect(stream.leftConfig()).toEqual(PI);
    expect(stream.rightConfig()).toEqual(E);
    expect(stream.leftPos()).toBe(3);
    expect(stream.rightPos()).toBe(8);
    expect(stream.zipNext()).toEqual([1, 2]);
  });
});

describe('DualStream snip', () => {
  it('captures an absolute range from both sides', () => {
    const snippet = piVsE().snip('a', 2, 5);
    expect(snippet).toEqual({
      name: 'a',
      from: 2,
      to: 5,
      pairs: [
        [4, 1],
        [1, 8],
        [5, 2],
      ],
    });
  });

  it('never moves the live cursors', () => {
    const stream = piVsE();
    stream.left().drop(4);
    stream.right().drop(9);
    stream.snip('one', 0, 20);
    stream.snip('two', 10, 12);
    stream.snip('three', 3, 3);
    expect(stream.leftPos()).toBe(4);
    expect(stream.rightPos()).toBe(9);
    expect(stream.zipNext()).toEqual([5, 8]);
  });

  it('is idempotent for equal arguments', () => {
    const stream = piVsE();
    const first = stream.snip('x', 5, 15);
    const second = stream.snip('x', 5, 15);
    expect(second.pairs).toEqual(first.pairs);
    expect(stream.snippetKeys()).toEqual(['x']);
  });

  it('follows the sides after a twist', () => {
    const stream = piVsE();
    stream.twist();
    expect(stream.snip('t', 0, 2).pairs).toEqual([
      [2, 3],
      [7, 1],
    ]);
  });

  it('allows an empty range', () => {
    expect(piVsE().snip('empty', 4, 4).pairs).toEqual([]);
  });

  it('rejects an inverted range and stores nothing', () => {
    const stream = piVsE();
    expect(() => stream.snip('bad', 5, 2)).toThrow(SnipRangeError);
    expect(() => stream.snip('bad', 5, 2)).toThrow('Invalid snip range [5, 2): from must be <= to.');
    expect(stream.getSnippet('bad')).toBeUndefined();
    expect(stream.snippetKeys()).toEqual([]);
  });

  it('rejects negative and fractional bounds', () => {
    const stream = piVsE();
    expect(() => stream.snip('neg', -1, 2)).toThrow(SnipRangeError);
    expect(() => stream.snip('frac', 0, 1.5)).toThrow(SnipRangeError);
  });

  it('lists names in insertion order, keeping the slot on overwrite', () => {
    const stream = piVsE();
    stream.snip('a', 0, 1);
    stream.snip('b', 0, 1);
    stream.snip('a', 1, 3);
    expect(stream.snippetKeys()).toEqual(['a', 'b']);
    expect(stream.getSnippet('a')?.pairs).toEqual([
      [1, 7],
      [4, 1],
    ]);
  });

  it('stores frozen entries', () => {
    const snippet = piVsE().snip('f', 0, 2);
    expect(Object.isFrozen(snippet)).toBe(true);
    expect(Object.isFrozen(snippet.pairs)).toBe(true);
  });
});

describe('DualStream status', () => {
  it('summarizes both sides and the store', () => {
    const stream = piVsE();
    stream.left().drop(2);
    stream.snip('s', 0, 1);
    expect(stream.status()).toBe('Left: π base 10 @ 2  Right: e base 10 @ 0  Snippets: 1');
  });
});
