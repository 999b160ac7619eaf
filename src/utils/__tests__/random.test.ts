import { describe, it, expect } from 'vitest';
import { cryptoRandom, pick, shuffle } from '../random';
import { firstRandom, lastRandom, sequenceRandom } from './helpers';

describe('pick', () => {
  it('indexes into the charset', () => {
    expect(pick(firstRandom, 'xyz')).toBe('x');
    expect(pick(lastRandom, 'xyz')).toBe('z');
    expect(pick(sequenceRandom([1]), 'xyz')).toBe('y');
  });

  it('stays inside the charset with the crypto source', () => {
    for (let i = 0; i < 50; i++) expect('abc').toContain(pick(cryptoRandom, 'abc'));
  });
});

describe('shuffle', () => {
  it('swaps from the end towards the front', () => {
    expect(shuffle(firstRandom, [1, 2, 3, 4])).toEqual([2, 3, 4, 1]);
  });

  it('leaves the order alone when every swap is with itself', () => {
    expect(shuffle(lastRandom, ['a', 'b', 'c'])).toEqual(['a', 'b', 'c']);
  });

  it('keeps the same elements', () => {
    const items = [...'password'];
    expect(shuffle(cryptoRandom, [...items]).sort()).toEqual([...items].sort());
  });

  it('handles empty and single-element input', () => {
    expect(shuffle(cryptoRandom, [])).toEqual([]);
    expect(shuffle(cryptoRandom, ['x'])).toEqual(['x']);
  });
});
