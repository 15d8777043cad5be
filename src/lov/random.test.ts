import { describe, expect, it } from 'vitest';

import { mathRandom, sequenceRandom, shuffle } from './random';

describe('sequenceRandom', () => {
  it('cycles picks modulo n', () => {
    const r = sequenceRandom([1, 5, -1]);
    expect(r.choose(3)).toBe(1);
    expect(r.choose(3)).toBe(2);
    expect(r.choose(3)).toBe(2);
    expect(r.choose(4)).toBe(1);
  });
});

describe('shuffle', () => {
  it('is deterministic under a fixed source', () => {
    expect(shuffle(['a', 'b', 'c', 'd'], sequenceRandom([0]))).toEqual(['b', 'c', 'd', 'a']);
    expect(shuffle(['a', 'b', 'c', 'd'], sequenceRandom([3, 2, 1]))).toEqual([
      'a',
      'b',
      'c',
      'd',
    ]);
  });

  it('returns a new permutation and leaves the input alone', () => {
    const input = ['x', 'y', 'z'];
    const out = shuffle(input, mathRandom);
    expect(out).not.toBe(input);
    expect([...out].sort()).toEqual(['x', 'y', 'z']);
    expect(input).toEqual(['x', 'y', 'z']);
  });
});

describe('mathRandom', () => {
  it('stays within range', () => {
    for (let i = 0; i < 100; i++) {
      const n = mathRandom.choose(5);
      expect(n).toBeGreaterThanOrEqual(0);
      expect(n).toBeLessThan(5);
    }
  });
});
