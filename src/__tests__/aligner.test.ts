import { describe, it, expect } from 'vitest';
import { alignChunks, wordJaccard } from '../analysis/aligner.js';
import { makeChunks } from './helpers.js';

describe('wordJaccard', () => {
  it('compares lower-cased word sets', () => {
    expect(wordJaccard('A b', 'a B c')).toBeCloseTo(2 / 3, 10);
  });

  it('is 0 for two empty texts', () => {
    expect(wordJaccard('', '  ')).toBe(0);
  });
});

describe('alignChunks', () => {
  it('matches reordered passages and keeps one-sided leftovers', () => {
    const prior = makeChunks(2022, [
      'cyber breach ransomware attack',
      'supply chain shortage supplier',
      'inflation recession interest rates',
    ]);
    const current = makeChunks(2023, [
      'supply chain shortage supplier tariffs',
      'cyber breach ransomware attack data',
      'brand new pandemic disclosure',
    ]);

    const pairs = alignChunks(prior, current);
    expect(pairs.map((p) => [p.prior?.index ?? null, p.current?.index ?? null])).toEqual([
      [1, 0],
      [0, 1],
      [null, 2],
      [2, null],
    ]);
    expect(pairs.map((p) => p.similarity)).toEqual([0.8, 0.8, 0, 0]);
  });

  it('breaks ties between equal passages by relative position', () => {
    const prior = makeChunks(2022, ['alpha beta', 'alpha beta']);
    const current = makeChunks(2023, ['alpha beta']);
    expect(alignChunks(prior, current).map((p) => [p.prior?.index ?? null, p.current?.index ?? null])).toEqual([
      [0, 0],
      [1, null],
    ]);
  });

  it('handles sections that grew', () => {
    const prior = makeChunks(2022, ['litigation liability lawsuit']);
    const current = makeChunks(2023, ['litigation liability lawsuit', 'war sanctions tariffs']);
    const pairs = alignChunks(prior, current);
    expect(pairs).toHaveLength(2);
    expect(pairs[0].similarity).toBe(1);
    expect(pairs[1].prior).toBeNull();
  });

  it('returns nothing for two empty sides', () => {
    expect(alignChunks([], [])).toEqual([]);
  });
});
