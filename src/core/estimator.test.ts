import { describe, expect, it } from 'vitest';

import { estimateItemTokens, estimateTokens } from './estimator.js';

describe('estimateTokens', () => {
  it('should count one token per four characters, rounding down', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abc')).toBe(0);
    expect(estimateTokens('abcdefgh')).toBe(2);
    expect(estimateTokens('a'.repeat(401))).toBe(100);
  });
});

describe('estimateItemTokens', () => {
  it('should include the title line and a fixed overhead', () => {
    // "Title\n" + 10 chars = 16 chars -> 4 tokens + 50
    expect(estimateItemTokens({ title: 'Title', content: 'a'.repeat(10), date: null })).toBe(54);
  });

  it('should treat a missing title as empty', () => {
    // "\n" + 7 chars = 8 chars -> 2 tokens + 50
    expect(estimateItemTokens({ content: 'a'.repeat(7), date: null })).toBe(52);
  });
});
