import { describe, expect, it } from 'vitest';

import { countOccurrences, scoreRelevance } from './relevance.js';

describe('scoreRelevance', () => {
  it('should score an empty or blank query as 0', () => {
    expect(scoreRelevance('anything at all', '')).toBe(0);
    expect(scoreRelevance('anything at all', '   ')).toBe(0);
  });

  it('should add occurrences of each word and divide by ten per query word', () => {
    // "project" x2 + "planning" x1 over 2 words
    expect(scoreRelevance('Project planning for the project', 'project planning')).toBeCloseTo(0.15);
  });

  it('should count short words in the divisor but not in the hits', () => {
    // "an" is skipped, yet the divisor is 2 * 10
    expect(scoreRelevance('an apple', 'an apple')).toBeCloseTo(0.05);
  });

  it('should clamp to 1', () => {
    expect(scoreRelevance('aaa '.repeat(20), 'aaa')).toBe(1);
  });

  it('should grow with the number of occurrences', () => {
    const once = scoreRelevance('budget review', 'budget');
    const twice = scoreRelevance('budget review, budget again', 'budget');
    expect(twice).toBeGreaterThan(once);
  });

  it('should match inside longer words', () => {
    expect(scoreRelevance('Replanning the sprint', 'plan')).toBeCloseTo(0.1);
  });
});

describe('countOccurrences', () => {
  it('should count non-overlapping matches', () => {
    expect(countOccurrences('aaaa', 'aa')).toBe(2);
    expect(countOccurrences('abcabc', 'abc')).toBe(2);
    expect(countOccurrences('abc', 'x')).toBe(0);
  });

  it('should return 0 for an empty needle', () => {
    expect(countOccurrences('abc', '')).toBe(0);
  });
});
