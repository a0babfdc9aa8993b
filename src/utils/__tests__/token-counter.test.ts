import { describe, it, expect } from 'vitest';
import { countTokens, estimateUsage } from '../token-counter.js';

describe('countTokens', () => {
  it('returns 0 for empty text', () => {
    expect(countTokens('')).toBe(0);
  });

  it('adds weight for whitespace and punctuation', () => {
    // 12 chars -> 3, one whitespace run -> 0.1, one period -> 0.05
    expect(countTokens('Hello there.')).toBe(4);
  });
});

describe('estimateUsage', () => {
  it('sums prompt and completion', () => {
    expect(estimateUsage('hi', 'Hello there.')).toEqual({
      prompt_tokens: 1,
      completion_tokens: 4,
      total_tokens: 5,
    });
  });
});
