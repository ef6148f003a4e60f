import { describe, it, expect } from 'vitest';
import { cleanResponse } from './response-cleaner.js';

describe('cleanResponse', () => {
  it('should drop lead-in phrases and trailing sentences', () => {
    expect(cleanResponse('The answer is Paris. It is the capital.')).toBe('paris');
    expect(cleanResponse('Answer: 1945\nMore text follows')).toBe('1945');
  });

  it('should prefer a year when the reply names a time', () => {
    expect(cleanResponse('It happened in 1969 during the summer')).toBe('1969');
  });

  it('should keep at most three words', () => {
    expect(cleanResponse('The Soviet Union collapsed completely')).toBe('soviet union collapsed');
  });

  it('should fall back to unknown for empty replies', () => {
    expect(cleanResponse('   ')).toBe('unknown');
    expect(cleanResponse('...')).toBe('unknown');
  });
});
