import { describe, it, expect } from 'vitest';
import { generateDeletes } from '@/services/deleteVariants';

describe('generateDeletes', () => {
  it('produces every single deletion at distance 1', () => {
    expect(generateDeletes('abc', 1)).toEqual(new Set(['bc', 'ac', 'ab']));
  });

  it('adds double deletions at distance 2', () => {
    expect(generateDeletes('abc', 2)).toEqual(new Set(['bc', 'ac', 'ab', 'c', 'b', 'a']));
  });

  it('collapses deletion orders that reach the same string', () => {
    expect(generateDeletes('aab', 1)).toEqual(new Set(['ab', 'aa']));
    expect(generateDeletes('hello', 1)).toEqual(new Set(['ello', 'hllo', 'helo', 'hell']));
  });

  it('never includes the word itself', () => {
    expect(generateDeletes('word', 2).has('word')).toBe(false);
  });

  it('reaches the empty string for short words', () => {
    expect(generateDeletes('ab', 2)).toEqual(new Set(['b', 'a', '']));
  });

  it('returns nothing for distance 0 or an empty word', () => {
    expect(generateDeletes('abc', 0).size).toBe(0);
    expect(generateDeletes('', 2).size).toBe(0);
  });

  it('deletes whole code points', () => {
    expect(generateDeletes('😀a', 1)).toEqual(new Set(['a', '😀']));
  });
});
