import { describe, it, expect } from 'vitest';
import { preserveCase, splitWord } from '../casing';

describe('preserveCase', () => {
  it('leaves lowercase input alone', () => {
    expect(preserveCase('teh', 'the')).toBe('the');
  });

  it('copies a leading capital', () => {
    expect(preserveCase('Teh', 'the')).toBe('The');
  });

  it('copies all caps', () => {
    expect(preserveCase('TEH', 'the')).toBe('THE');
  });

  it('treats a single capital letter as a leading capital', () => {
    expect(preserveCase('I', 'a')).toBe('A');
  });

  it('ignores characters without case', () => {
    expect(preserveCase("'teh", "'the")).toBe("'the");
  });

  it('handles empty strings', () => {
    expect(preserveCase('', 'the')).toBe('the');
    expect(preserveCase('Teh', '')).toBe('');
  });
});

describe('splitWord', () => {
  it('separates surrounding punctuation', () => {
    expect(splitWord('(teh,')).toEqual({ prefix: '(', core: 'teh', suffix: ',' });
    expect(splitWord('"Hello!"')).toEqual({ prefix: '"', core: 'Hello', suffix: '!"' });
  });

  it('keeps inner apostrophes and hyphens', () => {
    expect(splitWord("don't")).toEqual({ prefix: '', core: "don't", suffix: '' });
    expect(splitWord('well-known.')).toEqual({ prefix: '', core: 'well-known', suffix: '.' });
  });

  it('handles single letters and accented words', () => {
    expect(splitWord('a')).toEqual({ prefix: '', core: 'a', suffix: '' });
    expect(splitWord('café,')).toEqual({ prefix: '', core: 'café', suffix: ',' });
  });

  it('returns null without letters or with letters split by digits', () => {
    expect(splitWord('1234')).toBeNull();
    expect(splitWord('')).toBeNull();
    expect(splitWord('ab1cd')).toBeNull();
  });
});
