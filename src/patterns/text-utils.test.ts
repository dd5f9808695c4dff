import { describe, it, expect } from 'vitest';
import { extractKeywords, jaccardSimilarity, slugify, uniqueIdentifier } from './text-utils.js';

describe('extractKeywords', () => {
  it('should lowercase, split on punctuation, and drop stopwords', () => {
    expect([...extractKeywords('Write the README, then run tests!')]).toEqual(['write', 'readme', 'then', 'run', 'tests']);
  });

  it('should keep inner apostrophes', () => {
    expect(extractKeywords("Don't make changes").has("don't")).toBe(true);
  });
});

describe('jaccardSimilarity', () => {
  it('should return 0 for two empty sets', () => {
    expect(jaccardSimilarity(new Set(), new Set())).toBe(0);
  });

  it('should compute intersection over union', () => {
    expect(jaccardSimilarity(new Set(['a', 'b']), new Set(['b', 'c']))).toBeCloseTo(1 / 3);
  });
});

describe('slugify', () => {
  it('should collapse non-alphanumeric runs and trim hyphens', () => {
    expect(slugify('  Prefer `rg` -- over grep!  ')).toBe('prefer-rg-over-grep');
  });

  it('should fall back when nothing is left', () => {
    expect(slugify('!!!')).toBe('pattern');
  });
});

describe('uniqueIdentifier', () => {
  it('should append the first free numeric suffix', () => {
    expect(uniqueIdentifier('x', new Set())).toBe('x');
    expect(uniqueIdentifier('x', new Set(['x', 'x-2']))).toBe('x-3');
  });
});
