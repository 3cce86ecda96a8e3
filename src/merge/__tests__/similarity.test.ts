import { describe, it, expect } from 'vitest';
import {
  cosineSimilarity,
  embeddingIndexFrom,
  levenshteinDistance,
  levenshteinSimilarity,
  scoresTie,
  textSimilarity,
} from '../similarity';

/* ============= levenshteinDistance ============= */

describe('levenshteinDistance', () => {
  it('returns 0 for identical strings', () => {
    expect(levenshteinDistance('decree', 'decree')).toBe(0);
  });

  it('handles the classic example', () => {
    // kitten -> sitten -> sittin -> sitting
    expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
  });

  it('returns the other length when one side is empty', () => {
    expect(levenshteinDistance('', 'law')).toBe(3);
    expect(levenshteinDistance('cabinet', '')).toBe(7);
  });
});

/* ============= levenshteinSimilarity ============= */

describe('levenshteinSimilarity', () => {
  it('returns 1 for identical strings, even short ones', () => {
    expect(levenshteinSimilarity('ab', 'ab')).toBe(1);
  });

  it('returns 0 when either string is shorter than 3 chars', () => {
    expect(levenshteinSimilarity('ab', 'abc')).toBe(0);
  });

  it('scales distance by the longer length', () => {
    // distance 3, max length 7
    expect(levenshteinSimilarity('kitten', 'sitting')).toBeCloseTo(1 - 3 / 7);
  });
});

/* ============= cosineSimilarity ============= */

describe('cosineSimilarity', () => {
  it('is 1 for parallel vectors', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
  });

  it('is 0 for orthogonal vectors', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('is -1 for opposite vectors', () => {
    expect(cosineSimilarity([1, 0], [-1, 0])).toBeCloseTo(-1);
  });

  it('is 0 when a vector is all zeros', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('throws on dimension mismatch', () => {
    expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow('Vector dimensions must match');
  });
});

/* ============= textSimilarity ============= */

describe('textSimilarity', () => {
  it('compares normalized text', () => {
    const score = textSimilarity('Tax Period', 'tax  period!', { lexicalWeight: 0.5 });
    expect(score).toEqual({ lexical: 1, combined: 1 });
  });

  it('blends lexical and semantic scores when both vectors exist', () => {
    const embeddings = embeddingIndexFrom([
      ['alpha', [1, 0]],
      ['omega', [1, 1]],
    ]);
    // lexical: distance 4 over length 5 = 0.2; cosine = 1/sqrt(2)
    const score = textSimilarity('alpha', 'omega', { lexicalWeight: 0.5, embeddings });
    expect(score.lexical).toBeCloseTo(0.2);
    expect(score.semantic).toBeCloseTo(Math.SQRT1_2);
    expect(score.combined).toBeCloseTo(0.5 * 0.2 + 0.5 * Math.SQRT1_2);
  });

  it('clamps negative cosine to 0', () => {
    const embeddings = embeddingIndexFrom([
      ['alpha', [1, 0]],
      ['omega', [-1, 0]],
    ]);
    const score = textSimilarity('alpha', 'omega', { lexicalWeight: 0.5, embeddings });
    expect(score.semantic).toBe(0);
    expect(score.combined).toBeCloseTo(0.1);
  });

  it('falls back to lexical when one text has no vector', () => {
    const embeddings = embeddingIndexFrom([['alpha', [1, 0]]]);
    const score = textSimilarity('alpha', 'omega', { lexicalWeight: 0.5, embeddings });
    expect(score.semantic).toBeUndefined();
    expect(score.combined).toBeCloseTo(0.2);
  });
});

describe('scoresTie', () => {
  it('treats floating-point noise as a tie', () => {
    expect(scoresTie(0.1 + 0.2, 0.3)).toBe(true);
    expect(scoresTie(0.3, 0.31)).toBe(false);
  });
});
