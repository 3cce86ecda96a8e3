// src/merge/similarity.ts
// Merge: lexical and embedding similarity between candidate texts.
//
// Combined score:
//   both embeddings present -> w * lexical + (1 - w) * max(0, cosine)
//   otherwise               -> lexical

import { normalizeText } from '../canonical/canonicalizer';

/* ============= Constants ============= */

const MIN_TEXT_LENGTH = 3; // skip Levenshtein for texts shorter than this
const TIE_EPSILON = 1e-9;

/* ============= Types ============= */

export type EmbeddingVector = readonly number[];

/** Text -> vector lookup produced by an embedding provider for one document */
export interface EmbeddingIndex {
  get(text: string): EmbeddingVector | undefined;
}

export interface SimilarityScore {
  lexical: number;
  /** Cosine clamped to [0, 1]; absent when either text has no vector */
  semantic?: number;
  combined: number;
}

export interface SimilarityOptions {
  /** Weight of the lexical score, in [0, 1] */
  lexicalWeight: number;
  embeddings?: EmbeddingIndex;
}

/* ============= Lexical ============= */

/**
 * Levenshtein distance (Wagner-Fischer, two rows).
 */
export function levenshteinDistance(a: string, b: string): number {
  const m = a.length;
  const n = b.length;

  if (m === 0) return n;
  if (n === 0) return m;

  let prev = new Array<number>(n + 1);
  let curr = new Array<number>(n + 1);

  for (let j = 0; j <= n; j++) prev[j] = j;

  for (let i = 1; i <= m; i++) {
    curr[0] = i;
    for (let j = 1; j <= n; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(
        curr[j - 1] + 1, // insertion
        prev[j] + 1, // deletion
        prev[j - 1] + cost // substitution
      );
    }
    [prev, curr] = [curr, prev];
  }

  return prev[n];
}

/**
 * 1 - distance / maxLength. Identical strings score 1; strings shorter than
 * MIN_TEXT_LENGTH otherwise score 0.
 */
export function levenshteinSimilarity(a: string, b: string): number {
  if (a === b) return 1;
  if (a.length < MIN_TEXT_LENGTH || b.length < MIN_TEXT_LENGTH) return 0;

  const maxLen = Math.max(a.length, b.length);
  return 1 - levenshteinDistance(a, b) / maxLen;
}

/* ============= Semantic ============= */

/**
 * Cosine similarity in [-1, 1]. Zero vectors score 0.
 * Throws on dimension mismatch.
 */
export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  if (a.length !== b.length) throw new Error('Vector dimensions must match');

  let dot = 0;
  let magA = 0;
  let magB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    magA += a[i] * a[i];
    magB += b[i] * b[i];
  }
  if (magA === 0 || magB === 0) return 0;

  return Math.max(-1, Math.min(1, dot / (Math.sqrt(magA) * Math.sqrt(magB))));
}

/* ============= Combined ============= */

export function textSimilarity(a: string, b: string, opts: SimilarityOptions): SimilarityScore {
  const lexical = levenshteinSimilarity(normalizeText(a), normalizeText(b));

  const va = opts.embeddings?.get(a);
  const vb = opts.embeddings?.get(b);
  if (va && vb && va.length > 0 && va.length === vb.length) {
    const semantic = Math.max(0, cosineSimilarity(va, vb));
    const w = opts.lexicalWeight;
    return { lexical, semantic, combined: w * lexical + (1 - w) * semantic };
  }

  return { lexical, combined: lexical };
}

/** Scores within floating-point noise of each other */
export function scoresTie(a: number, b: number): boolean {
  return Math.abs(a - b) <= TIE_EPSILON;
}

/** EmbeddingIndex over a plain map */
export function embeddingIndexFrom(entries: Iterable<readonly [string, EmbeddingVector]>): EmbeddingIndex {
  const map = new Map<string, EmbeddingVector>(entries);
  return { get: (text) => map.get(text) };
}
