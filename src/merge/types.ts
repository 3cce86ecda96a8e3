// src/merge/types.ts
// Merge: the reconciled record and its evidence trail.

import type { CanonicalKey } from '../canonical/canonicalizer';
import type { Candidate, CandidateKind, ExtractionMethod } from '../extraction/types';
import type { EmbeddingIndex } from './similarity';

/* ============= Review Status ============= */

export const REVIEW_STATUSES = [
  'pending',
  'accepted',
  'flagged_for_review',
  'corrected',
  'rejected',
] as const;

export type ReviewStatus = (typeof REVIEW_STATUSES)[number];

/* ============= Records ============= */

/** One piece of evidence behind a record, one per merged candidate */
export interface ProvenanceEntry {
  documentId: string;
  page: number;
  excerpt: string;
  extractionMethod: ExtractionMethod;
  confidence: number;
  term?: string;
  definitionText?: string;
  possiblyTruncated?: boolean;
  /** Stable hash of the source candidate; repeats are skipped on re-merge */
  fingerprint: string;
}

export interface MergedRecord {
  /** `${documentId}:${kind}:${key.id}` */
  recordId: string;
  kind: CandidateKind;
  documentId: string;
  key: CanonicalKey;
  /** Text of the highest-confidence evidence */
  bestText: string;
  /** Canonical label or cleaned term */
  displayText: string;
  definitionText?: string;
  /** 1 - prod(1 - best confidence per extraction method) */
  confidence: number;
  /** Append-only, in merge order */
  provenance: ProvenanceEntry[];
  reviewStatus: ReviewStatus;
  correctedText?: string;
  reviewedBy?: string;
}

/* ============= Merge I/O ============= */

export interface MergeOptions {
  /** Records from an earlier merge of the same document */
  existing?: readonly MergedRecord[];
  embeddings?: EmbeddingIndex;
}

export interface DroppedCandidate {
  index: number;
  reason: string;
  candidate: Candidate;
}

export interface MergeStats {
  received: number;
  merged: number;
  dropped: number;
  duplicatesSkipped: number;
  exactMatches: number;
  fuzzyMatches: number;
  recordsCreated: number;
  recordsUpdated: number;
}

export interface MergeResult {
  records: MergedRecord[];
  dropped: DroppedCandidate[];
  stats: MergeStats;
}
