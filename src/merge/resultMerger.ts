// src/merge/resultMerger.ts
// Merge: reconcile every candidate of one document into MergedRecords.
//
// Algorithm:
//   1. Drop malformed candidates (logged, never fatal)
//   2. Group candidates with a parsed CanonicalKey by exact key
//   3. Place fallback-keyed candidates by similarity against existing groups
//      of the same kind (threshold from config); otherwise they open a group
//   4. Rebuild each touched record from its provenance:
//        bestText    = highest-confidence evidence (first wins ties)
//        confidence  = 1 - prod(1 - c_m), c_m = best confidence of method m
//
// Single-threaded and order-preserving, so tie-breaks are reproducible.

import { createLogger, type Logger } from '../observability/logger';
import { recordCandidatesDropped, recordRecordsMerged } from '../observability/metrics';
import { canonicalize, displayForm, type CanonicalKey } from '../canonical/canonicalizer';
import { MalformedCandidateError } from '../errors';
import type { PipelineConfig } from '../config';
import {
  isExtractionMethod,
  type Candidate,
  type CandidateKind,
  type ExtractionMethod,
} from '../extraction/types';
import { stableHash } from '../utils/hash';
import { scoresTie, textSimilarity } from './similarity';
import type {
  DroppedCandidate,
  MergedRecord,
  MergeOptions,
  MergeResult,
  MergeStats,
  ProvenanceEntry,
} from './types';

const log = createLogger('merge/resultMerger');

/* ============= Constants ============= */

const FINGERPRINT_LENGTH = 16;
const CONFIDENCE_DECIMALS = 10_000; // 4 decimal places

/* ============= Validation ============= */

/**
 * Check the fields the merger relies on. Candidate types are static, but
 * adapter output is assembled from external data at run time.
 */
export function validateCandidate(
  candidate: Candidate,
  index: number,
  documentId: string
): MalformedCandidateError | null {
  const fail = (reason: string) => new MalformedCandidateError(reason, index);
  const kind: string = candidate.kind;

  if (kind !== 'citation' && kind !== 'definition') {
    return fail(`unknown kind "${kind}"`);
  }
  if (typeof candidate.rawText !== 'string' || candidate.rawText.trim() === '') {
    return fail('empty rawText');
  }
  if (!Number.isInteger(candidate.page) || candidate.page < 1) {
    return fail(`invalid page ${String(candidate.page)}`);
  }
  if (candidate.sourceDocumentId !== documentId) {
    return fail(`belongs to document "${String(candidate.sourceDocumentId)}"`);
  }
  if (!isExtractionMethod(candidate.extractionMethod)) {
    return fail(`unknown extraction method "${String(candidate.extractionMethod)}"`);
  }
  if (
    typeof candidate.confidence !== 'number' ||
    !Number.isFinite(candidate.confidence) ||
    candidate.confidence < 0 ||
    candidate.confidence > 1
  ) {
    return fail(`confidence out of range: ${String(candidate.confidence)}`);
  }
  if (candidate.kind === 'definition') {
    if (candidate.term !== undefined && typeof candidate.term !== 'string') {
      return fail('term is not a string');
    }
    if (candidate.definitionText !== undefined && typeof candidate.definitionText !== 'string') {
      return fail('definitionText is not a string');
    }
  }
  return null;
}

/* ============= Helpers ============= */

export function candidateFingerprint(candidate: Candidate): string {
  return stableHash({
    kind: candidate.kind,
    documentId: candidate.sourceDocumentId,
    rawText: candidate.rawText,
    page: candidate.page,
    method: candidate.extractionMethod,
    confidence: candidate.confidence,
    span: candidate.span,
    term: candidate.kind === 'definition' ? candidate.term : undefined,
    definitionText: candidate.kind === 'definition' ? candidate.definitionText : undefined,
  }).slice(0, FINGERPRINT_LENGTH);
}

function toProvenance(candidate: Candidate, fingerprint: string): ProvenanceEntry {
  const entry: ProvenanceEntry = {
    documentId: candidate.sourceDocumentId,
    page: candidate.page,
    excerpt: candidate.rawText.replace(/\s+/g, ' ').trim(),
    extractionMethod: candidate.extractionMethod,
    confidence: candidate.confidence,
    fingerprint,
  };
  if (candidate.kind === 'definition') {
    if (candidate.term) entry.term = candidate.term;
    if (candidate.definitionText) entry.definitionText = candidate.definitionText;
  }
  if (candidate.possiblyTruncated) entry.possiblyTruncated = true;
  return entry;
}

/**
 * Independent-evidence combination over distinct methods:
 * 1 - prod(1 - c_m), never below the strongest single entry.
 */
export function aggregateConfidence(entries: readonly ProvenanceEntry[]): number {
  const bestByMethod = new Map<ExtractionMethod, number>();
  for (const e of entries) {
    const prev = bestByMethod.get(e.extractionMethod);
    if (prev === undefined || e.confidence > prev) bestByMethod.set(e.extractionMethod, e.confidence);
  }
  if (bestByMethod.size === 0) return 0;

  let miss = 1;
  let strongest = 0;
  for (const c of bestByMethod.values()) {
    miss *= 1 - c;
    strongest = Math.max(strongest, c);
  }
  const combined = Math.round((1 - miss) * CONFIDENCE_DECIMALS) / CONFIDENCE_DECIMALS;
  return Math.min(1, Math.max(strongest, combined));
}

/** Highest confidence wins; the earliest entry wins ties */
export function strongestEntry(entries: readonly ProvenanceEntry[]): ProvenanceEntry {
  let best = entries[0];
  for (const e of entries) {
    if (e.confidence > best.confidence) best = e;
  }
  return best;
}

export function buildRecordId(documentId: string, kind: CandidateKind, key: CanonicalKey): string {
  return `${documentId}:${kind}:${key.id}`;
}

/* ============= Merge Groups ============= */

interface MergeGroup {
  key: CanonicalKey;
  /** Record this group continues, when re-merging */
  base?: MergedRecord;
  entries: ProvenanceEntry[];
  /** Display form from the first candidate of a new group */
  display?: string;
  touched: boolean;
}

function groupId(kind: CandidateKind, id: string): string {
  return `${kind}:${id}`;
}

function groupConfidence(group: MergeGroup): number {
  return aggregateConfidence(group.entries);
}

/* ============= Merger ============= */

export interface ResultMergerDeps {
  /** Overrides the module logger (tests, per-run child loggers) */
  logger?: Logger;
}

export class ResultMerger {
  private readonly log: Logger;

  constructor(private readonly config: PipelineConfig, deps: ResultMergerDeps = {}) {
    this.log = deps.logger ?? log;
  }

  /**
   * Merge a document's candidate multiset, optionally on top of records from
   * an earlier merge. Re-merging candidates that are already in provenance
   * changes nothing.
   */
  merge(documentId: string, candidates: Iterable<Candidate>, options: MergeOptions = {}): MergeResult {
    const stats: MergeStats = {
      received: 0,
      merged: 0,
      dropped: 0,
      duplicatesSkipped: 0,
      exactMatches: 0,
      fuzzyMatches: 0,
      recordsCreated: 0,
      recordsUpdated: 0,
    };
    const dropped: DroppedCandidate[] = [];
    const groups: MergeGroup[] = [];
    const byId = new Map<string, MergeGroup>();
    const seen = new Set<string>();

    for (const record of options.existing ?? []) {
      if (record.documentId !== documentId) {
        this.log.warn({ documentId, recordId: record.recordId }, 'Ignoring existing record from another document');
        continue;
      }
      const group: MergeGroup = { key: record.key, base: record, entries: [...record.provenance], touched: false };
      groups.push(group);
      byId.set(groupId(record.kind, record.key.id), group);
      for (const e of record.provenance) seen.add(e.fingerprint);
    }

    const addToGroup = (group: MergeGroup, candidate: Candidate, fingerprint: string) => {
      group.entries.push(toProvenance(candidate, fingerprint));
      group.touched = true;
      stats.merged++;
    };

    const openGroup = (key: CanonicalKey, candidate: Candidate, fingerprint: string) => {
      const group: MergeGroup = {
        key,
        entries: [],
        display: displayForm(candidate, key),
        touched: true,
      };
      groups.push(group);
      byId.set(groupId(key.kind, key.id), group);
      addToGroup(group, candidate, fingerprint);
    };

    /* ---------- Pass 1: validate, exact grouping ---------- */

    const deferred: Array<{ candidate: Candidate; key: CanonicalKey; fingerprint: string }> = [];
    let index = 0;
    for (const candidate of candidates) {
      const i = index++;
      stats.received++;

      const error = validateCandidate(candidate, i, documentId);
      if (error) {
        dropped.push({ index: i, reason: error.reason, candidate });
        this.log.warn({ documentId, index: i, reason: error.reason }, 'Dropped malformed candidate');
        continue;
      }

      const fingerprint = candidateFingerprint(candidate);
      if (seen.has(fingerprint)) {
        stats.duplicatesSkipped++;
        continue;
      }
      seen.add(fingerprint);

      const key = canonicalize(candidate);
      if (key.fallback) {
        deferred.push({ candidate, key, fingerprint });
        continue;
      }

      const existing = byId.get(groupId(key.kind, key.id));
      if (existing) {
        stats.exactMatches++;
        addToGroup(existing, candidate, fingerprint);
      } else {
        openGroup(key, candidate, fingerprint);
      }
    }

    /* ---------- Pass 2: approximate matching for fallback keys ---------- */

    for (const { candidate, key, fingerprint } of deferred) {
      const sameFallback = byId.get(groupId(key.kind, key.id));
      if (sameFallback) {
        stats.exactMatches++;
        addToGroup(sameFallback, candidate, fingerprint);
        continue;
      }

      const target = this.bestGroupFor(candidate, groups, options);
      if (target) {
        stats.fuzzyMatches++;
        addToGroup(target, candidate, fingerprint);
      } else {
        openGroup(key, candidate, fingerprint);
      }
    }

    /* ---------- Build records ---------- */

    const created: Record<CandidateKind, number> = { citation: 0, definition: 0 };
    const records = groups.map((group) => {
      if (!group.touched && group.base) return group.base;
      if (group.base) {
        stats.recordsUpdated++;
      } else {
        stats.recordsCreated++;
        created[group.key.kind]++;
      }
      return this.buildRecord(documentId, group);
    });

    stats.dropped = dropped.length;
    recordCandidatesDropped(dropped.length);
    recordRecordsMerged('citation', created.citation);
    recordRecordsMerged('definition', created.definition);

    this.log.debug({ documentId, ...stats }, 'Merged document candidates');
    return { records, dropped, stats };
  }

  /**
   * Group a fallback-keyed candidate belongs to, if any: highest similarity
   * above threshold, then the tie-break policy, then the earliest group.
   */
  private bestGroupFor(
    candidate: Candidate,
    groups: readonly MergeGroup[],
    options: MergeOptions
  ): MergeGroup | undefined {
    let best: { group: MergeGroup; score: number } | undefined;

    for (const group of groups) {
      if (group.key.kind !== candidate.kind) continue;

      let score = 0;
      for (const entry of group.entries) {
        const s = textSimilarity(candidate.rawText, entry.excerpt, {
          lexicalWeight: this.config.lexicalWeight,
          embeddings: options.embeddings,
        }).combined;
        if (s > score) score = s;
      }
      if (score < this.config.fuzzyMatchThreshold) continue;

      if (!best || this.prefer(group, score, best.group, best.score)) {
        best = { group, score };
      }
    }
    return best?.group;
  }

  /** True when `a` should win over the current best `b`; groups arrive in creation order */
  private prefer(a: MergeGroup, scoreA: number, b: MergeGroup, scoreB: number): boolean {
    if (!scoresTie(scoreA, scoreB)) return scoreA > scoreB;

    if (this.config.tieBreak === 'higher_confidence') {
      const ca = groupConfidence(a);
      const cb = groupConfidence(b);
      if (!scoresTie(ca, cb)) return ca > cb;
      return a.entries.length > b.entries.length;
    }

    if (a.entries.length !== b.entries.length) return a.entries.length > b.entries.length;
    const ca = groupConfidence(a);
    const cb = groupConfidence(b);
    return !scoresTie(ca, cb) && ca > cb;
  }

  private buildRecord(documentId: string, group: MergeGroup): MergedRecord {
    const best = strongestEntry(group.entries);
    const kind = group.key.kind;

    let definitionText: string | undefined;
    if (kind === 'definition') {
      const withText = group.entries.filter((e) => e.definitionText);
      if (withText.length > 0) definitionText = strongestEntry(withText).definitionText;
    }

    const displayText =
      kind === 'citation' && group.key.fallback
        ? best.excerpt
        : group.base?.displayText ?? group.display ?? best.excerpt;

    const record: MergedRecord = {
      recordId: buildRecordId(documentId, kind, group.key),
      kind,
      documentId,
      key: group.key,
      bestText: best.excerpt,
      displayText,
      confidence: aggregateConfidence(group.entries),
      provenance: group.entries,
      reviewStatus: group.base?.reviewStatus ?? 'pending',
    };
    if (definitionText !== undefined) record.definitionText = definitionText;
    if (group.base?.correctedText !== undefined) record.correctedText = group.base.correctedText;
    if (group.base?.reviewedBy !== undefined) record.reviewedBy = group.base.reviewedBy;
    return record;
  }
}
