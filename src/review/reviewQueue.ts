// src/review/reviewQueue.ts
// Review: export flagged records for human review and re-import decisions.
//
// Exchange format is a flat item list keyed by recordId. Import is idempotent:
// applying the same decision twice leaves the record as the first import did.

import fs from 'fs/promises';
import path from 'path';
import type { PipelineConfig } from '../config';
import { ReviewImportMismatchError } from '../errors';
import { isRecord, readNumber, readString } from '../ai/extraction';
import { isExtractionMethod, type CandidateKind, type ExtractionMethod } from '../extraction/types';
import { strongestEntry } from '../merge/resultMerger';
import type { MergedRecord, ReviewStatus } from '../merge/types';
import { createLogger } from '../observability';
import type { RecordRepository } from '../store/recordRepository';
import { canTransition } from './stateMachine';

const log = createLogger('review/reviewQueue');

/* ---------- Types ---------- */

export type ReviewDecision = 'accept' | 'reject';

export interface ReviewItem {
  recordId: string;
  kind: CandidateKind;
  rawText: string;
  definitionText?: string;
  page: number;
  confidence: number;
  extractionMethod: ExtractionMethod;
  /** e.g. "Low confidence (0.62)" */
  reason: string;
  flags: string[];
  reviewedBy?: string;
  correctedText?: string;
  decision?: ReviewDecision;
}

export interface Correction {
  decision: ReviewDecision;
  /** With decision "accept", overrides the record text */
  correctedText?: string;
  reviewedBy?: string;
}

export type ImportResult =
  | { ok: true; record: MergedRecord; changed: boolean }
  | { ok: false; recordId: string; error: ReviewImportMismatchError };

export interface ReviewSummary {
  total: number;
  byKind: Record<CandidateKind, number>;
  byReason: Record<string, number>;
  byStatus: Partial<Record<ReviewStatus, number>>;
  averageConfidence: number;
}

export interface ExportFilter {
  documentId?: string;
}

/* ---------- Helpers ---------- */

const TRUNCATED_FLAG = 'possibly_truncated';
const FALLBACK_FLAG = 'unparsed_key';
const SINGLE_SOURCE_FLAG = 'single_source';

function lowConfidenceReason(confidence: number): string {
  return `Low confidence (${confidence.toFixed(2)})`;
}

function flagsFor(record: MergedRecord): string[] {
  const flags: string[] = [];
  if (record.key.fallback) flags.push(FALLBACK_FLAG);
  if (record.provenance.some((p) => p.possiblyTruncated)) flags.push(TRUNCATED_FLAG);
  if (new Set(record.provenance.map((p) => p.extractionMethod)).size === 1) flags.push(SINGLE_SOURCE_FLAG);
  return flags;
}

export function toReviewItem(record: MergedRecord): ReviewItem {
  const best = strongestEntry(record.provenance);
  const item: ReviewItem = {
    recordId: record.recordId,
    kind: record.kind,
    rawText: record.bestText,
    page: best.page,
    confidence: record.confidence,
    extractionMethod: best.extractionMethod,
    reason: lowConfidenceReason(record.confidence),
    flags: flagsFor(record),
  };
  if (record.definitionText !== undefined) item.definitionText = record.definitionText;
  if (record.reviewedBy !== undefined) item.reviewedBy = record.reviewedBy;
  if (record.correctedText !== undefined) item.correctedText = record.correctedText;
  return item;
}

/** Status a correction moves a record to */
export function targetStatus(correction: Correction): ReviewStatus {
  if (correction.decision === 'reject') return 'rejected';
  return correction.correctedText ? 'corrected' : 'accepted';
}

function sameDecision(record: MergedRecord, target: ReviewStatus, correction: Correction): boolean {
  if (record.reviewStatus !== target) return false;
  if (target === 'corrected') return record.correctedText === correction.correctedText;
  return true;
}

/* ---------- File Normalization ---------- */

function isDecision(value: unknown): value is ReviewDecision {
  return value === 'accept' || value === 'reject';
}

function isCandidateKind(value: unknown): value is CandidateKind {
  return value === 'citation' || value === 'definition';
}

/** Validate one item read from a review file; undefined when unusable */
export function normalizeReviewItem(raw: unknown): ReviewItem | undefined {
  if (!isRecord(raw)) return undefined;
  const recordId = readString(raw.recordId);
  const rawText = readString(raw.rawText);
  const page = readNumber(raw.page);
  const confidence = readNumber(raw.confidence);
  if (!recordId || rawText === undefined || page === undefined || confidence === undefined) return undefined;
  if (!isCandidateKind(raw.kind) || !isExtractionMethod(raw.extractionMethod)) return undefined;

  const item: ReviewItem = {
    recordId,
    kind: raw.kind,
    rawText,
    page,
    confidence,
    extractionMethod: raw.extractionMethod,
    reason: readString(raw.reason) ?? lowConfidenceReason(confidence),
    flags: Array.isArray(raw.flags) ? raw.flags.filter((f): f is string => typeof f === 'string') : [],
  };
  const definitionText = readString(raw.definitionText);
  const reviewedBy = readString(raw.reviewedBy);
  const correctedText = readString(raw.correctedText);
  if (definitionText !== undefined) item.definitionText = definitionText;
  if (reviewedBy !== undefined) item.reviewedBy = reviewedBy;
  if (correctedText !== undefined) item.correctedText = correctedText;
  if (isDecision(raw.decision)) item.decision = raw.decision;
  return item;
}

/* ---------- Queue ---------- */

export class ReviewQueue {
  constructor(
    private readonly repo: RecordRepository,
    private readonly config: Pick<PipelineConfig, 'highConfidenceThreshold'>
  ) {}

  /** Records awaiting review, in first-insertion order */
  exportReviewQueue(filter: ExportFilter = {}): ReviewItem[] {
    return this.repo
      .list({ documentId: filter.documentId, status: 'flagged_for_review' })
      .map(toReviewItem);
  }

  importCorrection(recordId: string, correction: Correction): ImportResult {
    const record = this.repo.get(recordId);
    if (!record) {
      log.warn({ recordId }, 'Correction for unknown record');
      return { ok: false, recordId, error: new ReviewImportMismatchError(recordId, 'unknown record id') };
    }

    const target = targetStatus(correction);
    if (sameDecision(record, target, correction)) {
      return { ok: true, record, changed: false };
    }

    if (!canTransition(record.reviewStatus, target)) {
      const detail = `record is ${record.reviewStatus}, correction asks for ${target}`;
      log.warn({ recordId, from: record.reviewStatus, to: target }, 'Conflicting correction ignored');
      return { ok: false, recordId, error: new ReviewImportMismatchError(recordId, detail) };
    }

    const updated: MergedRecord = { ...record, reviewStatus: target };
    if (target === 'corrected') updated.correctedText = correction.correctedText;
    if (correction.reviewedBy !== undefined) updated.reviewedBy = correction.reviewedBy;
    this.repo.put(updated);

    log.info({ recordId, from: record.reviewStatus, to: target, reviewedBy: correction.reviewedBy }, 'Correction applied');
    return { ok: true, record: updated, changed: true };
  }

  /** Apply decided items in order; items without a decision are skipped */
  importReviewBatch(items: readonly ReviewItem[]): ImportResult[] {
    const results: ImportResult[] = [];
    for (const item of items) {
      if (!item.decision) continue;
      const correction: Correction = { decision: item.decision };
      if (item.correctedText !== undefined) correction.correctedText = item.correctedText;
      if (item.reviewedBy !== undefined) correction.reviewedBy = item.reviewedBy;
      results.push(this.importCorrection(item.recordId, correction));
    }
    return results;
  }

  summary(filter: ExportFilter = {}): ReviewSummary {
    const items = this.exportReviewQueue(filter);
    const byKind: Record<CandidateKind, number> = { citation: 0, definition: 0 };
    const byReason: Record<string, number> = {};
    let confidenceSum = 0;

    for (const item of items) {
      byKind[item.kind]++;
      confidenceSum += item.confidence;
      const reasons = item.flags.length > 0 ? item.flags : ['below_threshold'];
      for (const r of reasons) byReason[r] = (byReason[r] ?? 0) + 1;
    }

    const byStatus: Partial<Record<ReviewStatus, number>> = {};
    for (const r of this.repo.list({ documentId: filter.documentId })) {
      byStatus[r.reviewStatus] = (byStatus[r.reviewStatus] ?? 0) + 1;
    }

    return {
      total: items.length,
      byKind,
      byReason,
      byStatus,
      averageConfidence: items.length ? Math.round((confidenceSum / items.length) * 100) / 100 : 0,
    };
  }

  /** Threshold the queue was built against, for report headers */
  get threshold(): number {
    return this.config.highConfidenceThreshold;
  }

  async writeReviewFile(filePath: string, filter: ExportFilter = {}): Promise<number> {
    const items = this.exportReviewQueue(filter);
    await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify({ threshold: this.threshold, items }, null, 2), 'utf8');
    log.info({ path: filePath, items: items.length }, 'Review file written');
    return items.length;
  }

  /** Read a review file; unusable items are logged and skipped */
  async readReviewFile(filePath: string): Promise<ReviewItem[]> {
    const parsed: unknown = JSON.parse(await fs.readFile(filePath, 'utf8'));
    const rawItems = isRecord(parsed) && Array.isArray(parsed.items) ? parsed.items : Array.isArray(parsed) ? parsed : [];

    const items: ReviewItem[] = [];
    rawItems.forEach((raw: unknown, index: number) => {
      const item = normalizeReviewItem(raw);
      if (item) items.push(item);
      else log.warn({ path: filePath, index }, 'Skipping unusable review item');
    });
    return items;
  }
}
