// src/store/recordCodec.ts
// Store: JSON round-trip for merged records with structural validation on read.

import { isInstrumentType } from '../canonical/instrumentTypes';
import type { CanonicalKey } from '../canonical/canonicalizer';
import { isExtractionMethod } from '../extraction/types';
import { REVIEW_STATUSES, type MergedRecord, type ProvenanceEntry, type ReviewStatus } from '../merge/types';

type Json = Record<string, unknown>;

function isJson(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === 'string';
}

function optionalNumber(value: unknown): value is number | undefined {
  return value === undefined || typeof value === 'number';
}

export function isReviewStatus(value: unknown): value is ReviewStatus {
  return typeof value === 'string' && REVIEW_STATUSES.some((s) => s === value);
}

function toKey(value: unknown): CanonicalKey | undefined {
  if (!isJson(value) || typeof value.id !== 'string' || typeof value.fallback !== 'boolean') return undefined;
  if (value.kind === 'citation') {
    if (!optionalNumber(value.number) || !optionalNumber(value.year)) return undefined;
    if (value.type !== undefined && !isInstrumentType(value.type)) return undefined;
    return {
      kind: 'citation',
      id: value.id,
      fallback: value.fallback,
      ...(value.type !== undefined && isInstrumentType(value.type) ? { type: value.type } : {}),
      ...(value.number !== undefined ? { number: value.number } : {}),
      ...(value.year !== undefined ? { year: value.year } : {}),
    };
  }
  if (value.kind === 'definition') {
    if (!optionalString(value.normalizedTerm)) return undefined;
    return {
      kind: 'definition',
      id: value.id,
      fallback: value.fallback,
      ...(value.normalizedTerm !== undefined ? { normalizedTerm: value.normalizedTerm } : {}),
    };
  }
  return undefined;
}

function toProvenance(value: unknown): ProvenanceEntry | undefined {
  if (!isJson(value)) return undefined;
  const { documentId, page, excerpt, extractionMethod, confidence, fingerprint, term, definitionText, possiblyTruncated } = value;
  if (typeof documentId !== 'string' || typeof page !== 'number' || typeof excerpt !== 'string') return undefined;
  if (!isExtractionMethod(extractionMethod) || typeof confidence !== 'number' || typeof fingerprint !== 'string') {
    return undefined;
  }
  if (!optionalString(term) || !optionalString(definitionText)) return undefined;

  const entry: ProvenanceEntry = { documentId, page, excerpt, extractionMethod, confidence, fingerprint };
  if (term !== undefined) entry.term = term;
  if (definitionText !== undefined) entry.definitionText = definitionText;
  if (possiblyTruncated === true) entry.possiblyTruncated = true;
  return entry;
}

/** Rebuild a MergedRecord from parsed JSON, or undefined when any field is off */
export function toMergedRecord(value: unknown): MergedRecord | undefined {
  if (!isJson(value)) return undefined;
  const key = toKey(value.key);
  if (!key || value.kind !== key.kind) return undefined;
  const { recordId, documentId, bestText, displayText, confidence, reviewStatus } = value;
  if (typeof recordId !== 'string' || typeof documentId !== 'string') return undefined;
  if (typeof bestText !== 'string' || typeof displayText !== 'string' || typeof confidence !== 'number') {
    return undefined;
  }
  if (!isReviewStatus(reviewStatus) || !Array.isArray(value.provenance)) return undefined;
  if (!optionalString(value.definitionText) || !optionalString(value.correctedText) || !optionalString(value.reviewedBy)) {
    return undefined;
  }

  const provenance: ProvenanceEntry[] = [];
  for (const raw of value.provenance) {
    const entry = toProvenance(raw);
    if (!entry) return undefined;
    provenance.push(entry);
  }

  const record: MergedRecord = {
    recordId,
    kind: key.kind,
    documentId,
    key,
    bestText,
    displayText,
    confidence,
    provenance,
    reviewStatus,
  };
  if (value.definitionText !== undefined) record.definitionText = value.definitionText;
  if (value.correctedText !== undefined) record.correctedText = value.correctedText;
  if (value.reviewedBy !== undefined) record.reviewedBy = value.reviewedBy;
  return record;
}

export function encodeRecord(record: MergedRecord): string {
  return JSON.stringify(record);
}

/** Parse stored JSON; undefined for unreadable or invalid rows */
export function decodeRecord(json: string): MergedRecord | undefined {
  try {
    return toMergedRecord(JSON.parse(json));
  } catch {
    return undefined;
  }
}
