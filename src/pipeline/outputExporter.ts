// src/pipeline/outputExporter.ts
// Pipeline: per-document output shape and the run output file.
//
// Rejected records are left out. A corrected record exports its corrected text.

import fs from 'fs/promises';
import path from 'path';
import type { ExtractionMethod } from '../extraction/types';
import { strongestEntry } from '../merge/resultMerger';
import type { MergedRecord, ReviewStatus } from '../merge/types';
import { createLogger } from '../observability';
import type { DocumentResult } from './documentPipeline';

const log = createLogger('pipeline/outputExporter');

/* ---------- Types ---------- */

export interface OutputProvenance {
  page: number;
  excerpt: string;
  extractionMethod: ExtractionMethod;
}

export interface CitationOutput {
  recordId: string;
  text: string;
  /** Canonical label, e.g. "Federal Decree-Law No. (7) of 2017" */
  displayText: string;
  canonicalId: string;
  page: number;
  confidence: number;
  extractionMethod: ExtractionMethod;
  reviewStatus: ReviewStatus;
  provenance: OutputProvenance[];
}

export interface DefinitionOutput {
  recordId: string;
  term: string;
  definition: string;
  normalizedTerm: string;
  page: number;
  confidence: number;
  extractionMethod: ExtractionMethod;
  reviewStatus: ReviewStatus;
  provenance: OutputProvenance[];
}

export interface DocumentOutput {
  metadata: {
    documentId: string;
    pages: number;
    /** ISO timestamp */
    processedAt: string;
    processingTimeSeconds: number;
    error?: string;
  };
  citations: CitationOutput[];
  termDefinitions: DefinitionOutput[];
}

/* ---------- Conversion ---------- */

function provenanceOf(record: MergedRecord): OutputProvenance[] {
  return record.provenance.map((p) => ({ page: p.page, excerpt: p.excerpt, extractionMethod: p.extractionMethod }));
}

function toCitationOutput(record: MergedRecord): CitationOutput {
  const best = strongestEntry(record.provenance);
  return {
    recordId: record.recordId,
    text: record.correctedText ?? record.bestText,
    displayText: record.displayText,
    canonicalId: record.key.id,
    page: best.page,
    confidence: record.confidence,
    extractionMethod: best.extractionMethod,
    reviewStatus: record.reviewStatus,
    provenance: provenanceOf(record),
  };
}

function toDefinitionOutput(record: MergedRecord): DefinitionOutput {
  const best = strongestEntry(record.provenance);
  return {
    recordId: record.recordId,
    term: record.displayText,
    definition: record.correctedText ?? record.definitionText ?? record.bestText,
    normalizedTerm: record.key.kind === 'definition' ? record.key.normalizedTerm ?? record.key.id : record.key.id,
    page: best.page,
    confidence: record.confidence,
    extractionMethod: best.extractionMethod,
    reviewStatus: record.reviewStatus,
    provenance: provenanceOf(record),
  };
}

/** Output for one document; `records` overrides the result's own (e.g. after review import) */
export function toDocumentOutput(result: DocumentResult, records: readonly MergedRecord[] = result.records): DocumentOutput {
  const kept = records.filter((r) => r.reviewStatus !== 'rejected');
  return {
    metadata: {
      documentId: result.documentId,
      pages: result.pages,
      processedAt: result.startedAt,
      processingTimeSeconds: Math.round(result.processingTimeMs / 10) / 100,
      ...(result.error !== undefined ? { error: result.error } : {}),
    },
    citations: kept.filter((r) => r.kind === 'citation').map(toCitationOutput),
    termDefinitions: kept.filter((r) => r.kind === 'definition').map(toDefinitionOutput),
  };
}

/* ---------- File Output ---------- */

/** Write all document outputs into one JSON file keyed by documentId */
export async function writeRunOutput(filePath: string, outputs: readonly DocumentOutput[]): Promise<void> {
  const byDocument: Record<string, DocumentOutput> = {};
  for (const o of outputs) byDocument[o.metadata.documentId] = o;

  await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(byDocument, null, 2), 'utf8');

  log.info(
    {
      path: filePath,
      documents: outputs.length,
      citations: outputs.reduce((n, o) => n + o.citations.length, 0),
      definitions: outputs.reduce((n, o) => n + o.termDefinitions.length, 0),
    },
    'Run output written'
  );
}
