// src/pipeline/documentPipeline.ts
// Pipeline: one document end to end.
//
//   extract (sync, per page) -> adapters (concurrent, bounded) -> similarity index
//   -> merge (sync) -> route -> persist
//
// Documents are independent units of work; processDocuments runs them through a
// bounded pool. A failing document yields a result with `error` set and never
// stops the others.

import { nanoid } from 'nanoid';
import type { PipelineConfig } from '../config';
import { runAdapter, runBounded, type BoundedCallOptions } from '../enhancement/runAdapter';
import type { AdapterReport, EnhancementAdapter, SimilaritySource } from '../enhancement/types';
import { extractDocument } from '../extraction/patternExtractor';
import type { Candidate, DocumentInput } from '../extraction/types';
import { ResultMerger } from '../merge/resultMerger';
import type { EmbeddingIndex } from '../merge/similarity';
import type { DroppedCandidate, MergedRecord, MergeStats } from '../merge/types';
import {
  createDocumentLogger,
  createLogger,
  recordCandidateExtracted,
  recordDocumentProcessed,
  type Logger,
} from '../observability';
import { ConfidenceRouter } from '../review/confidenceRouter';
import { InMemoryRecordRepository, type RecordRepository } from '../store/recordRepository';
import { createLimiter } from '../utils/limiter';

const moduleLog = createLogger('pipeline/documentPipeline');

/* ============= Types ============= */

export interface DocumentResult {
  documentId: string;
  runId: string;
  /** All records of the document after routing, accepted and flagged included */
  records: MergedRecord[];
  accepted: MergedRecord[];
  flagged: MergedRecord[];
  dropped: DroppedCandidate[];
  adapterReports: AdapterReport[];
  /** Similarity source report, when one is configured */
  similarityReport?: Omit<AdapterReport, 'candidates'>;
  stats: MergeStats;
  pages: number;
  processingTimeMs: number;
  /** ISO timestamp */
  startedAt: string;
  /** Set when the document failed outside the per-adapter error scope */
  error?: string;
}

export interface RunSummary {
  runId: string;
  documents: number;
  failed: number;
  records: number;
  accepted: number;
  flagged: number;
  dropped: number;
  adapterFailures: number;
  processingTimeMs: number;
}

export interface DocumentPipelineDeps {
  adapters?: EnhancementAdapter[];
  similarity?: SimilaritySource;
  repository?: RecordRepository;
  logger?: Logger;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface ProcessDocumentsOptions {
  /** Documents in flight at once */
  concurrency?: number;
  runId?: string;
}

const DEFAULT_CONCURRENCY = 4;

function emptyStats(): MergeStats {
  return {
    received: 0,
    merged: 0,
    dropped: 0,
    duplicatesSkipped: 0,
    exactMatches: 0,
    fuzzyMatches: 0,
    recordsCreated: 0,
    recordsUpdated: 0,
  };
}

/* ============= Pipeline ============= */

export class DocumentPipeline {
  readonly repository: RecordRepository;
  private readonly adapters: EnhancementAdapter[];
  private readonly merger: ResultMerger;
  private readonly router: ConfidenceRouter;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(private readonly config: PipelineConfig, private readonly deps: DocumentPipelineDeps = {}) {
    this.adapters = deps.adapters ?? [];
    this.repository = deps.repository ?? new InMemoryRecordRepository();
    this.log = deps.logger ?? moduleLog;
    this.now = deps.now ?? Date.now;
    this.merger = new ResultMerger(config, { logger: this.log });
    this.router = new ConfidenceRouter(config);
  }

  /** Process one document. Never throws; failures land in `error`. */
  async processDocument(document: DocumentInput, runId: string = nanoid()): Promise<DocumentResult> {
    const started = this.now();
    const log = createDocumentLogger(this.log, { documentId: document.documentId, runId });
    const base = {
      documentId: document.documentId,
      runId,
      pages: document.pages.length,
      startedAt: new Date(started).toISOString(),
    };

    try {
      const result = await this.run(document, started, log);
      const processingTimeMs = this.now() - started;
      recordDocumentProcessed('success', processingTimeMs);
      log.info(
        {
          records: result.records.length,
          accepted: result.accepted.length,
          flagged: result.flagged.length,
          dropped: result.dropped.length,
          durationMs: processingTimeMs,
        },
        'Document processed'
      );
      return { ...base, ...result, processingTimeMs };
    } catch (err) {
      const processingTimeMs = this.now() - started;
      const message = err instanceof Error ? err.message : String(err);
      recordDocumentProcessed('error', processingTimeMs);
      log.error({ err: message, durationMs: processingTimeMs }, 'Document failed');
      return {
        ...base,
        records: [],
        accepted: [],
        flagged: [],
        dropped: [],
        adapterReports: [],
        stats: emptyStats(),
        processingTimeMs,
        error: message,
      };
    }
  }

  /** Process documents through a bounded worker pool; results keep input order */
  async processDocuments(
    documents: readonly DocumentInput[],
    options: ProcessDocumentsOptions = {}
  ): Promise<{ results: DocumentResult[]; summary: RunSummary }> {
    const runId = options.runId ?? nanoid();
    const started = this.now();
    const limiter = createLimiter(options.concurrency ?? DEFAULT_CONCURRENCY);

    this.log.info({ runId, documents: documents.length, concurrency: options.concurrency ?? DEFAULT_CONCURRENCY }, 'Run started');
    const results = await Promise.all(documents.map((d) => limiter.run(() => this.processDocument(d, runId))));

    const summary = summarizeRun(runId, results, this.now() - started);
    this.log.info({ ...summary }, 'Run finished');
    return { results, summary };
  }

  /* ---------- Stages ---------- */

  private async run(
    document: DocumentInput,
    started: number,
    log: Logger
  ): Promise<Omit<DocumentResult, 'documentId' | 'runId' | 'pages' | 'startedAt' | 'processingTimeMs'>> {
    const deterministic: Candidate[] = [];
    for (const candidate of extractDocument(document)) {
      recordCandidateExtracted(candidate.kind, candidate.extractionMethod);
      deterministic.push(candidate);
    }
    log.debug({ candidates: deterministic.length }, 'Pattern extraction done');

    const bounded: BoundedCallOptions = {
      timeoutMs: this.config.adapterTimeoutMs,
      retryCount: this.config.adapterRetryCount,
      backoffMs: this.config.adapterBackoffMs,
      deadline: this.config.documentTimeoutMs > 0 ? started + this.config.documentTimeoutMs : undefined,
      log,
      sleep: this.deps.sleep,
      now: this.now,
    };

    const outcomes = await Promise.all(this.adapters.map((a) => runAdapter(a, document, bounded)));
    const enhanced: Candidate[] = [];
    for (const { candidates } of outcomes) {
      for (const c of candidates) recordCandidateExtracted(c.kind, c.extractionMethod);
      enhanced.push(...candidates);
    }

    const candidates = [...deterministic, ...enhanced];
    const existing = this.repository.list({ documentId: document.documentId });

    let embeddings: EmbeddingIndex | undefined;
    let similarityReport: DocumentResult['similarityReport'];
    const source = this.deps.similarity;
    if (source) {
      // the merger compares candidate rawText against collapsed provenance excerpts
      const texts = [
        ...candidates.flatMap((c) => [c.rawText, c.rawText.replace(/\s+/g, ' ').trim()]),
        ...existing.flatMap((r) => r.provenance.map((p) => p.excerpt)),
      ];
      const { value, report } = await runBounded<EmbeddingIndex | undefined>(
        source.name,
        (ctx) => source.buildIndex(texts, ctx),
        undefined,
        bounded
      );
      embeddings = value;
      similarityReport = report;
    }

    const merged = this.merger.merge(document.documentId, candidates, { existing, embeddings });
    const routed = this.router.routeAll(merged.records);
    this.repository.putMany(routed.records);

    return {
      records: routed.records,
      accepted: routed.accepted,
      flagged: routed.flagged,
      dropped: merged.dropped,
      adapterReports: outcomes.map((o) => o.report),
      ...(similarityReport ? { similarityReport } : {}),
      stats: merged.stats,
    };
  }
}

/* ============= Summary ============= */

export function summarizeRun(runId: string, results: readonly DocumentResult[], processingTimeMs: number): RunSummary {
  const summary: RunSummary = {
    runId,
    documents: results.length,
    failed: 0,
    records: 0,
    accepted: 0,
    flagged: 0,
    dropped: 0,
    adapterFailures: 0,
    processingTimeMs,
  };
  for (const r of results) {
    if (r.error !== undefined) summary.failed++;
    summary.records += r.records.length;
    summary.accepted += r.accepted.length;
    summary.flagged += r.flagged.length;
    summary.dropped += r.dropped.length;
    summary.adapterFailures += r.adapterReports.filter((a) => a.status !== 'success').length;
  }
  return summary;
}
