// src/index.ts
// Public surface of the extraction-reconciliation pipeline.

export { config, createPipelineConfig, type PipelineConfig, type TieBreakPolicy, type AIProvider } from './config';
export * from './errors';

/* ---------- Extraction ---------- */
export * from './extraction/types';
export { PatternExtractor, extractPage, extractDocument } from './extraction/patternExtractor';
export { isValidTerm, isValidDefinitionText, termViolations, definitionViolations } from './extraction/termRules';

/* ---------- Canonicalization ---------- */
export {
  Canonicalizer,
  canonicalize,
  displayForm,
  normalizeText,
  normalizeTerm,
  type CanonicalKey,
  type CitationKey,
  type DefinitionKey,
} from './canonical/canonicalizer';
export { INSTRUMENT_TYPES, INSTRUMENT_LABELS, type InstrumentType } from './canonical/instrumentTypes';

/* ---------- Enhancement ---------- */
export * from './enhancement/types';
export { runAdapter, runBounded, type BoundedCallOptions } from './enhancement/runAdapter';
export { AiEnhancementAdapter, type AiEnhancerOptions } from './enhancement/aiEnhancer';
export { NerAdapter, type EntityRecognizer, type RecognizedEntity } from './enhancement/nerAdapter';
export { EmbeddingSimilaritySource, type EmbeddingSourceOptions } from './enhancement/embeddingSource';

/* ---------- Merge ---------- */
export * from './merge/types';
export { ResultMerger, aggregateConfidence } from './merge/resultMerger';
export { textSimilarity, embeddingIndexFrom, type EmbeddingIndex } from './merge/similarity';

/* ---------- Review ---------- */
export { ConfidenceRouter, type RoutingResult } from './review/confidenceRouter';
export { canTransition, isFinalStatus } from './review/stateMachine';
export {
  ReviewQueue,
  type ReviewItem,
  type Correction,
  type ImportResult,
  type ReviewSummary,
} from './review/reviewQueue';

/* ---------- Store ---------- */
export { openDatabase } from './db';
export { InMemoryRecordRepository, type RecordRepository, type RecordFilter } from './store/recordRepository';
export { SqliteRecordRepository } from './store/sqliteRecordRepository';

/* ---------- Pipeline ---------- */
export {
  DocumentPipeline,
  summarizeRun,
  type DocumentResult,
  type RunSummary,
  type DocumentPipelineDeps,
} from './pipeline/documentPipeline';
export { toDocumentOutput, writeRunOutput, type DocumentOutput } from './pipeline/outputExporter';
