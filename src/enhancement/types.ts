// src/enhancement/types.ts
// Enhancement: the capability interface every enrichment source implements.
//
// The pipeline treats adapters identically: each is a candidate producer with
// its own extraction method tag and confidence policy.

import type { Logger } from '../observability/logger';
import type { Candidate, DocumentInput, ExtractionMethod, PageInput } from '../extraction/types';
import type { EmbeddingIndex } from '../merge/similarity';

export interface EnrichmentContext {
  /** Aborted when the call times out or the document deadline passes */
  signal: AbortSignal;
  log: Logger;
}

/** Sees the whole document in one bounded call */
export interface DocumentEnhancementAdapter {
  readonly name: string;
  readonly method: ExtractionMethod;
  readonly scope?: 'document';
  enrich(document: DocumentInput, ctx: EnrichmentContext): Promise<Candidate[]>;
}

/**
 * Called once per page, each page with its own timeout and retries.
 * A page that fails costs only its own candidates.
 */
export interface PageEnhancementAdapter {
  readonly name: string;
  readonly method: ExtractionMethod;
  readonly scope: 'page';
  enrichPage(page: PageInput, ctx: EnrichmentContext): Promise<Candidate[]>;
}

export type EnhancementAdapter = DocumentEnhancementAdapter | PageEnhancementAdapter;

/**
 * A source of text vectors for the merger's near-duplicate scoring.
 * Contributes a similarity signal rather than candidates.
 */
export interface SimilaritySource {
  readonly name: string;
  buildIndex(texts: string[], ctx: EnrichmentContext): Promise<EmbeddingIndex>;
}

/** `partial`: a page-scoped adapter where some pages failed and others contributed */
export type AdapterStatus = 'success' | 'partial' | 'timeout' | 'unavailable' | 'skipped';

export interface AdapterReport {
  adapter: string;
  status: AdapterStatus;
  attempts: number;
  candidates: number;
  durationMs: number;
  error?: string;
  /** Page-scoped adapters: pages that contributed nothing because every attempt failed */
  failedPages?: number[];
}
