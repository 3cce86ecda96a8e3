// src/extraction/types.ts
// Extraction: candidate and page input types shared by the extractor,
// canonicalizer, enhancement adapters and merger.

/* ============= Extraction Methods ============= */

/** Closed set of producers. New sources add a tag here, not a string at a call site. */
export const EXTRACTION_METHODS = [
  'regex',
  'colon_pattern',
  'means_pattern',
  'layout',
  'ai_enhancement',
  'ner',
] as const;

export type ExtractionMethod = (typeof EXTRACTION_METHODS)[number];

export function isExtractionMethod(value: unknown): value is ExtractionMethod {
  return typeof value === 'string' && EXTRACTION_METHODS.some((m) => m === value);
}

/* ============= Candidates ============= */

export type CandidateKind = 'citation' | 'definition';

/** Character offsets within the page text, end exclusive */
export interface TextSpan {
  readonly start: number;
  readonly end: number;
}

interface CandidateBase {
  readonly rawText: string;
  /** 1-based page number */
  readonly page: number;
  readonly sourceDocumentId: string;
  readonly extractionMethod: ExtractionMethod;
  /** In [0, 1] */
  readonly confidence: number;
  /** Set when the match ran into the end of the page */
  readonly possiblyTruncated?: boolean;
  readonly span?: TextSpan;
}

export interface CitationCandidate extends CandidateBase {
  readonly kind: 'citation';
}

export interface DefinitionCandidate extends CandidateBase {
  readonly kind: 'definition';
  readonly term?: string;
  readonly definitionText?: string;
}

/** One unreconciled observation from a single source and method */
export type Candidate = CitationCandidate | DefinitionCandidate;

/* ============= Page / Document Input ============= */

/** A text block reported by the page-layout collaborator, in reading order */
export interface LayoutBlock {
  text: string;
  bold: boolean;
}

export interface PageLayout {
  blocks: LayoutBlock[];
  /** Layout extraction quality in [0, 1]; scales layout-derived confidence */
  quality: number;
}

export interface PageInput {
  documentId: string;
  /** 1-based */
  pageNumber: number;
  text: string;
  layout?: PageLayout;
}

export interface DocumentInput {
  documentId: string;
  pages: PageInput[];
}

/* ============= Helpers ============= */

/** Round a confidence to two decimals and clamp it to [0, 1] */
export function roundConfidence(value: number): number {
  const clamped = Math.min(1, Math.max(0, value));
  return Math.round(clamped * 100) / 100;
}

/** Confidence multiplier for candidates cut off by a page boundary */
export const TRUNCATION_PENALTY = 0.7;
