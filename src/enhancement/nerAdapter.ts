// src/enhancement/nerAdapter.ts
// Enhancement: entity-recognition pass.
//
// The recognizer itself is an external collaborator; only its entity output
// matters here. LAW / ORG entities that name a legal instrument become
// citation candidates at a fixed confidence.

import type { CitationCandidate, DocumentInput } from '../extraction/types';
import type { DocumentEnhancementAdapter, EnrichmentContext } from './types';

export const NER_CONFIDENCE = 0.8;
const CITATION_LABELS = new Set(['LAW', 'ORG']);
const INSTRUMENT_HINT = /\b(?:law|decree|resolution|decision|cabinet)\b/i;
const MIN_ENTITY_LENGTH = 10;

export interface RecognizedEntity {
  text: string;
  /** e.g. "LAW", "ORG", "PERSON" */
  label: string;
}

export interface EntityRecognizer {
  recognize(text: string, signal: AbortSignal): Promise<RecognizedEntity[]>;
}

export class NerAdapter implements DocumentEnhancementAdapter {
  readonly name = 'ner';
  readonly method = 'ner' as const;

  constructor(private readonly recognizer: EntityRecognizer) {}

  async enrich(document: DocumentInput, ctx: EnrichmentContext): Promise<CitationCandidate[]> {
    const out: CitationCandidate[] = [];

    for (const page of document.pages) {
      if (ctx.signal.aborted) break;
      const entities = await this.recognizer.recognize(page.text, ctx.signal);

      const seen = new Set<string>();
      for (const entity of entities) {
        const text = entity.text.replace(/\s+/g, ' ').trim();
        if (!CITATION_LABELS.has(entity.label.toUpperCase())) continue;
        if (text.length < MIN_ENTITY_LENGTH || !INSTRUMENT_HINT.test(text)) continue;
        if (seen.has(text)) continue;
        seen.add(text);

        out.push({
          kind: 'citation',
          rawText: text,
          page: page.pageNumber,
          sourceDocumentId: page.documentId,
          extractionMethod: 'ner',
          confidence: NER_CONFIDENCE,
        });
      }
    }

    ctx.log.debug({ documentId: document.documentId, candidates: out.length }, 'NER pass complete');
    return out;
  }
}
