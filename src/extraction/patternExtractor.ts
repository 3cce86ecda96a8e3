// src/extraction/patternExtractor.ts
// Extraction: deterministic per-page candidate extraction.
//
// Pages are scanned lazily; every iteration of a returned iterable rescans
// from the start, so the same page always yields the same candidates.

import { scanCitations } from './citationGrammar';
import { scanLayoutDefinitions, scanTextDefinitions } from './definitionGrammar';
import { comparisonForm, firstLine, firstLineEnd, stripPageFurniture } from './pageCleaner';
import type { Candidate, DocumentInput, PageInput } from './types';

/**
 * Candidates on one page: citations, then text definitions, then layout pairs.
 * Empty pages and pages without matches yield nothing.
 */
export function extractPage(page: PageInput): Iterable<Candidate> {
  return {
    *[Symbol.iterator]() {
      const text = stripPageFurniture(page.text);
      yield* scanCitations(text, page.pageNumber, page.documentId);
      yield* scanTextDefinitions(text, page.pageNumber, page.documentId);
      if (page.layout) {
        yield* scanLayoutDefinitions(page.layout, page.pageNumber, page.documentId);
      }
    },
  };
}

/**
 * The citation that titles the document, taken from the first line of the
 * first page, in comparison form.
 */
export function documentTitleCitation(document: DocumentInput): string | undefined {
  const first = document.pages[0];
  if (!first) return undefined;
  const title = firstLine(first.text);
  if (!title) return undefined;
  for (const c of scanCitations(title, first.pageNumber, document.documentId)) {
    return comparisonForm(c.rawText);
  }
  return undefined;
}

/**
 * Candidates for every page of a document. Citations of the document itself
 * (its title line and repeated running headers) are skipped.
 */
export function extractDocument(document: DocumentInput): Iterable<Candidate> {
  return {
    *[Symbol.iterator]() {
      const title = documentTitleCitation(document);

      for (const page of document.pages) {
        const headerEnd = firstLineEnd(page.text);
        for (const candidate of extractPage(page)) {
          if (
            title !== undefined &&
            candidate.kind === 'citation' &&
            candidate.span !== undefined &&
            candidate.span.start < headerEnd &&
            comparisonForm(candidate.rawText) === title
          ) {
            continue;
          }
          yield candidate;
        }
      }
    },
  };
}

export const PatternExtractor = {
  extractPage,
  extractDocument,
  documentTitleCitation,
};
