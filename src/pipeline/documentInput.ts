// src/pipeline/documentInput.ts
// Pipeline: validation of document input read from JSON.

import { isRecord, readNumber, readString } from '../ai/extraction';
import type { DocumentInput, LayoutBlock, PageInput, PageLayout } from '../extraction/types';

export class DocumentInputError extends Error {
  constructor(public readonly path: string, detail: string) {
    super(`Invalid document input at ${path}: ${detail}`);
    this.name = 'DocumentInputError';
  }
}

function toLayout(raw: unknown, at: string): PageLayout | undefined {
  if (raw === undefined) return undefined;
  if (!isRecord(raw) || !Array.isArray(raw.blocks)) throw new DocumentInputError(at, 'layout needs a blocks array');

  const blocks: LayoutBlock[] = raw.blocks.map((b: unknown, i: number) => {
    if (!isRecord(b) || typeof b.text !== 'string') throw new DocumentInputError(`${at}.blocks[${i}]`, 'block needs text');
    return { text: b.text, bold: b.bold === true };
  });
  return { blocks, quality: readNumber(raw.quality) ?? 0 };
}

/**
 * Accepts `[{documentId, pages: [{pageNumber?, text, layout?}]}]`. Page numbers
 * default to position + 1; a page's documentId is always its document's.
 */
export function parseDocumentInputs(raw: unknown): DocumentInput[] {
  if (!Array.isArray(raw)) throw new DocumentInputError('$', 'expected an array of documents');

  return raw.map((doc: unknown, d: number) => {
    const at = `$[${d}]`;
    if (!isRecord(doc)) throw new DocumentInputError(at, 'expected an object');
    const documentId = readString(doc.documentId);
    if (!documentId) throw new DocumentInputError(`${at}.documentId`, 'missing');
    if (!Array.isArray(doc.pages)) throw new DocumentInputError(`${at}.pages`, 'expected an array');

    const pages: PageInput[] = doc.pages.map((page: unknown, p: number) => {
      const pageAt = `${at}.pages[${p}]`;
      if (!isRecord(page) || typeof page.text !== 'string') throw new DocumentInputError(pageAt, 'page needs text');
      const pageNumber = readNumber(page.pageNumber) ?? p + 1;
      const layout = toLayout(page.layout, `${pageAt}.layout`);
      return { documentId, pageNumber, text: page.text, ...(layout ? { layout } : {}) };
    });
    return { documentId, pages };
  });
}
