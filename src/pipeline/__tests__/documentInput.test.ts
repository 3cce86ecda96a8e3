import { describe, it, expect } from 'vitest';
import { DocumentInputError, parseDocumentInputs } from '../documentInput';

describe('parseDocumentInputs', () => {
  it('fills page numbers and document ids', () => {
    const docs = parseDocumentInputs([
      {
        documentId: 'doc-a',
        pages: [
          { text: 'first' },
          {
            pageNumber: 7,
            text: 'second',
            layout: { quality: '0.5', blocks: [{ text: 'Supplier', bold: true }, { text: 'The person.' }] },
          },
        ],
      },
    ]);

    expect(docs).toEqual([
      {
        documentId: 'doc-a',
        pages: [
          { documentId: 'doc-a', pageNumber: 1, text: 'first' },
          {
            documentId: 'doc-a',
            pageNumber: 7,
            text: 'second',
            layout: {
              quality: 0.5,
              blocks: [
                { text: 'Supplier', bold: true },
                { text: 'The person.', bold: false },
              ],
            },
          },
        ],
      },
    ]);
  });

  it('points at the offending field', () => {
    expect(() => parseDocumentInputs({})).toThrow('Invalid document input at $: expected an array of documents');
    expect(() => parseDocumentInputs([{ pages: [] }])).toThrow('Invalid document input at $[0].documentId: missing');
    expect(() => parseDocumentInputs([{ documentId: 'd', pages: [{ text: 3 }] }])).toThrow(
      'Invalid document input at $[0].pages[0]: page needs text'
    );
    expect(() =>
      parseDocumentInputs([{ documentId: 'd', pages: [{ text: '', layout: { blocks: [{}] } }] }])
    ).toThrow(DocumentInputError);
  });
});
