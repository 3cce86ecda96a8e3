import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { describe, it, expect } from 'vitest';
import { createPipelineConfig } from '../../config';
import type { DocumentInput } from '../../extraction/types';
import { DocumentPipeline } from '../documentPipeline';
import { toDocumentOutput, writeRunOutput } from '../outputExporter';

const doc: DocumentInput = {
  documentId: 'doc-a',
  pages: [
    {
      documentId: 'doc-a',
      pageNumber: 1,
      text: [
        'Article 1',
        'Authority: The Federal Tax Authority.',
        '',
        'This Law repeals Cabinet Resolution No. (52) of 2017.',
      ].join('\n'),
    },
  ],
};

async function processed() {
  const pipeline = new DocumentPipeline(createPipelineConfig({ highConfidenceThreshold: 0.7 }), { now: () => 1_000 });
  return pipeline.processDocument(doc, 'run-1');
}

/* ============= toDocumentOutput ============= */

describe('toDocumentOutput', () => {
  it('splits records into citations and term definitions', async () => {
    const output = toDocumentOutput(await processed());

    expect(output.metadata).toEqual({
      documentId: 'doc-a',
      pages: 1,
      processedAt: '1970-01-01T00:00:01.000Z',
      processingTimeSeconds: 0,
    });
    expect(output.citations).toEqual([
      {
        recordId: 'doc-a:citation:cabinet_resolution_52_2017',
        text: 'Cabinet Resolution No. (52) of 2017',
        displayText: 'Cabinet Resolution No. (52) of 2017',
        canonicalId: 'cabinet_resolution_52_2017',
        page: 1,
        confidence: 0.95,
        extractionMethod: 'regex',
        reviewStatus: 'accepted',
        provenance: [{ page: 1, excerpt: 'Cabinet Resolution No. (52) of 2017', extractionMethod: 'regex' }],
      },
    ]);
    expect(output.termDefinitions).toEqual([
      {
        recordId: 'doc-a:definition:authority',
        term: 'Authority',
        definition: 'The Federal Tax Authority.',
        normalizedTerm: 'authority',
        page: 1,
        confidence: 0.95,
        extractionMethod: 'colon_pattern',
        reviewStatus: 'accepted',
        provenance: [{ page: 1, excerpt: 'Authority: The Federal Tax Authority.', extractionMethod: 'colon_pattern' }],
      },
    ]);
  });

  it('leaves out rejected records and prefers corrected text', async () => {
    const result = await processed();
    const [cite, def] = result.records;
    const output = toDocumentOutput(result, [
      { ...cite, reviewStatus: 'rejected' },
      { ...def, reviewStatus: 'corrected', correctedText: 'The Federal Tax Authority of the State.' },
    ]);

    expect(output.citations).toEqual([]);
    expect(output.termDefinitions.map((d) => [d.definition, d.reviewStatus])).toEqual([
      ['The Federal Tax Authority of the State.', 'corrected'],
    ]);
  });

  it('carries the document error', async () => {
    const result = { ...(await processed()), error: 'disk full', processingTimeMs: 1234 };
    expect(toDocumentOutput(result).metadata).toMatchObject({ error: 'disk full', processingTimeSeconds: 1.23 });
  });
});

/* ============= writeRunOutput ============= */

describe('writeRunOutput', () => {
  it('writes one JSON object keyed by document', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'run-output-'));
    try {
      const output = toDocumentOutput(await processed());
      const file = path.join(dir, 'out', 'extraction_output.json');
      await writeRunOutput(file, [output]);

      const written: unknown = JSON.parse(await fs.readFile(file, 'utf8'));
      expect(written).toEqual({ 'doc-a': output });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
