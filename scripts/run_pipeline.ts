// scripts/run_pipeline.ts
// Purpose: run the extraction-reconciliation pipeline over a JSON file of documents
// and write the per-document output plus the review-queue file.
//
// Usage:
//   npx tsx scripts/run_pipeline.ts --input=docs.json --out=output
//   npx tsx scripts/run_pipeline.ts --input=docs.json --out=output --ai --embeddings
//   npx tsx scripts/run_pipeline.ts --input=docs.json --out=output --db=storage/records.db
//   npx tsx scripts/run_pipeline.ts --input=docs.json --out=output --review=output/review_queue.json
//
// Input: [{ "documentId": "...", "pages": [{ "pageNumber": 1, "text": "...", "layout"?: {...} }] }]

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { config, createPipelineConfig } from '../src/config';
import { openDatabase } from '../src/db';
import { AiEnhancementAdapter } from '../src/enhancement/aiEnhancer';
import { EmbeddingSimilaritySource } from '../src/enhancement/embeddingSource';
import type { EnhancementAdapter } from '../src/enhancement/types';
import { parseDocumentInputs } from '../src/pipeline/documentInput';
import { DocumentPipeline } from '../src/pipeline/documentPipeline';
import { toDocumentOutput, writeRunOutput } from '../src/pipeline/outputExporter';
import { ReviewQueue } from '../src/review/reviewQueue';
import { InMemoryRecordRepository, type RecordRepository } from '../src/store/recordRepository';
import { SqliteRecordRepository } from '../src/store/sqliteRecordRepository';

type Flags = {
  input?: string;
  out: string;
  ai: boolean;
  embeddings: boolean;
  db?: string;
  review?: string;
  concurrency: number;
};

function parseFlags(argv: string[]): Flags {
  const f: Flags = { out: 'output', ai: false, embeddings: false, concurrency: 4 };
  for (const a of argv.slice(2)) {
    if (a.startsWith('--input=')) f.input = a.slice('--input='.length);
    else if (a.startsWith('--out=')) f.out = a.slice('--out='.length);
    else if (a === '--ai') f.ai = true;
    else if (a === '--embeddings') f.embeddings = true;
    else if (a.startsWith('--db=')) f.db = a.slice('--db='.length);
    else if (a.startsWith('--review=')) f.review = a.slice('--review='.length);
    else if (a.startsWith('--concurrency=')) f.concurrency = Number(a.slice('--concurrency='.length)) || 4;
  }
  return f;
}

async function main() {
  const flags = parseFlags(process.argv);
  const pipelineConfig = createPipelineConfig();

  const repository: RecordRepository = flags.db
    ? new SqliteRecordRepository(openDatabase(flags.db))
    : new InMemoryRecordRepository();
  const queue = new ReviewQueue(repository, pipelineConfig);

  // Re-import a reviewed file before (or instead of) a new run
  if (flags.review) {
    const items = await queue.readReviewFile(flags.review);
    const results = queue.importReviewBatch(items);
    const failed = results.filter((r) => !r.ok);
    for (const r of failed) if (!r.ok) console.error(`! ${r.error.message}`);
    console.log(JSON.stringify({ imported: results.length - failed.length, mismatched: failed.length }, null, 2));
    if (!flags.input) return;
  }

  if (!flags.input) {
    console.error('Usage: run_pipeline.ts --input=<documents.json> [--out=<dir>] [--ai] [--embeddings] [--db=<path>]');
    process.exitCode = 1;
    return;
  }

  const documents = parseDocumentInputs(JSON.parse(await fs.readFile(flags.input, 'utf8')));

  const adapters: EnhancementAdapter[] = [];
  if (flags.ai) adapters.push(new AiEnhancementAdapter({ provider: config.ai.provider }));
  const similarity = flags.embeddings
    ? new EmbeddingSimilaritySource({ provider: config.ai.provider, model: config.ai.model.embedding })
    : undefined;

  const pipeline = new DocumentPipeline(pipelineConfig, { adapters, similarity, repository });
  const { results, summary } = await pipeline.processDocuments(documents, { concurrency: flags.concurrency });

  await writeRunOutput(path.join(flags.out, 'extraction_output.json'), results.map((r) => toDocumentOutput(r)));
  const queued = await queue.writeReviewFile(path.join(flags.out, 'review_queue.json'));

  console.log(JSON.stringify({ ...summary, reviewQueue: queued, summary: queue.summary() }, null, 2));
  if (summary.failed > 0) process.exitCode = 1;
}

if (require.main === module) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
