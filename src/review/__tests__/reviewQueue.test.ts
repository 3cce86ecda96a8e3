import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { MergedRecord } from '../../merge/types';
import { InMemoryRecordRepository } from '../../store/recordRepository';
import { normalizeReviewItem, ReviewQueue, targetStatus, toReviewItem } from '../reviewQueue';

/* ============= Fixtures ============= */

function truncatedCitation(): MergedRecord {
  return {
    recordId: 'doc-1:citation:cabinet_resolution_9_2019',
    kind: 'citation',
    documentId: 'doc-1',
    key: { kind: 'citation', id: 'cabinet_resolution_9_2019', fallback: false },
    bestText: 'Cabinet Resolution No. (9) of 2019',
    displayText: 'Cabinet Resolution No. (9) of 2019',
    confidence: 0.62,
    provenance: [
      {
        documentId: 'doc-1',
        page: 2,
        excerpt: 'Cabinet Resolution No. (9) of 2019',
        extractionMethod: 'regex',
        confidence: 0.62,
        possiblyTruncated: true,
        fingerprint: 'fp-1',
      },
    ],
    reviewStatus: 'flagged_for_review',
  };
}

function fallbackDefinition(): MergedRecord {
  return {
    recordId: 'doc-1:definition:unparsed_0123456789ab',
    kind: 'definition',
    documentId: 'doc-1',
    key: { kind: 'definition', id: 'unparsed_0123456789ab', fallback: true },
    bestText: 'FTA',
    displayText: 'FTA',
    confidence: 0.5,
    provenance: [
      { documentId: 'doc-1', page: 1, excerpt: 'FTA', extractionMethod: 'ner', confidence: 0.3, fingerprint: 'fp-2' },
      { documentId: 'doc-1', page: 4, excerpt: 'FTA', extractionMethod: 'layout', confidence: 0.3, fingerprint: 'fp-3' },
    ],
    reviewStatus: 'flagged_for_review',
  };
}

function acceptedCitation(): MergedRecord {
  return {
    ...truncatedCitation(),
    recordId: 'doc-1:citation:federal_law_5_2020',
    key: { kind: 'citation', id: 'federal_law_5_2020', fallback: false },
    confidence: 0.9,
    reviewStatus: 'accepted',
  };
}

function setup() {
  const repo = new InMemoryRecordRepository();
  repo.putMany([truncatedCitation(), acceptedCitation(), fallbackDefinition()]);
  return { repo, queue: new ReviewQueue(repo, { highConfidenceThreshold: 0.7 }) };
}

/* ============= toReviewItem ============= */

describe('toReviewItem', () => {
  it('describes why a record needs review', () => {
    expect(toReviewItem(truncatedCitation())).toEqual({
      recordId: 'doc-1:citation:cabinet_resolution_9_2019',
      kind: 'citation',
      rawText: 'Cabinet Resolution No. (9) of 2019',
      page: 2,
      confidence: 0.62,
      extractionMethod: 'regex',
      reason: 'Low confidence (0.62)',
      flags: ['possibly_truncated', 'single_source'],
    });
  });

  it('takes page and method from the first of equally strong entries', () => {
    const item = toReviewItem(fallbackDefinition());
    expect(item.page).toBe(1);
    expect(item.extractionMethod).toBe('ner');
    expect(item.flags).toEqual(['unparsed_key']);
  });
});

describe('targetStatus', () => {
  it('maps decisions onto statuses', () => {
    expect(targetStatus({ decision: 'reject' })).toBe('rejected');
    expect(targetStatus({ decision: 'accept' })).toBe('accepted');
    expect(targetStatus({ decision: 'accept', correctedText: 'Federal Law No. (6) of 2020' })).toBe('corrected');
  });
});

/* ============= ReviewQueue ============= */

describe('ReviewQueue', () => {
  it('exports only flagged records in insertion order', () => {
    const { queue } = setup();
    expect(queue.exportReviewQueue().map((i) => i.recordId)).toEqual([
      'doc-1:citation:cabinet_resolution_9_2019',
      'doc-1:definition:unparsed_0123456789ab',
    ]);
    expect(queue.exportReviewQueue({ documentId: 'doc-2' })).toEqual([]);
  });

  it('applies a correction once and treats a repeat as a no-op', () => {
    const { queue, repo } = setup();
    const id = 'doc-1:citation:cabinet_resolution_9_2019';

    const first = queue.importCorrection(id, {
      decision: 'accept',
      correctedText: 'Cabinet Resolution No. (9) of 2019 on Tax Procedures',
      reviewedBy: 'reviewer-1',
    });
    const second = queue.importCorrection(id, {
      decision: 'accept',
      correctedText: 'Cabinet Resolution No. (9) of 2019 on Tax Procedures',
      reviewedBy: 'reviewer-1',
    });

    expect(first.ok && first.changed).toBe(true);
    expect(second.ok && !second.changed).toBe(true);
    expect(repo.get(id)).toMatchObject({
      reviewStatus: 'corrected',
      correctedText: 'Cabinet Resolution No. (9) of 2019 on Tax Procedures',
      reviewedBy: 'reviewer-1',
    });
    expect(queue.exportReviewQueue()).toHaveLength(1);
  });

  it('refuses to reopen a final decision', () => {
    const { queue, repo } = setup();
    const id = 'doc-1:citation:cabinet_resolution_9_2019';
    queue.importCorrection(id, { decision: 'reject' });

    const result = queue.importCorrection(id, { decision: 'accept' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.recordId).toBe(id);
      expect(result.error.message).toBe(
        `Review import mismatch for ${id}: record is rejected, correction asks for accepted`
      );
    }
    expect(repo.get(id)?.reviewStatus).toBe('rejected');
  });

  it('reports corrections for unknown records', () => {
    const { queue } = setup();
    const result = queue.importCorrection('doc-9:citation:nothing', { decision: 'accept' });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.name).toBe('ReviewImportMismatchError');
  });

  it('lets an accepted record be rejected later', () => {
    const { queue } = setup();
    const result = queue.importCorrection('doc-1:citation:federal_law_5_2020', { decision: 'reject' });
    expect(result.ok && result.record.reviewStatus).toBe('rejected');
  });

  it('imports decided batch items and skips the rest', () => {
    const { queue } = setup();
    const [cite, def] = queue.exportReviewQueue();
    const results = queue.importReviewBatch([{ ...cite, decision: 'accept' }, def]);

    expect(results).toHaveLength(1);
    expect(queue.exportReviewQueue().map((i) => i.recordId)).toEqual([def.recordId]);
  });

  it('summarizes the queue', () => {
    const { queue } = setup();
    expect(queue.summary()).toEqual({
      total: 2,
      byKind: { citation: 1, definition: 1 },
      byReason: { possibly_truncated: 1, single_source: 1, unparsed_key: 1 },
      byStatus: { flagged_for_review: 2, accepted: 1 },
      averageConfidence: 0.56,
    });
    expect(queue.threshold).toBe(0.7);
  });

  /* ---------- Review files ---------- */

  describe('review files', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'review-queue-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('round-trips decisions through a file', async () => {
      const { queue } = setup();
      const file = path.join(dir, 'nested', 'review_queue.json');

      expect(await queue.writeReviewFile(file)).toBe(2);
      const written: unknown = JSON.parse(await fs.readFile(file, 'utf8'));
      expect(written).toMatchObject({ threshold: 0.7 });

      const items = await queue.readReviewFile(file);
      expect(items).toEqual(queue.exportReviewQueue());

      const results = queue.importReviewBatch(items.map((i) => ({ ...i, decision: 'reject' as const })));
      expect(results.every((r) => r.ok)).toBe(true);
      expect(queue.exportReviewQueue()).toEqual([]);
    });

    it('skips unusable items in a bare array file', async () => {
      const { queue } = setup();
      const file = path.join(dir, 'review.json');
      const [item] = queue.exportReviewQueue();
      await fs.writeFile(file, JSON.stringify([{ recordId: 'x' }, item]), 'utf8');

      expect(await queue.readReviewFile(file)).toEqual([item]);
    });
  });
});

/* ============= normalizeReviewItem ============= */

describe('normalizeReviewItem', () => {
  it('accepts numeric strings and drops unknown decisions', () => {
    const item = normalizeReviewItem({
      recordId: 'doc-1:citation:x',
      kind: 'citation',
      rawText: 'Federal Law No. (5) of 2020',
      page: '3',
      confidence: '0.4',
      extractionMethod: 'regex',
      decision: 'maybe',
    });
    expect(item).toEqual({
      recordId: 'doc-1:citation:x',
      kind: 'citation',
      rawText: 'Federal Law No. (5) of 2020',
      page: 3,
      confidence: 0.4,
      extractionMethod: 'regex',
      reason: 'Low confidence (0.40)',
      flags: [],
    });
  });

  it('rejects unknown kinds and methods', () => {
    const base = { recordId: 'r', rawText: 't', page: 1, confidence: 0.5 };
    expect(normalizeReviewItem({ ...base, kind: 'clause', extractionMethod: 'regex' })).toBeUndefined();
    expect(normalizeReviewItem({ ...base, kind: 'citation', extractionMethod: 'embedding' })).toBeUndefined();
  });
});
