import { describe, it, expect, vi } from 'vitest';
import type { Candidate, DocumentInput } from '../../extraction/types';
import { runAdapter, runBounded, type BoundedCallOptions } from '../runAdapter';
import type { EnhancementAdapter, EnrichmentContext } from '../types';

const DOC: DocumentInput = {
  documentId: 'doc-1',
  pages: [{ documentId: 'doc-1', pageNumber: 1, text: 'Federal Law No. (5) of 2020' }],
};

const CANDIDATE: Candidate = {
  kind: 'citation',
  rawText: 'Federal Law No. (5) of 2020',
  page: 1,
  sourceDocumentId: 'doc-1',
  extractionMethod: 'ner',
  confidence: 0.8,
};

function adapter(enrich: (ctx: EnrichmentContext) => Promise<Candidate[]>): EnhancementAdapter {
  return { name: 'fake', method: 'ner', enrich: (_doc, ctx) => enrich(ctx) };
}

function options(overrides: Partial<BoundedCallOptions> = {}): BoundedCallOptions {
  return { timeoutMs: 1000, retryCount: 2, backoffMs: 100, sleep: async () => undefined, ...overrides };
}

/* ============= runAdapter ============= */

describe('runAdapter', () => {
  it('returns candidates and a success report', async () => {
    const { candidates, report } = await runAdapter(adapter(async () => [CANDIDATE]), DOC, options());
    expect(candidates).toEqual([CANDIDATE]);
    expect(report).toMatchObject({ adapter: 'fake', status: 'success', attempts: 1, candidates: 1 });
    expect(report.error).toBeUndefined();
  });

  it('retries with exponential backoff', async () => {
    const waits: number[] = [];
    let calls = 0;
    const flaky = adapter(async () => {
      calls++;
      if (calls < 3) throw new Error('connection reset');
      return [CANDIDATE];
    });

    const { candidates, report } = await runAdapter(
      flaky,
      DOC,
      options({ sleep: async (ms) => void waits.push(ms) })
    );
    expect(candidates).toHaveLength(1);
    expect(report.attempts).toBe(3);
    expect(waits).toEqual([100, 200]);
  });

  it('contributes nothing once retries are exhausted', async () => {
    const enrich = vi.fn(async (): Promise<Candidate[]> => {
      throw new Error('boom');
    });
    const { candidates, report } = await runAdapter(adapter(enrich), DOC, options({ retryCount: 1 }));

    expect(candidates).toEqual([]);
    expect(enrich).toHaveBeenCalledTimes(2);
    expect(report).toMatchObject({ status: 'unavailable', attempts: 2, candidates: 0, error: 'boom' });
  });

  it('times out a hanging adapter and aborts its signal', async () => {
    let seen: AbortSignal | undefined;
    const hanging = adapter((ctx) => {
      seen = ctx.signal;
      return new Promise<Candidate[]>(() => undefined);
    });

    const { candidates, report } = await runAdapter(hanging, DOC, options({ timeoutMs: 10, retryCount: 0 }));
    expect(candidates).toEqual([]);
    expect(report.status).toBe('timeout');
    expect(report.error).toBe('Adapter "fake" timed out after 10ms');
    expect(seen?.aborted).toBe(true);
  });

  it('skips the pages of a page-scoped adapter once the deadline has passed', async () => {
    const enrichPage = vi.fn(async (): Promise<Candidate[]> => [CANDIDATE]);
    const perPage: EnhancementAdapter = { name: 'pages', method: 'ner', scope: 'page', enrichPage };

    const { candidates, report } = await runAdapter(perPage, DOC, options({ now: () => 1000, deadline: 1000 }));

    expect(enrichPage).not.toHaveBeenCalled();
    expect(candidates).toEqual([]);
    expect(report).toMatchObject({
      status: 'skipped',
      attempts: 0,
      error: 'document deadline passed',
      failedPages: [1],
    });
  });
});

/* ============= runBounded ============= */

describe('runBounded', () => {
  it('starts nothing after the deadline', async () => {
    const call = vi.fn(async () => 'value');
    const { value, report } = await runBounded(
      'late',
      call,
      'fallback',
      options({ now: () => 1000, deadline: 1000 })
    );

    expect(value).toBe('fallback');
    expect(call).not.toHaveBeenCalled();
    expect(report).toMatchObject({ status: 'skipped', attempts: 0, error: 'document deadline passed' });
  });

  it('caps the attempt budget at the remaining deadline', async () => {
    const { report } = await runBounded(
      'capped',
      () => new Promise<string>(() => undefined),
      'fallback',
      options({ timeoutMs: 1000, retryCount: 0, now: () => 0, deadline: 5 })
    );
    expect(report.error).toBe('Adapter "capped" timed out after 5ms');
  });
});
