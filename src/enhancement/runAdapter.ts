// src/enhancement/runAdapter.ts
// Enhancement: bounded execution of enrichment calls.
//
// Each call gets a timeout, a fixed number of retries with exponential backoff
// (backoffMs * 2^attempt), and an optional document deadline that both caps
// the current attempt and prevents new ones. On exhaustion the caller gets the
// fallback value (no candidates) and a report, never an exception.
// Page-scoped adapters get that treatment per page, so a failing page costs
// only its own candidates.

import { withTimeout } from '../ai/extraction';
import { AdapterTimeoutError } from '../errors';
import type { Candidate, DocumentInput } from '../extraction/types';
import { createLogger, type Logger } from '../observability/logger';
import { recordAdapterCall } from '../observability/metrics';
import type {
  AdapterReport,
  AdapterStatus,
  EnhancementAdapter,
  EnrichmentContext,
  PageEnhancementAdapter,
} from './types';

const moduleLog = createLogger('enhancement/runAdapter');

export interface BoundedCallOptions {
  timeoutMs: number;
  retryCount: number;
  backoffMs: number;
  /** Epoch ms; no attempt starts after it and running attempts are cut off at it */
  deadline?: number;
  log?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function runBounded<T>(
  name: string,
  call: (ctx: EnrichmentContext) => Promise<T>,
  fallback: T,
  opts: BoundedCallOptions
): Promise<{ value: T; report: Omit<AdapterReport, 'candidates'> }> {
  const now = opts.now ?? Date.now;
  const sleep = opts.sleep ?? defaultSleep;
  const log = opts.log ?? moduleLog;
  const deadline = opts.deadline ?? Number.POSITIVE_INFINITY;
  const started = now();

  let attempts = 0;
  let status: AdapterStatus = 'skipped';
  let lastError: string | undefined;

  for (let attempt = 0; attempt <= opts.retryCount; attempt++) {
    const remaining = deadline - now();
    if (remaining <= 0) {
      lastError = lastError ?? 'document deadline passed';
      break;
    }

    attempts++;
    const budget = Math.min(opts.timeoutMs, remaining);
    const controller = new AbortController();
    try {
      const value = await withTimeout(
        call({ signal: controller.signal, log: log.child({ adapter: name }) }),
        budget,
        () => new AdapterTimeoutError(name, budget)
      );
      const durationMs = now() - started;
      recordAdapterCall(name, 'success', durationMs);
      return { value, report: { adapter: name, status: 'success', attempts, durationMs } };
    } catch (err) {
      controller.abort();
      status = err instanceof AdapterTimeoutError ? 'timeout' : 'unavailable';
      lastError = err instanceof Error ? err.message : String(err);
      log.warn({ adapter: name, attempt: attempts, err: lastError }, 'Adapter call failed');

      if (attempt < opts.retryCount) {
        const wait = Math.min(opts.backoffMs * 2 ** attempt, Math.max(0, deadline - now()));
        if (wait > 0) await sleep(wait);
      }
    }
  }

  const durationMs = now() - started;
  recordAdapterCall(name, status === 'timeout' ? 'timeout' : 'error', durationMs);
  log.warn({ adapter: name, attempts, status, err: lastError }, 'Adapter exhausted, contributing nothing');
  return {
    value: fallback,
    report: { adapter: name, status, attempts, durationMs, ...(lastError ? { error: lastError } : {}) },
  };
}

/**
 * Run one enhancement adapter for a document. Failures and timeouts yield an
 * empty candidate list plus a report.
 */
export async function runAdapter(
  adapter: EnhancementAdapter,
  document: DocumentInput,
  opts: BoundedCallOptions
): Promise<{ candidates: Candidate[]; report: AdapterReport }> {
  if (adapter.scope === 'page') return runPerPage(adapter, document, opts);

  const empty: Candidate[] = [];
  const { value, report } = await runBounded(
    adapter.name,
    (ctx) => adapter.enrich(document, ctx),
    empty,
    opts
  );
  return { candidates: value, report: { ...report, candidates: value.length } };
}

async function runPerPage(
  adapter: PageEnhancementAdapter,
  document: DocumentInput,
  opts: BoundedCallOptions
): Promise<{ candidates: Candidate[]; report: AdapterReport }> {
  const now = opts.now ?? Date.now;
  const log = opts.log ?? moduleLog;
  const started = now();
  const empty: Candidate[] = [];

  const candidates: Candidate[] = [];
  const failedPages: number[] = [];
  let attempts = 0;
  let succeeded = 0;
  let failure: { status: AdapterStatus; error?: string } | undefined;

  for (const page of document.pages) {
    const { value, report } = await runBounded(
      adapter.name,
      (ctx) => adapter.enrichPage(page, ctx),
      empty,
      { ...opts, log: log.child({ page: page.pageNumber }) }
    );
    attempts += report.attempts;
    if (report.status === 'success') {
      succeeded++;
      candidates.push(...value);
      continue;
    }
    failedPages.push(page.pageNumber);
    failure = failure ?? { status: report.status, error: report.error };
  }

  const durationMs = now() - started;
  if (!failure) {
    return {
      candidates,
      report: { adapter: adapter.name, status: 'success', attempts, candidates: candidates.length, durationMs },
    };
  }

  const status: AdapterStatus = succeeded > 0 ? 'partial' : failure.status;
  log.warn({ adapter: adapter.name, status, failedPages }, 'Adapter lost pages');
  return {
    candidates,
    report: {
      adapter: adapter.name,
      status,
      attempts,
      candidates: candidates.length,
      durationMs,
      ...(failure.error ? { error: failure.error } : {}),
      failedPages,
    },
  };
}
