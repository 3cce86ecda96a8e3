// src/observability/metrics.ts
// Prometheus metrics for extraction, merging, routing and adapter calls.
//
// The registry is exposed for whoever hosts the pipeline (a scrape endpoint,
// a push gateway job, or a dump at the end of a batch run).

import { Registry, Counter, Histogram, collectDefaultMetrics } from "prom-client";

/* ---------- Configuration ---------- */
const METRICS_PREFIX = process.env.METRICS_PREFIX || "lexrecon";
export const METRICS_ENABLED = process.env.METRICS_ENABLED !== "false";

/* ---------- Registry ---------- */
export const registry = new Registry();

registry.setDefaultLabels({
  service: "lexrecon",
});

if (METRICS_ENABLED) {
  collectDefaultMetrics({ register: registry, prefix: `${METRICS_PREFIX}_` });
}

/* ---------- Extraction Metrics ---------- */

export const candidatesExtractedTotal = new Counter({
  name: `${METRICS_PREFIX}_candidates_extracted_total`,
  help: "Candidates produced by the pattern extractor and enhancement adapters",
  labelNames: ["kind", "method"] as const,
  registers: [registry],
});

export const candidatesDroppedTotal = new Counter({
  name: `${METRICS_PREFIX}_candidates_dropped_total`,
  help: "Malformed candidates dropped before merging",
  registers: [registry],
});

/* ---------- Merge / Routing Metrics ---------- */

export const recordsMergedTotal = new Counter({
  name: `${METRICS_PREFIX}_records_merged_total`,
  help: "Merged records produced per document run",
  labelNames: ["kind"] as const,
  registers: [registry],
});

export const routingDecisionsTotal = new Counter({
  name: `${METRICS_PREFIX}_routing_decisions_total`,
  help: "Confidence router decisions by resulting status",
  labelNames: ["status"] as const,
  registers: [registry],
});

/* ---------- Adapter Metrics ---------- */

export const adapterCallsTotal = new Counter({
  name: `${METRICS_PREFIX}_adapter_calls_total`,
  help: "Enhancement adapter calls by outcome",
  labelNames: ["adapter", "status"] as const,
  registers: [registry],
});

export const adapterCallDuration = new Histogram({
  name: `${METRICS_PREFIX}_adapter_call_duration_seconds`,
  help: "Enhancement adapter call duration in seconds",
  labelNames: ["adapter"] as const,
  buckets: [0.1, 0.5, 1, 2.5, 5, 10, 30, 60],
  registers: [registry],
});

/* ---------- AI Metrics ---------- */

export const aiRequestsTotal = new Counter({
  name: `${METRICS_PREFIX}_ai_requests_total`,
  help: "Total number of AI provider requests",
  labelNames: ["action", "provider", "status"] as const,
  registers: [registry],
});

export const aiRequestDuration = new Histogram({
  name: `${METRICS_PREFIX}_ai_request_duration_seconds`,
  help: "AI provider request duration in seconds",
  labelNames: ["action", "provider"] as const,
  buckets: [0.5, 1, 2.5, 5, 10, 30, 60, 120],
  registers: [registry],
});

/* ---------- Document Metrics ---------- */

export const documentDuration = new Histogram({
  name: `${METRICS_PREFIX}_document_duration_seconds`,
  help: "End-to-end processing time per document",
  labelNames: ["status"] as const,
  buckets: [0.05, 0.1, 0.5, 1, 5, 15, 60, 120],
  registers: [registry],
});

/* ---------- Helper Functions ---------- */

export function recordCandidateExtracted(kind: string, method: string): void {
  if (!METRICS_ENABLED) return;
  candidatesExtractedTotal.inc({ kind, method });
}

export function recordCandidatesDropped(count: number): void {
  if (!METRICS_ENABLED || count <= 0) return;
  candidatesDroppedTotal.inc(count);
}

export function recordRecordsMerged(kind: string, count: number): void {
  if (!METRICS_ENABLED || count <= 0) return;
  recordsMergedTotal.inc({ kind }, count);
}

export function recordRoutingDecision(status: string): void {
  if (!METRICS_ENABLED) return;
  routingDecisionsTotal.inc({ status });
}

export function recordAdapterCall(
  adapter: string,
  status: "success" | "timeout" | "error",
  durationMs: number
): void {
  if (!METRICS_ENABLED) return;
  adapterCallsTotal.inc({ adapter, status });
  adapterCallDuration.observe({ adapter }, durationMs / 1000);
}

export function recordAiRequest(
  action: string,
  provider: string,
  status: "success" | "error",
  durationMs: number
): void {
  if (!METRICS_ENABLED) return;
  aiRequestsTotal.inc({ action, provider, status });
  aiRequestDuration.observe({ action, provider }, durationMs / 1000);
}

export function recordDocumentProcessed(status: "success" | "error", durationMs: number): void {
  if (!METRICS_ENABLED) return;
  documentDuration.observe({ status }, durationMs / 1000);
}
