// src/observability/index.ts
// Central export point for logging and metrics.

/* ---------- Logger ---------- */
export {
  createLogger,
  createDocumentLogger,
  getLogLevel,
  isPrettyEnabled,
  type DocumentLogContext,
  type Logger,
  type LogLevel,
} from "./logger";

/* ---------- Metrics ---------- */
export {
  registry,
  METRICS_ENABLED,
  recordCandidateExtracted,
  recordCandidatesDropped,
  recordRecordsMerged,
  recordRoutingDecision,
  recordAdapterCall,
  recordAiRequest,
  recordDocumentProcessed,
} from "./metrics";
