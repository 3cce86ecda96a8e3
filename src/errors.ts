// src/errors.ts
// Error taxonomy for the extraction-reconciliation pipeline.
//
// None of these abort a document run: callers catch them at the smallest
// unit (one candidate, one adapter call, one record) and carry on.

/** Thrown by createPipelineConfig when a setting is out of range */
export class ConfigError extends Error {
  constructor(public readonly setting: string, detail: string) {
    super(`Invalid pipeline config "${setting}": ${detail}`);
    this.name = "ConfigError";
  }
}

/** A candidate that fails validation before merging; dropped, never fatal */
export class MalformedCandidateError extends Error {
  constructor(public readonly reason: string, public readonly index: number) {
    super(`Malformed candidate at index ${index}: ${reason}`);
    this.name = "MalformedCandidateError";
  }
}

/** An enrichment source could not be reached or failed outright */
export class AdapterUnavailableError extends Error {
  constructor(public readonly adapter: string, cause: string) {
    super(`Adapter "${adapter}" unavailable: ${cause}`);
    this.name = "AdapterUnavailableError";
  }
}

/** An enrichment source did not answer within its time budget */
export class AdapterTimeoutError extends Error {
  constructor(public readonly adapter: string, public readonly timeoutMs: number) {
    super(`Adapter "${adapter}" timed out after ${timeoutMs}ms`);
    this.name = "AdapterTimeoutError";
  }
}

/** Correction import for an unknown record, or one that contradicts a final decision */
export class ReviewImportMismatchError extends Error {
  constructor(public readonly recordId: string, detail: string) {
    super(`Review import mismatch for ${recordId}: ${detail}`);
    this.name = "ReviewImportMismatchError";
  }
}

/** Attempted review status change that the state machine does not allow */
export class InvalidTransitionError extends Error {
  constructor(public readonly from: string, public readonly to: string) {
    super(`Invalid review status transition: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}
