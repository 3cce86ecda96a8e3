/* src/config.ts
   Centralized config: environment defaults and the immutable pipeline config */
import path from 'node:path';
import 'dotenv/config';
import { ConfigError } from './errors';

const env = (name: string, fallback?: string) =>
  (process.env[name] ?? fallback ?? '').toString();

const envNumber = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
};

export type AIProvider = 'dev' | 'openai' | 'anthropic';
export type TieBreakPolicy = 'more_evidence' | 'higher_confidence';

const AI_PROVIDERS: readonly AIProvider[] = ['dev', 'openai', 'anthropic'];
const TIE_BREAK_POLICIES: readonly TieBreakPolicy[] = ['more_evidence', 'higher_confidence'];

function parseProvider(raw: string): AIProvider {
  const found = AI_PROVIDERS.find((p) => p === raw.trim().toLowerCase());
  return found ?? 'dev';
}

function parseTieBreak(raw: string): TieBreakPolicy {
  const found = TIE_BREAK_POLICIES.find((p) => p === raw.trim().toLowerCase());
  return found ?? 'more_evidence';
}

export const config = {
  nodeEnv: env('NODE_ENV', 'development'),

  // ── Pipeline defaults ───────────────────────────────────────────
  pipeline: {
    highConfidenceThreshold: envNumber('HIGH_CONFIDENCE_THRESHOLD', 0.7),
    fuzzyMatchThreshold: envNumber('FUZZY_MATCH_THRESHOLD', 0.85),
    adapterTimeoutMs: envNumber('ADAPTER_TIMEOUT_MS', 15_000),
    adapterRetryCount: envNumber('ADAPTER_RETRY_COUNT', 2),
    adapterBackoffMs: envNumber('ADAPTER_BACKOFF_MS', 500),
    documentTimeoutMs: envNumber('DOCUMENT_TIMEOUT_MS', 60_000),
    lexicalWeight: envNumber('LEXICAL_WEIGHT', 0.5),
    tieBreak: parseTieBreak(env('MERGE_TIE_BREAK', 'more_evidence')),
  },

  // ── Record store ────────────────────────────────────────────────
  database: {
    path: env('DATABASE_PATH', path.join('storage', 'lexrecon.db')),
  },

  // ── AI ───────────────────────────────────────────────────────────
  ai: {
    provider: parseProvider(env('AI_PROVIDER', 'dev')),
    openaiKey: env('OPENAI_API_KEY'),
    anthropicKey: env('ANTHROPIC_API_KEY'),
    model: {
      openai: env('AI_MODEL_OPENAI', 'gpt-4o-mini'),
      anthropic: env('AI_MODEL_ANTHROPIC', 'claude-sonnet-4-5-20250929'),
      embedding: env('AI_MODEL_EMBEDDING', 'text-embedding-3-small'),
    },
  },
} as const;

/* ---------- Pipeline config ---------- */

/** Immutable settings handed to the merger, router and document pipeline. */
export interface PipelineConfig {
  readonly highConfidenceThreshold: number;
  readonly fuzzyMatchThreshold: number;
  readonly adapterTimeoutMs: number;
  readonly adapterRetryCount: number;
  readonly adapterBackoffMs: number;
  readonly documentTimeoutMs: number;
  /** Weight of the lexical score when an embedding score is also available. */
  readonly lexicalWeight: number;
  readonly tieBreak: TieBreakPolicy;
}

function assertUnitInterval(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigError(name, `must be a number in [0, 1], got ${value}`);
  }
}

function assertNonNegativeInt(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(name, `must be a non-negative integer, got ${value}`);
  }
}

/**
 * Build a frozen PipelineConfig from environment defaults plus overrides.
 * Throws ConfigError on out-of-range values.
 */
export function createPipelineConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  const merged: PipelineConfig = { ...config.pipeline, ...overrides };

  assertUnitInterval('highConfidenceThreshold', merged.highConfidenceThreshold);
  assertUnitInterval('fuzzyMatchThreshold', merged.fuzzyMatchThreshold);
  assertUnitInterval('lexicalWeight', merged.lexicalWeight);
  assertNonNegativeInt('adapterTimeoutMs', merged.adapterTimeoutMs);
  assertNonNegativeInt('adapterRetryCount', merged.adapterRetryCount);
  assertNonNegativeInt('adapterBackoffMs', merged.adapterBackoffMs);
  assertNonNegativeInt('documentTimeoutMs', merged.documentTimeoutMs);
  if (!TIE_BREAK_POLICIES.includes(merged.tieBreak)) {
    throw new ConfigError('tieBreak', `unknown policy "${String(merged.tieBreak)}"`);
  }

  return Object.freeze(merged);
}
