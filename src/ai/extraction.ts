// src/ai/extraction.ts
// AI helpers shared by enrichment passes: output markers, response JSON
// recovery, timeouts and prompt-size guards.

/* ============= Output Markers ============= */

export const OUT_START = '<<<LEXRECON_OUTPUT_START>>>';
export const OUT_END = '<<<LEXRECON_OUTPUT_END>>>';

/* ============= Timeouts ============= */

/**
 * Race a promise against a timer. The timer is always cleared.
 * `onTimeout` is the rejection message, or a factory for a typed error.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: string | (() => Error)
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(
      () => reject(typeof onTimeout === 'string' ? new Error(onTimeout) : onTimeout()),
      timeoutMs
    );
  });
  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutId !== undefined) clearTimeout(timeoutId);
  }
}

/* ============= Prompt Size ============= */

const MAX_PROMPT_CHARS = 24_000;

export function truncateForPrompt(
  text: string,
  limit = MAX_PROMPT_CHARS
): { text: string; truncated: boolean; originalLength: number } {
  if (text.length <= limit) {
    return { text, truncated: false, originalLength: text.length };
  }
  return {
    text: `${text.slice(0, limit)}\n\n[...page truncated, showing first ${limit} of ${text.length} characters...]`,
    truncated: true,
    originalLength: text.length,
  };
}

/* ============= Empty Content Guard ============= */

export function isExtractableText(text: string): { extractable: boolean; reason?: string } {
  const stripped = text.replace(/\s+/g, ' ').trim();
  if (stripped.length < 50) {
    return { extractable: false, reason: 'text_too_short' };
  }
  const alphanumeric = stripped.replace(/[^\p{L}\p{N}]/gu, '');
  if (alphanumeric.length < 20) {
    return { extractable: false, reason: 'insufficient_meaningful_content' };
  }
  return { extractable: true };
}

/* ============= Response Parsing ============= */

function stripCodeFences(s: string): string {
  let out = s.trim();
  if (out.startsWith('```')) {
    const firstNl = out.indexOf('\n');
    if (firstNl !== -1) out = out.slice(firstNl + 1);
    const lastFence = out.lastIndexOf('```');
    if (lastFence !== -1) out = out.slice(0, lastFence);
    out = out.trim();
  }
  return out;
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Pull JSON out of a model response:
 * 1. strip code fences
 * 2. slice between OUT_START / OUT_END when both are present
 * 3. parse, falling back to the outermost {...} or [...] span
 */
export function extractJsonFromResponse(raw: string): {
  json: unknown;
  parseError?: string;
  usedMarkers: boolean;
} {
  let text = stripCodeFences(raw);

  const startIdx = text.indexOf(OUT_START);
  const endIdx = text.indexOf(OUT_END);
  let usedMarkers = false;
  if (startIdx !== -1 && endIdx !== -1 && endIdx > startIdx) {
    text = stripCodeFences(text.slice(startIdx + OUT_START.length, endIdx));
    usedMarkers = true;
  }

  const direct = tryParse(text);
  if (direct.ok) return { json: direct.value, usedMarkers };

  for (const pattern of [/\{[\s\S]*\}/, /\[[\s\S]*\]/]) {
    const match = pattern.exec(text);
    if (!match) continue;
    const inner = tryParse(match[0]);
    if (inner.ok) return { json: inner.value, usedMarkers };
  }

  return { json: null, parseError: `Failed to parse JSON: ${direct.error}`, usedMarkers };
}

/* ============= Value Guards ============= */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Trimmed non-empty string, or undefined */
export function readString(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const t = value.trim();
  return t ? t : undefined;
}

/** Finite number, or undefined */
export function readNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}
