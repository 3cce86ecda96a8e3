// src/ai/embeddings.ts
// Text embeddings for near-duplicate detection.
//
// 'openai' calls the embeddings endpoint; 'dev' hashes character trigrams into
// a fixed-size vector, deterministic and offline. Anthropic has no embedding
// endpoint, so asking for it is reported as an unavailable adapter.

import { config, type AIProvider } from '../config';
import { normalizeText } from '../canonical/canonicalizer';
import { AdapterUnavailableError } from '../errors';
import { recordAiRequest } from '../observability/metrics';

export interface EmbedOptions {
  provider?: AIProvider;
  model?: string;
}

const DEV_DIMENSIONS = 64;
const MAX_BATCH = 256; // inputs per embeddings request

/* ---------- Dev stub ---------- */

function fnv1a(text: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    h ^= text.charCodeAt(i);
    h = Math.imul(h, 0x01000193) >>> 0;
  }
  return h;
}

/** Bag of hashed character trigrams over the normalized text */
export function hashedEmbedding(text: string, dimensions = DEV_DIMENSIONS): number[] {
  const vec = new Array<number>(dimensions).fill(0);
  const norm = ` ${normalizeText(text)} `;
  for (let i = 0; i + 3 <= norm.length; i++) {
    vec[fnv1a(norm.slice(i, i + 3)) % dimensions] += 1;
  }
  return vec;
}

/* ---------- OpenAI ---------- */

async function embedOpenAI(texts: string[], model: string): Promise<number[][]> {
  const { default: OpenAI } = await import('openai');
  const client = new OpenAI({ apiKey: config.ai.openaiKey });

  const out: number[][] = [];
  for (let i = 0; i < texts.length; i += MAX_BATCH) {
    const batch = texts.slice(i, i + MAX_BATCH);
    const resp = await client.embeddings.create({ model, input: batch });
    const ordered = [...resp.data].sort((a, b) => a.index - b.index);
    for (const item of ordered) out.push(item.embedding);
  }
  return out;
}

/* ---------- Entry ---------- */

/** One vector per input text, in input order */
export async function embedTexts(texts: string[], opts: EmbedOptions = {}): Promise<number[][]> {
  const provider = opts.provider ?? config.ai.provider;
  if (texts.length === 0) return [];

  if (provider === 'anthropic') {
    throw new AdapterUnavailableError('embeddings', 'provider "anthropic" has no embedding endpoint');
  }

  const started = Date.now();
  try {
    const vectors =
      provider === 'openai'
        ? await embedOpenAI(texts, opts.model || config.ai.model.embedding)
        : texts.map((t) => hashedEmbedding(t));
    recordAiRequest('embed', provider, 'success', Date.now() - started);
    return vectors;
  } catch (err) {
    recordAiRequest('embed', provider, 'error', Date.now() - started);
    throw err;
  }
}
