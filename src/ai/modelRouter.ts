/* src/ai/modelRouter.ts
   Provider-agnostic "compose text" with provider/model/seed overrides.
   The 'dev' provider is a deterministic stub that never leaves the process.
*/
import { config, type AIProvider } from '../config';
import { recordAiRequest } from '../observability/metrics';

export type ProviderName = AIProvider;

export interface ComposeOptions {
  systemPrompt?: string;
  maxTokens?: number;
  provider?: ProviderName;
  model?: string;
  seed?: string | number;
}

export interface ComposeResult {
  text: string;
  provider: ProviderName;
  model: string;
  raw?: unknown;
}

export type ComposeFn = (prompt: string, opts?: ComposeOptions) => Promise<ComposeResult>;

/* ------------------------------ helpers ------------------------------ */

function normalizeSeedNumber(seed?: string | number): number | undefined {
  if (seed == null) return undefined;
  const n = typeof seed === 'number' ? seed : Number(String(seed).trim());
  return Number.isFinite(n) ? Math.floor(n) : undefined;
}

/* ------------------------------ providers ------------------------------ */

async function composeOpenAI(prompt: string, opts: ComposeOptions): Promise<ComposeResult> {
  const { default: OpenAI } = await import('openai');
  const client = new OpenAI({ apiKey: config.ai.openaiKey });
  const model = opts.model || config.ai.model.openai;

  const resp = await client.chat.completions.create({
    model,
    messages: [
      ...(opts.systemPrompt ? [{ role: 'system' as const, content: opts.systemPrompt }] : []),
      { role: 'user' as const, content: prompt },
    ],
    max_tokens: opts.maxTokens ?? 600,
    temperature: 0,
    seed: normalizeSeedNumber(opts.seed),
  });

  const text = (resp.choices[0]?.message?.content ?? '').trim();
  return { text, provider: 'openai', model, raw: resp };
}

async function composeAnthropic(prompt: string, opts: ComposeOptions): Promise<ComposeResult> {
  const { default: Anthropic } = await import('@anthropic-ai/sdk');
  const client = new Anthropic({ apiKey: config.ai.anthropicKey });
  const model = opts.model || config.ai.model.anthropic;

  const resp = await client.messages.create({
    model,
    max_tokens: opts.maxTokens ?? 600,
    temperature: 0,
    ...(opts.systemPrompt ? { system: opts.systemPrompt } : {}),
    messages: [{ role: 'user', content: prompt }],
  });

  const parts: string[] = [];
  for (const block of resp.content) {
    if (block.type === 'text' && block.text.trim()) parts.push(block.text.trim());
  }
  return { text: parts.join('\n\n').trim(), provider: 'anthropic', model, raw: resp };
}

/* ------------------------------ main entry ------------------------------ */

/**
 * Canonical text generation entry for enrichment passes.
 * Records an AI request metric per call, success or failure.
 */
export async function composeText(prompt: string, opts: ComposeOptions = {}): Promise<ComposeResult> {
  const provider: ProviderName = opts.provider ?? config.ai.provider;
  const started = Date.now();

  try {
    let result: ComposeResult;
    if (provider === 'openai') {
      result = await composeOpenAI(prompt, opts);
    } else if (provider === 'anthropic') {
      result = await composeAnthropic(prompt, opts);
    } else {
      const model = opts.model || 'dev-stub-1';
      result = { text: `Draft:\n${prompt}\n\n[dev stub; deterministic]`, provider, model };
    }
    recordAiRequest('compose', provider, 'success', Date.now() - started);
    return result;
  } catch (err) {
    recordAiRequest('compose', provider, 'error', Date.now() - started);
    throw err;
  }
}
