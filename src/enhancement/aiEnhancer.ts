// src/enhancement/aiEnhancer.ts
// Enhancement: generative-AI pass over each page.
//
// Page-scoped: the runner bounds every page on its own, so one failed model
// call loses that page and nothing else.
//
// The model is asked for citations and definitions as JSON between output
// markers; the response is normalized by hand before it becomes candidates.
// Reported confidence is capped, since the model's own estimate is optimistic.

import { composeText, type ComposeFn, type ProviderName } from '../ai/modelRouter';
import {
  extractJsonFromResponse,
  isExtractableText,
  isRecord,
  readNumber,
  readString,
  truncateForPrompt,
  OUT_START,
  OUT_END,
} from '../ai/extraction';
import { config } from '../config';
import type { Candidate, PageInput } from '../extraction/types';
import { createLogger, type Logger } from '../observability/logger';
import type { EnrichmentContext, PageEnhancementAdapter } from './types';

const moduleLog = createLogger('enhancement/aiEnhancer');

/* ============= Constants ============= */

export const AI_CONFIDENCE_CAP = 0.85;
export const AI_DEFAULT_CONFIDENCE = 0.75;
const MAX_AI_TOKENS = 1500;
const MAX_ITEMS_PER_PAGE = 100;

/* ============= System Prompt ============= */

const SYSTEM_PROMPT = `You extract legal facts from one page of a legal document.

Find:
- citations: references to other legal instruments (e.g. "Federal Decree-Law No. (7) of 2017 on Excise Tax", "Cabinet Resolution No. 52 of 2017")
- definitions: defined terms with their definition text (e.g. term "Authority", definition "The Federal Tax Authority.")

IMPORTANT:
1. Copy citation text exactly as it appears on the page
2. Do not invent citations or definitions that are not on the page
3. Give each item a confidence between 0.0 and 1.0
4. Return ONLY valid JSON, no explanations outside the markers

Return your response wrapped in markers:
${OUT_START}
{
  "citations": [{"text": "Federal Decree-Law No. (7) of 2017 on Excise Tax", "confidence": 0.9}],
  "definitions": [{"term": "Authority", "definition": "The Federal Tax Authority.", "confidence": 0.9}]
}
${OUT_END}`;

/* ============= Normalization ============= */

function aiConfidence(raw: unknown): number {
  const n = readNumber(raw);
  if (n === undefined) return AI_DEFAULT_CONFIDENCE;
  return Math.min(AI_CONFIDENCE_CAP, Math.max(0, n));
}

function itemsOf(value: unknown): unknown[] {
  return Array.isArray(value) ? value.slice(0, MAX_ITEMS_PER_PAGE) : [];
}

/**
 * Convert parsed model output for one page into candidates. Accepts
 * `{citations, definitions}`; citation items may be plain strings.
 * Items without usable text are skipped.
 */
export function normalizeAiCandidates(raw: unknown, page: PageInput): Candidate[] {
  if (!isRecord(raw)) return [];
  const out: Candidate[] = [];

  for (const item of itemsOf(raw.citations)) {
    const text = typeof item === 'string' ? readString(item) : isRecord(item) ? readString(item.text) : undefined;
    if (!text) continue;
    out.push({
      kind: 'citation',
      rawText: text,
      page: page.pageNumber,
      sourceDocumentId: page.documentId,
      extractionMethod: 'ai_enhancement',
      confidence: aiConfidence(isRecord(item) ? item.confidence : undefined),
    });
  }

  for (const item of itemsOf(raw.definitions)) {
    if (!isRecord(item)) continue;
    const term = readString(item.term);
    const definition = readString(item.definition);
    if (!term || !definition) continue;
    out.push({
      kind: 'definition',
      rawText: `${term}: ${definition}`,
      term,
      definitionText: definition,
      page: page.pageNumber,
      sourceDocumentId: page.documentId,
      extractionMethod: 'ai_enhancement',
      confidence: aiConfidence(item.confidence),
    });
  }

  return out;
}

/* ============= Adapter ============= */

export interface AiEnhancerOptions {
  provider?: ProviderName;
  model?: string;
  seed?: string | number;
  /** Injected text generation; defaults to the model router */
  compose?: ComposeFn;
  log?: Logger;
}

export class AiEnhancementAdapter implements PageEnhancementAdapter {
  readonly name = 'ai_enhancement';
  readonly method = 'ai_enhancement' as const;
  readonly scope = 'page' as const;
  private readonly compose: ComposeFn;

  constructor(private readonly options: AiEnhancerOptions = {}) {
    this.compose = options.compose ?? composeText;

    const provider = options.provider ?? config.ai.provider;
    if (!options.compose && provider === 'dev') {
      (options.log ?? moduleLog).warn(
        { provider },
        'AI pass runs on the dev stub provider and will contribute no candidates; set AI_PROVIDER'
      );
    }
  }

  async enrichPage(page: PageInput, ctx: EnrichmentContext): Promise<Candidate[]> {
    if (ctx.signal.aborted) return [];

    const guard = isExtractableText(page.text);
    if (!guard.extractable) {
      ctx.log.debug({ page: page.pageNumber, reason: guard.reason }, 'Skipping page for AI pass');
      return [];
    }

    const { text, truncated } = truncateForPrompt(page.text);
    const result = await this.compose(`Extract citations and definitions from this page:\n\n---\n${text}\n---`, {
      systemPrompt: SYSTEM_PROMPT,
      maxTokens: MAX_AI_TOKENS,
      provider: this.options.provider,
      model: this.options.model,
      seed: this.options.seed,
    });

    const { json, parseError, usedMarkers } = extractJsonFromResponse(result.text);
    if (parseError || json === null) {
      ctx.log.debug(
        { page: page.pageNumber, parseError, usedMarkers, provider: result.provider },
        'AI output not parseable, page contributes nothing'
      );
      return [];
    }

    if (truncated) ctx.log.debug({ page: page.pageNumber }, 'Page truncated for AI prompt');
    return normalizeAiCandidates(json, page);
  }
}
