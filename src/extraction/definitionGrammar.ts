// src/extraction/definitionGrammar.ts
// Extraction: term/definition grammar.
//
// Three sources, each with its own confidence policy:
//   colon_pattern  "Term: definition"                   fixed 0.95
//   means_pattern  "Term" means / shall mean / ...      fixed 0.82
//   layout         bold term block + following blocks   0.6 + 0.3 x layout quality

import { isValidDefinitionText, isValidTerm } from './termRules';
import {
  roundConfidence,
  TRUNCATION_PENALTY,
  type DefinitionCandidate,
  type ExtractionMethod,
  type PageLayout,
} from './types';

/* ============= Constants ============= */

export const COLON_CONFIDENCE = 0.95;
export const MEANS_CONFIDENCE = 0.82;
export const LAYOUT_BASE_CONFIDENCE = 0.6;
export const LAYOUT_QUALITY_WEIGHT = 0.3;

/** Continuation lines appended to a definition before it is emitted */
export const DEFINITION_MAX_CONTINUATION_LINES = 6;
const LAYOUT_MAX_DEFINITION_BLOCKS = 3;
const APPEND_PERIOD_MIN_LENGTH = 20;

const LIST_MARKER = String.raw`(?:[-•–—*]\s*)?(?:\(?[a-z0-9]{1,3}[.)]\s+)?`;
const COLON_LINE = new RegExp(
  String.raw`^\s*${LIST_MARKER}["“']?([A-ZÀ-ɏ][^:"”\n]{0,79}?)["”']?\s*:\s*(.*)$`
);
const MEANS_LINE = new RegExp(
  String.raw`^\s*${LIST_MARKER}(?:The\s+)?["“']?([A-ZÀ-ɏ][^"”:\n]{0,79}?)["”']?\s+(?:means|shall\s+mean|refers\s+to|is\s+defined\s+as|denotes)\b\s*(.*)$`
);
const HEADING_LINE = /^\s*(?:article|chapter|section|part)\s*\(?\s*(?:\d+|[ivxlc]+)\b/i;
const TERMINAL_PUNCTUATION = /[.;)!?]$/;

/* ============= Normalization ============= */

/** Clean a raw term: quotes, edge punctuation, whitespace, a leading "The" */
export function cleanTerm(raw: string): string {
  return raw
    .replace(/[“”"']/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^[:.,;\-—–\s]+|[:.,;\-—–\s]+$/g, '')
    .replace(/^the\s+/i, '');
}

/** Clean definition text and close long sentences with a period */
export function cleanDefinitionText(raw: string): string {
  let out = raw
    .replace(/(\p{L})-\s*\n\s*(\p{L})/gu, '$1$2')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^[:,;\-—–\s]+/, '')
    .replace(/[,;:\s]+$/, '');
  if (out.length > APPEND_PERIOD_MIN_LENGTH && !/[.!?)]$/.test(out)) out += '.';
  return out;
}

/** Join wrapped lines, healing words hyphenated across the break */
function joinLines(lines: string[]): string {
  let out = '';
  for (const raw of lines) {
    const line = raw.trim();
    if (!out) {
      out = line;
    } else if (/\p{L}-$/u.test(out)) {
      out = out.slice(0, -1) + line;
    } else {
      out = `${out} ${line}`;
    }
  }
  return out;
}

/* ============= Line Matching ============= */

interface DefinitionStart {
  term: string;
  firstLineDefinition: string;
  method: Extract<ExtractionMethod, 'colon_pattern' | 'means_pattern'>;
  /** Offset of the match start within the line (leading space skipped) */
  lead: number;
}

/** Match a line that opens a definition with a valid term, colon form first */
export function matchDefinitionStart(line: string): DefinitionStart | null {
  const lead = line.length - line.trimStart().length;

  const colon = COLON_LINE.exec(line);
  if (colon) {
    const term = cleanTerm(colon[1]);
    if (isValidTerm(term)) {
      return { term, firstLineDefinition: colon[2], method: 'colon_pattern', lead };
    }
  }

  const means = MEANS_LINE.exec(line);
  if (means) {
    const term = cleanTerm(means[1]);
    if (isValidTerm(term)) {
      return { term, firstLineDefinition: means[2], method: 'means_pattern', lead };
    }
  }
  return null;
}

/* ============= Text Scanner ============= */

interface OpenDefinition {
  start: DefinitionStart;
  lines: string[];
  spanStart: number;
  spanEnd: number;
}

function finish(
  open: OpenDefinition,
  truncated: boolean,
  page: number,
  documentId: string
): DefinitionCandidate | null {
  const definitionText = cleanDefinitionText(joinLines([open.start.firstLineDefinition, ...open.lines]));
  if (!isValidDefinitionText(definitionText)) return null;

  const base = open.start.method === 'colon_pattern' ? COLON_CONFIDENCE : MEANS_CONFIDENCE;
  return {
    kind: 'definition',
    rawText: '',
    term: open.start.term,
    definitionText,
    page,
    sourceDocumentId: documentId,
    extractionMethod: open.start.method,
    confidence: roundConfidence(truncated ? base * TRUNCATION_PENALTY : base),
    ...(truncated ? { possiblyTruncated: true } : {}),
    span: { start: open.spanStart, end: open.spanEnd },
  };
}

/**
 * Scan page text for colon- and means-pattern definitions. A definition runs
 * until a blank line, a heading, the next definition, or the continuation limit.
 */
export function* scanTextDefinitions(
  text: string,
  page: number,
  documentId: string
): Generator<DefinitionCandidate> {
  let open: OpenDefinition | null = null;
  let offset = 0;

  const close = (o: OpenDefinition, truncated: boolean): DefinitionCandidate | null => {
    const c = finish(o, truncated, page, documentId);
    if (!c) return null;
    return { ...c, rawText: text.slice(o.spanStart, o.spanEnd).replace(/\s+/g, ' ').trim() };
  };

  for (const line of text.split('\n')) {
    const lineOffset = offset;
    offset += line.length + 1;
    const trimmed = line.trim();

    const start = trimmed ? matchDefinitionStart(line) : null;
    const stops = trimmed === '' || start !== null || HEADING_LINE.test(line);

    if (open && (stops || open.lines.length >= DEFINITION_MAX_CONTINUATION_LINES)) {
      const c = close(open, false);
      if (c) yield c;
      open = null;
    } else if (open) {
      open.lines.push(trimmed);
      open.spanEnd = lineOffset + line.trimEnd().length;
      continue;
    }

    if (start) {
      open = {
        start,
        lines: [],
        spanStart: lineOffset + start.lead,
        spanEnd: lineOffset + line.trimEnd().length,
      };
    }
  }

  if (open) {
    const body = joinLines([open.start.firstLineDefinition, ...open.lines]);
    const c = close(open, !TERMINAL_PUNCTUATION.test(body));
    if (c) yield c;
  }
}

/* ============= Layout Pairing ============= */

export function layoutConfidence(quality: number, truncated: boolean): number {
  const q = Math.min(1, Math.max(0, Number.isFinite(quality) ? quality : 0));
  const base = LAYOUT_BASE_CONFIDENCE + LAYOUT_QUALITY_WEIGHT * q;
  return roundConfidence(truncated ? base * TRUNCATION_PENALTY : base);
}

/**
 * Pair bold term blocks with the plain blocks that follow them.
 * Blocks come from the page-layout collaborator in reading order.
 */
export function* scanLayoutDefinitions(
  layout: PageLayout,
  page: number,
  documentId: string
): Generator<DefinitionCandidate> {
  const { blocks } = layout;

  for (let i = 0; i < blocks.length; i++) {
    if (!blocks[i].bold) continue;
    const term = cleanTerm(blocks[i].text);
    if (!isValidTerm(term)) continue;

    const parts: string[] = [];
    let j = i + 1;
    while (j < blocks.length && !blocks[j].bold && parts.length < LAYOUT_MAX_DEFINITION_BLOCKS) {
      parts.push(blocks[j].text);
      j++;
    }
    if (parts.length === 0) continue;

    const body = joinLines(parts);
    const truncated = j === blocks.length && !TERMINAL_PUNCTUATION.test(body.trim());
    const definitionText = cleanDefinitionText(body);
    if (!isValidDefinitionText(definitionText)) continue;

    yield {
      kind: 'definition',
      rawText: `${term}: ${definitionText}`,
      term,
      definitionText,
      page,
      sourceDocumentId: documentId,
      extractionMethod: 'layout',
      confidence: layoutConfidence(layout.quality, truncated),
      ...(truncated ? { possiblyTruncated: true } : {}),
    };
  }
}
