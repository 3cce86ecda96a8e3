// src/extraction/citationGrammar.ts
// Extraction: line-oriented citation grammar.
//
// A citation is an instrument-type keyword, a number token, a year token and an
// optional title clause ("on ...", "concerning ..."). Any of these may wrap onto
// the following lines, so the scanner keeps a small forward-looking state machine:
//
//   idle -> saw_type -> saw_number -> saw_year -> closing
//
// At most MAX_CONTINUATION_LINES extra lines are buffered before the citation is
// emitted as-is. A blank line always ends the citation in progress.

import {
  typeKeywordScanner,
  stickyTokenPatterns,
} from '../canonical/instrumentTypes';
import {
  roundConfidence,
  TRUNCATION_PENALTY,
  type CitationCandidate,
} from './types';

/* ============= Constants ============= */

export type CitationState = 'idle' | 'saw_type' | 'saw_number' | 'saw_year' | 'closing';

export const MAX_CONTINUATION_LINES = 2;
export const CITATION_MIN_LENGTH = 20;
export const CITATION_MAX_LENGTH = 200;

const BASE_CONFIDENCE = 0.85;
const FEATURE_BONUS = 0.05; // per: parenthesized number, year, title clause

// Title terminators: clause punctuation (not the period of "No."), parentheses, ", "
const TITLE_TERMINATOR = /[;:](?=\s|$)|(?<!\bNo)\.(?=\s|$)|[()]|,\s/g;
// Buffered text that plainly stops mid-phrase
const DANGLING_TAIL = /(?:\b(?:of|the|and|or|on|for|in|to|with|concerning|regarding|amending|a|an)|[-,])$/i;

/* ============= Buffer Parse ============= */

export interface CitationParse {
  state: Exclude<CitationState, 'idle'>;
  /** End of the citation text within the buffer (exclusive, trailing space trimmed) */
  end: number;
  /** End of the type + number + year portion */
  coreEnd: number;
  /** The buffer ran out while the grammar could still extend */
  open: boolean;
  parenthesizedNumber: boolean;
  hasYear: boolean;
  hasTitle: boolean;
}

function trimEndAt(text: string, pos: number): number {
  let i = pos;
  while (i > 0 && /\s/.test(text[i - 1])) i--;
  return i;
}

function isBlankFrom(text: string, pos: number): boolean {
  return text.slice(pos).trim() === '';
}

/**
 * Run the citation state machine over a buffer that begins with a type keyword
 * of the given length. Pure: the same buffer always yields the same parse.
 */
export function parseCitationBuffer(buffer: string, keywordLength: number): CitationParse {
  const tokens = stickyTokenPatterns();
  let pos = keywordLength;

  const result: CitationParse = {
    state: 'saw_type',
    end: pos,
    coreEnd: pos,
    open: isBlankFrom(buffer, pos),
    parenthesizedNumber: false,
    hasYear: false,
    hasTitle: false,
  };

  tokens.number.lastIndex = pos;
  const num = tokens.number.exec(buffer);
  if (!num) return result;
  pos = num.index + num[0].length;
  result.state = 'saw_number';
  result.parenthesizedNumber = /\(\s*\d+\s*\)/.test(num[0]);
  result.end = result.coreEnd = trimEndAt(buffer, pos);
  result.open = isBlankFrom(buffer, pos);

  tokens.year.lastIndex = pos;
  const year = tokens.year.exec(buffer);
  if (!year) return result;
  pos = year.index + year[0].length;
  result.state = 'saw_year';
  result.hasYear = true;
  result.end = result.coreEnd = trimEndAt(buffer, pos);
  result.open = isBlankFrom(buffer, pos);

  tokens.title.lastIndex = pos;
  const title = tokens.title.exec(buffer);
  if (!title) return result;
  const titleStart = title.index + title[0].length;
  result.state = 'closing';
  result.hasTitle = true;

  let stop = -1;
  TITLE_TERMINATOR.lastIndex = titleStart;
  const terminator = TITLE_TERMINATOR.exec(buffer);
  if (terminator) stop = terminator.index;

  // another citation inside the title ends this one
  const nextKeyword = typeKeywordScanner();
  nextKeyword.lastIndex = titleStart;
  const kw = nextKeyword.exec(buffer);
  if (kw && (stop === -1 || kw.index < stop)) stop = kw.index;

  if (stop === -1) {
    result.end = trimEndAt(buffer, buffer.length);
    result.open = true;
  } else {
    result.end = trimEndAt(buffer, stop);
    result.open = false;
  }
  return result;
}

/* ============= Text Cleanup ============= */

/**
 * Collapse whitespace and strip bullets and trailing list punctuation
 * ("...; and", "...,").
 */
export function cleanCitationText(text: string): string {
  let out = text.replace(/\s+/g, ' ').trim();
  out = out.replace(/^[−–—•*\-\s]+/, '');
  let prev = '';
  while (prev !== out) {
    prev = out;
    out = out.replace(/[,;:\s]+$/, '').replace(/\s+(?:and|or)$/i, '');
  }
  return out;
}

export function citationConfidence(parse: CitationParse, truncated: boolean): number {
  let confidence = BASE_CONFIDENCE;
  if (parse.parenthesizedNumber) confidence += FEATURE_BONUS;
  if (parse.hasYear) confidence += FEATURE_BONUS;
  if (parse.hasTitle) confidence += FEATURE_BONUS;
  confidence = Math.min(1, confidence);
  return roundConfidence(truncated ? confidence * TRUNCATION_PENALTY : confidence);
}

/* ============= Scanner ============= */

interface Segment {
  bufferStart: number;
  pageStart: number;
}

interface PendingCitation {
  buffer: string;
  keywordLength: number;
  linesUsed: number;
  segments: Segment[];
}

interface PageLine {
  text: string;
  offset: number;
}

function splitLines(text: string): PageLine[] {
  const lines: PageLine[] = [];
  let offset = 0;
  for (const line of text.split('\n')) {
    lines.push({ text: line, offset });
    offset += line.length + 1;
  }
  return lines;
}

function toPageOffset(pending: PendingCitation, bufferIndex: number): number {
  let seg = pending.segments[0];
  for (const s of pending.segments) {
    if (s.bufferStart <= bufferIndex) seg = s;
  }
  return seg.pageStart + (bufferIndex - seg.bufferStart);
}

function extend(pending: PendingCitation, trimmedLine: string, pageStart: number): PendingCitation {
  const bufferStart = pending.buffer.length + 1;
  return {
    buffer: `${pending.buffer} ${trimmedLine}`,
    keywordLength: pending.keywordLength,
    linesUsed: pending.linesUsed + 1,
    segments: [...pending.segments, { bufferStart, pageStart }],
  };
}

/** Only a title clause needs a hint that the next line continues it */
function continuesLine(parse: CitationParse, buffer: string, nextLine: string): boolean {
  if (parse.state !== 'closing') return true;
  return /^[a-z(]/.test(nextLine) || DANGLING_TAIL.test(buffer.trimEnd());
}

function pageEndTruncates(parse: CitationParse, buffer: string): boolean {
  if (!parse.open) return false;
  if (parse.state === 'saw_number') return true;
  if (parse.state === 'closing') return DANGLING_TAIL.test(buffer.slice(0, parse.end));
  return false;
}

interface ScanContext {
  page: number;
  documentId: string;
}

function emit(
  pending: PendingCitation,
  parse: CitationParse,
  truncated: boolean,
  ctx: ScanContext
): CitationCandidate | null {
  if (parse.state === 'saw_type') return null;

  let end = parse.end;
  let effective = parse;
  let text = cleanCitationText(pending.buffer.slice(0, end));
  if (text.length > CITATION_MAX_LENGTH && parse.hasTitle) {
    // an overlong title is noise; keep the citation proper
    end = parse.coreEnd;
    effective = { ...parse, hasTitle: false };
    text = cleanCitationText(pending.buffer.slice(0, end));
  }
  if (text.length < CITATION_MIN_LENGTH || text.length > CITATION_MAX_LENGTH) return null;

  return {
    kind: 'citation',
    rawText: text,
    page: ctx.page,
    sourceDocumentId: ctx.documentId,
    extractionMethod: 'regex',
    confidence: citationConfidence(effective, truncated),
    ...(truncated ? { possiblyTruncated: true } : {}),
    span: { start: toPageOffset(pending, 0), end: toPageOffset(pending, end) },
  };
}

/**
 * Scan one page for citations. Each call starts a fresh scan, so the
 * generator can back a restartable iterable.
 */
export function* scanCitations(
  text: string,
  page: number,
  documentId: string
): Generator<CitationCandidate> {
  const ctx: ScanContext = { page, documentId };
  let pending: PendingCitation | null = null;

  for (const line of splitLines(text)) {
    let col = 0;

    if (pending) {
      const trimmed = line.text.trim();
      const before = parseCitationBuffer(pending.buffer, pending.keywordLength);

      if (trimmed === '') {
        const c = emit(pending, before, false, ctx);
        if (c) yield c;
        pending = null;
        continue;
      }

      const lead = line.text.length - line.text.trimStart().length;
      const extended = extend(pending, trimmed, line.offset + lead);
      const after = parseCitationBuffer(extended.buffer, extended.keywordLength);
      const progressed =
        after.end > pending.buffer.length && continuesLine(before, pending.buffer, trimmed);

      if (!progressed) {
        const c = emit(pending, before, false, ctx);
        if (c) yield c;
        pending = null;
        // the line is scanned from its start below
      } else if (!after.open) {
        const c = emit(extended, after, false, ctx);
        if (c) yield c;
        const last = extended.segments[extended.segments.length - 1];
        col = lead + (after.end - last.bufferStart);
        pending = null;
      } else if (extended.linesUsed >= MAX_CONTINUATION_LINES) {
        const c = emit(extended, after, false, ctx);
        if (c) yield c;
        pending = null;
        continue;
      } else {
        pending = extended;
        continue;
      }
    }

    const scanner = typeKeywordScanner();
    scanner.lastIndex = col;
    let m: RegExpExecArray | null;
    while ((m = scanner.exec(line.text)) !== null) {
      const start: PendingCitation = {
        buffer: line.text.slice(m.index),
        keywordLength: m[0].length,
        linesUsed: 0,
        segments: [{ bufferStart: 0, pageStart: line.offset + m.index }],
      };
      const parse = parseCitationBuffer(start.buffer, start.keywordLength);
      if (parse.open) {
        pending = start;
        break;
      }
      // keyword without a number is a mention, not a citation
      if (parse.state === 'saw_type') continue;

      const c = emit(start, parse, false, ctx);
      if (c) yield c;
      scanner.lastIndex = m.index + Math.max(parse.end, m[0].length);
    }
  }

  if (pending) {
    const parse = parseCitationBuffer(pending.buffer, pending.keywordLength);
    const c = emit(pending, parse, pageEndTruncates(parse, pending.buffer), ctx);
    if (c) yield c;
  }
}
