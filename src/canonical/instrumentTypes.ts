// src/canonical/instrumentTypes.ts
// Canonical: the fixed enumeration of legal instrument types and the token
// patterns (type keyword, number, year, title clause) shared by the citation
// grammar and the canonicalizer.

/* ============= Instrument Types ============= */

export const INSTRUMENT_TYPES = [
  'federal_decree_law',
  'federal_law',
  'federal_decree',
  'cabinet_resolution',
  'cabinet_decision',
  'ministerial_resolution',
  'ministerial_decision',
  'law',
] as const;

export type InstrumentType = (typeof INSTRUMENT_TYPES)[number];

export function isInstrumentType(value: unknown): value is InstrumentType {
  return typeof value === 'string' && INSTRUMENT_TYPES.some((t) => t === value);
}

interface InstrumentPattern {
  type: InstrumentType;
  source: string;
  /** Lookahead the scanner also requires; not part of the matched keyword */
  guard?: string;
}

// Most specific first: "Federal Decree-Law" must win over "Federal Decree",
// and any qualified keyword over a bare "Law".
const INSTRUMENT_PATTERNS: readonly InstrumentPattern[] = [
  { type: 'federal_decree_law', source: String.raw`Federal\s+Decree[-\s]?(?:by[-\s]+)?Law` },
  { type: 'federal_decree_law', source: String.raw`Decree[-\s]?(?:by[-\s]+)?Law` },
  { type: 'federal_law', source: String.raw`Federal\s+Law` },
  { type: 'federal_decree', source: String.raw`Federal\s+Decree` },
  { type: 'cabinet_resolution', source: String.raw`Cabinet\s+Resolution` },
  { type: 'cabinet_decision', source: String.raw`Cabinet\s+Decision` },
  { type: 'ministerial_resolution', source: String.raw`Ministerial\s+Resolution` },
  { type: 'ministerial_decision', source: String.raw`Ministerial\s+Decision` },
  // bare "law" is common prose; only a following number makes it an instrument
  {
    type: 'law',
    source: 'Law',
    guard: String.raw`(?=\s*(?:No\.?\s*\(?\s*\d|Number\s*\d|#\s*\d|\(\s*\d))`,
  },
];

export const INSTRUMENT_LABELS: Readonly<Record<InstrumentType, string>> = {
  federal_decree_law: 'Federal Decree-Law',
  federal_law: 'Federal Law',
  federal_decree: 'Federal Decree',
  cabinet_resolution: 'Cabinet Resolution',
  cabinet_decision: 'Cabinet Decision',
  ministerial_resolution: 'Ministerial Resolution',
  ministerial_decision: 'Ministerial Decision',
  law: 'Law',
};

const TYPE_ALTERNATION = INSTRUMENT_PATTERNS.map((p) => p.source + (p.guard ?? '')).join('|');
const ANCHORED_PATTERNS = INSTRUMENT_PATTERNS.map((p) => ({
  type: p.type,
  re: new RegExp(`^(?:${p.source})$`, 'i'),
}));

/* ============= Token Patterns ============= */

const NUMBER_SOURCE = String.raw`\s*(?:No\.?|Number|#)\s*\(?\s*(\d{1,5})\s*\)?|\s*\(\s*(\d{1,5})\s*\)|\s+(\d{1,5})(?=\s*\/\s*\d{4}|\s+of\s+\d{4})`;
const YEAR_SOURCE = String.raw`\s*,?\s*(?:of(?:\s+the\s+year)?\s+|\/\s*)(\d{4})\b`;
const TITLE_SOURCE = String.raw`\s*,?\s*(?:on|concerning|regarding|amending|in\s+respect\s+of|pertaining\s+to|relating\s+to)\s+`;

/** Fresh global keyword scanner (callers own lastIndex) */
export function typeKeywordScanner(): RegExp {
  return new RegExp(`\\b(?:${TYPE_ALTERNATION})\\b`, 'gi');
}

/** Sticky matchers for the citation state machine; one set per scan */
export interface StickyTokenPatterns {
  number: RegExp;
  year: RegExp;
  title: RegExp;
}

export function stickyTokenPatterns(): StickyTokenPatterns {
  return {
    number: new RegExp(NUMBER_SOURCE, 'iy'),
    year: new RegExp(YEAR_SOURCE, 'iy'),
    title: new RegExp(TITLE_SOURCE, 'iy'),
  };
}

/** Classify a matched keyword (e.g. "Federal Decree Law") into its instrument type */
export function classifyInstrumentKeyword(keyword: string): InstrumentType | undefined {
  const collapsed = keyword.replace(/\s+/g, ' ').trim();
  return ANCHORED_PATTERNS.find((p) => p.re.test(collapsed))?.type;
}

/** First capture group that matched, as an integer */
export function firstNumericGroup(match: RegExpExecArray): number | undefined {
  for (let i = 1; i < match.length; i++) {
    const g = match[i];
    if (g !== undefined) return Number.parseInt(g, 10);
  }
  return undefined;
}

/* ============= Lenient Parse ============= */

export interface CitationParts {
  type?: InstrumentType;
  number?: number;
  year?: number;
}

const NUMBER_ANYWHERE = String.raw`No\.?\s*\(?\s*(\d{1,5})|\(\s*(\d{1,5})\s*\)|\b(\d{1,5})\s*\/\s*\d{4}\b|\b(\d{1,5})\s+of\s+\d{4}\b`;
const YEAR_ANYWHERE = String.raw`(?:\bof(?:\s+the\s+year)?\s+|\/\s*)(\d{4})\b`;

/**
 * Parse type, number and year from free citation text.
 * Looser than the extractor's grammar: the number and year may appear
 * anywhere after the keyword, so enrichment output in other word orders
 * still resolves to the same parts.
 */
export function parseCitationParts(text: string): CitationParts {
  const parts: CitationParts = {};
  const keyword = typeKeywordScanner().exec(text);
  if (!keyword) return parts;

  parts.type = classifyInstrumentKeyword(keyword[0]);

  const numberRe = new RegExp(NUMBER_ANYWHERE, 'gi');
  numberRe.lastIndex = keyword.index + keyword[0].length;
  const num = numberRe.exec(text);
  if (!num) return parts;
  parts.number = firstNumericGroup(num);

  const yearRe = new RegExp(YEAR_ANYWHERE, 'gi');
  yearRe.lastIndex = num.index + num[0].length - yearTail(num[0]);
  const year = yearRe.exec(text);
  if (year) parts.year = Number.parseInt(year[1], 10);

  return parts;
}

// NUMBER_ANYWHERE alternatives 3 and 4 consume the year ("7/2017", "7 of 2017");
// step back so the year pattern can see it.
function yearTail(numberMatch: string): number {
  const tail = /(?:\/\s*|\s+of\s+)\d{4}$/i.exec(numberMatch);
  return tail ? tail[0].length : 0;
}
