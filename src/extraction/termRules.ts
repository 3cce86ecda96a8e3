// src/extraction/termRules.ts
// Extraction: noun-phrase rules that keep the definition grammar from
// treating sentence fragments, headings or citations as defined terms.
//
// Each rule is a pure predicate with metadata, evaluated in order.

import lexicon from './data/termLexicon.json';
import { typeKeywordScanner } from '../canonical/instrumentTypes';

/* ============= Rule Types ============= */

export interface TermRuleMetadata {
  /** Unique machine-readable code (e.g., "MODAL_VERB") */
  code: string;
  /** Description of what this rule rejects */
  description: string;
}

export interface TermContext {
  /** Term as written, trimmed */
  term: string;
  /** Lower-cased words */
  words: string[];
}

export interface TermRule {
  meta: TermRuleMetadata;
  /** Returns true when the term violates the rule */
  rejects: (ctx: TermContext) => boolean;
}

export interface DefinitionTextRule {
  meta: TermRuleMetadata;
  rejects: (definitionText: string) => boolean;
}

/* ============= Limits ============= */

export const TERM_MAX_LENGTH = 60;
export const DEFINITION_MIN_LENGTH = 5;
export const DEFINITION_MAX_LENGTH = 2000;
const MAX_PREPOSITIONS = 2;

const SENTENCE_STARTERS = new Set(lexicon.sentenceStarters);
const DETERMINERS = new Set(lexicon.determiners);
const PREPOSITIONS = new Set(lexicon.prepositions);
const MODALS = new Set(lexicon.modals);
const TRAILING_FUNCTION_WORDS = new Set(lexicon.trailingFunctionWords);
const GENERIC_WORDS = new Set(lexicon.genericWords);
const STRUCTURE_HEADING = new RegExp(
  String.raw`^(?:${lexicon.structureKeywords.join('|')})\s*\(?\s*(?:\d+|[ivxlc]+)\b`,
  'i'
);

/* ============= Term Rules ============= */

export const TERM_RULES: readonly TermRule[] = [
  {
    meta: { code: 'TERM_LENGTH', description: `Term is empty or longer than ${TERM_MAX_LENGTH} characters` },
    rejects: (ctx) => ctx.term.length === 0 || ctx.term.length > TERM_MAX_LENGTH,
  },
  {
    meta: { code: 'PURE_NUMBER', description: 'Term is only digits and punctuation' },
    rejects: (ctx) => /^[\d\s.,()/-]+$/.test(ctx.term),
  },
  {
    meta: { code: 'STRUCTURE_HEADING', description: 'Term is a structural heading such as "Article 3"' },
    rejects: (ctx) => STRUCTURE_HEADING.test(ctx.term),
  },
  {
    meta: { code: 'SENTENCE_STARTER', description: 'Term opens like a sentence or clause' },
    rejects: (ctx) => ctx.words.length > 0 && SENTENCE_STARTERS.has(ctx.words[0]),
  },
  {
    meta: { code: 'DETERMINER_ONLY', description: 'Term has no content word' },
    rejects: (ctx) => ctx.words.every((w) => DETERMINERS.has(w)),
  },
  {
    meta: { code: 'GERUND_CLAUSE', description: 'Term starts with a verb-ing followed by a function word' },
    rejects: (ctx) =>
      ctx.words.length > 1 &&
      /^[a-z]{3,}ing$/.test(ctx.words[0]) &&
      (DETERMINERS.has(ctx.words[1]) || PREPOSITIONS.has(ctx.words[1])),
  },
  {
    meta: { code: 'MODAL_VERB', description: 'Term contains a modal verb' },
    rejects: (ctx) => ctx.words.some((w) => MODALS.has(w)),
  },
  {
    meta: { code: 'PREPOSITION_CHAIN', description: `Term has more than ${MAX_PREPOSITIONS} prepositions` },
    rejects: (ctx) => ctx.words.filter((w) => PREPOSITIONS.has(w)).length > MAX_PREPOSITIONS,
  },
  {
    meta: { code: 'TRAILING_FUNCTION_WORD', description: 'Term ends with a preposition, article or conjunction' },
    rejects: (ctx) => ctx.words.length > 1 && TRAILING_FUNCTION_WORDS.has(ctx.words[ctx.words.length - 1]),
  },
  {
    meta: { code: 'SENTENCE_ENDING', description: 'Term ends like a sentence or joins clauses' },
    rejects: (ctx) => /[.!?]$/.test(ctx.term) || /;\s*and\b/i.test(ctx.term),
  },
  {
    meta: { code: 'GENERIC_WORD', description: 'Term is a single generic document word' },
    rejects: (ctx) => ctx.words.length === 1 && GENERIC_WORDS.has(ctx.words[0]),
  },
  {
    meta: { code: 'NO_CAPITAL', description: 'Term has no capital letter' },
    rejects: (ctx) => !/[A-Z]/.test(ctx.term),
  },
  {
    meta: { code: 'CITATION_TERM', description: 'Term names a legal instrument' },
    rejects: (ctx) => typeKeywordScanner().test(ctx.term),
  },
];

/* ============= Definition Text Rules ============= */

export const DEFINITION_TEXT_RULES: readonly DefinitionTextRule[] = [
  {
    meta: {
      code: 'DEFINITION_LENGTH',
      description: `Definition shorter than ${DEFINITION_MIN_LENGTH} or longer than ${DEFINITION_MAX_LENGTH} characters`,
    },
    rejects: (text) => text.length < DEFINITION_MIN_LENGTH || text.length > DEFINITION_MAX_LENGTH,
  },
  {
    meta: { code: 'DEFINITION_PREAMBLE', description: 'Definition is enactment preamble text' },
    rejects: (text) => {
      const lower = text.toLowerCase();
      return lexicon.definitionPreambles.some((p) => lower.startsWith(p));
    },
  },
  {
    meta: { code: 'DEFINITION_ARTICLE', description: 'Definition starts with an article heading' },
    rejects: (text) => /^article\s*\(?\s*\d+/i.test(text),
  },
  {
    meta: { code: 'DEFINITION_CITATION', description: 'Definition is itself a citation' },
    rejects: (text) => {
      const match = typeKeywordScanner().exec(text);
      return match !== null && match.index === 0;
    },
  },
];

/* ============= Evaluation ============= */

export function toTermContext(term: string): TermContext {
  const trimmed = term.trim();
  const words = trimmed
    .toLowerCase()
    .split(/[\s/-]+/)
    .map((w) => w.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, ''))
    .filter(Boolean);
  return { term: trimmed, words };
}

/** Codes of every term rule the term violates, in rule order */
export function termViolations(term: string): string[] {
  const ctx = toTermContext(term);
  return TERM_RULES.filter((r) => r.rejects(ctx)).map((r) => r.meta.code);
}

export function isValidTerm(term: string): boolean {
  const ctx = toTermContext(term);
  return !TERM_RULES.some((r) => r.rejects(ctx));
}

export function definitionViolations(definitionText: string): string[] {
  const text = definitionText.trim();
  return DEFINITION_TEXT_RULES.filter((r) => r.rejects(text)).map((r) => r.meta.code);
}

export function isValidDefinitionText(definitionText: string): boolean {
  const text = definitionText.trim();
  return !DEFINITION_TEXT_RULES.some((r) => r.rejects(text));
}
