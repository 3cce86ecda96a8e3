// src/canonical/canonicalizer.ts
// Canonical: maps a candidate to the identity used for merging.
//
// Citations key on (type, number, year); definitions key on the normalized term.
// When the structured fields cannot be parsed the key falls back to a hash of
// the normalized raw text: the candidate still merges, but only by similarity.
// Pure and deterministic: no clock, randomness or I/O.

import { cleanTerm } from '../extraction/definitionGrammar';
import type { Candidate, CitationCandidate, DefinitionCandidate } from '../extraction/types';
import { sha256Hex } from '../utils/hash';
import { INSTRUMENT_LABELS, parseCitationParts, type InstrumentType } from './instrumentTypes';

/* ============= Types ============= */

export interface CitationKey {
  kind: 'citation';
  /** e.g. "federal_decree_law_7_2017", or "unparsed_<hash>" */
  id: string;
  fallback: boolean;
  type?: InstrumentType;
  number?: number;
  year?: number;
}

export interface DefinitionKey {
  kind: 'definition';
  /** normalizedTerm with "_" for spaces, or "unparsed_<hash>" */
  id: string;
  fallback: boolean;
  normalizedTerm?: string;
}

export type CanonicalKey = CitationKey | DefinitionKey;

const FALLBACK_PREFIX = 'unparsed_';
const FALLBACK_HASH_LENGTH = 12;
const LEADING_ARTICLE = /^(?:the|a|an)\s+/;

/* ============= Text Normalization ============= */

/**
 * Accent-free, lower-case, punctuation-free form with single spaces.
 * Shared by fallback ids and lexical similarity.
 */
export function normalizeText(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/\p{M}+/gu, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/** normalizeText without a leading article */
export function normalizeTerm(term: string): string {
  return normalizeText(term).replace(LEADING_ARTICLE, '');
}

export function fallbackId(rawText: string): string {
  return FALLBACK_PREFIX + sha256Hex(normalizeText(rawText)).slice(0, FALLBACK_HASH_LENGTH);
}

const COLON_TERM = /^\s*["“']?([^:"”\n]{1,80}?)["”']?\s*:/;
const MEANS_TERM =
  /^\s*["“']?([^"”\n]{1,80}?)["”']?\s+(?:means|shall\s+mean|refers\s+to|is\s+defined\s+as|denotes)\b/i;

/** Term from "Term: ..." or "Term means ..." when a candidate carries none */
export function deriveTerm(rawText: string): string | undefined {
  const match = COLON_TERM.exec(rawText) ?? MEANS_TERM.exec(rawText);
  if (!match) return undefined;
  const term = cleanTerm(match[1]);
  return term || undefined;
}

/* ============= Canonicalization ============= */

export function canonicalizeCitation(candidate: CitationCandidate): CitationKey {
  const parts = parseCitationParts(candidate.rawText);
  if (parts.type !== undefined && parts.number !== undefined && parts.year !== undefined) {
    return {
      kind: 'citation',
      id: `${parts.type}_${parts.number}_${parts.year}`,
      fallback: false,
      type: parts.type,
      number: parts.number,
      year: parts.year,
    };
  }
  return { kind: 'citation', id: fallbackId(candidate.rawText), fallback: true, ...parts };
}

export function canonicalizeDefinition(candidate: DefinitionCandidate): DefinitionKey {
  const term = candidate.term?.trim() ? cleanTerm(candidate.term) : deriveTerm(candidate.rawText);
  const normalizedTerm = term ? normalizeTerm(term) : '';
  if (!normalizedTerm) {
    return { kind: 'definition', id: fallbackId(candidate.rawText), fallback: true };
  }
  return {
    kind: 'definition',
    id: normalizedTerm.replace(/ /g, '_'),
    fallback: false,
    normalizedTerm,
  };
}

export function canonicalize(candidate: Candidate): CanonicalKey {
  return candidate.kind === 'citation'
    ? canonicalizeCitation(candidate)
    : canonicalizeDefinition(candidate);
}

/* ============= Display Form ============= */

/**
 * Human-facing form: "Federal Decree-Law No. (7) of 2017" for parsed citations,
 * the cleaned term for definitions, the collapsed raw text otherwise.
 */
export function displayForm(candidate: Candidate, key: CanonicalKey = canonicalize(candidate)): string {
  if (key.kind === 'citation') {
    if (!key.fallback && key.type !== undefined) {
      return `${INSTRUMENT_LABELS[key.type]} No. (${key.number}) of ${key.year}`;
    }
    return candidate.rawText.replace(/\s+/g, ' ').trim();
  }
  if (candidate.kind === 'definition') {
    const term = candidate.term?.trim() ? cleanTerm(candidate.term) : deriveTerm(candidate.rawText);
    if (term) return term;
  }
  return candidate.rawText.replace(/\s+/g, ' ').trim();
}

/** Keys denote the same entity */
export function sameKey(a: CanonicalKey, b: CanonicalKey): boolean {
  return a.kind === b.kind && a.id === b.id;
}

export const Canonicalizer = {
  canonicalize,
  canonicalizeCitation,
  canonicalizeDefinition,
  displayForm,
  normalizeText,
  normalizeTerm,
  deriveTerm,
  fallbackId,
  sameKey,
};
