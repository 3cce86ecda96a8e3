import { describe, it, expect } from 'vitest';
import {
  TERM_RULES,
  definitionViolations,
  isValidDefinitionText,
  isValidTerm,
  termViolations,
  toTermContext,
} from '../termRules';

describe('TERM_RULES', () => {
  it('has unique codes', () => {
    const codes = TERM_RULES.map((r) => r.meta.code);
    expect(new Set(codes).size).toBe(codes.length);
  });
});

describe('toTermContext', () => {
  it('lower-cases words and strips edge punctuation', () => {
    expect(toTermContext('  Place-of (Supply) ')).toEqual({
      term: 'Place-of (Supply)',
      words: ['place', 'of', 'supply'],
    });
  });
});

describe('termViolations', () => {
  it('accepts ordinary noun phrases', () => {
    expect(termViolations('Taxable Person')).toEqual([]);
    expect(termViolations('Place of Supply')).toEqual([]);
  });

  it('rejects structural headings', () => {
    expect(termViolations('Article 5')).toEqual(['STRUCTURE_HEADING']);
  });

  it('rejects sentence openers', () => {
    expect(termViolations('This Decree')).toEqual(['SENTENCE_STARTER']);
  });

  it('rejects modal verbs', () => {
    expect(termViolations('Person Who Shall Pay')).toEqual(['MODAL_VERB']);
  });

  it('rejects a single generic word', () => {
    expect(termViolations('Law')).toEqual(['GENERIC_WORD']);
  });

  it('rejects terms without a capital', () => {
    expect(termViolations('taxable person')).toEqual(['NO_CAPITAL']);
  });

  it('rejects instrument names', () => {
    expect(termViolations('Federal Law No. 5')).toEqual(['CITATION_TERM']);
  });

  it('rejects trailing function words', () => {
    expect(termViolations('Period for')).toEqual(['TRAILING_FUNCTION_WORD']);
  });

  it('lists every violation in rule order', () => {
    expect(termViolations('2017')).toEqual(['PURE_NUMBER', 'NO_CAPITAL']);
  });

  it('rejects overlong terms', () => {
    expect(termViolations('A'.repeat(61))).toEqual(['TERM_LENGTH']);
  });
});

describe('isValidTerm', () => {
  it('matches termViolations', () => {
    expect(isValidTerm('Taxable Supply')).toBe(true);
    expect(isValidTerm('Article 5')).toBe(false);
  });
});

describe('definitionViolations', () => {
  it('rejects very short text', () => {
    expect(definitionViolations('abc')).toEqual(['DEFINITION_LENGTH']);
  });

  it('rejects enactment preambles', () => {
    expect(definitionViolations('Having reviewed the Constitution')).toEqual(['DEFINITION_PREAMBLE']);
  });

  it('rejects article headings', () => {
    expect(definitionViolations('Article 3 of this Law')).toEqual(['DEFINITION_ARTICLE']);
  });

  it('rejects text that is itself a citation', () => {
    expect(definitionViolations('Federal Law No. 5 of 2020.')).toEqual(['DEFINITION_CITATION']);
  });

  it('accepts ordinary definitions', () => {
    expect(isValidDefinitionText('The Federal Tax Authority.')).toBe(true);
  });
});
