import { describe, it, expect } from 'vitest';
import {
  classifyInstrumentKeyword,
  parseCitationParts,
  stickyTokenPatterns,
  typeKeywordScanner,
} from '../instrumentTypes';

describe('classifyInstrumentKeyword', () => {
  it('prefers the decree-law reading over decree', () => {
    expect(classifyInstrumentKeyword('Federal Decree-Law')).toBe('federal_decree_law');
    expect(classifyInstrumentKeyword('Federal  Decree Law')).toBe('federal_decree_law');
    expect(classifyInstrumentKeyword('Decree-Law')).toBe('federal_decree_law');
  });

  it('classifies the other instrument types', () => {
    expect(classifyInstrumentKeyword('Federal Decree')).toBe('federal_decree');
    expect(classifyInstrumentKeyword('federal law')).toBe('federal_law');
    expect(classifyInstrumentKeyword('Cabinet Decision')).toBe('cabinet_decision');
    expect(classifyInstrumentKeyword('Ministerial Resolution')).toBe('ministerial_resolution');
    expect(classifyInstrumentKeyword('Law')).toBe('law');
  });

  it('returns undefined for unknown keywords', () => {
    expect(classifyInstrumentKeyword('Local Order')).toBeUndefined();
  });
});

describe('typeKeywordScanner', () => {
  it('finds the keyword inside running text', () => {
    const m = typeKeywordScanner().exec('as set out under Federal Law No. 5 of 2020');
    expect(m?.[0]).toBe('Federal Law');
    expect(m?.index).toBe(17);
  });

  it('returns a fresh regex on each call', () => {
    const a = typeKeywordScanner();
    a.exec('Cabinet Resolution');
    expect(a.lastIndex).toBeGreaterThan(0);
    expect(typeKeywordScanner().lastIndex).toBe(0);
  });

  it('takes a bare Law only when a number follows', () => {
    expect(typeKeywordScanner().exec('under the law of the land')).toBeNull();
    const m = typeKeywordScanner().exec('under Law No. (5) of 2010');
    expect(m?.[0]).toBe('Law');
    expect(m?.index).toBe(6);
  });

  it('keeps the qualified keyword when Law is part of it', () => {
    expect(typeKeywordScanner().exec('Federal Law No. 5 of 2020')?.[0]).toBe('Federal Law');
    expect(parseCitationParts('the law implementing Cabinet Resolution No. 52 of 2017')).toEqual({
      type: 'cabinet_resolution',
      number: 52,
      year: 2017,
    });
  });
});

describe('stickyTokenPatterns', () => {
  it('matches only at lastIndex', () => {
    const { number } = stickyTokenPatterns();
    number.lastIndex = 0;
    expect(number.exec('x No. 5')).toBeNull();
    number.lastIndex = 1;
    expect(number.exec('x No. 5')?.[1]).toBe('5');
  });
});

describe('parseCitationParts', () => {
  it('parses a parenthesized number and year', () => {
    expect(parseCitationParts('Federal Decree-Law No. (7) of 2017')).toEqual({
      type: 'federal_decree_law',
      number: 7,
      year: 2017,
    });
  });

  it('parses the slash form', () => {
    expect(parseCitationParts('Federal Decree Law 7/2017 on Excise Tax')).toEqual({
      type: 'federal_decree_law',
      number: 7,
      year: 2017,
    });
  });

  it('parses a bare parenthesized number', () => {
    expect(parseCitationParts('Cabinet Resolution (52) of 2017')).toEqual({
      type: 'cabinet_resolution',
      number: 52,
      year: 2017,
    });
  });

  it('returns what it can when the year is missing', () => {
    expect(parseCitationParts('Ministerial Decision No. 12')).toEqual({
      type: 'ministerial_decision',
      number: 12,
    });
  });

  it('returns nothing without a type keyword', () => {
    expect(parseCitationParts('No. 7 of 2017')).toEqual({});
  });
});
