import { describe, it, expect } from 'vitest';
import {
  extractJsonFromResponse,
  isExtractableText,
  readNumber,
  readString,
  truncateForPrompt,
  withTimeout,
  OUT_END,
  OUT_START,
} from '../extraction';

/* ============= extractJsonFromResponse ============= */

describe('extractJsonFromResponse', () => {
  it('strips code fences', () => {
    const out = extractJsonFromResponse('```json\n{"a":1}\n```');
    expect(out.json).toEqual({ a: 1 });
    expect(out.usedMarkers).toBe(false);
    expect(out.parseError).toBeUndefined();
  });

  it('reads the payload between output markers', () => {
    const out = extractJsonFromResponse(`Sure.\n${OUT_START}\n{"b":2}\n${OUT_END}\nDone.`);
    expect(out.json).toEqual({ b: 2 });
    expect(out.usedMarkers).toBe(true);
  });

  it('falls back to the outermost object in prose', () => {
    expect(extractJsonFromResponse('Here you go: {"c":3} thanks').json).toEqual({ c: 3 });
  });

  it('falls back to an array', () => {
    expect(extractJsonFromResponse('items: [1, 2]').json).toEqual([1, 2]);
  });

  it('reports unparseable output', () => {
    const out = extractJsonFromResponse('no json here');
    expect(out.json).toBeNull();
    expect(out.parseError).toMatch(/^Failed to parse JSON: /);
  });
});

/* ============= Guards ============= */

describe('isExtractableText', () => {
  it('rejects short pages', () => {
    expect(isExtractableText('Page 2')).toEqual({ extractable: false, reason: 'text_too_short' });
  });

  it('rejects pages of punctuation', () => {
    expect(isExtractableText('.'.repeat(60))).toEqual({
      extractable: false,
      reason: 'insufficient_meaningful_content',
    });
  });

  it('accepts ordinary prose', () => {
    const text = 'Article 1. Definitions. In this Decree-Law the following words have the meanings given.';
    expect(isExtractableText(text)).toEqual({ extractable: true });
  });
});

describe('truncateForPrompt', () => {
  it('leaves short text alone', () => {
    expect(truncateForPrompt('abc', 5)).toEqual({ text: 'abc', truncated: false, originalLength: 3 });
  });

  it('cuts long text and says so', () => {
    expect(truncateForPrompt('abcdef', 3)).toEqual({
      text: 'abc\n\n[...page truncated, showing first 3 of 6 characters...]',
      truncated: true,
      originalLength: 6,
    });
  });
});

describe('readString / readNumber', () => {
  it('trims strings and treats blanks as absent', () => {
    expect(readString('  Authority ')).toBe('Authority');
    expect(readString('   ')).toBeUndefined();
    expect(readString(5)).toBeUndefined();
  });

  it('accepts finite numbers and numeric strings', () => {
    expect(readNumber(0.5)).toBe(0.5);
    expect(readNumber(' 0.25 ')).toBe(0.25);
    expect(readNumber('high')).toBeUndefined();
    expect(readNumber(Number.NaN)).toBeUndefined();
    expect(readNumber('')).toBeUndefined();
  });
});

/* ============= withTimeout ============= */

describe('withTimeout', () => {
  it('resolves when the promise wins', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 1000, 'late')).resolves.toBe('ok');
  });

  it('rejects with the message when the timer wins', async () => {
    const never = new Promise<string>(() => undefined);
    await expect(withTimeout(never, 5, 'late')).rejects.toThrow('late');
  });

  it('rejects with a typed error from a factory', async () => {
    class Late extends Error {}
    const never = new Promise<string>(() => undefined);
    await expect(withTimeout(never, 5, () => new Late('too slow'))).rejects.toBeInstanceOf(Late);
  });
});
