import { describe, it, expect } from 'vitest';
import { sha256Hex, stableHash, stableStringify } from '../hash';

describe('sha256Hex', () => {
  it('hashes a known string', () => {
    expect(sha256Hex('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });
});

describe('stableStringify', () => {
  it('sorts keys and drops undefined members', () => {
    expect(stableStringify({ b: 1, a: [1, { d: undefined, c: 'x' }] })).toBe('{"a":[1,{"c":"x"}],"b":1}');
  });

  it('serializes bare undefined as null', () => {
    expect(stableStringify(undefined)).toBe('null');
  });

  it('keeps array order', () => {
    expect(stableStringify([3, 1, 2])).toBe('[3,1,2]');
  });
});

describe('stableHash', () => {
  it('ignores key order', () => {
    expect(stableHash({ x: 1, y: 'two' })).toBe(stableHash({ y: 'two', x: 1 }));
  });

  it('differs for different values', () => {
    expect(stableHash({ x: 1 })).not.toBe(stableHash({ x: 2 }));
  });
});
