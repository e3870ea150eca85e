/**
 * Unit tests for the base-62 codec and code validation.
 */

import { describe, it, expect } from 'vitest';
import {
  BASE62_ALPHABET,
  customCodeProblem,
  encodeBase62,
  isWellFormedCode,
} from '../../src/utils/shortcode';

describe('encodeBase62', () => {
  it('uses digits, then lowercase, then uppercase', () => {
    expect(BASE62_ALPHABET).toHaveLength(62);
    expect(encodeBase62(1)).toBe('1');
    expect(encodeBase62(10)).toBe('a');
    expect(encodeBase62(35)).toBe('z');
    expect(encodeBase62(36)).toBe('A');
    expect(encodeBase62(61)).toBe('Z');
  });

  it('carries into a new position at powers of 62', () => {
    expect(encodeBase62(62)).toBe('10');
    expect(encodeBase62(125)).toBe('21');
    expect(encodeBase62(3843)).toBe('ZZ');
    expect(encodeBase62(3844)).toBe('100');
    expect(encodeBase62(1_000_000)).toBe('4c92');
  });

  it('encodes the largest safe integer in at most 12 characters', () => {
    expect(encodeBase62(Number.MAX_SAFE_INTEGER)).toBe('FfGNdXsE7');
  });

  it('encodes zero as the first symbol', () => {
    expect(encodeBase62(0)).toBe('0');
  });

  it('rejects negative, fractional and unsafe values', () => {
    expect(() => encodeBase62(-1)).toThrow(RangeError);
    expect(() => encodeBase62(1.5)).toThrow(RangeError);
    expect(() => encodeBase62(Number.MAX_SAFE_INTEGER + 1)).toThrow(RangeError);
  });

  it('never maps two sequence values to the same code', () => {
    const seen = new Set<string>();
    for (let n = 1; n <= 20_000; n++) {
      seen.add(encodeBase62(n));
    }
    expect(seen.size).toBe(20_000);
  });

  it('produces codes whose length never shrinks as the counter grows', () => {
    let previous = 0;
    for (let n = 1; n <= 250_000; n += 7) {
      const length = encodeBase62(n).length;
      expect(length).toBeGreaterThanOrEqual(previous);
      previous = length;
    }
    expect(previous).toBe(4);
  });
});

describe('isWellFormedCode', () => {
  it('accepts generated and custom-looking codes', () => {
    expect(isWellFormedCode('4c92')).toBe(true);
    expect(isWellFormedCode('my-link')).toBe(true);
    expect(isWellFormedCode('a_b')).toBe(true);
  });

  it('rejects empty, overlong and out-of-alphabet codes', () => {
    expect(isWellFormedCode('')).toBe(false);
    expect(isWellFormedCode('abcdefghijklm')).toBe(false);
    expect(isWellFormedCode('abc.def')).toBe(false);
    expect(isWellFormedCode('favicon.ico')).toBe(false);
  });
});

describe('customCodeProblem', () => {
  it('returns null for an acceptable code', () => {
    expect(customCodeProblem('my-link')).toBeNull();
    expect(customCodeProblem('abcdefghijkl')).toBeNull();
  });

  it('explains malformed codes', () => {
    expect(customCodeProblem('has space')).toBe(
      "Custom code must be 1-12 characters of letters, digits, '-' or '_'."
    );
  });

  it('refuses route names regardless of case', () => {
    expect(customCodeProblem('shorten')).toBe('Custom code "shorten" is reserved.');
    expect(customCodeProblem('Health')).toBe('Custom code "Health" is reserved.');
    expect(customCodeProblem('stats')).toBe('Custom code "stats" is reserved.');
  });
});
