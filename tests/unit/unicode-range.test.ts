import { describe, it, expect } from 'vitest';
import { encodeUnicodeRange, parseUnicodeRange } from '../../src/unicode/unicode-range.js';

describe('encodeUnicodeRange', () => {
  it('should collapse consecutive codepoints into ranges', () => {
    expect(encodeUnicodeRange([0x43, 0x41, 0x42, 0x20, 0x41])).toBe('U+20,U+41-43');
  });

  it('should return an empty string for no codepoints', () => {
    expect(encodeUnicodeRange([])).toBe('');
    expect(encodeUnicodeRange(new Set<number>())).toBe('');
  });

  it('should write uppercase hex without padding', () => {
    expect(encodeUnicodeRange([0xe9, 0x1f600])).toBe('U+E9,U+1F600');
  });

  it('should keep single codepoints between ranges', () => {
    expect(encodeUnicodeRange([1, 2, 3, 5, 7, 8])).toBe('U+1-3,U+5,U+7-8');
  });
});

describe('parseUnicodeRange', () => {
  it('should expand single values and ranges', () => {
    expect(parseUnicodeRange('U+20,U+41-43')).toEqual([0x20, 0x41, 0x42, 0x43]);
  });

  it('should expand wildcard tokens', () => {
    const cps = parseUnicodeRange('U+4?');
    expect(cps).toHaveLength(16);
    expect(cps[0]).toBe(0x40);
    expect(cps[15]).toBe(0x4f);
  });

  it('should accept lowercase and whitespace', () => {
    expect(parseUnicodeRange(' u+61 , U+62-63 ')).toEqual([0x61, 0x62, 0x63]);
  });

  it('should skip tokens that do not parse', () => {
    expect(parseUnicodeRange('bogus,U+41,U+43-41,U+4?-50')).toEqual([0x41]);
  });

  it('should give back what encodeUnicodeRange wrote', () => {
    const input = [0x7a, 0x20, 0x61, 0x62, 0x63, 0x2014, 0x1f600];
    expect(parseUnicodeRange(encodeUnicodeRange(input))).toEqual([...input].sort((a, b) => a - b));
  });
});
