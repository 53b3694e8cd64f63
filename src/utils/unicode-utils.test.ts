import { describe, expect, it } from 'vitest';
import { describeCodePoint, formatCodePoint, toCodePoint } from './unicode-utils';

describe('unicode utils', () => {
  it('formats code points', () => {
    expect(formatCodePoint(0x41)).toBe('U+0041');
    expect(formatCodePoint(0x1f600)).toBe('U+1F600');
    expect(describeCodePoint(0xa5)).toBe("'¥' (U+00A5)");
  });

  it('accepts exactly one character', () => {
    expect(toCodePoint('A')).toBe(0x41);
    expect(toCodePoint('\u{1f600}')).toBe(0x1f600);
    expect(toCodePoint('')).toBeUndefined();
    expect(toCodePoint('AB')).toBeUndefined();
  });
});
