import { describe, expect, it } from 'vitest';
import { MAPPINGS, Mapping, StrGlyphMapping, findMapping, glyphsToMapping, glyphsToStrMapping } from './mapping-utils';

const codes = (text: string) => Array.from(text, (c) => c.codePointAt(0) ?? 0);

describe('glyphsToStrMapping', () => {
  it('writes short runs out', () => {
    expect(glyphsToStrMapping([])).toBe('');
    expect(glyphsToStrMapping(codes('a'))).toBe('a');
    expect(glyphsToStrMapping(codes('ab'))).toBe('ab');
    expect(glyphsToStrMapping(codes('ac'))).toBe('ac');
  });

  it('compresses runs of three or more', () => {
    expect(glyphsToStrMapping(codes('abc'))).toBe('\0ac');
    expect(glyphsToStrMapping(codes('abcdx'))).toBe('\0adx');
    expect(glyphsToStrMapping(codes('abcdxy'))).toBe('\0adxy');
    expect(glyphsToStrMapping(codes('abcdxyz'))).toBe('\0ad\0xz');
  });

  it('writes runs starting at NUL as ranges', () => {
    expect(glyphsToStrMapping([0, 0x41, 0x42, 0x43])).toBe('\0\0\0\0AC');
    expect(glyphsToStrMapping([0, 1, 0x41])).toBe('\0\0\u0001A');
    expect(glyphsToStrMapping([0, 1, 2])).toBe('\0\0\u0002');
  });

  it('handles characters outside the BMP', () => {
    expect(glyphsToStrMapping([0x1f600, 0x1f601, 0x1f602])).toBe('\0\u{1f600}\u{1f602}');
  });
});

describe('StrGlyphMapping', () => {
  it('expands ranges and literal characters', () => {
    const mapping = new StrGlyphMapping('\0adxy', 0);
    expect(mapping.index('a')).toBe(0);
    expect(mapping.index('d')).toBe(3);
    expect(mapping.index('x')).toBe(4);
    expect(mapping.index('y')).toBe(5);
  });

  it('treats two characters without a sentinel as a set', () => {
    const mapping = new StrGlyphMapping('ad', 7);
    expect(mapping.index('a')).toBe(0);
    expect(mapping.index('d')).toBe(1);
    expect(mapping.index('b')).toBe(7);
  });

  it('falls back to the replacement index', () => {
    const mapping = new StrGlyphMapping('\0ad\0xz', 2);
    expect(mapping.index('q')).toBe(2);
    expect(mapping.index('')).toBe(2);
    expect(mapping.index('z')).toBe(6);
  });

  it('reads back selections containing NUL', () => {
    for (const selected of [[0, 0x41, 0x42, 0x43], [0, 1, 0x41], [0, 0x20, 0x21]]) {
      const mapping = new StrGlyphMapping(glyphsToStrMapping(selected), 99);
      expect(selected.map((code) => mapping.index(String.fromCodePoint(code)))).toEqual(selected.map((_, i) => i));
    }
  });

  it('inverts glyphsToStrMapping', () => {
    const selected = codes(' !"#$%&()*+-./0123456789?ABCabcxyz');
    const mapping = new StrGlyphMapping(glyphsToStrMapping(selected), 0);
    selected.forEach((code, index) => {
      expect(mapping.index(String.fromCodePoint(code))).toBe(index);
    });
  });
});

describe('Mapping', () => {
  it('loads the presets', () => {
    expect(MAPPINGS.map((mapping) => mapping.id)).toEqual(['ascii', 'iso-8859-1', 'iso-8859-5', 'iso-8859-15', 'jis-x0201']);
    expect(findMapping('ascii')?.length).toBe(96);
    expect(findMapping('iso-8859-1')?.length).toBe(192);
    expect(findMapping('iso-8859-15')?.length).toBe(192);
    expect(findMapping('iso-8859-5')?.length).toBe(192);
    expect(findMapping('jis-x0201')?.length).toBe(158);
    expect(findMapping('ebcdic')).toBeUndefined();
  });

  it('indexes characters in preset order', () => {
    const latin1 = findMapping('iso-8859-1');
    expect(latin1?.index(' ')).toBe(0);
    expect(latin1?.index('~')).toBe(94);
    expect(latin1?.index('\u00a0')).toBe(96);
    expect(latin1?.index('é')).toBe(169);

    const latin9 = findMapping('iso-8859-15');
    expect(latin9?.index('€')).toBe(100);
  });

  it('falls back to the question mark', () => {
    expect(findMapping('ascii')?.index('é')).toBe(31);
    expect(new Mapping('digits', '', [[0x30, 0x39]]).index('x')).toBe(0);
  });
});

describe('glyphsToMapping', () => {
  const range = (from: number, to: number) => Array.from({ length: to - from + 1 }, (_, i) => from + i);

  it('matches a preset exactly', () => {
    expect(glyphsToMapping(range(32, 127))?.id).toBe('ascii');
    expect(glyphsToMapping([...range(32, 127), ...range(160, 255)])?.id).toBe('iso-8859-1');
  });

  it('matches a preset whose order differs from code point order', () => {
    const jis = findMapping('jis-x0201');
    const sorted = [...(jis?.codePoints() ?? [])].sort((a, b) => a - b);
    expect(glyphsToMapping(sorted)?.id).toBe('jis-x0201');
  });

  it('does not match subsets or supersets', () => {
    expect(glyphsToMapping(range(32, 126))).toBeUndefined();
    expect(glyphsToMapping(range(31, 127))).toBeUndefined();
    expect(glyphsToMapping([])).toBeUndefined();
  });
});
