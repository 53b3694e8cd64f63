import { z } from 'zod';
import mappingsJson from '../data/mappings.json';

/** Maps a character to a glyph index. */
export interface GlyphMapping {
  index(c: string): number;
}

const mappingsSchema = z.object({
  mappings: z.array(
    z.object({
      id: z.string(),
      description: z.string(),
      ranges: z.array(z.tuple([z.number().int().nonnegative(), z.number().int().nonnegative()])),
    }),
  ),
});

/**
 * Well-known character set whose glyphs are stored in the set's own order.
 */
export class Mapping implements GlyphMapping {
  private readonly codes: readonly number[];
  private readonly positions = new Map<number, number>();

  constructor(
    readonly id: string,
    readonly description: string,
    ranges: ReadonlyArray<readonly [number, number]>,
  ) {
    const codes: number[] = [];
    for (const [start, end] of ranges) {
      for (let code = start; code <= end; code++) {
        codes.push(code);
      }
    }
    this.codes = codes;
    codes.forEach((code, position) => {
      if (!this.positions.has(code)) {
        this.positions.set(code, position);
      }
    });
  }

  get length(): number {
    return this.codes.length;
  }

  /** Code points in glyph index order. */
  codePoints(): readonly number[] {
    return this.codes;
  }

  /** Falls back to `?`, or the first glyph if the set has no `?`. */
  index(c: string): number {
    const code = c.codePointAt(0);
    const position = code === undefined ? undefined : this.positions.get(code);
    return position ?? this.positions.get(0x3f) ?? 0;
  }
}

export const MAPPINGS: readonly Mapping[] = mappingsSchema
  .parse(mappingsJson)
  .mappings.map((mapping) => new Mapping(mapping.id, mapping.description, mapping.ranges));

export function findMapping(id: string): Mapping | undefined {
  return MAPPINGS.find((mapping) => mapping.id === id);
}

/**
 * Compresses ascending code points into a mapping string.
 *
 * Runs of three or more characters are written as `\0`, start, end; shorter
 * runs are written out. A run starting at U+0000 always uses the `\0` form,
 * since a literal NUL would read as the sentinel.
 */
export function glyphsToStrMapping(codes: Iterable<number>): string {
  const ranges: Array<{ start: number; end: number }> = [];

  for (const code of codes) {
    const last = ranges[ranges.length - 1];
    if (last && code === last.end + 1) {
      last.end = code;
    } else {
      ranges.push({ start: code, end: code });
    }
  }

  let mapping = '';
  for (const { start, end } of ranges) {
    const chars = end - start + 1;
    if (chars > 2 || start === 0) {
      mapping += '\0' + String.fromCodePoint(start) + String.fromCodePoint(end);
    } else if (chars === 2) {
      mapping += String.fromCodePoint(start) + String.fromCodePoint(end);
    } else {
      mapping += String.fromCodePoint(start);
    }
  }

  return mapping;
}

/** Returns the preset whose character set equals `codes` exactly. */
export function glyphsToMapping(codes: readonly number[]): Mapping | undefined {
  return MAPPINGS.find((mapping) => {
    const sorted = [...mapping.codePoints()].sort((a, b) => a - b);
    return sorted.length === codes.length && sorted.every((code, i) => code === codes[i]);
  });
}

/**
 * Glyph mapping backed by a string produced by `glyphsToStrMapping`.
 */
export class StrGlyphMapping implements GlyphMapping {
  constructor(
    readonly data: string,
    readonly replacementIndex: number,
  ) {}

  index(c: string): number {
    const code = c.codePointAt(0);
    if (code === undefined) {
      return this.replacementIndex;
    }

    const chars = Array.from(this.data, (char) => char.codePointAt(0) ?? 0);
    let index = 0;
    let i = 0;
    while (i < chars.length) {
      if (chars[i] === 0 && i + 2 < chars.length) {
        const start = chars[i + 1];
        const end = chars[i + 2];
        if (code >= start && code <= end) {
          return index + code - start;
        }
        index += end - start + 1;
        i += 3;
      } else {
        if (chars[i] === code) {
          return index;
        }
        index++;
        i++;
      }
    }

    return this.replacementIndex;
  }
}
