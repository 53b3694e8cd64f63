import type { Font } from '../parser/font';
import { parseFont } from '../parser/font';
import type { Glyph } from '../parser/glyph';
import { standardEncoding } from '../parser/glyph';
import type { PropertyValue } from '../parser/properties';
import { Property } from '../parser/properties';
import type { AtlasOptions, CharRange, ParseOptions } from '../types/font';
import type { Mapping } from '../utils/mapping-utils';
import { describeCodePoint, toCodePoint } from '../utils/unicode-utils';
import { AtlasFontOutput } from './atlas-font';
import { BitPackedFontOutput } from './bit-packed-font';

export class ConversionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConversionError';
  }
}

/**
 * Selection of glyphs: a string of characters, an array of characters, an
 * inclusive range or a preset mapping.
 */
export type GlyphRange = string | readonly string[] | CharRange | Mapping;

export interface ConvertedFont {
  bdf: Font;
  name: string;
  fileStem: string;
  comments: readonly string[];

  /** Selected glyphs, re-encoded to the character they answer for. */
  glyphs: readonly Glyph[];
  replacementCharacter: number;

  ascent: number;
  descent: number;
  underlinePosition: number;
  underlineThickness: number;
  strikethroughPosition: number;
  strikethroughThickness: number;
}

const REPLACEMENT_CHARACTER = 0xfffd;
const QUESTION_MARK = 0x3f;

/**
 * Converts BDF fonts into bit-packed or atlas glyph data.
 *
 * If no glyphs are added, every glyph with a standard encoding is converted.
 */
export class FontConverter {
  private readonly glyphSet = new Set<number>();
  private readonly comments: string[] = [];
  private substitute?: number;
  private replacement?: number;
  private options: ParseOptions = {};

  constructor(
    private readonly source: string | Font,
    readonly name: string,
  ) {}

  glyphs(range: GlyphRange): this {
    for (const code of rangeCodePoints(range)) {
      this.glyphSet.add(code);
    }
    return this;
  }

  /** Glyph to use for requested characters that are missing in the font. */
  missingGlyphSubstitute(c: string): this {
    this.substitute = singleCodePoint(c, 'missing glyph substitute');
    return this;
  }

  /**
   * Character drawn for characters that aren't part of the converted font.
   *
   * Defaults to U+FFFD, then `?`, then the first converted glyph.
   */
  replacementCharacter(c: string): this {
    this.replacement = singleCodePoint(c, 'replacement character');
    return this;
  }

  /** Adds a doc comment line to the generated source. */
  comment(text: string): this {
    this.comments.push(text);
    return this;
  }

  parseOptions(options: ParseOptions): this {
    this.options = options;
    return this;
  }

  /** Requested code points in ascending order. */
  selectedCodePoints(): number[] {
    return [...this.glyphSet].sort((a, b) => a - b);
  }

  convert(): ConvertedFont {
    if (!isValidIdentifier(this.name)) {
      throw new ConversionError(`name is not a valid identifier: ${this.name}`);
    }

    const bdf = typeof this.source === 'string' ? this.parseSource(this.source) : this.source;
    const glyphs = this.glyphSet.size === 0 ? allStandardGlyphs(bdf) : this.selectGlyphs(bdf);

    const ascent = nonNegativeInt(bdf.metadata.properties.get(Property.FontAscent));
    const descent = nonNegativeInt(bdf.metadata.properties.get(Property.FontDescent));

    return {
      bdf,
      name: this.name,
      fileStem: this.name.toLowerCase(),
      comments: [...this.comments],
      glyphs,
      replacementCharacter: this.resolveReplacement(glyphs),
      ascent,
      descent,
      // Most fonts don't specify decoration metrics.
      underlinePosition: ascent + 1,
      underlineThickness: 1,
      strikethroughPosition: Math.floor((ascent + descent) / 2),
      strikethroughThickness: 1,
    };
  }

  convertBitPacked(): BitPackedFontOutput {
    return new BitPackedFontOutput(this.convert());
  }

  convertAtlas(options: AtlasOptions = {}): AtlasFontOutput {
    return new AtlasFontOutput(this.convert(), options);
  }

  private parseSource(source: string): Font {
    try {
      return parseFont(source, this.options);
    } catch (error) {
      throw new ConversionError(`couldn't parse BDF file: ${error}`, { cause: error });
    }
  }

  private selectGlyphs(bdf: Font): Glyph[] {
    return this.selectedCodePoints().map((code) => {
      const glyphCode = bdf.glyphs.getCode(code) === undefined && this.substitute !== undefined ? this.substitute : code;
      const glyph = bdf.glyphs.getCode(glyphCode);
      if (!glyph) {
        throw new ConversionError(`glyph ${describeCodePoint(glyphCode)} is not contained in the BDF font`);
      }

      return glyph.withEncoding(standardEncoding(code));
    });
  }

  private resolveReplacement(glyphs: readonly Glyph[]): number {
    if (this.replacement !== undefined) {
      const index = glyphIndex(glyphs, this.replacement);
      if (index === undefined) {
        throw new ConversionError(
          `replacement character ${describeCodePoint(this.replacement)} is not included in the glyphs`,
        );
      }
      return index;
    }

    return glyphIndex(glyphs, REPLACEMENT_CHARACTER) ?? glyphIndex(glyphs, QUESTION_MARK) ?? 0;
  }
}

export function isValidIdentifier(name: string): boolean {
  return /^[A-Za-z][A-Za-z0-9_]*$/.test(name);
}

export function glyphIndex(glyphs: readonly Glyph[], code: number): number | undefined {
  const index = glyphs.findIndex((glyph) => glyph.encoding.kind === 'standard' && glyph.encoding.code === code);
  return index === -1 ? undefined : index;
}

/** Returns the code point a converted glyph answers for. */
export function glyphCodePoint(glyph: Glyph): number {
  if (glyph.encoding.kind !== 'standard') {
    throw new ConversionError(`glyph "${glyph.name}" has no standard encoding`);
  }
  return glyph.encoding.code;
}

function isMapping(range: GlyphRange): range is Mapping {
  return typeof range === 'object' && 'codePoints' in range;
}

function rangeCodePoints(range: GlyphRange): number[] {
  if (typeof range === 'string') {
    return Array.from(range, (c) => c.codePointAt(0) ?? 0);
  }
  if (isMapping(range)) {
    return [...range.codePoints()];
  }
  if ('from' in range) {
    const from = singleCodePoint(range.from, 'range start');
    const to = singleCodePoint(range.to, 'range end');
    const codes: number[] = [];
    for (let code = from; code <= to; code++) {
      codes.push(code);
    }
    return codes;
  }

  return range.flatMap((c) => Array.from(c, (char) => char.codePointAt(0) ?? 0));
}

function singleCodePoint(c: string, what: string): number {
  const code = toCodePoint(c);
  if (code === undefined) {
    throw new ConversionError(`${what} must be a single character, got "${c}"`);
  }
  return code;
}

function allStandardGlyphs(bdf: Font): Glyph[] {
  const byCode = new Map<number, Glyph>();
  for (const glyph of bdf.glyphs) {
    if (glyph.encoding.kind === 'standard' && !byCode.has(glyph.encoding.code)) {
      byCode.set(glyph.encoding.code, glyph);
    }
  }

  return [...byCode.entries()].sort(([a], [b]) => a - b).map(([, glyph]) => glyph);
}

function nonNegativeInt(value: PropertyValue | undefined): number {
  return value?.kind === 'int' && value.value >= 0 ? value.value : 0;
}
