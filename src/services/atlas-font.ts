import type { BoundingBox } from '../parser/geometry';
import { EMPTY_BOUNDING_BOX, boundingBox, isEmpty, top, union } from '../parser/geometry';
import type { Glyph } from '../parser/glyph';
import type { AtlasOptions, DecorationDimensions } from '../types/font';
import { Bitmap } from '../utils/bitmap';
import type { GlyphMapping, Mapping } from '../utils/mapping-utils';
import { StrGlyphMapping, glyphsToMapping, glyphsToStrMapping } from '../utils/mapping-utils';
import { writeFontFiles } from './file-handler';
import type { ConvertedFont } from './font-converter';
import { ConversionError, glyphCodePoint } from './font-converter';
import { generateAtlasModule } from './template-generator';

export const DEFAULT_GLYPHS_PER_ROW = 16;

/**
 * Glyphs drawn into a grid of equally sized cells.
 *
 * The cell spans the union of all glyph bounding boxes horizontally. Its
 * rows cover the glyphs, the font's ascent and descent, the baseline row and
 * the decoration rows, so every exported metric lies inside the cell. Glyph
 * `i` occupies column `i % glyphsPerRow` of row `floor(i / glyphsPerRow)`.
 */
export class AtlasFontOutput {
  /** Glyphs in atlas order. */
  readonly glyphs: readonly Glyph[];
  readonly cell: BoundingBox;
  readonly characterSize: { width: number; height: number };
  readonly characterSpacing = 0;
  readonly glyphsPerRow: number;
  readonly rows: number;
  readonly image: Bitmap;

  /** Preset matching the converted glyphs exactly, if any. */
  readonly mapping?: Mapping;
  /** Compressed mapping, used when no preset matches. */
  readonly strMapping?: string;
  readonly replacementIndex: number;

  readonly baseline: number;
  readonly underline: DecorationDimensions;
  readonly strikethrough: DecorationDimensions;

  constructor(
    readonly font: ConvertedFont,
    options: AtlasOptions = {},
  ) {
    this.glyphsPerRow = options.glyphsPerRow ?? DEFAULT_GLYPHS_PER_ROW;
    if (!Number.isInteger(this.glyphsPerRow) || this.glyphsPerRow < 1) {
      throw new ConversionError(`glyphs per row must be a positive integer: ${this.glyphsPerRow}`);
    }

    const codes = font.glyphs.map(glyphCodePoint);
    this.mapping = glyphsToMapping(codes);

    // Presets define their own glyph order.
    if (this.mapping) {
      const byCode = new Map(font.glyphs.map((glyph, i): [number, Glyph] => [codes[i], glyph]));
      this.glyphs = this.mapping.codePoints().flatMap((code) => byCode.get(code) ?? []);
    } else {
      this.glyphs = font.glyphs;
      this.strMapping = glyphsToStrMapping(codes);
    }

    const replacement = font.glyphs[font.replacementCharacter];
    this.replacementIndex = replacement ? Math.max(this.glyphs.indexOf(replacement), 0) : 0;

    this.cell = atlasCell(font, this.glyphs);
    this.characterSize = { width: this.cell.size.x, height: this.cell.size.y };
    this.rows = Math.ceil(this.glyphs.length / this.glyphsPerRow);
    this.image = new Bitmap(this.characterSize.width * this.glyphsPerRow, this.characterSize.height * this.rows);

    this.glyphs.forEach((glyph, index) => this.drawGlyph(glyph, index));

    // Cell row of the pixels directly above the baseline (Y = 0).
    this.baseline = top(this.cell);
    this.underline = { offset: this.cellRow(font.underlinePosition), height: font.underlineThickness };
    this.strikethrough = { offset: this.cellRow(font.strikethroughPosition), height: font.strikethroughThickness };
  }

  /** Top-left pixel of the glyph's cell. */
  glyphPosition(index: number): { x: number; y: number } {
    return {
      x: (index % this.glyphsPerRow) * this.characterSize.width,
      y: Math.floor(index / this.glyphsPerRow) * this.characterSize.height,
    };
  }

  /** Offset of the cell's top-left pixel in row-major pixel order. */
  pixelOffset(index: number): number {
    const { width, height } = this.characterSize;
    const row = Math.floor(index / this.glyphsPerRow);
    const column = index % this.glyphsPerRow;
    return row * width * this.glyphsPerRow * height + column * width;
  }

  glyphMapping(): GlyphMapping {
    return this.mapping ?? new StrGlyphMapping(this.strMapping ?? '', this.replacementIndex);
  }

  /** Reads a cell back from the image, one string per row, `#` for set pixels. */
  renderGlyph(index: number): string[] {
    const { x, y } = this.glyphPosition(index);
    const rows: string[] = [];
    for (let row = 0; row < this.characterSize.height; row++) {
      let line = '';
      for (let column = 0; column < this.characterSize.width; column++) {
        line += this.image.getPixel(x + column, y + row) ? '#' : '.';
      }
      rows.push(line);
    }
    return rows;
  }

  data(): Uint8Array {
    return this.image.data;
  }

  source(): string {
    return generateAtlasModule(this);
  }

  save(outputDir: string): Promise<string[]> {
    return writeFontFiles(outputDir, this.font.fileStem, this.source(), this.image.data);
  }

  /** Converts a row counted from the font's ascent into a cell row. */
  private cellRow(fontRow: number): number {
    return top(this.cell) - fontRowToY(this.font, fontRow);
  }

  private drawGlyph(glyph: Glyph, index: number): void {
    const position = this.glyphPosition(index);
    const dx = glyph.boundingBox.offset.x - this.cell.offset.x;
    const dy = top(this.cell) - top(glyph.boundingBox);
    const { x: width, y: height } = glyph.boundingBox.size;

    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        if (glyph.pixel(x, y)) {
          this.image.setPixel(position.x + dx + x, position.y + dy + y, true);
        }
      }
    }
  }
}

/** Y coordinate of a row counted downwards from the top row of the ascent. */
function fontRowToY(font: ConvertedFont, row: number): number {
  return font.ascent - 1 - row;
}

function atlasCell(font: ConvertedFont, glyphs: readonly Glyph[]): BoundingBox {
  const glyphCell = glyphs.reduce((cell, glyph) => union(cell, glyph.boundingBox), EMPTY_BOUNDING_BOX);

  const rows = [
    0,
    fontRowToY(font, 0),
    -font.descent,
    fontRowToY(font, font.underlinePosition),
    fontRowToY(font, font.underlinePosition + font.underlineThickness - 1),
    fontRowToY(font, font.strikethroughPosition),
    fontRowToY(font, font.strikethroughPosition + font.strikethroughThickness - 1),
  ];
  if (!isEmpty(glyphCell)) {
    rows.push(top(glyphCell), glyphCell.offset.y);
  }

  const topY = Math.max(...rows);
  const bottomY = Math.min(...rows);
  return boundingBox(glyphCell.size.x, topY - bottomY + 1, glyphCell.offset.x, bottomY);
}
