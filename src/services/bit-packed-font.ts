import type { BoundingBox } from '../parser/geometry';
import type { Rectangle } from '../types/font';
import { BitBuffer, readBit } from '../utils/bit-buffer';
import { writeFontFiles } from './file-handler';
import type { ConvertedFont } from './font-converter';
import { glyphCodePoint } from './font-converter';
import { generateBitPackedModule } from './template-generator';

export interface PackedGlyph {
  character: string;
  boundingBox: Rectangle;
  deviceWidth: number;
  /** Bit offset of the glyph's first pixel in the data buffer. */
  startIndex: number;
}

/** Converts a Y-up BDF bounding box into a Y-down rectangle. */
export function boundingBoxToRectangle(box: BoundingBox): Rectangle {
  return {
    x: box.offset.x,
    y: 1 - box.size.y - box.offset.y,
    width: box.size.x,
    height: box.size.y,
  };
}

/**
 * Glyph pixels concatenated into a single bit stream.
 */
export class BitPackedFontOutput {
  readonly glyphs: readonly PackedGlyph[];
  private readonly bytes: Uint8Array;
  readonly bitLength: number;

  constructor(readonly font: ConvertedFont) {
    const bits = new BitBuffer();
    const glyphs: PackedGlyph[] = [];

    for (const glyph of font.glyphs) {
      glyphs.push({
        character: String.fromCodePoint(glyphCodePoint(glyph)),
        boundingBox: boundingBoxToRectangle(glyph.boundingBox),
        deviceWidth: glyph.widthHorizontal?.device.x ?? 0,
        startIndex: bits.length,
      });
      bits.extend(glyph.pixels());
    }

    this.glyphs = glyphs;
    this.bitLength = bits.length;
    this.bytes = bits.toBytes();
  }

  data(): Uint8Array {
    return this.bytes;
  }

  asFont(): BitPackedFont {
    return new BitPackedFont({
      replacementCharacter: this.font.replacementCharacter,
      ascent: this.font.ascent,
      descent: this.font.descent,
      glyphs: this.glyphs,
      data: this.bytes,
    });
  }

  /** TypeScript module exporting the font as a constant. */
  source(): string {
    return generateBitPackedModule(this);
  }

  /** Writes `<fileStem>.ts` and `<fileStem>.data` to the directory. */
  save(outputDir: string): Promise<string[]> {
    return writeFontFiles(outputDir, this.font.fileStem, this.source(), this.bytes);
  }
}

export interface BitPackedFontData {
  replacementCharacter: number;
  ascent: number;
  descent: number;
  glyphs: readonly PackedGlyph[];
  data: Uint8Array;
}

/**
 * Reads glyphs back from bit-packed font data.
 */
export class BitPackedFont {
  private readonly byCharacter = new Map<string, PackedGlyph>();

  constructor(readonly font: BitPackedFontData) {
    for (const glyph of font.glyphs) {
      if (!this.byCharacter.has(glyph.character)) {
        this.byCharacter.set(glyph.character, glyph);
      }
    }
  }

  /** Returns the glyph for `c`, or the replacement glyph. */
  glyph(c: string): PackedGlyph | undefined {
    return this.byCharacter.get(c) ?? this.font.glyphs[this.font.replacementCharacter];
  }

  /** Pixel rows of a glyph, top to bottom. */
  glyphPixels(glyph: PackedGlyph): boolean[][] {
    const { width, height } = glyph.boundingBox;
    const rows: boolean[][] = [];
    for (let y = 0; y < height; y++) {
      const row: boolean[] = [];
      for (let x = 0; x < width; x++) {
        row.push(readBit(this.font.data, glyph.startIndex + y * width + x));
      }
      rows.push(row);
    }
    return rows;
  }

  /**
   * Renders a single line of text, one string per pixel row, `#` for set
   * pixels. The canvas is `ascent + descent` rows high with the baseline
   * below row `ascent - 1`.
   */
  renderText(text: string): string[] {
    const height = this.font.ascent + this.font.descent;
    const placed: Array<{ glyph: PackedGlyph; x: number }> = [];
    let width = 0;

    for (const c of text) {
      const glyph = this.glyph(c);
      if (!glyph) {
        continue;
      }
      placed.push({ glyph, x: width });
      width += glyph.deviceWidth;
    }

    const canvas = Array.from({ length: height }, () => new Array<string>(width).fill('.'));
    for (const { glyph, x } of placed) {
      this.glyphPixels(glyph).forEach((row, rowIndex) => {
        const canvasY = this.font.ascent - 1 + glyph.boundingBox.y + rowIndex;
        row.forEach((on, column) => {
          const canvasX = x + glyph.boundingBox.x + column;
          if (on && canvasY >= 0 && canvasY < height && canvasX >= 0 && canvasX < width) {
            canvas[canvasY][canvasX] = '#';
          }
        });
      });
    }

    return canvas.map((row) => row.join(''));
  }
}
