import type { ParseOptions } from '../types/font';
import type { BoundingBox, Coord } from './geometry';
import { parseBoundingBox, parseCoord } from './geometry';
import { ParserError, parseInt32, parseIntegerParameters } from './lines';
import type { Line, Lines } from './lines';
import type { Metadata } from './metadata';

/**
 * Character code of a glyph.
 *
 * `standard` codes are treated as Unicode code points throughout this
 * package, although BDF allows other character sets (e.g. JIS).
 */
export type Encoding =
  | { kind: 'standard'; code: number }
  | { kind: 'nonStandard'; index: number }
  | { kind: 'unspecified' };

export function standardEncoding(code: number): Encoding {
  return { kind: 'standard', code };
}

export interface GlyphWidth {
  /** Scalable width in 1/1000 em. */
  scalable: Coord;
  /** Device width in pixels. */
  device: Coord;
}

export interface GlyphData {
  name: string;
  encoding: Encoding;
  widthHorizontal?: GlyphWidth;
  widthVertical?: GlyphWidth;
  boundingBox: BoundingBox;
  /** Offset between the origins of the two writing directions (`VVECTOR`). */
  originOffset?: Coord;
  /** Row-major, MSB-first, `ceil(width / 8)` bytes per row. */
  bitmap: Uint8Array;
}

export class Glyph implements GlyphData {
  readonly name: string;
  readonly encoding: Encoding;
  readonly widthHorizontal?: GlyphWidth;
  readonly widthVertical?: GlyphWidth;
  readonly boundingBox: BoundingBox;
  readonly originOffset?: Coord;
  readonly bitmap: Uint8Array;

  constructor(data: GlyphData) {
    this.name = data.name;
    this.encoding = data.encoding;
    this.widthHorizontal = data.widthHorizontal;
    this.widthVertical = data.widthVertical;
    this.boundingBox = data.boundingBox;
    this.originOffset = data.originOffset;
    this.bitmap = data.bitmap;
  }

  /** Returns a copy of this glyph answering to a different encoding. */
  withEncoding(encoding: Encoding): Glyph {
    return new Glyph({ ...this, encoding });
  }

  /**
   * Returns the pixel at `(x, y)`, `y` counting rows from the top, or
   * `undefined` if the position lies outside of the bitmap data.
   */
  pixel(x: number, y: number): boolean | undefined {
    const width = this.boundingBox.size.x;
    if (x < 0 || x >= width || y < 0) {
      return undefined;
    }

    const bytesPerRow = Math.ceil(width / 8);
    const index = Math.floor(x / 8) + bytesPerRow * y;
    if (index >= this.bitmap.length) {
      return undefined;
    }

    return (this.bitmap[index] & (0x80 >> x % 8)) !== 0;
  }

  /** All pixels of the bounding box in row-major order. */
  pixels(): Iterable<boolean> {
    return { [Symbol.iterator]: () => this.iteratePixels() };
  }

  private *iteratePixels(): Generator<boolean> {
    const { x: width, y: height } = this.boundingBox.size;
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        yield this.pixel(x, y) ?? false;
      }
    }
  }

  static parse(lines: Lines, metadata: Metadata): Glyph {
    const start = lines.next();
    if (!start || start.keyword !== 'STARTCHAR') {
      throw new ParserError('expected "STARTCHAR"', start?.lineNumber);
    }

    const state: GlyphState = { phase: 'header', start, rows: [] };

    for (let line = lines.next(); line; line = lines.next()) {
      if (state.phase === 'header') {
        const transition = Object.hasOwn(headerTransitions, line.keyword) ? headerTransitions[line.keyword] : undefined;
        if (!transition) {
          throw ParserError.withLine(`unknown keyword in glyphs: "${line.keyword}"`, line);
        }
        transition(state, line);
      } else if (line.keyword === 'ENDCHAR') {
        return finishGlyph(state, metadata);
      } else {
        state.rows.push(parseBitmapRow(line));
      }
    }

    throw ParserError.withLine('missing "ENDCHAR"', start);
  }
}

interface GlyphState {
  phase: 'header' | 'bitmap';
  start: Line;
  encoding?: Encoding;
  scalableWidth?: Coord;
  deviceWidth?: Coord;
  scalableWidthVertical?: Coord;
  deviceWidthVertical?: Coord;
  boundingBox?: BoundingBox;
  originOffset?: Coord;
  rows: Uint8Array[];
}

type Transition = (state: GlyphState, line: Line) => void;

function coordTransition(key: 'scalableWidth' | 'deviceWidth' | 'scalableWidthVertical' | 'deviceWidthVertical' | 'originOffset'): Transition {
  return (state, line) => {
    const value = parseCoord(line);
    if (!value) {
      throw ParserError.withLine(`invalid "${line.keyword}"`, line);
    }
    state[key] = value;
  };
}

const headerTransitions: Record<string, Transition> = {
  ENCODING: (state, line) => {
    state.encoding = parseEncoding(line);
  },
  SWIDTH: coordTransition('scalableWidth'),
  DWIDTH: coordTransition('deviceWidth'),
  SWIDTH1: coordTransition('scalableWidthVertical'),
  DWIDTH1: coordTransition('deviceWidthVertical'),
  VVECTOR: coordTransition('originOffset'),
  BBX: (state, line) => {
    state.boundingBox = parseBoundingBox(line);
    if (!state.boundingBox) {
      throw ParserError.withLine('invalid "BBX"', line);
    }
  },
  BITMAP: (state, line) => {
    if (line.parameters !== '') {
      throw ParserError.withLine('invalid "BITMAP"', line);
    }
    state.phase = 'bitmap';
  },
};

function parseEncoding(line: Line): Encoding {
  const values = parseIntegerParameters(line, 1) ?? parseIntegerParameters(line, 2);
  if (values?.length === 1) {
    const [code] = values;
    return code >= 0 ? { kind: 'standard', code } : { kind: 'unspecified' };
  }
  if (values?.length === 2 && values[0] < 0 && values[1] >= 0) {
    return { kind: 'nonStandard', index: values[1] };
  }

  throw ParserError.withLine('invalid "ENCODING"', line);
}

const HEX_ROW = /^(?:[0-9a-fA-F]{2})+$/;

function parseBitmapRow(line: Line): Uint8Array {
  if (line.parameters !== '' || !HEX_ROW.test(line.keyword)) {
    throw ParserError.withLine('invalid hex data in BITMAP', line);
  }

  const row = new Uint8Array(line.keyword.length / 2);
  for (let i = 0; i < row.length; i++) {
    row[i] = parseInt(line.keyword.slice(i * 2, i * 2 + 2), 16);
  }
  return row;
}

/**
 * Some fonts omit `SWIDTH`; it is approximated from the device width, the
 * point size and the resolution in that case.
 */
function approximateScalableWidth(device: Coord, metadata: Metadata): Coord {
  const scale = (value: number, resolution: number): number => {
    const divisor = metadata.pointSize * resolution;
    return divisor === 0 ? 0 : Math.round((value * 1000 * 72) / divisor);
  };

  return {
    x: scale(device.x, metadata.resolution.x),
    y: scale(device.y, metadata.resolution.y),
  };
}

function glyphWidth(
  scalable: Coord | undefined,
  device: Coord | undefined,
  deviceKeyword: string,
  state: GlyphState,
  metadata: Metadata,
): GlyphWidth | undefined {
  if (!scalable && !device) {
    return undefined;
  }
  if (!device) {
    throw ParserError.withLine(`missing "${deviceKeyword}"`, state.start);
  }

  return { scalable: scalable ?? approximateScalableWidth(device, metadata), device };
}

function finishGlyph(state: GlyphState, metadata: Metadata): Glyph {
  if (!state.encoding) {
    throw ParserError.withLine('missing "ENCODING"', state.start);
  }
  if (!state.boundingBox) {
    throw ParserError.withLine('missing "BBX"', state.start);
  }

  const bitmap = new Uint8Array(state.rows.reduce((length, row) => length + row.length, 0));
  let offset = 0;
  for (const row of state.rows) {
    bitmap.set(row, offset);
    offset += row.length;
  }

  return new Glyph({
    name: state.start.parameters,
    encoding: state.encoding,
    widthHorizontal: glyphWidth(state.scalableWidth, state.deviceWidth, 'DWIDTH', state, metadata),
    widthVertical: glyphWidth(state.scalableWidthVertical, state.deviceWidthVertical, 'DWIDTH1', state, metadata),
    boundingBox: state.boundingBox,
    originOffset: state.originOffset,
    bitmap,
  });
}

/**
 * Glyphs in file order, with a lookup index by standard encoding.
 */
export class Glyphs implements Iterable<Glyph> {
  private readonly glyphs: readonly Glyph[];
  private readonly byCode = new Map<number, Glyph>();

  constructor(glyphs: readonly Glyph[]) {
    this.glyphs = glyphs;
    for (const glyph of glyphs) {
      if (glyph.encoding.kind === 'standard' && !this.byCode.has(glyph.encoding.code)) {
        this.byCode.set(glyph.encoding.code, glyph);
      }
    }
  }

  get length(): number {
    return this.glyphs.length;
  }

  [Symbol.iterator](): Iterator<Glyph> {
    return this.glyphs[Symbol.iterator]();
  }

  at(index: number): Glyph | undefined {
    return this.glyphs[index];
  }

  /** Looks up a glyph by character, assuming the font is Unicode encoded. */
  get(c: string): Glyph | undefined {
    const code = c.codePointAt(0);
    return code === undefined ? undefined : this.getCode(code);
  }

  getCode(code: number): Glyph | undefined {
    return this.byCode.get(code);
  }

  /**
   * Parses glyphs up to `ENDFONT` or the end of the input.
   *
   * `CHARS` is skipped unless `strictCounts` is set, in which case it must
   * hold the number of glyphs that follow.
   */
  static parse(lines: Lines, metadata: Metadata, options: ParseOptions = {}): Glyphs {
    const glyphs: Glyph[] = [];
    let chars: { count: number; line: Line } | undefined;

    for (let line = lines.next(); line; line = lines.next()) {
      if (line.keyword === 'ENDFONT') {
        break;
      } else if (line.keyword === 'STARTCHAR') {
        lines.backtrack(line);
        glyphs.push(Glyph.parse(lines, metadata));
      } else if (line.keyword === 'CHARS') {
        if (options.strictCounts) {
          const count = parseInt32(line.parameters);
          if (count === undefined) {
            throw ParserError.withLine('invalid "CHARS"', line);
          }
          chars = { count, line };
        }
      } else {
        throw ParserError.withLine(`unknown keyword in glyphs: "${line.keyword}"`, line);
      }
    }

    if (chars && chars.count !== glyphs.length) {
      throw ParserError.withLine(`"CHARS" declares ${chars.count} glyphs, found ${glyphs.length}`, chars.line);
    }

    return new Glyphs(glyphs);
  }
}
