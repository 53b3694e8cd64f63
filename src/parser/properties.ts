import type { ParseOptions } from '../types/font';
import { ParserError, parseInt32 } from './lines';
import type { Line, Lines } from './lines';

/** Standard XLFD property names. */
export const Property = {
  FontAscent: 'FONT_ASCENT',
  FontDescent: 'FONT_DESCENT',
  DefaultChar: 'DEFAULT_CHAR',
  PixelSize: 'PIXEL_SIZE',
  PointSize: 'POINT_SIZE',
  ResolutionX: 'RESOLUTION_X',
  ResolutionY: 'RESOLUTION_Y',
  Spacing: 'SPACING',
  AverageWidth: 'AVERAGE_WIDTH',
  FamilyName: 'FAMILY_NAME',
  WeightName: 'WEIGHT_NAME',
  Slant: 'SLANT',
  Foundry: 'FOUNDRY',
  CharsetRegistry: 'CHARSET_REGISTRY',
  CharsetEncoding: 'CHARSET_ENCODING',
  UnderlinePosition: 'UNDERLINE_POSITION',
  UnderlineThickness: 'UNDERLINE_THICKNESS',
  Copyright: 'COPYRIGHT',
  Notice: 'NOTICE',
} as const;

export type PropertyValue = { kind: 'text'; value: string } | { kind: 'int'; value: number };

export class PropertyError extends Error {
  constructor(
    readonly property: string,
    readonly reason: 'missing' | 'wrongType',
  ) {
    super(reason === 'missing' ? `missing property "${property}"` : `property "${property}" has the wrong type`);
    this.name = 'PropertyError';
  }
}

export class Properties {
  private readonly values: Map<string, PropertyValue>;

  constructor(values: Iterable<[string, PropertyValue]> = []) {
    this.values = new Map(values);
  }

  get size(): number {
    return this.values.size;
  }

  get(name: string): PropertyValue | undefined {
    return this.values.get(name);
  }

  getInt(name: string): number {
    const value = this.values.get(name);
    if (!value) {
      throw new PropertyError(name, 'missing');
    }
    if (value.kind !== 'int') {
      throw new PropertyError(name, 'wrongType');
    }
    return value.value;
  }

  getText(name: string): string {
    const value = this.values.get(name);
    if (!value) {
      throw new PropertyError(name, 'missing');
    }
    if (value.kind !== 'text') {
      throw new PropertyError(name, 'wrongType');
    }
    return value.value;
  }

  entries(): IterableIterator<[string, PropertyValue]> {
    return this.values.entries();
  }

  /**
   * Parses a `STARTPROPERTIES` ... `ENDPROPERTIES` block.
   *
   * The declared count is only checked when `strictCounts` is set; many
   * fonts in the wild declare the wrong number.
   */
  static parse(lines: Lines, options: ParseOptions = {}): Properties {
    const start = lines.next();
    if (!start || start.keyword !== 'STARTPROPERTIES') {
      throw new ParserError('expected "STARTPROPERTIES"', start?.lineNumber);
    }

    const declared = parseInt32(start.parameters);
    if (declared === undefined) {
      throw ParserError.withLine('invalid "STARTPROPERTIES"', start);
    }

    const values = new Map<string, PropertyValue>();
    let found = 0;

    for (let line = lines.next(); line; line = lines.next()) {
      if (line.keyword === 'ENDPROPERTIES') {
        if (options.strictCounts && found !== declared) {
          throw ParserError.withLine(
            `"STARTPROPERTIES" declares ${declared} properties, found ${found}`,
            start,
          );
        }
        return new Properties(values);
      }

      values.set(line.keyword, parseValue(line));
      found++;
    }

    throw new ParserError('missing "ENDPROPERTIES"');
  }
}

function parseValue(line: Line): PropertyValue {
  const int = parseInt32(line.parameters);
  if (int !== undefined) {
    return { kind: 'int', value: int };
  }

  const { parameters } = line;
  if (parameters.length >= 2 && parameters.startsWith('"') && parameters.endsWith('"')) {
    return { kind: 'text', value: parameters.slice(1, -1).replace(/""/g, '"') };
  }

  throw ParserError.withLine(`invalid property "${line.keyword}"`, line);
}
