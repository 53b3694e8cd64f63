import type { ParseOptions } from '../types/font';
import { Glyphs } from './glyph';
import { Lines, ParserError } from './lines';
import type { Metadata } from './metadata';
import { parseMetadata } from './metadata';

export interface Font {
  metadata: Metadata;
  glyphs: Glyphs;
}

const SUPPORTED_VERSION = '2.1';

/**
 * Parses a BDF font.
 *
 * Accepts `\n` and `\r\n` line endings. `ENDFONT` may be omitted; whatever
 * follows it is ignored unless `endOfInput` is `strict`.
 */
export function parseFont(text: string, options: ParseOptions = {}): Font {
  const lines = new Lines(text);

  const banner = lines.next();
  if (!banner) {
    throw new ParserError('empty file');
  }
  if (banner.keyword !== 'STARTFONT') {
    throw ParserError.withLine('expected "STARTFONT"', banner);
  }
  if (banner.parameters !== SUPPORTED_VERSION) {
    throw ParserError.withLine(`unsupported BDF version: "${banner.parameters}"`, banner);
  }

  const metadata = parseMetadata(lines, options);
  const glyphs = Glyphs.parse(lines, metadata, options);

  if (options.endOfInput === 'strict') {
    const trailing = lines.next();
    if (trailing) {
      throw ParserError.withLine('unexpected data after "ENDFONT"', trailing);
    }
  }

  return { metadata, glyphs };
}
