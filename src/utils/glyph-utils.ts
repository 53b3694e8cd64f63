import type { BoundingBox } from '../parser/geometry';
import type { Encoding, Glyph } from '../parser/glyph';
import { formatCodePoint } from './unicode-utils';

/** One string per pixel row, `#` for set pixels. */
export function glyphToRows(glyph: Glyph): string[] {
  const { x: width, y: height } = glyph.boundingBox.size;
  const rows: string[] = [];
  for (let y = 0; y < height; y++) {
    let row = '';
    for (let x = 0; x < width; x++) {
      row += glyph.pixel(x, y) ? '#' : '.';
    }
    rows.push(row);
  }
  return rows;
}

export function formatEncoding(encoding: Encoding): string {
  switch (encoding.kind) {
    case 'standard':
      return formatCodePoint(encoding.code);
    case 'nonStandard':
      return `non-standard ${encoding.index}`;
    case 'unspecified':
      return 'unspecified';
  }
}

export function formatBoundingBox(box: BoundingBox): string {
  return `${box.size.x}x${box.size.y} at (${box.offset.x}, ${box.offset.y})`;
}
