import type { Line } from './lines';
import { parseIntegerParameters } from './lines';

/** Integer coordinate, Y axis pointing up. */
export interface Coord {
  x: number;
  y: number;
}

export interface BoundingBox {
  offset: Coord;
  size: Coord;
}

export function coord(x: number, y: number): Coord {
  return { x, y };
}

export function boundingBox(width: number, height: number, offsetX: number, offsetY: number): BoundingBox {
  return { offset: { x: offsetX, y: offsetY }, size: { x: width, y: height } };
}

export const EMPTY_BOUNDING_BOX: BoundingBox = boundingBox(0, 0, 0, 0);

/** Parses the two integer parameters of `DWIDTH`, `SWIDTH`, `VVECTOR` and similar lines. */
export function parseCoord(line: Line): Coord | undefined {
  const values = parseIntegerParameters(line, 2);
  return values && coord(values[0], values[1]);
}

/** Parses `width height offsetX offsetY`, as used by `BBX` and `FONTBOUNDINGBOX`. */
export function parseBoundingBox(line: Line): BoundingBox | undefined {
  const values = parseIntegerParameters(line, 4);
  return values && boundingBox(values[0], values[1], values[2], values[3]);
}

export function isEmpty(box: BoundingBox): boolean {
  return box.size.x === 0 || box.size.y === 0;
}

/** Y coordinate of the topmost pixel row. */
export function top(box: BoundingBox): number {
  return box.offset.y + box.size.y - 1;
}

/**
 * Returns the smallest box containing both boxes.
 *
 * Empty boxes are ignored. Both sizes must be non-negative.
 */
export function union(a: BoundingBox, b: BoundingBox): BoundingBox {
  assertNonNegative(a);
  assertNonNegative(b);

  if (isEmpty(b)) {
    return a;
  }
  if (isEmpty(a)) {
    return b;
  }

  const xMin = Math.min(a.offset.x, b.offset.x);
  const yMin = Math.min(a.offset.y, b.offset.y);
  const xMax = Math.max(a.offset.x + a.size.x - 1, b.offset.x + b.size.x - 1);
  const yMax = Math.max(a.offset.y + a.size.y - 1, b.offset.y + b.size.y - 1);

  return boundingBox(xMax - xMin + 1, yMax - yMin + 1, xMin, yMin);
}

function assertNonNegative(box: BoundingBox): void {
  if (box.size.x < 0 || box.size.y < 0) {
    throw new RangeError(`bounding box size must not be negative: ${box.size.x}x${box.size.y}`);
  }
}
