export interface ParseOptions {
  /** Reject files whose `STARTPROPERTIES` or `CHARS` counts don't match the entries found. */
  strictCounts?: boolean;
  /** `strict` rejects anything but blank or comment lines after `ENDFONT`. */
  endOfInput?: 'lenient' | 'strict';
}

export interface AtlasOptions {
  glyphsPerRow?: number;
}

/** Inclusive character range. */
export interface CharRange {
  from: string;
  to: string;
}

/** Y-down rectangle relative to the glyph origin on the baseline. */
export interface Rectangle {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface DecorationDimensions {
  offset: number;
  height: number;
}
