import type { ParseOptions } from '../types/font';
import type { BoundingBox, Coord } from './geometry';
import { parseBoundingBox } from './geometry';
import { ParserError, parseIntegerParameters } from './lines';
import type { Line, Lines } from './lines';
import { Properties } from './properties';

/** Writing directions the font has metrics for (`METRICSSET 0|1|2`). */
export type MetricsSet = 'horizontal' | 'vertical' | 'both';

const METRICS_SETS: readonly MetricsSet[] = ['horizontal', 'vertical', 'both'];

export interface Metadata {
  /** Raw parameters of the `FONT` line. */
  name: string;
  pointSize: number;
  /** Resolution in DPI. */
  resolution: Coord;
  boundingBox: BoundingBox;
  metricsSet: MetricsSet;
  properties: Properties;
}

interface MetadataState {
  lines: Lines;
  options: ParseOptions;
  name?: string;
  boundingBox?: BoundingBox;
  pointSize?: number;
  resolution: Coord;
  metricsSet: MetricsSet;
  properties?: Properties;
  done: boolean;
}

type Transition = (state: MetadataState, line: Line) => void;

const transitions: Record<string, Transition> = {
  FONT: (state, line) => {
    state.name = line.parameters;
  },
  FONTBOUNDINGBOX: (state, line) => {
    state.boundingBox = parseBoundingBox(line);
    if (!state.boundingBox) {
      throw ParserError.withLine('invalid "FONTBOUNDINGBOX"', line);
    }
  },
  SIZE: (state, line) => {
    const values = parseIntegerParameters(line, 3);
    if (!values) {
      throw ParserError.withLine('invalid "SIZE"', line);
    }
    const [pointSize, x, y] = values;
    state.pointSize = pointSize;
    state.resolution = { x, y };
  },
  METRICSSET: (state, line) => {
    const values = parseIntegerParameters(line, 1);
    const metricsSet = values && METRICS_SETS[values[0]];
    if (!metricsSet) {
      throw ParserError.withLine('invalid "METRICSSET"', line);
    }
    state.metricsSet = metricsSet;
  },
  STARTPROPERTIES: (state, line) => {
    state.lines.backtrack(line);
    state.properties = Properties.parse(state.lines, state.options);
  },
  CHARS: (state, line) => {
    state.lines.backtrack(line);
    state.done = true;
  },
  STARTCHAR: (state, line) => {
    state.lines.backtrack(line);
    state.done = true;
  },
};

/**
 * Parses the font header following the `STARTFONT` line, up to the first
 * `CHARS` or `STARTCHAR` line.
 */
export function parseMetadata(lines: Lines, options: ParseOptions = {}): Metadata {
  const state: MetadataState = {
    lines,
    options,
    resolution: { x: 0, y: 0 },
    metricsSet: 'horizontal',
    done: false,
  };

  for (let line = lines.next(); line; line = state.done ? undefined : lines.next()) {
    const transition = Object.hasOwn(transitions, line.keyword) ? transitions[line.keyword] : undefined;
    if (!transition) {
      throw ParserError.withLine(`unknown keyword in metadata: "${line.keyword}"`, line);
    }
    transition(state, line);
  }

  if (state.name === undefined) {
    throw new ParserError('missing "FONT"');
  }
  if (!state.boundingBox) {
    throw new ParserError('missing "FONTBOUNDINGBOX"');
  }
  if (state.pointSize === undefined) {
    throw new ParserError('missing "SIZE"');
  }

  return {
    name: state.name,
    pointSize: state.pointSize,
    resolution: state.resolution,
    boundingBox: state.boundingBox,
    metricsSet: state.metricsSet,
    properties: state.properties ?? new Properties(),
  };
}
