/**
 * Error raised while parsing BDF text.
 *
 * `lineNumber` is 1-based and counts every physical line of the input,
 * including blank and `COMMENT` lines.
 */
export class ParserError extends Error {
  readonly lineNumber?: number;

  constructor(message: string, lineNumber?: number) {
    super(message);
    this.name = 'ParserError';
    this.lineNumber = lineNumber;
  }

  static withLine(message: string, line: Line): ParserError {
    return new ParserError(message, line.lineNumber);
  }

  override toString(): string {
    return this.lineNumber === undefined ? this.message : `line ${this.lineNumber}: ${this.message}`;
  }
}

export interface Line {
  /** First whitespace-delimited word. */
  keyword: string;
  /** Remainder of the line, trimmed. */
  parameters: string;
  lineNumber: number;
}

const INT32_PATTERN = /^[+-]?\d+$/;

export function parseInt32(text: string): number | undefined {
  if (!INT32_PATTERN.test(text)) {
    return undefined;
  }

  const value = Number(text);
  if (value < -0x80000000 || value > 0x7fffffff) {
    return undefined;
  }

  return value;
}

/**
 * Parses exactly `count` whitespace separated int32 values from the line's
 * parameters.
 */
export function parseIntegerParameters(line: Line, count: number): number[] | undefined {
  const parts = line.parameters.split(/\s+/).filter((part) => part.length > 0);
  if (parts.length !== count) {
    return undefined;
  }

  const values: number[] = [];
  for (const part of parts) {
    const value = parseInt32(part);
    if (value === undefined) {
      return undefined;
    }
    values.push(value);
  }

  return values;
}

/**
 * Line iterator over BDF text with a single slot of lookahead.
 *
 * Blank lines and `COMMENT` lines are skipped.
 */
export class Lines {
  private readonly input: string[];
  private index = 0;
  private backtrackNext: Line | undefined;

  constructor(text: string) {
    this.input = text.split(/\r?\n/);
  }

  next(): Line | undefined {
    if (this.backtrackNext) {
      const line = this.backtrackNext;
      this.backtrackNext = undefined;
      return line;
    }

    while (this.index < this.input.length) {
      const lineNumber = this.index + 1;
      const text = this.input[this.index].trim();
      this.index++;

      if (text.length === 0) {
        continue;
      }

      const line = splitLine(text, lineNumber);
      if (line.keyword !== 'COMMENT') {
        return line;
      }
    }

    return undefined;
  }

  /**
   * Pushes a line back so that it is returned by the next call to `next`.
   */
  backtrack(line: Line): void {
    if (this.backtrackNext) {
      throw new Error(`cannot backtrack twice (line ${line.lineNumber})`);
    }

    this.backtrackNext = line;
  }
}

function splitLine(text: string, lineNumber: number): Line {
  const match = /\s/.exec(text);
  if (!match) {
    return { keyword: text, parameters: '', lineNumber };
  }

  return {
    keyword: text.slice(0, match.index),
    parameters: text.slice(match.index).trim(),
    lineNumber,
  };
}
