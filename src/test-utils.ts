import fs from 'fs-extra';

export function readFixture(name: string): string {
  return fs.readFileSync(new URL(`./__fixtures__/${name}`, import.meta.url), 'utf8');
}

/** Strips the common indentation of a template literal. */
export function bdf(strings: TemplateStringsArray, ...values: unknown[]): string {
  const text = String.raw({ raw: strings }, ...values);
  const lines = text.split('\n');
  const indents = lines.filter((line) => line.trim().length > 0).map((line) => line.length - line.trimStart().length);
  const indent = indents.length > 0 ? Math.min(...indents) : 0;
  return lines.map((line) => line.slice(indent)).join('\n').replace(/^\n/, '');
}

/** Runs `fn` and returns the string form of the error it throws. */
export function errorOf(fn: () => unknown): string {
  try {
    fn();
  } catch (error) {
    return `${error}`;
  }
  throw new Error('expected an error');
}

/** Font with a 1x1 glyph for each code point. */
export function dotFont(codes: readonly number[]): string {
  const glyphs = codes.map((code) =>
    [`STARTCHAR U${code}`, `ENCODING ${code}`, 'DWIDTH 2 0', 'BBX 1 1 0 0', 'BITMAP', '80', 'ENDCHAR'].join('\n'),
  );
  return [
    'STARTFONT 2.1',
    'FONT dots',
    'SIZE 2 75 75',
    'FONTBOUNDINGBOX 1 1 0 0',
    'STARTPROPERTIES 2',
    'FONT_ASCENT 1',
    'FONT_DESCENT 0',
    'ENDPROPERTIES',
    `CHARS ${codes.length}`,
    ...glyphs,
    'ENDFONT',
  ].join('\n');
}
