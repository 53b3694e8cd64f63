import type { AtlasFontOutput } from './atlas-font';
import type { BitPackedFontOutput } from './bit-packed-font';

export function dataFileName(fileStem: string): string {
  return `${fileStem}.data`;
}

/** Single quoted string literal; control characters use `\u` escapes. */
export function stringLiteral(value: string): string {
  const escaped = Array.from(value, (c) => {
    const code = c.codePointAt(0) ?? 0;
    if (c === '\\' || c === "'") {
      return `\\${c}`;
    }
    if (code < 0x20 || code === 0x7f) {
      return `\\u${code.toString(16).padStart(4, '0')}`;
    }
    return c;
  });

  return `'${escaped.join('')}'`;
}

function docComment(comments: readonly string[]): string {
  if (comments.length === 0) {
    return '';
  }
  if (comments.length === 1) {
    return `/** ${comments[0]} */\n`;
  }
  return `/**\n${comments.map((comment) => ` * ${comment}`).join('\n')}\n */\n`;
}

function dataExpression(fileStem: string): string {
  return `readFileSync(new URL(${stringLiteral(`./${dataFileName(fileStem)}`)}, import.meta.url))`;
}

export function generateBitPackedModule(output: BitPackedFontOutput): string {
  const { font } = output;

  const glyphs = output.glyphs
    .map(({ character, boundingBox: { x, y, width, height }, deviceWidth, startIndex }) => {
      return `    { character: ${stringLiteral(character)}, boundingBox: { x: ${x}, y: ${y}, width: ${width}, height: ${height} }, deviceWidth: ${deviceWidth}, startIndex: ${startIndex} },`;
    })
    .join('\n');

  return `import { readFileSync } from 'node:fs';

${docComment(font.comments)}export const ${font.name} = {
  data: ${dataExpression(font.fileStem)},
  replacementCharacter: ${font.replacementCharacter},
  ascent: ${font.ascent},
  descent: ${font.descent},
  glyphs: [
${glyphs}
  ],
} as const;
`;
}

export function generateAtlasModule(output: AtlasFontOutput): string {
  const { font } = output;

  const glyphMapping = output.mapping
    ? `{ preset: ${stringLiteral(output.mapping.id)} }`
    : `{ data: ${stringLiteral(output.strMapping ?? '')}, replacementIndex: ${output.replacementIndex} }`;

  return `import { readFileSync } from 'node:fs';

${docComment(font.comments)}export const ${font.name} = {
  image: { data: ${dataExpression(font.fileStem)}, width: ${output.image.width} },
  glyphMapping: ${glyphMapping},
  characterSize: { width: ${output.characterSize.width}, height: ${output.characterSize.height} },
  characterSpacing: ${output.characterSpacing},
  baseline: ${output.baseline},
  underline: { offset: ${output.underline.offset}, height: ${output.underline.height} },
  strikethrough: { offset: ${output.strikethrough.offset}, height: ${output.strikethrough.height} },
} as const;
`;
}
