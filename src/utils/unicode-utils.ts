export function formatCodePoint(code: number): string {
  return `U+${code.toString(16).toUpperCase().padStart(4, '0')}`;
}

/** Formats a character for messages, e.g. `'A' (U+0041)`. */
export function describeCodePoint(code: number): string {
  return `'${String.fromCodePoint(code)}' (${formatCodePoint(code)})`;
}

/** Returns the code point of a string holding exactly one character. */
export function toCodePoint(c: string): number | undefined {
  const [first, ...rest] = Array.from(c);
  return first !== undefined && rest.length === 0 ? first.codePointAt(0) : undefined;
}
