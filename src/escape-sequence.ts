/**
 * `#U` escape placeholders
 *
 * Some archivers and sync tools that cannot store non-ASCII names write each
 * character as `#U` followed by its four-digit hex code point:
 * `#U51b2#U950b#U7ebf.txt` stands for `冲锋线.txt`.
 */

const ESCAPE_PATTERN = /#U([0-9a-fA-F]{4})/g;
const ESCAPE_TEST = /#U[0-9a-fA-F]{4}/;

export function hasEscapeSequence(name: string): boolean {
  return ESCAPE_TEST.test(name);
}

/**
 * Replace every `#UXXXX` placeholder with the character it denotes. A match
 * that does not parse stays verbatim.
 */
export function decodeEscapeSequences(name: string): string {
  if (!hasEscapeSequence(name)) return name;

  return name.replace(ESCAPE_PATTERN, (match: string, hex: string) => {
    const codePoint = Number.parseInt(hex, 16);
    return Number.isNaN(codePoint) ? match : String.fromCharCode(codePoint);
  });
}
