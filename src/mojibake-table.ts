/**
 * Known mojibake substrings and the text they stand for.
 *
 * Most entries are UTF-8 encoded Latin letters that were decoded as
 * Windows-1252 ("Ã©" for "é"). Rules are applied in declaration order.
 */

export type MojibakeRule = readonly [corrupted: string, correct: string];

export const DEFAULT_MOJIBAKE_TABLE: readonly MojibakeRule[] = Object.freeze([
  ['æ–‡ä»¶', '文件'],
  ['Ã©', 'é'],
  ['Ã¨', 'è'],
  // 0xA0 (no-break space) after Ã is usually stored as a plain space
  ['Ã ', 'à'],
  ['Ã±', 'ñ'],
  ['Ã¤', 'ä'],
  ['Ã¶', 'ö'],
  ['Ã¼', 'ü'],
  ['Ã¡', 'á'],
  ['Ã\u00AD', 'í'],
  ['Ã³', 'ó'],
  ['Ãº', 'ú'],
  ['Ã§', 'ç'],
  ['Ã¢', 'â'],
  ['Ãª', 'ê'],
  ['Ã´', 'ô'],
  ['Ã®', 'î'],
  ['Ã»', 'û'],
  ['Ã«', 'ë'],
  ['Ã¯', 'ï'],
  ['Ã£', 'ã'],
  ['Ãµ', 'õ'],
  ['ÃŸ', 'ß'],
  ['Ã‰', 'É'],
  ['Ã–', 'Ö'],
  ['Ãœ', 'Ü'],
  ['Ã„', 'Ä']
] as const);

export function applyMojibakeTable(
  name: string,
  table: readonly MojibakeRule[] = DEFAULT_MOJIBAKE_TABLE
): string {
  let result = name;
  for (const [corrupted, correct] of table) {
    if (corrupted.length === 0) continue;
    result = result.split(corrupted).join(correct);
  }
  return result;
}
