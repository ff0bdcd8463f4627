/**
 * Text codec module
 *
 * Wraps iconv-lite for decoding and encoding legacy code pages (Latin-1,
 * Windows-1252, GBK, GB2312, Big5, ...) and counts the substitutions a lossy
 * decode leaves behind.
 */

import * as iconv from 'iconv-lite';

const REPLACEMENT_CHAR = '\uFFFD';

/**
 * Count replacement characters (U+FFFD) in a string
 */
export function countReplacementChars(str: string): number {
  let count = 0;
  for (const char of str) {
    if (char === REPLACEMENT_CHAR) count++;
  }
  return count;
}

export function isSupportedEncoding(encoding: string): boolean {
  return iconv.encodingExists(encoding);
}

/**
 * Decode bytes to string using the specified encoding.
 *
 * Unmappable sequences become U+FFFD. An encoding iconv-lite does not know
 * falls back to Latin-1, which preserves every byte value.
 */
export function decodeBytes(bytes: Uint8Array, encoding: string): string {
  if (!iconv.encodingExists(encoding)) {
    return iconv.decode(Buffer.from(bytes), 'latin1');
  }
  return iconv.decode(Buffer.from(bytes), encoding);
}

/**
 * Encode a string into the specified encoding. Characters the encoding
 * cannot represent are written as iconv-lite's default substitute.
 */
export function encodeText(text: string, encoding: string): Buffer {
  return iconv.encode(text, encoding);
}

/**
 * Strict UTF-8 validity check (no replacement on malformed input).
 */
export function isValidUtf8(bytes: Uint8Array): boolean {
  try {
    new TextDecoder('utf-8', {fatal: true}).decode(bytes);
    return true;
  } catch {
    return false;
  }
}

/**
 * Take the Latin-1 bytes of a garbled name and decode them with another
 * encoding, dropping whatever that encoding cannot map.
 *
 * Example: "Õâ¸ö" reinterpreted as "gbk" → "这个"
 *
 * @returns the reinterpreted name, or undefined when the name holds a
 * character above U+00FF and therefore has no Latin-1 form
 */
export function reinterpretName(
  name: string,
  encoding: string
): string | undefined {
  for (let i = 0; i < name.length; i++) {
    if (name.charCodeAt(i) > 0xFF) return undefined;
  }

  const bytes = iconv.encode(name, 'latin1');
  return decodeBytes(bytes, encoding).split(REPLACEMENT_CHAR).join('');
}
