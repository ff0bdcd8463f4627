/**
 * A name is clean when every character is 7-bit ASCII. Non-ASCII names are
 * not judged right or wrong here; they are simply candidates for repair.
 */
export function isClean(name: string): boolean {
  for (let i = 0; i < name.length; i++) {
    if (name.charCodeAt(i) > 0x7F) return false;
  }
  return true;
}
