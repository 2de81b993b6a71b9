/**
 * Text helpers shared by the embedders and the ROUGE metrics
 */

/**
 * Lower-cased alphanumeric tokens; punctuation and whitespace separate tokens
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

/**
 * 32-bit FNV-1a
 */
export function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
