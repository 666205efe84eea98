/**
 * Trigram similarity, for recovering from misspelled medication names.
 * Words are lower-cased and padded with two leading and one trailing blank,
 * so "abc" gives "  a", " ab", "abc", "bc ".
 */

export function trigrams(text: string): Set<string> {
  const out = new Set<string>();
  for (const word of text.toLowerCase().split(/[^\p{L}\p{N}]+/u)) {
    if (!word) continue;
    const padded = `  ${word} `;
    for (let i = 0; i + 3 <= padded.length; i++) {
      out.add(padded.slice(i, i + 3));
    }
  }
  return out;
}

/** Shared trigrams over all distinct trigrams, 0..1 */
export function similarity(a: string, b: string): number {
  const ta = trigrams(a);
  const tb = trigrams(b);
  if (ta.size === 0 || tb.size === 0) return 0;
  let shared = 0;
  for (const t of ta) {
    if (tb.has(t)) shared++;
  }
  return shared / (ta.size + tb.size - shared);
}
