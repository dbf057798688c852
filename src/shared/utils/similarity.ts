/**
 * Text Similarity
 *
 * Trigram similarity in the style of PostgreSQL's pg_trgm: each word is
 * padded with two leading spaces and one trailing space, split into
 * three-character grams, and two strings score |A ∩ B| / |A ∪ B|.
 */

export type SimilarityScorer = (a: string, b: string) => number;

/** Set of padded trigrams for a string */
export function trigrams(text: string): Set<string> {
  const grams = new Set<string>();
  const words = text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((word) => word.length > 0);

  for (const word of words) {
    const padded = `  ${word} `;
    for (let i = 0; i + 3 <= padded.length; i++) {
      grams.add(padded.slice(i, i + 3));
    }
  }

  return grams;
}

export function trigramSimilarity(a: string, b: string): number {
  const left = trigrams(a);
  const right = trigrams(b);
  if (left.size === 0 && right.size === 0) return 0;

  let shared = 0;
  for (const gram of left) {
    if (right.has(gram)) shared++;
  }

  return shared / (left.size + right.size - shared);
}

/** Words worth prefiltering a candidate search on */
export function significantTokens(normalizedName: string): string[] {
  const generic = new Set(["ltd", "plc", "llp", "co", "&", "the", "group", "uk", "services"]);
  return normalizedName
    .split(" ")
    .filter((token) => token.length >= 3 && !generic.has(token));
}
