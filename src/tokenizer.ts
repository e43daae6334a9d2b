import stopWordList from "../data/stop-words.json" with { type: "json" };

/** English stop words dropped before term extraction. */
export const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

/**
 * Split text into lower-cased alphanumeric tokens of two or more characters,
 * dropping stop words. Apostrophes are removed so "insurer's" stays whole.
 */
export function tokenize(text: string): string[] {
  return text
    .normalize("NFKC")
    .toLowerCase()
    .replace(/['’]/g, "")
    .split(/[^\p{L}\p{N}]+/u)
    .filter((t) => t.length >= 2 && !STOP_WORDS.has(t));
}

/**
 * Unigrams followed by n-grams up to `maxN` over the stop-word-filtered token
 * stream. Bigrams therefore join words that were separated only by stop words.
 */
export function extractTerms(text: string, maxN = 2): string[] {
  const tokens = tokenize(text);
  const terms = [...tokens];
  for (let n = 2; n <= maxN; n++) {
    for (let i = 0; i + n <= tokens.length; i++) {
      terms.push(tokens.slice(i, i + n).join(" "));
    }
  }
  return terms;
}
