import type { NgramRange } from "./types";

/** Word rule: runs of at least two Unicode letters, digits or underscores. */
const WORD = /[\p{L}\p{N}_]{2,}/gu;

/**
 * Lowercase `text` and yield its word tokens, skipping stop words. Single
 * characters never form a token.
 */
export function* tokenize(text: string, stopWords: ReadonlySet<string>): Generator<string> {
  for (const m of text.toLowerCase().matchAll(WORD)) {
    const token = m[0];
    if (!stopWords.has(token)) yield token;
  }
}

/**
 * Assemble candidate terms from surviving tokens: all n-grams for n in
 * `[min, max]`, joined by single spaces. Unigrams come first, then bigrams, and
 * so on, each group in text order.
 */
export function extractTerms(tokens: readonly string[], ngramRange: NgramRange): string[] {
  const [min, max] = ngramRange;
  if (min === 1 && max === 1) return [...tokens];

  const out: string[] = [];
  for (let n = min; n <= max; n++) {
    for (let i = 0; i + n <= tokens.length; i++) {
      out.push(n === 1 ? tokens[i] : tokens.slice(i, i + n).join(" "));
    }
  }
  return out;
}

/** Tokenize + n-gram assembly in one step. */
export function analyze(
  text: string,
  stopWords: ReadonlySet<string>,
  ngramRange: NgramRange,
): string[] {
  return extractTerms([...tokenize(text, stopWords)], ngramRange);
}
