import { InvalidConfigurationError } from "./errors";
import type { NgramRange } from "./types";

/** Built-in stop word list name, "none", or an explicit word list. */
export type StopWordsOption = "english" | "none" | readonly string[];

/**
 * Knobs accepted by the retrieval core. Defaults: 500-char chunks with 50
 * chars of overlap, 500 features, English stop words, unigrams, raw term
 * counts, top 5, strictly positive similarity.
 */
export interface RetrievalOptions {
  /** Characters per chunk window. */
  chunkSize: number;
  /** Characters shared by consecutive windows (must be < chunkSize). */
  chunkOverlap: number;
  /** Vocabulary cap; most frequent terms (by document frequency) win. */
  maxFeatures: number;
  stopWords: StopWordsOption;
  ngramRange: NgramRange;
  /** Replace raw term count c with 1 + ln(c). */
  sublinearTf: boolean;
  /** Default number of results per query. */
  topK: number;
  /** Results must score strictly above this value. */
  minSimilarity: number;
}

const defaults: RetrievalOptions = {
  chunkSize: 500,
  chunkOverlap: 50,
  maxFeatures: 500,
  stopWords: "english",
  ngramRange: [1, 1],
  sublinearTf: false,
  topK: 5,
  minSimilarity: 0,
};

export const DEFAULT_OPTIONS: Readonly<RetrievalOptions> = Object.freeze(defaults);

function isPositiveInt(n: number): boolean {
  return Number.isInteger(n) && n > 0;
}

/** Throws {@link InvalidConfigurationError} if `chunkSize` / `overlap` cannot drive the chunker. */
export function assertChunkParams(chunkSize: number, overlap: number): void {
  if (!isPositiveInt(chunkSize)) {
    throw new InvalidConfigurationError("chunkSize", `expected a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new InvalidConfigurationError("chunkOverlap", `expected a non-negative integer, got ${overlap}`);
  }
  if (overlap >= chunkSize) {
    throw new InvalidConfigurationError(
      "chunkOverlap",
      `must be smaller than chunkSize (${chunkSize}), got ${overlap}`,
    );
  }
}

export function assertTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK < 0) {
    throw new InvalidConfigurationError("topK", `expected a non-negative integer, got ${topK}`);
  }
}

export function assertMinSimilarity(minSimilarity: number): void {
  if (!Number.isFinite(minSimilarity)) {
    throw new InvalidConfigurationError("minSimilarity", `expected a finite number, got ${minSimilarity}`);
  }
}

export function assertNgramRange(range: NgramRange): void {
  const [min, max] = range;
  if (!isPositiveInt(min) || !isPositiveInt(max) || min > max) {
    throw new InvalidConfigurationError(
      "ngramRange",
      `expected integers 1 <= min <= max, got [${min}, ${max}]`,
    );
  }
}

/**
 * Merge caller overrides over {@link DEFAULT_OPTIONS} and validate the result.
 * Every malformed option is reported here, before any computation starts.
 */
export function resolveOptions(overrides: Partial<RetrievalOptions> = {}): Readonly<RetrievalOptions> {
  const merged: RetrievalOptions = { ...DEFAULT_OPTIONS, ...overrides };
  assertChunkParams(merged.chunkSize, merged.chunkOverlap);
  if (!isPositiveInt(merged.maxFeatures)) {
    throw new InvalidConfigurationError(
      "maxFeatures",
      `expected a positive integer, got ${merged.maxFeatures}`,
    );
  }
  assertNgramRange(merged.ngramRange);
  assertTopK(merged.topK);
  assertMinSimilarity(merged.minSimilarity);
  const stopWords =
    typeof merged.stopWords === "string" ? merged.stopWords : Object.freeze([...merged.stopWords]);
  return Object.freeze({
    ...merged,
    stopWords,
    ngramRange: [merged.ngramRange[0], merged.ngramRange[1]] as const,
  });
}
