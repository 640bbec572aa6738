import { selectTopK } from "./topk";
import type { SparseVector } from "./types";

/** A scored corpus position. */
export interface RankedHit {
  /** Position of the vector in the corpus sequence passed to {@link rank}. */
  position: number;
  score: number;
}

/**
 * Cosine similarity of two unit-length sparse vectors: their dot product,
 * summed over the smaller vector's terms.
 */
export function cosine(a: SparseVector, b: SparseVector): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let dot = 0;
  for (const [id, w] of small) {
    const other = large.get(id);
    if (other !== undefined) dot += w * other;
  }
  return dot;
}

/** Higher score first; equal scores keep the lower position first. */
export function compareHits(a: RankedHit, b: RankedHit): number {
  return b.score - a.score || a.position - b.position;
}

/**
 * Score `query` against every corpus vector and return the best `topK` hits in
 * rank order, keeping only those scoring strictly above `minSimilarity`.
 * `topK <= 0`, an empty corpus or an empty query vector yield [].
 */
export function rank(
  query: SparseVector,
  corpus: readonly SparseVector[],
  topK: number,
  minSimilarity: number,
): RankedHit[] {
  if (topK <= 0 || corpus.length === 0 || query.size === 0) return [];

  const scored = corpus.map((v, position) => ({ position, score: cosine(query, v) }));
  return selectTopK(scored, topK, compareHits).filter((h) => h.score > minSimilarity);
}
