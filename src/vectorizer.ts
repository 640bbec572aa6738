import { VectorizerNotFittedError } from "./errors";
import { analyze } from "./tokenizer";
import type { NgramRange, SparseVector, TermId } from "./types";
import { Vocabulary } from "./vocabulary";

export interface VectorizerOptions {
  maxFeatures: number;
  stopWords: ReadonlySet<string>;
  ngramRange: NgramRange;
  sublinearTf: boolean;
}

/** Smoothed inverse document frequency: ln((1 + N) / (1 + df)) + 1. */
export function idf(documentCount: number, df: number): number {
  return Math.log((1 + documentCount) / (1 + df)) + 1;
}

export function l2Norm(v: SparseVector): number {
  let sum = 0;
  for (const w of v.values()) sum += w * w;
  return Math.sqrt(sum);
}

/**
 * Weight `text` against a vocabulary: tf (optionally 1 + ln(tf)) times idf for
 * every in-vocabulary term, then scaled to unit L2 length. Terms outside the
 * vocabulary contribute nothing; if none remain the result is empty.
 */
export function vectorize(text: string, vocabulary: Vocabulary, sublinearTf: boolean): SparseVector {
  const counts = new Map<TermId, number>();
  for (const term of analyze(text, vocabulary.stopWords, vocabulary.ngramRange)) {
    const id = vocabulary.idOf(term);
    if (id === undefined) continue;
    counts.set(id, (counts.get(id) ?? 0) + 1);
  }

  const weights = new Map<TermId, number>();
  for (const [id, c] of counts) {
    const tf = sublinearTf ? 1 + Math.log(c) : c;
    weights.set(id, tf * idf(vocabulary.documentCount, vocabulary.documentFrequency(id)));
  }

  const norm = l2Norm(weights);
  if (norm === 0) return new Map();
  for (const [id, w] of weights) weights.set(id, w / norm);
  return weights;
}

/**
 * TF-IDF vectorizer. `fit` learns the vocabulary from a corpus once; `transform`
 * only reads it, so query vectors never change corpus statistics.
 */
export class TfidfVectorizer {
  private vocab: Vocabulary | null = null;

  public constructor(private readonly options: VectorizerOptions) {}

  /** Learn the vocabulary (terms + document frequencies) from `texts`. */
  public fit(texts: readonly string[]): this {
    this.vocab = Vocabulary.build(texts, this.options);
    return this;
  }

  /** Fit on `texts`, then return one vector per text, in order. */
  public fitTransform(texts: readonly string[]): SparseVector[] {
    this.fit(texts);
    return texts.map((t) => this.transform(t));
  }

  /**
   * Vectorize a single text against the fitted vocabulary.
   * @throws {VectorizerNotFittedError} If {@link fit} has not been called.
   */
  public transform(text: string): SparseVector {
    return vectorize(text, this.vocabulary, this.options.sublinearTf);
  }

  public isFitted(): boolean {
    return this.vocab !== null;
  }

  /** @throws {VectorizerNotFittedError} If {@link fit} has not been called. */
  public get vocabulary(): Vocabulary {
    if (!this.vocab) throw new VectorizerNotFittedError();
    return this.vocab;
  }
}
