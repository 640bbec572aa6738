import { chunkCorpus } from "./chunker";
import {
  assertMinSimilarity,
  assertTopK,
  resolveOptions,
  type RetrievalOptions,
} from "./options";
import { rank } from "./ranker";
import { resolveStopWords } from "./stopwords";
import type { Chunk, Corpus, QueryResult, SparseVector } from "./types";
import { TfidfVectorizer, vectorize } from "./vectorizer";
import { Vocabulary } from "./vocabulary";

/**
 * Immutable retrieval index over a corpus: the fitted vocabulary plus the
 * (chunk, vector) pairs of every searchable chunk, stored positionally so
 * `chunks()[i]` always belongs to `vectorOf(i)`.
 *
 * Instances are produced by {@link DocumentIndex.build} and never change
 * afterwards; a corpus reload builds a new instance. Queries are synchronous
 * and side-effect free, so any number of them may share one instance.
 */
export class DocumentIndex {
  private constructor(
    public readonly options: Readonly<RetrievalOptions>,
    public readonly vocabulary: Vocabulary,
    private readonly entries: readonly Chunk[],
    private readonly vectors: readonly SparseVector[],
    /** Number of documents in the source corpus. */
    public readonly documentCount: number,
    /** Chunks produced before degenerate ones were dropped. */
    public readonly chunksTotal: number,
  ) {}

  /**
   * Chunk the corpus, fit the vocabulary once over every chunk, vectorize each
   * chunk and keep the non-degenerate ones. An empty corpus or a corpus whose
   * terms are all filtered out yields an empty (but valid) index.
   *
   * @throws {InvalidConfigurationError} On malformed options, before any work.
   */
  public static build(corpus: Corpus, overrides: Partial<RetrievalOptions> = {}): DocumentIndex {
    const options = resolveOptions(overrides);
    const chunks = chunkCorpus(corpus, options.chunkSize, options.chunkOverlap);

    const vectorizer = new TfidfVectorizer({
      maxFeatures: options.maxFeatures,
      stopWords: resolveStopWords(options.stopWords),
      ngramRange: options.ngramRange,
      sublinearTf: options.sublinearTf,
    });
    const vectors = vectorizer.fitTransform(chunks.map((c) => c.text));

    const keptChunks: Chunk[] = [];
    const keptVectors: SparseVector[] = [];
    for (let i = 0; i < chunks.length; i++) {
      if (vectors[i].size === 0) continue;
      keptChunks.push(chunks[i]);
      keptVectors.push(vectors[i]);
    }

    const skipped = chunks.length - keptChunks.length;
    if (skipped > 0) {
      console.error(`[RAG] Skipped ${skipped} chunk(s) sharing no vocabulary term.`);
    }

    return new DocumentIndex(
      options,
      vectorizer.vocabulary,
      keptChunks,
      keptVectors,
      corpus.length,
      chunks.length,
    );
  }

  /** An index with nothing to search. */
  public static empty(overrides: Partial<RetrievalOptions> = {}): DocumentIndex {
    return DocumentIndex.build([], overrides);
  }

  /** Number of searchable chunks. */
  public get chunkCount(): number {
    return this.entries.length;
  }

  public get vocabularySize(): number {
    return this.vocabulary.size;
  }

  /** True when no query can ever match (no chunks or no vocabulary). */
  public get isEmpty(): boolean {
    return this.entries.length === 0 || this.vocabulary.isEmpty();
  }

  public chunks(): readonly Chunk[] {
    return this.entries;
  }

  public vectorOf(position: number): SparseVector | undefined {
    return this.vectors[position];
  }

  /** Vectorize arbitrary text against this index's vocabulary. */
  public vectorize(text: string): SparseVector {
    return vectorize(text, this.vocabulary, this.options.sublinearTf);
  }

  /**
   * Rank stored chunks against `text`. `topK` and `minSimilarity` default to
   * the values the index was built with.
   *
   * @throws {InvalidConfigurationError} If `topK` is negative or not an
   * integer, or `minSimilarity` is not finite.
   */
  public query(
    text: string,
    topK: number = this.options.topK,
    minSimilarity: number = this.options.minSimilarity,
  ): QueryResult {
    assertTopK(topK);
    assertMinSimilarity(minSimilarity);
    if (this.isEmpty) return { status: "no-index", matches: [] };

    const q = this.vectorize(text);
    if (q.size === 0) return { status: "no-terms", matches: [] };

    const hits = rank(q, this.vectors, topK, minSimilarity);
    return {
      status: "ok",
      matches: hits.map(({ position, score }) => {
        const chunk = this.entries[position];
        return {
          text: chunk.text,
          source: chunk.documentId,
          score,
          chunkIndex: chunk.index,
          start: chunk.start,
          end: chunk.end,
        };
      }),
    };
  }
}
