/**
 * Shared corpus / chunk / vector types used throughout the retrieval core,
 * the indexer and the MCP tool layer.
 */

/** A loaded source document. Text is immutable once loaded. */
export interface Document {
  /** Unique identifier (relative file path, forward slashes). */
  readonly id: string;
  /** Full extracted text. */
  readonly text: string;
}

/** Ordered corpus handed to the index builder. */
export type Corpus = readonly Document[];

/**
 * A bounded window of a document's text: the unit of retrieval. Created during
 * chunking and never mutated afterwards.
 */
export interface Chunk {
  /** Global 0-based position in the chunk list produced for a corpus. */
  readonly index: number;
  /** Identifier of the owning document. */
  readonly documentId: string;
  /** Raw window text. */
  readonly text: string;
  /** Start offset (inclusive) within the owning document. */
  readonly start: number;
  /** End offset (exclusive) within the owning document. */
  readonly end: number;
}

/** Numeric id of a vocabulary term. */
export type TermId = number;

/**
 * Sparse TF-IDF vector: term id -> weight. Only non-zero weights are stored,
 * so an empty map is the all-zero (degenerate) vector.
 */
export type SparseVector = ReadonlyMap<TermId, number>;

/** Inclusive n-gram bounds, e.g. [1, 2] for unigrams + bigrams. */
export type NgramRange = readonly [min: number, max: number];

/** One retrieval result handed to the downstream answering collaborator. */
export interface RetrievedChunk {
  /** Chunk text. */
  readonly text: string;
  /** Owning document identifier. */
  readonly source: string;
  /** Cosine similarity with the query, in [0, 1]. */
  readonly score: number;
  /** Global chunk index. */
  readonly chunkIndex: number;
  readonly start: number;
  readonly end: number;
}

/**
 * Outcome of a query. `no-index` means nothing is searchable (empty corpus or
 * empty vocabulary); `no-terms` means the query shares no vocabulary term.
 */
export type QueryStatus = "ok" | "no-index" | "no-terms";

export interface QueryResult {
  readonly status: QueryStatus;
  readonly matches: readonly RetrievedChunk[];
}
