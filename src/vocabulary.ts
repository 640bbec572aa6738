import { analyze } from "./tokenizer";
import type { NgramRange, TermId } from "./types";

export interface VocabularyParams {
  maxFeatures: number;
  stopWords: ReadonlySet<string>;
  ngramRange: NgramRange;
}

interface Candidate {
  term: string;
  df: number;
  /** Scan order of the first occurrence; tie-break for equal df. */
  firstSeen: number;
}

/**
 * Fixed term -> id mapping with per-term document frequency, plus the analyzer
 * settings it was built with so later transforms tokenize identically.
 * Read-only once built.
 */
export class Vocabulary {
  private readonly ids: ReadonlyMap<string, TermId>;

  private constructor(
    private readonly termList: readonly string[],
    private readonly dfs: readonly number[],
    /** Number of texts scanned (N in the idf formula). */
    public readonly documentCount: number,
    public readonly stopWords: ReadonlySet<string>,
    public readonly ngramRange: NgramRange,
  ) {
    this.ids = new Map(termList.map((t, i) => [t, i]));
  }

  /**
   * Scan `texts` once and keep at most `maxFeatures` terms, preferring the
   * highest document frequency and, on equal frequency, the term seen first.
   * Ids are assigned in that selection order. No surviving term gives an empty
   * vocabulary.
   */
  public static build(texts: readonly string[], params: VocabularyParams): Vocabulary {
    const candidates = new Map<string, Candidate>();
    for (const text of texts) {
      const seen = new Set<string>();
      for (const term of analyze(text, params.stopWords, params.ngramRange)) {
        if (seen.has(term)) continue;
        seen.add(term);
        const c = candidates.get(term);
        if (c) c.df++;
        else candidates.set(term, { term, df: 1, firstSeen: candidates.size });
      }
    }

    const selected = [...candidates.values()]
      .sort((a, b) => b.df - a.df || a.firstSeen - b.firstSeen)
      .slice(0, params.maxFeatures);

    return new Vocabulary(
      selected.map((c) => c.term),
      selected.map((c) => c.df),
      texts.length,
      params.stopWords,
      params.ngramRange,
    );
  }

  /** Number of retained terms. */
  public get size(): number {
    return this.termList.length;
  }

  public isEmpty(): boolean {
    return this.termList.length === 0;
  }

  public idOf(term: string): TermId | undefined {
    return this.ids.get(term);
  }

  public termOf(id: TermId): string | undefined {
    return this.termList[id];
  }

  /** Number of scanned texts containing the term (0 for unknown ids). */
  public documentFrequency(id: TermId): number {
    return this.dfs[id] ?? 0;
  }

  /** Retained terms in id order. */
  public terms(): readonly string[] {
    return this.termList;
  }
}

/** Functional alias for {@link Vocabulary.build}. */
export function buildVocabulary(texts: readonly string[], params: VocabularyParams): Vocabulary {
  return Vocabulary.build(texts, params);
}
