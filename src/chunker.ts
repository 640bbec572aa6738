import { assertChunkParams } from "./options";
import type { Chunk, Corpus } from "./types";

/** A raw window produced by {@link chunkText}. */
export interface TextWindow {
  text: string;
  /** Code point offset of the first character within the source text. */
  start: number;
  /** Code point offset just past the last character. */
  end: number;
}

/**
 * Split text into fixed-size overlapping windows. Starting at offset 0, each
 * window takes up to `chunkSize` characters (the last may be shorter) and the
 * next one starts `chunkSize - overlap` characters later, until the start
 * offset reaches the end of the text. Characters are Unicode code points, so
 * a surrogate pair is never split. Whitespace-only windows are dropped.
 *
 * @throws {InvalidConfigurationError} If `chunkSize` is not a positive integer
 * or `overlap` is outside `[0, chunkSize)`.
 */
export function chunkText(text: string, chunkSize: number, overlap: number): TextWindow[] {
  assertChunkParams(chunkSize, overlap);
  const out: TextWindow[] = [];
  const step = chunkSize - overlap;
  const chars = Array.from(text);
  for (let start = 0; start < chars.length; start += step) {
    const slice = chars.slice(start, start + chunkSize);
    const window = slice.join("");
    if (window.trim().length === 0) continue;
    out.push({ text: window, start, end: start + slice.length });
  }
  return out;
}

/**
 * Chunk every document of a corpus, in corpus order, numbering the resulting
 * chunks with one global, contiguous, 0-based index.
 */
export function chunkCorpus(corpus: Corpus, chunkSize: number, overlap: number): Chunk[] {
  assertChunkParams(chunkSize, overlap);
  const chunks: Chunk[] = [];
  for (const doc of corpus) {
    for (const w of chunkText(doc.text, chunkSize, overlap)) {
      chunks.push(
        Object.freeze({
          index: chunks.length,
          documentId: doc.id,
          text: w.text,
          start: w.start,
          end: w.end,
        }),
      );
    }
  }
  return chunks;
}
