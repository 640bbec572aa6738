import type { RetrievedChunk } from "./types";

export const CONTEXT_SEPARATOR = "\n\n---\n\n";

export interface ContextOptions {
  /** Upper bound on the rendered bundle length, in characters. */
  maxChars?: number;
}

export interface ContextBundle {
  text: string;
  /** Matches rendered into `text`, in rank order. */
  included: readonly RetrievedChunk[];
}

/**
 * Render ranked matches as a context bundle for an answering model: one
 * `[From: source]` block per match, separated by horizontal rules. Stops
 * before the first block that would push the bundle past `maxChars`.
 */
export function formatContext(
  matches: readonly RetrievedChunk[],
  options: ContextOptions = {},
): ContextBundle {
  const limit = options.maxChars ?? Number.POSITIVE_INFINITY;
  const blocks: string[] = [];
  const included: RetrievedChunk[] = [];
  let length = 0;

  for (const m of matches) {
    const block = `[From: ${m.source}]\n${m.text}`;
    const added = blocks.length === 0 ? block.length : CONTEXT_SEPARATOR.length + block.length;
    if (length + added > limit) break;
    blocks.push(block);
    included.push(m);
    length += added;
  }

  return { text: blocks.join(CONTEXT_SEPARATOR), included };
}

/** Single-line preview of a chunk, truncated to `length` characters. */
export function previewOf(text: string, length = 200): string {
  const flat = text.replace(/\r?\n/g, " ");
  return flat.length > length ? `${flat.slice(0, length)}...` : flat;
}
