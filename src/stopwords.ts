import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { StopWordsOption } from "./options";

const ENGLISH_LIST = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "data/english-stopwords.txt",
);

const NO_STOP_WORDS: ReadonlySet<string> = new Set();

let english: ReadonlySet<string> | null = null;

/** Built-in English stop word list (read once, lazily). */
export function englishStopWords(): ReadonlySet<string> {
  if (!english) {
    const words = fsSync
      .readFileSync(ENGLISH_LIST, "utf8")
      .split(/\r?\n/)
      .map((w) => w.trim().toLowerCase())
      .filter(Boolean);
    english = new Set(words);
  }
  return english;
}

/** Turn the configured stop word option into a lookup set of lowercase words. */
export function resolveStopWords(option: StopWordsOption): ReadonlySet<string> {
  if (option === "english") return englishStopWords();
  if (option === "none") return NO_STOP_WORDS;
  return new Set(option.map((w) => w.trim().toLowerCase()).filter(Boolean));
}
