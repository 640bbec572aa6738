import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import pkg from "../package.json" with { type: "json" };
import { DEFAULT_OPTIONS, type RetrievalOptions, type StopWordsOption } from "./options";

const PROJECT_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");

// Single dotenv load for the process. Prefer the .env beside package.json, then dotenv's default lookup.
(() => {
  const rootEnv = path.join(PROJECT_ROOT, ".env");
  if (fsSync.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
    return;
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export interface Config {
  DOCS_ROOT: string;
  ALLOWED_EXT: string[];
  EXCLUDED_FOLDERS: string[];
  VERBOSE: boolean;
  /** Upper bound for the rag_context bundle; undefined = unbounded. */
  CONTEXT_MAX_CHARS: number | undefined;
  /** Retrieval knobs, not yet validated (see resolveOptions). */
  RETRIEVAL: RetrievalOptions;
}

type Env = Record<string, string | undefined>;

function list(raw: string | undefined): string[] | undefined {
  return raw
    ?.split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function flag(raw: string | undefined, fallback: boolean): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  if (!v) return fallback;
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

/**
 * Integer env knob. Unparseable input falls back to the default; the parsed
 * value is NOT range-checked here so that semantic errors (e.g. overlap >=
 * chunk size) surface from resolveOptions as a configuration error.
 */
function int(raw: string | undefined, fallback: number): number {
  const s = raw?.trim();
  if (!s) return fallback;
  const n = Number(s);
  return Number.isFinite(n) ? Math.trunc(n) : fallback;
}

function float(raw: string | undefined, fallback: number): number {
  const s = raw?.trim();
  if (!s) return fallback;
  const n = Number(s);
  return Number.isFinite(n) ? n : fallback;
}

function stopWords(raw: string | undefined): StopWordsOption {
  const v = raw?.trim();
  if (!v) return DEFAULT_OPTIONS.stopWords;
  const lower = v.toLowerCase();
  if (lower === "english" || lower === "none") return lower;
  return list(v) ?? [];
}

/** "1,2" / "1-2" / "2" -> [min, max]. */
function ngramRange(raw: string | undefined): readonly [number, number] {
  const parts = raw
    ?.split(/[,\-\s]+/)
    .map((s) => s.trim())
    .filter(Boolean)
    .map(Number);
  if (!parts?.length || parts.some((n) => !Number.isFinite(n))) {
    return [DEFAULT_OPTIONS.ngramRange[0], DEFAULT_OPTIONS.ngramRange[1]];
  }
  const [min, max = min] = parts;
  return [Math.trunc(min), Math.trunc(max)];
}

/** Parse an environment map into {@link Config}. Pure; used directly by tests. */
export function parseConfig(env: Env): Config {
  // Folder of plain-text documents to index.
  const DOCS_ROOT = path.resolve(env.DOCS_ROOT?.trim() || "./documents");

  const ALLOWED_EXT = (list(env.ALLOWED_EXT) ?? ["txt", "md"]).map((e) =>
    e.replace(/^\./, "").toLowerCase(),
  );

  // Folder names (not globs) pruned during discovery.
  const EXCLUDED_FOLDERS = list(env.EXCLUDED_FOLDERS) ?? [
    "node_modules",
    ".git",
    "dist",
    "build",
    ".cache",
  ];

  const VERBOSE = flag(env.VERBOSE, false);

  const maxChars = int(env.CONTEXT_MAX_CHARS, 0);
  const CONTEXT_MAX_CHARS = maxChars > 0 ? maxChars : undefined;

  const RETRIEVAL: RetrievalOptions = {
    chunkSize: int(env.CHUNK_SIZE, DEFAULT_OPTIONS.chunkSize),
    chunkOverlap: int(env.CHUNK_OVERLAP, DEFAULT_OPTIONS.chunkOverlap),
    maxFeatures: int(env.MAX_FEATURES, DEFAULT_OPTIONS.maxFeatures),
    stopWords: stopWords(env.STOP_WORDS),
    ngramRange: ngramRange(env.NGRAM_RANGE),
    sublinearTf: flag(env.SUBLINEAR_TF, DEFAULT_OPTIONS.sublinearTf),
    topK: int(env.TOP_K, DEFAULT_OPTIONS.topK),
    minSimilarity: float(env.MIN_SIMILARITY, DEFAULT_OPTIONS.minSimilarity),
  };

  return { DOCS_ROOT, ALLOWED_EXT, EXCLUDED_FOLDERS, VERBOSE, CONTEXT_MAX_CHARS, RETRIEVAL };
}

export function getConfig(): Config {
  return parseConfig(process.env);
}
