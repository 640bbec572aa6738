import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { McpError, ErrorCode } from "./mcp-sdk";
import { DocumentIndex } from "./documentIndex";
import { resolveOptions, type RetrievalOptions } from "./options";
import { StatusManager, statusManager } from "./status";
import type { Corpus, Document, QueryResult } from "./types";

/** Options required to construct an {@link Indexer}. */
export interface IndexerOptions {
  root: string; // folder of documents to index
  allowedExt: string[]; // extensions WITHOUT leading dot
  excludedFolders?: string[]; // folder names pruned during discovery
  verbose?: boolean;
  retrieval?: Partial<RetrievalOptions>;
  status?: StatusManager; // defaults to the shared singleton
}

/** Result of corpus discovery + loading. */
export interface LoadedCorpus {
  corpus: Corpus;
  filesDiscovered: number;
}

/**
 * Owns the current {@link DocumentIndex} for a folder of plain-text documents.
 *
 * Each build loads the whole corpus again and produces a brand-new index that
 * replaces the previous one in a single assignment, so queries running during
 * a rebuild keep reading the old, complete index. There is no incremental
 * update path.
 */
export class Indexer {
  private readonly root: string;
  private readonly allowedExt: string[];
  private readonly excludedFolders: string[];
  private readonly verbose: boolean;
  private readonly retrieval: Readonly<RetrievalOptions>;
  private readonly status: StatusManager;
  private index: DocumentIndex;
  private built = false;
  private diskBuild: Promise<DocumentIndex> | null = null;
  // Tail of the build queue; builds never overlap.
  private queue: Promise<unknown> = Promise.resolve();

  /** @throws {InvalidConfigurationError} If the retrieval options are malformed. */
  public constructor(opts: IndexerOptions) {
    this.root = path.resolve(opts.root);
    this.allowedExt = opts.allowedExt.map((e) => e.replace(/^\./, "").toLowerCase());
    this.excludedFolders = opts.excludedFolders ?? [];
    this.verbose = !!opts.verbose;
    this.retrieval = resolveOptions(opts.retrieval);
    this.status = opts.status ?? statusManager;
    this.index = DocumentIndex.empty(this.retrieval);
    this.status.setDocsRoot(this.root);
  }

  /** The index queries currently run against. */
  public current(): DocumentIndex {
    return this.index;
  }

  /** Whether a build has completed successfully. */
  public isReady(): boolean {
    return this.built;
  }

  /**
   * Rank chunks of the current index against `text`. Before the first build
   * this answers with status `no-index`.
   */
  public query(text: string, topK?: number, minSimilarity?: number): QueryResult {
    return this.index.query(text, topK, minSimilarity);
  }

  /**
   * Reload the corpus from disk and swap in a freshly built index. Calls made
   * while a build is running share that build. On failure the previous index
   * stays current and the error is rethrown.
   */
  public build(): Promise<DocumentIndex> {
    if (!this.diskBuild) {
      this.diskBuild = this.enqueue(() => this.loadCorpus()).finally(() => {
        this.diskBuild = null;
      });
    }
    return this.diskBuild;
  }

  /**
   * Build from an in-memory corpus with the same swap semantics as
   * {@link build}. Queued behind any running build, so the index of the call
   * made last is the one left current.
   */
  public buildFrom(corpus: Corpus): Promise<DocumentIndex> {
    return this.enqueue(async () => ({ corpus, filesDiscovered: corpus.length }));
  }

  private enqueue(load: () => Promise<LoadedCorpus>): Promise<DocumentIndex> {
    const run = this.queue.then(() => this.runBuild(load));
    // Failures reach the caller through `run`; the queue itself moves on.
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async runBuild(load: () => Promise<LoadedCorpus>): Promise<DocumentIndex> {
    const started = Date.now();
    this.status.markBuilding();
    try {
      const { corpus, filesDiscovered } = await load();
      const next = DocumentIndex.build(corpus, this.retrieval);
      this.index = next;
      this.built = true;
      const lastBuildMs = Date.now() - started;
      this.status.recordBuild({
        filesDiscovered,
        documentsLoaded: corpus.length,
        chunksTotal: next.chunksTotal,
        chunksIndexed: next.chunkCount,
        vocabularySize: next.vocabularySize,
        lastBuildMs,
      });
      console.error(
        `[RAG] Indexed ${corpus.length} document(s): ${next.chunkCount} chunk(s), ${next.vocabularySize} term(s) in ${lastBuildMs} ms.`,
      );
      if (next.isEmpty) console.error(`[RAG] Index is empty; queries will return no results.`);
      return next;
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      this.status.recordFailure(message);
      console.error(`[RAG] Index build failed:`, e);
      throw e;
    }
  }

  /**
   * Discover allow-listed files under the root and read them as UTF-8.
   * Documents are ordered by relative path; empty and unreadable files are
   * skipped.
   */
  public async loadCorpus(): Promise<LoadedCorpus> {
    const files = await this.discoverFiles();
    console.error(`[RAG] Loading documents from ${this.root} ... (${files.length} files)`);
    if (this.verbose) console.error(`[RAG][verbose] Extensions: ${this.allowedExt.join(", ")}`);

    const corpus: Document[] = [];
    for (const rel of files) {
      let text: string;
      try {
        text = await fs.readFile(path.join(this.root, rel), "utf8");
      } catch (e) {
        console.error(`[RAG] Failed to read ${rel}:`, e);
        continue;
      }
      if (!text.trim()) {
        if (this.verbose) console.error(`[RAG][verbose] Skipping empty file ${rel}`);
        continue;
      }
      corpus.push({ id: rel, text });
      if (this.verbose) console.error(`[RAG][verbose] Loaded ${rel} (${text.length} chars)`);
    }
    return { corpus, filesDiscovered: files.length };
  }

  private async discoverFiles(): Promise<string[]> {
    if (this.allowedExt.length === 0) return [];
    const st = await fs.stat(this.root).catch(() => null);
    if (!st?.isDirectory()) {
      console.error(`[RAG] Folder not found: ${this.root}`);
      return [];
    }
    const patterns = this.allowedExt.map((ext) => `**/*.${ext}`);
    const files = await fg(patterns, {
      cwd: this.root,
      dot: false,
      onlyFiles: true,
      caseSensitiveMatch: false,
      ignore: this.excludedFolders.map((f) => `**/${f}/**`),
    });
    return files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }

  /** Ensure a (possibly user-supplied) relative path stays within the indexer's root. */
  public ensureWithinRoot(relPath: string): string {
    return Indexer.ensureWithinRoot(this.root, relPath);
  }

  /**
   * Static variant of {@link ensureWithinRoot}. Throws an MCP InvalidRequest
   * error if the resolved path escapes `root`.
   */
  public static ensureWithinRoot(root: string, relPath: string): string {
    const abs = path.resolve(root, relPath);
    const normRoot = path.resolve(root) + path.sep;
    if (!abs.startsWith(normRoot)) throw new McpError(ErrorCode.InvalidRequest, "Path outside DOCS_ROOT");
    return abs;
  }

  /** Whether `relPath` carries one of the indexed extensions. */
  public isIndexable(relPath: string): boolean {
    const ext = path.extname(relPath).replace(/^\./, "").toLowerCase();
    return this.allowedExt.includes(ext);
  }
}
