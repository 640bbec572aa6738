import { APP_VERSION } from "./config";

/**
 * Counters describing the most recent index build. Replaced wholesale on each
 * rebuild.
 */
export interface IndexingStatus {
  /** Files matched by the extension allow-list. */
  filesDiscovered: number;
  /** Files with non-empty text that entered the corpus. */
  documentsLoaded: number;
  /** Chunks produced before degenerate ones were dropped. */
  chunksTotal: number;
  /** Chunks stored in the searchable index. */
  chunksIndexed: number;
  vocabularySize: number;
  /** Wall time of the last build in milliseconds. */
  lastBuildMs: number;
}

/**
 * Snapshot of server lifecycle + indexing state, exposed by the `index_status`
 * tool. `ready` flips to true after the first successful build and stays true
 * across rebuilds (queries keep hitting the previous index meanwhile).
 */
export interface ServerStatus {
  version: string;
  /** Folder being indexed. */
  docsRoot: string;
  /** Active transport: 'stdio' | 'unknown'. */
  transport: string;
  ready: boolean;
  /** True while a build is running. */
  building: boolean;
  startedAt: string;
  /** ISO timestamp of the last completed build, if any. */
  lastBuiltAt: string | null;
  /** Message of the last failed build, cleared by the next success. */
  lastError: string | null;
  indexing: IndexingStatus;
}

function emptyIndexing(): IndexingStatus {
  return {
    filesDiscovered: 0,
    documentsLoaded: 0,
    chunksTotal: 0,
    chunksIndexed: 0,
    vocabularySize: 0,
    lastBuildMs: 0,
  };
}

/** Centralizes mutation of {@link ServerStatus}. */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      docsRoot: initial?.docsRoot ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      building: initial?.building ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      lastBuiltAt: initial?.lastBuiltAt ?? null,
      lastError: initial?.lastError ?? null,
      indexing: initial?.indexing ?? emptyIndexing(),
    };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setDocsRoot(root: string) {
    this.data.docsRoot = root;
  }

  public markBuilding() {
    this.data.building = true;
  }

  /** Record a completed build and mark the server ready. */
  public recordBuild(indexing: IndexingStatus) {
    this.data.indexing = { ...indexing };
    this.data.building = false;
    this.data.ready = true;
    this.data.lastError = null;
    this.data.lastBuiltAt = new Date().toISOString();
  }

  /** Record a failed build; the previous counters and readiness are kept. */
  public recordFailure(message: string) {
    this.data.building = false;
    this.data.lastError = message;
  }

  /** Detached copy of the current status. */
  public getStatus(): ServerStatus {
    return { ...this.data, indexing: { ...this.data.indexing } };
  }

  public toJSON() {
    return this.getStatus();
  }
}

// Shared by the indexer and the MCP tools.
export const statusManager = new StatusManager();
