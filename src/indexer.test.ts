import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { McpError } from "./mcp-sdk";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { DocumentIndex } from "./documentIndex";
import { InvalidConfigurationError } from "./errors";
import { Indexer } from "./indexer";
import { StatusManager } from "./status";

let root: string;

beforeAll(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "rag-indexer-"));
  await fs.mkdir(path.join(root, "notes"));
  await fs.mkdir(path.join(root, "node_modules"));
  await fs.writeFile(path.join(root, "notes", "alpha.txt"), "Solar panels convert sunlight into electricity.");
  await fs.writeFile(path.join(root, "beta.md"), "Wind turbines generate electricity from wind.");
  await fs.writeFile(path.join(root, "node_modules", "skip.txt"), "solar solar solar");
  await fs.writeFile(path.join(root, "empty.txt"), "   ");
  await fs.writeFile(path.join(root, "image.png"), "not really a png");
});

afterAll(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

function makeIndexer(status = new StatusManager(), dir = root): Indexer {
  return new Indexer({
    root: dir,
    allowedExt: [".TXT", "md"],
    excludedFolders: ["node_modules"],
    status,
  });
}

describe("Indexer", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("loads allow-listed, non-empty files ordered by relative path", async () => {
    const { corpus, filesDiscovered } = await makeIndexer().loadCorpus();
    expect(corpus.map((d) => d.id)).toEqual(["beta.md", "notes/alpha.txt"]);
    expect(filesDiscovered).toBe(3);
  });

  it("answers no-index until the first build completes", async () => {
    const indexer = makeIndexer();
    expect(indexer.isReady()).toBe(false);
    expect(indexer.query("solar").status).toBe("no-index");

    await indexer.build();
    expect(indexer.isReady()).toBe(true);
    const result = indexer.query("solar sunlight");
    expect(result.status).toBe("ok");
    expect(result.matches.map((m) => m.source)).toEqual(["notes/alpha.txt"]);
  });

  it("records build counters on the status manager", async () => {
    const status = new StatusManager();
    await makeIndexer(status).build();
    const s = status.getStatus();
    expect(s.ready).toBe(true);
    expect(s.building).toBe(false);
    expect(s.docsRoot).toBe(path.resolve(root));
    expect(s.lastBuiltAt).not.toBeNull();
    expect(s.indexing).toMatchObject({ filesDiscovered: 3, documentsLoaded: 2, chunksTotal: 2, chunksIndexed: 2 });
  });

  it("shares a running build between concurrent callers", async () => {
    const indexer = makeIndexer();
    const first = indexer.build();
    const second = indexer.build();
    expect(second).toBe(first);
    expect(await second).toBe(indexer.current());
  });

  it("swaps in a new index on rebuild", async () => {
    const indexer = makeIndexer();
    const before = await indexer.build();
    const after = await indexer.build();
    expect(after).not.toBe(before);
    expect(indexer.current()).toBe(after);
  });

  it("keeps the previous index when a build fails", async () => {
    const status = new StatusManager();
    const indexer = makeIndexer(status);
    const good = await indexer.build();

    vi.spyOn(DocumentIndex, "build").mockImplementationOnce(() => {
      throw new Error("boom");
    });
    await expect(indexer.build()).rejects.toThrow("boom");

    expect(indexer.current()).toBe(good);
    expect(indexer.query("wind").matches.map((m) => m.source)).toEqual(["beta.md"]);
    expect(status.getStatus().lastError).toBe("boom");
    expect(status.getStatus().ready).toBe(true);
  });

  it("builds from an in-memory corpus", async () => {
    const indexer = makeIndexer();
    const index = await indexer.buildFrom([{ id: "mem.txt", text: "cat dog" }]);
    expect(index.documentCount).toBe(1);
    expect(indexer.query("cat").matches[0].source).toBe("mem.txt");
  });

  it("runs an in-memory build after a disk build already in flight", async () => {
    const indexer = makeIndexer();
    const disk = indexer.build();
    const mem = indexer.buildFrom([{ id: "mem.txt", text: "cat dog" }]);
    const [diskIndex, memIndex] = await Promise.all([disk, mem]);
    expect(diskIndex.documentCount).toBe(2);
    expect(indexer.current()).toBe(memIndex);
    expect(indexer.query("cat").matches.map((m) => m.source)).toEqual(["mem.txt"]);
  });

  it("keeps queueing builds after one fails", async () => {
    const indexer = makeIndexer();
    vi.spyOn(DocumentIndex, "build").mockImplementationOnce(() => {
      throw new Error("boom");
    });
    const failed = indexer.buildFrom([{ id: "bad.txt", text: "cat" }]);
    const next = indexer.buildFrom([{ id: "good.txt", text: "dog" }]);
    await expect(failed).rejects.toThrow("boom");
    expect(indexer.current()).toBe(await next);
    expect(indexer.query("dog").matches.map((m) => m.source)).toEqual(["good.txt"]);
  });

  it("indexes nothing when the root is missing", async () => {
    const missing = path.join(root, "does-not-exist");
    const indexer = makeIndexer(new StatusManager(), missing);
    const index = await indexer.build();
    expect(index.isEmpty).toBe(true);
    expect(console.error).toHaveBeenCalledWith(`[RAG] Folder not found: ${missing}`);
  });

  it("rejects malformed retrieval options at construction", () => {
    expect(
      () =>
        new Indexer({
          root,
          allowedExt: ["txt"],
          retrieval: { chunkSize: 100, chunkOverlap: 100 },
          status: new StatusManager(),
        }),
    ).toThrow(InvalidConfigurationError);
  });

  it("confines paths to the root", () => {
    const indexer = makeIndexer();
    expect(indexer.ensureWithinRoot("notes/alpha.txt")).toBe(path.join(path.resolve(root), "notes", "alpha.txt"));
    expect(() => indexer.ensureWithinRoot("../outside.txt")).toThrow(McpError);
    expect(() => Indexer.ensureWithinRoot(root, "/etc/passwd")).toThrow("Path outside DOCS_ROOT");
  });

  it("recognizes indexed extensions", () => {
    const indexer = makeIndexer();
    expect(indexer.isIndexable("notes/alpha.TXT")).toBe(true);
    expect(indexer.isIndexable("image.png")).toBe(false);
  });
});
