/**
 * Application entry point.
 *
 * 1. Load environment configuration (dotenv, see config.ts).
 * 2. Walk DOCS_ROOT, chunk every allow-listed text file, fit the TF-IDF
 *    vocabulary and build the in-memory index.
 * 3. Serve the retrieval tools over MCP stdio. The connected client (an LLM
 *    host) composes answers from the ranked context it retrieves.
 *
 * ENVIRONMENT VARIABLES (all optional):
 *  - DOCS_ROOT          Folder of documents to index (default ./documents).
 *  - ALLOWED_EXT        Comma list of extensions, no leading dots (default txt,md).
 *  - EXCLUDED_FOLDERS   Comma list of folder names skipped during discovery.
 *  - VERBOSE            1/true/yes/on for per-file logging.
 *  - CHUNK_SIZE         Characters per chunk (default 500).
 *  - CHUNK_OVERLAP      Characters shared by consecutive chunks (default 50).
 *  - MAX_FEATURES       Vocabulary cap (default 500).
 *  - STOP_WORDS         english | none | comma list (default english).
 *  - NGRAM_RANGE        "min,max" n-gram bounds (default 1,1).
 *  - SUBLINEAR_TF       Use 1 + ln(tf) term weighting (default off).
 *  - TOP_K              Default results per query (default 5).
 *  - MIN_SIMILARITY     Results must score strictly above this (default 0).
 *  - CONTEXT_MAX_CHARS  Upper bound for rag_context bundles (default unbounded).
 */
import path from "node:path";
import { getConfig } from "./config";
import { Indexer } from "./indexer";
import { createServer } from "./server";
import { statusManager } from "./status";
import { startStdioTransport } from "./transport/stdio";

const config = getConfig();

// Malformed retrieval settings throw here, before anything is loaded.
const indexer = new Indexer({
  root: config.DOCS_ROOT,
  allowedExt: config.ALLOWED_EXT,
  excludedFolders: config.EXCLUDED_FOLDERS,
  verbose: config.VERBOSE,
  retrieval: config.RETRIEVAL,
});

await indexer.build();

statusManager.markTransport("stdio");
const server = await startStdioTransport(() =>
  createServer({
    indexer,
    status: statusManager,
    folderName: path.basename(config.DOCS_ROOT) || config.DOCS_ROOT,
    contextMaxChars: config.CONTEXT_MAX_CHARS,
  }),
);

function shutdown(): void {
  server.close().then(
    () => process.exit(0),
    (e: unknown) => {
      console.error("[RAG] Error during shutdown:", e);
      process.exit(1);
    },
  );
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
