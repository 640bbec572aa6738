import fs from "node:fs/promises";
import { McpError, ErrorCode } from "./mcp-sdk";
import { formatContext, previewOf } from "./context";
import { InvalidConfigurationError } from "./errors";
import type { Indexer } from "./indexer";
import type { StatusManager } from "./status";
import type { QueryStatus } from "./types";

/** Everything the tool handlers close over. */
export interface ToolContext {
  indexer: Indexer;
  status: StatusManager;
  /** Label used in tool descriptions. */
  folderName: string;
  /** Upper bound for rag_context bundles (undefined = unbounded). */
  contextMaxChars?: number;
}

/** Hard cap on results per call, whatever the caller asks for. */
export const MAX_TOP_K = 50;

export const NO_MATCH_MESSAGE = "No relevant information found in documents.";

type Args = Record<string, unknown>;

function requireString(args: Args, key: string): string {
  const v = args[key];
  if (typeof v !== "string" || !v.trim()) {
    throw new McpError(ErrorCode.InvalidParams, `Missing ${key}`);
  }
  return v;
}

function optionalNumber(args: Args, key: string): number | undefined {
  const v = args[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "number" || !Number.isFinite(v)) {
    throw new McpError(ErrorCode.InvalidParams, `${key} must be a number`);
  }
  return v;
}

function maxCharsOf(args: Args): number | undefined {
  const n = optionalNumber(args, "max_chars");
  if (n !== undefined && (!Number.isInteger(n) || n < 1)) {
    throw new McpError(ErrorCode.InvalidParams, "max_chars must be a positive integer");
  }
  return n;
}

function topKOf(args: Args): number | undefined {
  const k = optionalNumber(args, "top_k");
  return k === undefined ? undefined : Math.min(MAX_TOP_K, k);
}

/** Map core configuration errors onto the MCP error space. */
function asMcpError(e: unknown): unknown {
  if (e instanceof InvalidConfigurationError) return new McpError(ErrorCode.InvalidParams, e.message);
  return e;
}

/** rag_query: ranked chunks with scores rounded to 4 decimals. */
export function ragQuery(ctx: ToolContext, args: Args) {
  const query = requireString(args, "query");
  const topK = topKOf(args);
  const minSimilarity = optionalNumber(args, "min_similarity");
  try {
    const result = ctx.indexer.query(query, topK, minSimilarity);
    return {
      status: result.status,
      matches: result.matches.map((m) => ({
        source: m.source,
        score: Number(m.score.toFixed(4)),
        chunk: m.chunkIndex,
        snippet: m.text,
      })),
    };
  } catch (e) {
    throw asMcpError(e);
  }
}

/** One excerpt included in a rag_context bundle. */
export interface ContextSource {
  source: string;
  preview: string;
}

/**
 * rag_context: bounded, source-labelled context bundle for an answering model,
 * plus a one-line preview of every excerpt it includes.
 */
export function ragContext(
  ctx: ToolContext,
  args: Args,
): { status: QueryStatus; context: string; sources: ContextSource[] } {
  const query = requireString(args, "query");
  const topK = topKOf(args);
  const maxChars = maxCharsOf(args) ?? ctx.contextMaxChars;
  try {
    const result = ctx.indexer.query(query, topK);
    if (result.matches.length === 0) {
      return { status: result.status, context: NO_MATCH_MESSAGE, sources: [] };
    }
    const bundle = formatContext(result.matches, { maxChars });
    return {
      status: result.status,
      context: bundle.text || NO_MATCH_MESSAGE,
      sources: bundle.included.map((m) => ({ source: m.source, preview: previewOf(m.text) })),
    };
  } catch (e) {
    throw asMcpError(e);
  }
}

/** read_document: full text or a 1-based inclusive line range of an indexed file. */
export async function readDocument(ctx: ToolContext, args: Args): Promise<string> {
  const rel = requireString(args, "path");
  const startLine = optionalNumber(args, "startLine");
  const endLine = optionalNumber(args, "endLine");
  const abs = ctx.indexer.ensureWithinRoot(rel);
  if (!ctx.indexer.isIndexable(rel)) {
    throw new McpError(ErrorCode.InvalidRequest, "File type is not indexed");
  }
  let content: string;
  try {
    content = await fs.readFile(abs, "utf8");
  } catch {
    throw new McpError(ErrorCode.InvalidRequest, "File does not exist");
  }
  if (startLine == null && endLine == null) return content;
  const lines = content.split(/\r?\n/);
  const s = Math.max(0, (startLine ?? 1) - 1);
  const e = Math.min(lines.length, endLine ?? lines.length);
  return lines.slice(s, e).join("\n");
}

/** reindex: reload the corpus from disk and swap in the new index. */
export async function reindex(ctx: ToolContext) {
  const index = await ctx.indexer.build();
  return {
    documents: index.documentCount,
    chunksIndexed: index.chunkCount,
    vocabularySize: index.vocabularySize,
  };
}

/** Static tool schemas advertised through tools/list. */
export function toolDefinitions(folderName: string) {
  return [
    {
      name: "rag_query",
      description: `Search documents under '${folderName}' by TF-IDF keyword similarity and return the best matching chunks: source (relative path), score (cosine, 0-1), chunk (index), snippet (chunk text).`,
      inputSchema: {
        type: "object" as const,
        properties: {
          query: { type: "string", description: "Question or keywords to search for." },
          top_k: {
            type: "number",
            description: `Maximum number of matches (0-${MAX_TOP_K}). Defaults to the server setting.`,
            minimum: 0,
            maximum: MAX_TOP_K,
          },
          min_similarity: {
            type: "number",
            description: "Only return matches scoring strictly above this value.",
          },
        },
        required: ["query"],
      },
    },
    {
      name: "rag_context",
      description: `Retrieve excerpts from documents under '${folderName}' formatted as a context block ("[From: source]" sections) ready to answer a question from, plus the source and a short preview of each included excerpt.`,
      inputSchema: {
        type: "object" as const,
        properties: {
          query: { type: "string", description: "The question to gather context for." },
          top_k: { type: "number", minimum: 0, maximum: MAX_TOP_K },
          max_chars: { type: "integer", description: "Upper bound on context length.", minimum: 1 },
        },
        required: ["query"],
      },
    },
    {
      name: "read_document",
      description: `Read an indexed document under '${folderName}' (optionally a line range).`,
      inputSchema: {
        type: "object" as const,
        properties: {
          path: { type: "string", description: `Path relative to '${folderName}' (forward slashes).` },
          startLine: { type: "number", minimum: 1, description: "1-based first line (inclusive)." },
          endLine: { type: "number", minimum: 1, description: "1-based last line (inclusive)." },
        },
        required: ["path"],
      },
    },
    {
      name: "index_status",
      description: "Report index readiness and counters (documents, chunks, vocabulary size).",
      inputSchema: { type: "object" as const, properties: {} },
    },
    {
      name: "reindex",
      description: `Reload every document under '${folderName}' and rebuild the index from scratch.`,
      inputSchema: { type: "object" as const, properties: {} },
    },
  ];
}

/** Route a tools/call request to its handler. */
export async function callTool(ctx: ToolContext, name: string, args: Args = {}): Promise<unknown> {
  switch (name) {
    case "rag_query":
      return ragQuery(ctx, args);
    case "rag_context":
      return ragContext(ctx, args);
    case "read_document":
      return readDocument(ctx, args);
    case "index_status":
      return ctx.status.getStatus();
    case "reindex":
      return reindex(ctx);
    default:
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  }
}
