/**
 * Read-only retrieval tools exposed over the Model Context Protocol.
 *
 * Tool contracts:
 *  rag_query
 *    Input:  { query: string, top_k?: number }
 *    Output: { matches: Array<{ path, chunk, score, snippet }> }
 *    Errors: InvalidParams if query missing.
 *
 *  index_stats
 *    Input:  {}
 *    Output: { total_chunks, dimension }
 *
 *  list_indexed_files
 *    Input:  { directory?: string }
 *    Output: { files: FileListing[] }
 *
 * None of the tools mutate the store; indexing stays on the HTTP channel so
 * the single-writer rule is enforced in one place.
 */
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { APP_VERSION } from "./config";
import { InvalidRequestError } from "./errors";
import type { Retriever } from "./retriever";
import type { VectorStore } from "./vector-store";

export interface McpDeps {
  store: VectorStore;
  retriever: Retriever;
}

export const TOOLS = [
  {
    name: "rag_query",
    description:
      "Semantically search the indexed documents and return the most relevant chunks with path, chunk index, score and snippet.",
    inputSchema: {
      type: "object" as const,
      properties: {
        query: {
          type: "string",
          description: "Natural language search query.",
        },
        top_k: {
          type: "number",
          description: "Maximum number of matches to return (1-50). Defaults to the server's TOP_K.",
          minimum: 1,
          maximum: 50,
        },
      },
      required: ["query"],
    },
  },
  {
    name: "index_stats",
    description: "Number of live chunks in the index and the embedding dimension.",
    inputSchema: { type: "object" as const, properties: {} },
  },
  {
    name: "list_indexed_files",
    description: "List indexed files with chunk counts and content hashes, optionally below a directory.",
    inputSchema: {
      type: "object" as const,
      properties: {
        directory: {
          type: "string",
          description: "Absolute directory; only files below it are listed.",
        },
      },
    },
  },
];

/** Execute one tool call and return its JSON-serializable result. */
export async function runTool(
  deps: McpDeps,
  name: string,
  args: Record<string, unknown> = {},
): Promise<unknown> {
  if (name === "rag_query") {
    const query = typeof args.query === "string" ? args.query : "";
    const topK = typeof args.top_k === "number" ? Math.max(1, Math.min(50, Math.floor(args.top_k))) : undefined;
    try {
      const results = await deps.retriever.retrieve(query, topK);
      return {
        matches: results.map((r) => ({
          path: r.filePath,
          chunk: r.chunkIndex,
          score: Number(r.score.toFixed(4)),
          snippet: r.text,
        })),
      };
    } catch (e) {
      if (e instanceof InvalidRequestError) throw new McpError(ErrorCode.InvalidParams, e.message);
      throw e;
    }
  }
  if (name === "index_stats") return deps.store.stats();
  if (name === "list_indexed_files") {
    const directory = typeof args.directory === "string" && args.directory.trim() ? args.directory : undefined;
    return { files: deps.store.listFiles(directory) };
  }
  throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
}

/**
 * Factory for a fresh MCP server. One instance is created per transport
 * session; the store and retriever are shared.
 */
export function createMcpServer(deps: McpDeps): Server {
  const server = new Server(
    { name: "docchat-server", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (req) => {
    const result = await runTool(deps, req.params.name, req.params.arguments);
    return { content: [{ type: "text" as const, text: JSON.stringify(result) }] };
  });

  return server;
}
