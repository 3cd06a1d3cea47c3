/**
 * HTTP transport for the document chat service.
 *
 * Two streaming channels answer newline-delimited JSON, one `{type, data}`
 * record per line:
 *  - POST /api/index : body `{directory}`; progress records of one index run.
 *  - POST /api/chat  : body `{query}`; `sources`, `content`*, then `done` or
 *                      `error`. History is kept per `x-session-id` header.
 *
 * Read-only routes:
 *  - GET /api/stats            : `{total_chunks, dimension}`
 *  - GET /api/files?directory= : per-file listing, optionally below a directory
 *  - GET /health               : server / indexing status snapshot
 *
 * The Model Context Protocol endpoint (POST|GET|DELETE /mcp) uses the SDK's
 * `StreamableHTTPServerTransport` per session:
 *  - A client starts with a JSON-RPC `initialize` request WITHOUT an
 *    `mcp-session-id` header; a transport + server pair is created and the
 *    generated session id is returned in the response headers.
 *  - Later requests carry the same header and reuse that transport.
 *  - When the transport closes the session is evicted.
 *
 * Request validation errors (empty directory or query) answer 400 and a
 * second concurrent index run answers 409, both before any record is sent.
 * Once streaming started, failures arrive as records instead.
 */
import express from "express";
import type { ErrorRequestHandler, Request, Response } from "express";
import type { Server as HttpServer } from "node:http";
import type { AddressInfo } from "node:net";
import { randomUUID } from "node:crypto";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import type { ChatService } from "../chat";
import type { ConversationStore } from "../conversation";
import { errorMessage, IndexBusyError, InvalidRequestError } from "../errors";
import type { ChatEvent, ProgressEvent } from "../events";
import type { IndexOutcome, Indexer } from "../indexer";
import { createMcpServer } from "../mcp";
import type { Retriever } from "../retriever";
import type { StatusManager } from "../status";
import type { VectorStore } from "../vector-store";

export const NDJSON = "application/x-ndjson";
export const SESSION_HEADER = "x-session-id";

/** Shared services the routes delegate to. */
export interface HttpDeps {
  indexer: Indexer;
  chat: ChatService;
  store: VectorStore;
  retriever: Retriever;
  status: StatusManager;
  conversations: ConversationStore;
}

export interface HttpOptions {
  host: string;
  port: number;
  /** Explicit host[:port] whitelist for /mcp; empty or omitted means local-only. */
  allowedHosts?: string[];
  dnsRebindingProtection?: boolean;
}

export interface RunningHttpServer {
  /** e.g. `http://127.0.0.1:8000` with the port actually bound. */
  baseUrl: string;
  close(): Promise<void>;
}

/** Writes records to a response, sending the NDJSON headers with the first one. */
class RecordStream {
  public constructor(private readonly res: Response) {}

  public write(record: ProgressEvent | ChatEvent): void {
    const res = this.res;
    if (res.writableEnded || res.destroyed) return;
    if (!res.headersSent) {
      res.status(200);
      res.setHeader("content-type", NDJSON);
      res.setHeader("cache-control", "no-cache");
      res.flushHeaders();
    }
    res.write(JSON.stringify(record) + "\n");
  }

  public end(): void {
    if (!this.res.writableEnded) this.res.end();
  }
}

function readField(body: unknown, key: string): string {
  if (typeof body !== "object" || body === null || !(key in body)) return "";
  const value: unknown = Reflect.get(body, key);
  return typeof value === "string" ? value : "";
}

function sendError(res: Response, err: unknown): void {
  const status =
    err instanceof InvalidRequestError ? 400 : err instanceof IndexBusyError ? 409 : 500;
  if (status === 500) console.error("[RAG] HTTP handler error:", err);
  res.status(status).json({ error: errorMessage(err) });
}

/** Abort once the client goes away before the response finished. */
function abortOnDisconnect(res: Response): AbortController {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller;
}

function defaultAllowedHosts(host: string, port: number): string[] {
  const base = new Set<string>([
    "127.0.0.1",
    `127.0.0.1:${port}`,
    "localhost",
    `localhost:${port}`,
    host,
    `${host}:${port}`,
  ]);
  return Array.from(base);
}

/** Build the express application without binding a port. */
export function createApp(deps: HttpDeps, opts: HttpOptions): express.Express {
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  app.post("/api/index", (req: Request, res: Response) => {
    const controller = abortOnDisconnect(res);
    const out = new RecordStream(res);
    let run: Promise<IndexOutcome>;
    try {
      run = deps.indexer.start(readField(req.body, "directory"), (event) => out.write(event), controller.signal);
    } catch (err) {
      sendError(res, err);
      return;
    }
    // The run promise never rejects; failures arrive as fatal_error records.
    return run.then(
      () => out.end(),
      (err: unknown) => {
        console.error("[RAG] Index run rejected unexpectedly:", err);
        out.end();
      },
    );
  });

  app.post("/api/chat", async (req: Request, res: Response) => {
    const sessionId = req.header(SESSION_HEADER)?.trim() || randomUUID();
    const query = readField(req.body, "query");
    const history = [...(deps.conversations.get(sessionId)?.turns() ?? [])];
    const controller = abortOnDisconnect(res);

    let events: AsyncGenerator<ChatEvent>;
    try {
      events = deps.chat.respond(query, history, controller.signal);
    } catch (err) {
      sendError(res, err);
      return;
    }
    res.setHeader(SESSION_HEADER, sessionId);
    const out = new RecordStream(res);

    let answer = "";
    let completed = false;
    try {
      for await (const event of events) {
        out.write(event);
        if (event.type === "content") answer += event.data;
        else if (event.type === "done") completed = true;
      }
    } catch (err) {
      console.error("[RAG] Chat stream failed:", err);
      out.write({ type: "error", data: { message: errorMessage(err) } });
    }
    if (completed) {
      const convo = deps.conversations.open(sessionId);
      convo.append({ role: "user", text: query.trim() });
      convo.append({ role: "assistant", text: answer });
    }
    out.end();
  });

  app.get("/api/stats", (_req: Request, res: Response) => {
    res.json(deps.store.stats());
  });

  app.get("/api/files", (req: Request, res: Response) => {
    const raw = req.query.directory;
    const directory = typeof raw === "string" && raw.trim() ? raw.trim() : undefined;
    res.json({ files: deps.store.listFiles(directory) });
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ ...deps.status.getStatus(), index: deps.store.stats() });
  });

  // --- Model Context Protocol ---------------------------------------------

  const allowedHosts = opts.allowedHosts?.length
    ? opts.allowedHosts
    : defaultAllowedHosts(opts.host, opts.port);
  /** Active session transports by session id. */
  const transports = new Map<string, StreamableHTTPServerTransport>();

  app.post("/mcp", async (req: Request, res: Response) => {
    try {
      const sessionId = req.header("mcp-session-id");
      let transport = sessionId ? transports.get(sessionId) : undefined;

      // New session only when no header AND the body is an initialize request.
      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        const created: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid: string) => {
            transports.set(sid, created);
          },
          enableDnsRebindingProtection: opts.dnsRebindingProtection ?? true,
          allowedHosts,
        });

        const server = createMcpServer({ store: deps.store, retriever: deps.retriever });
        let closing = false;
        created.onclose = () => {
          if (closing) return;
          closing = true;
          if (created.sessionId) transports.delete(created.sessionId);
          // server.close() closes the transport again; detach first.
          created.onclose = undefined;
          server.close().catch((e: unknown) => console.error("[RAG] MCP server close failed:", e));
        };
        await server.connect(created);
        transport = created;
      }

      if (!transport) {
        res.status(400).json({
          jsonrpc: "2.0",
          error: { code: -32000, message: "Bad Request: No valid session ID provided" },
          id: null,
        });
        return;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("[RAG] MCP POST error:", err);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  /** GET / DELETE /mcp are only valid for an existing session. */
  const handleSessionRequest = async (req: Request, res: Response) => {
    const sessionId = req.header("mcp-session-id");
    const transport = sessionId ? transports.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    await transport.handleRequest(req, res);
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  // Malformed JSON bodies and anything thrown by a handler.
  const onError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    const status =
      typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
        ? err.status
        : 500;
    if (status >= 500) console.error("[RAG] Unhandled HTTP error:", err);
    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(status).json({ error: errorMessage(err) });
  };
  app.use(onError);

  return app;
}

/**
 * Bind the HTTP server. Resolves once the listener is ready; `port: 0`
 * picks a free port, reported through `baseUrl`.
 */
export async function startHttpTransport(deps: HttpDeps, opts: HttpOptions): Promise<RunningHttpServer> {
  const app = createApp(deps, opts);
  const server = await new Promise<HttpServer>((resolve, reject) => {
    const listening: HttpServer = app.listen(opts.port, opts.host, (err?: Error) => {
      if (err) reject(err);
      else resolve(listening);
    });
  });

  const address = server.address();
  const port = isAddressInfo(address) ? address.port : opts.port;
  const baseUrl = `http://${opts.host}:${port}`;
  console.error(`[RAG] HTTP listening at ${baseUrl} (MCP at ${baseUrl}/mcp)`);

  return {
    baseUrl,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err?: Error) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      }),
  };
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === "object" && address !== null;
}
