import fsSync from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { IndexBusyError, InvalidRequestError, StoreCorruptError } from "../errors";
import type { ProgressEvent } from "../events";
import { Indexer, type IndexerOptions } from "../indexer";
import { CURRENT_FILE, Persistence, STORE_FILE } from "../persistence";
import { Retriever } from "../retriever";
import { IndexRunLock, StatusManager } from "../status";
import { VectorStore } from "../vector-store";
import { collectEvents, FAKE_DIM, FakeEmbedder, makeTempDir } from "./helpers";

const types = (events: ProgressEvent[]) => events.map((e) => e.type);

describe("Indexer", () => {
  let dir: string;
  let storeDir: string;
  let embedder: FakeEmbedder;
  let store: VectorStore;

  beforeEach(async () => {
    dir = await makeTempDir("docchat-docs-");
    storeDir = path.join(await makeTempDir("docchat-index-"), "index");
    embedder = new FakeEmbedder();
    store = newStore();
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function newStore(chunkSize = 1000, chunkOverlap = 200): VectorStore {
    return new VectorStore({
      profile: { modelName: embedder.getModelName(), chunkSize, chunkOverlap },
      persistence: new Persistence(storeDir),
    });
  }

  function makeIndexer(overrides: Partial<IndexerOptions> = {}): Indexer {
    return new Indexer({
      store,
      embedder,
      allowedExt: ["md", "txt"],
      excludedFolders: ["node_modules"],
      ...overrides,
    });
  }

  async function run(indexer = makeIndexer()) {
    const { events, sink } = collectEvents();
    const outcome = await indexer.start(dir, sink);
    return { events, outcome };
  }

  const file = (name: string) => path.join(dir, name);
  const write = (name: string, content: string | Uint8Array) => fs.writeFile(file(name), content);

  it("indexes a single file end to end", async () => {
    await write("auth.md", "Auth uses JWT tokens.");
    const { events, outcome } = await run();

    expect(outcome).toEqual({
      ok: true,
      summary: { files: 1, chunks: 1, new: 1, modified: 0, unchanged: 0, deleted: 0 },
    });
    expect(store.stats()).toEqual({ total_chunks: 1, dimension: FAKE_DIM });
    const results = await new Retriever(store, embedder).retrieve("authentication", 5);
    expect(results).toHaveLength(1);
    expect(results[0].filePath.endsWith("auth.md")).toBe(true);

    expect(types(events)).toEqual([
      "scan_start",
      "file_processing",
      "file_processed",
      "embedding_start",
      "embedding_progress",
      "embedding_complete",
      "saving",
      "save_complete",
      "stats",
      "done",
    ]);
    expect(events[0]).toEqual({ type: "scan_start", data: { directory: dir } });
    expect(events[1]).toEqual({ type: "file_processing", data: { file: file("auth.md"), status: "new" } });
    expect(events[3]).toEqual({
      type: "embedding_start",
      data: { total_chunks: 1, device: "cpu", batch_size: 32 },
    });
  });

  it("is idempotent over an unchanged directory", async () => {
    await write("auth.md", "Auth uses JWT tokens.");
    await run();
    const { events, outcome } = await run();

    expect(outcome).toEqual({
      ok: true,
      summary: { files: 1, chunks: 0, new: 0, modified: 0, unchanged: 1, deleted: 0 },
    });
    expect(store.stats().total_chunks).toBe(1);
    expect(types(events)).toEqual(["scan_start", "file_skipped", "saving", "save_complete", "stats", "done"]);
  });

  it("replaces the chunks of a modified file", async () => {
    await write("auth.md", "Auth uses JWT tokens.");
    await run();
    await write("auth.md", "Sessions expire after one hour.");
    const { events, outcome } = await run();

    expect(outcome).toMatchObject({ ok: true, summary: { modified: 1, new: 0, deleted: 0 } });
    expect(events).toContainEqual({ type: "file_processing", data: { file: file("auth.md"), status: "modified" } });
    expect(store.stats().total_chunks).toBe(1);
    expect(store.physicalSize()).toBe(2);
    expect(store.chunksFor(file("auth.md")).map((c) => c.text)).toEqual(["Sessions expire after one hour."]);

    const results = await new Retriever(store, embedder).retrieve("Auth uses JWT tokens", 5);
    expect(results.map((r) => r.text)).toEqual(["Sessions expire after one hour."]);
  });

  it("soft-deletes a removed file and forgets its hash", async () => {
    await write("auth.md", "Auth uses JWT tokens.");
    await write("other.md", "Deploys run nightly.");
    await run();
    await fs.rm(file("auth.md"));
    const { events, outcome } = await run();

    expect(outcome).toMatchObject({ ok: true, summary: { deleted: 1, unchanged: 1 } });
    expect(events).toContainEqual({ type: "file_deleted", data: { file: file("auth.md") } });
    expect(store.stats().total_chunks).toBe(1);
    expect(store.getFileHashes().has(file("auth.md"))).toBe(false);
    const results = await new Retriever(store, embedder).retrieve("Auth uses JWT tokens", 5);
    expect(results.map((r) => r.filePath)).toEqual([file("other.md")]);
  });

  it("numbers the chunks of a multi-chunk file", async () => {
    store = newStore(10, 5);
    await write("words.md", "aaaa bbbb cccc");
    const { events } = await run();

    expect(events).toContainEqual({ type: "file_processed", data: { file: file("words.md"), chunks: 2 } });
    expect(store.chunksFor(file("words.md")).map((c) => [c.chunkIndex, c.text])).toEqual([
      [0, "aaaa bbbb "],
      [1, "bbbb cccc"],
    ]);
  });

  it("skips whitespace-only files that were never indexed", async () => {
    await write("auth.md", "Auth uses JWT tokens.");
    await write("blank.md", "  \n\t");
    const { events, outcome } = await run();

    expect(events).toContainEqual({ type: "file_skipped", data: { file: file("blank.md") } });
    expect(outcome).toEqual({
      ok: true,
      summary: { files: 1, chunks: 1, new: 1, modified: 0, unchanged: 0, deleted: 0 },
    });
    expect(store.getFileHashes().has(file("blank.md"))).toBe(false);
  });

  it("treats an indexed file that became empty as modified", async () => {
    await write("auth.md", "Auth uses JWT tokens.");
    await run();

    await write("auth.md", "");
    const { events, outcome } = await run();
    expect(outcome).toEqual({
      ok: true,
      summary: { files: 1, chunks: 0, new: 0, modified: 1, unchanged: 0, deleted: 0 },
    });
    expect(events.filter((e) => e.type.startsWith("file_"))).toEqual([
      { type: "file_processing", data: { file: file("auth.md"), status: "modified" } },
      { type: "file_processed", data: { file: file("auth.md"), chunks: 0 } },
    ]);
    expect(store.stats().total_chunks).toBe(0);
    expect(store.getFileHashes().get(file("auth.md"))).toBe("d41d8cd98f00b204e9800998ecf8427e");

    const again = await run();
    expect(again.outcome).toMatchObject({ ok: true, summary: { files: 1, unchanged: 1, modified: 0 } });
  });

  it("keeps the prior hash of a file that cannot be read", async () => {
    await write("notes.md", "Readable today.");
    await run();
    const before = store.getFileHashes().get(file("notes.md"));
    await write("notes.md", Uint8Array.from([0xff, 0xfe, 0xfd]));
    const { events, outcome } = await run();

    expect(events).toContainEqual({
      type: "error",
      data: { message: expect.stringMatching(/^Cannot read file: /), file: file("notes.md") },
    });
    expect(outcome).toEqual({
      ok: true,
      summary: { files: 0, chunks: 0, new: 0, modified: 0, unchanged: 0, deleted: 0 },
    });
    expect(store.getFileHashes().get(file("notes.md"))).toBe(before);
    expect(store.stats().total_chunks).toBe(1);
  });

  it("embeds in batches and reports progress", async () => {
    await write("a.md", "alpha");
    await write("b.md", "beta");
    await write("c.md", "gamma");
    const { events } = await run(makeIndexer({ batchSize: 2 }));

    expect(embedder.batches).toEqual([2, 1]);
    expect(events.filter((e) => e.type === "embedding_progress").map((e) => e.data)).toEqual([
      { processed: 2, total: 3, percent: 67 },
      { processed: 3, total: 3, percent: 100 },
    ]);
  });

  it("uses the accelerated batch size on a gpu embedder", async () => {
    embedder = new FakeEmbedder({ device: "gpu" });
    await write("a.md", "alpha");
    await write("b.md", "beta");
    await write("c.md", "gamma");
    const { events } = await run(makeIndexer({ batchSize: 1, acceleratedBatchSize: 3 }));

    expect(embedder.batches).toEqual([3]);
    expect(events).toContainEqual({
      type: "embedding_start",
      data: { total_chunks: 3, device: "gpu", batch_size: 3 },
    });
  });

  it("keeps vectors aligned with chunks when batches run concurrently", async () => {
    await write("a.md", "alpha alpha");
    await write("b.md", "beta beta");
    await write("c.md", "gamma gamma");
    await run(makeIndexer({ batchSize: 1, embedWorkers: 3, minParallelChunks: 0 }));

    const retriever = new Retriever(store, embedder);
    for (const word of ["alpha", "beta", "gamma"]) {
      const [top] = await retriever.retrieve(word, 1);
      expect(top.text).toBe(`${word} ${word}`);
    }
  });

  it("recovers from a failed batch by retrying chunk by chunk", async () => {
    embedder = new FakeEmbedder({ failBatchesLargerThan: 1 });
    await write("a.md", "alpha");
    await write("b.md", "beta");
    const { events, outcome } = await run();

    expect(outcome.ok).toBe(true);
    expect(embedder.batches).toEqual([2, 1, 1]);
    expect(events).toContainEqual({
      type: "error",
      data: { message: "Embedding batch of 2 failed (batch too large); retrying per chunk" },
    });
    expect(store.stats().total_chunks).toBe(2);
  });

  it("aborts without touching the store when embedding fails for good", async () => {
    embedder = new FakeEmbedder({ failOn: (t) => t.includes("poison") });
    await write("bad.md", "poison pill");
    await write("good.md", "fine text");
    const { events, outcome } = await run();

    expect(outcome).toEqual({ ok: false, error: "Embedding failed: backend down", cancelled: false });
    expect(types(events)).toEqual([
      "scan_start",
      "file_processing",
      "file_processed",
      "file_processing",
      "file_processed",
      "embedding_start",
      "error",
      "fatal_error",
    ]);
    expect(store.stats()).toEqual({ total_chunks: 0, dimension: null });
    expect(store.getFileHashes().size).toBe(0);
    expect(fsSync.existsSync(path.join(storeDir, CURRENT_FILE))).toBe(false);
  });

  it("reports a missing root as fatal", async () => {
    const missing = path.join(dir, "nope");
    const collected = collectEvents();
    const outcome = await makeIndexer().start(missing, collected.sink);
    expect(outcome).toEqual({
      ok: false,
      error: `Invalid directory '${missing}': does not exist`,
      cancelled: false,
    });
    expect(collected.events).toEqual([
      { type: "scan_start", data: { directory: missing } },
      { type: "fatal_error", data: { message: `Invalid directory '${missing}': does not exist` } },
    ]);
  });

  it("rejects an empty directory argument before doing any work", () => {
    const { sink, events } = collectEvents();
    expect(() => makeIndexer().start("   ", sink)).toThrow(InvalidRequestError);
    expect(events).toEqual([]);
  });

  it("allows only one run at a time", async () => {
    await write("auth.md", "Auth uses JWT tokens.");
    const lock = new IndexRunLock();
    const indexer = makeIndexer({ lock });
    const first = indexer.start(dir, () => {});
    expect(indexer.isRunning()).toBe(true);
    expect(() => makeIndexer({ lock }).start(dir, () => {})).toThrow(IndexBusyError);
    await first;
    expect(indexer.isRunning()).toBe(false);
    await expect(indexer.start(dir, () => {})).resolves.toMatchObject({ ok: true });
  });

  it("stays silent and leaves the store alone when cancelled", async () => {
    await write("auth.md", "Auth uses JWT tokens.");
    const { events, sink } = collectEvents();
    const outcome = await makeIndexer().start(dir, sink, AbortSignal.abort());

    expect(outcome).toMatchObject({ ok: false, cancelled: true });
    expect(events).toEqual([]);
    expect(store.stats().total_chunks).toBe(0);
  });

  it("is not affected by a failing sink", async () => {
    await write("auth.md", "Auth uses JWT tokens.");
    const outcome = await makeIndexer().start(dir, (e) => {
      if (e.type === "file_processed") throw new Error("sink broke");
      if (e.type === "stats") return Promise.reject(new Error("sink rejected"));
    });
    expect(outcome.ok).toBe(true);
    expect(store.stats().total_chunks).toBe(1);
  });

  it("persists a run so a restarted store sees no changes", async () => {
    await write("auth.md", "Auth uses JWT tokens.");
    await run();

    store = newStore();
    await store.load();
    expect(store.stats()).toEqual({ total_chunks: 1, dimension: FAKE_DIM });
    const { outcome } = await run();
    expect(outcome).toMatchObject({ ok: true, summary: { unchanged: 1, new: 0 } });
  });

  it("fails runs while the persisted store is corrupt and rebuilds once it is removed", async () => {
    await write("auth.md", "Auth uses JWT tokens.");
    await run();
    const generation = await new Persistence(storeDir).currentGeneration();
    const storeFile = path.join(storeDir, `gen-${generation}`, STORE_FILE);
    await fs.writeFile(storeFile, "{bad");

    store = newStore();
    await store.hydrate();
    expect(store.corruption).toBeInstanceOf(StoreCorruptError);
    expect(store.stats()).toEqual({ total_chunks: 0, dimension: null });

    const failed = await run();
    expect(failed.outcome).toEqual({
      ok: false,
      error: expect.stringContaining(`Persisted store at ${storeFile} is unreadable`),
      cancelled: false,
    });
    expect(types(failed.events)).toEqual(["scan_start", "fatal_error"]);
    expect(await fs.readFile(storeFile, "utf8")).toBe("{bad");

    await fs.rm(storeDir, { recursive: true });
    const rebuilt = await run();
    expect(rebuilt.outcome).toMatchObject({ ok: true, summary: { new: 1, chunks: 1 } });
    expect(store.corruption).toBeNull();
  });

  it("reports a failed save as fatal while memory keeps the committed chunks", async () => {
    await fs.mkdir(path.dirname(storeDir), { recursive: true });
    await fs.writeFile(storeDir, "not a directory");
    await write("auth.md", "Auth uses JWT tokens.");
    const { events, outcome } = await run();

    expect(outcome).toMatchObject({ ok: false, cancelled: false });
    expect(types(events).slice(-2)).toEqual(["saving", "fatal_error"]);
    expect(store.stats().total_chunks).toBe(1);
  });

  it("records the outcome in the status manager", async () => {
    await write("auth.md", "Auth uses JWT tokens.");
    const status = new StatusManager();
    const indexer = makeIndexer({ status });
    await run(indexer);
    expect(indexer.state).toBe("done");

    const indexing = status.getStatus().indexing;
    expect(indexing.state).toBe("idle");
    expect(indexing.directory).toBe(dir);
    expect(indexing.lastSummary).toEqual({ files: 1, chunks: 1, new: 1, modified: 0, unchanged: 0, deleted: 0 });
    expect(indexing.lastError).toBeNull();
  });
});
