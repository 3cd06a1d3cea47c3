import { splitChunks } from "./chunker";
import { classify } from "./change-detector";
import type { Embedder } from "./embeddings";
import {
  EmbeddingError,
  errorMessage,
  IndexBusyError,
  InvalidRequestError,
} from "./errors";
import {
  emitSafely,
  type IndexSummary,
  type ProgressEvent,
  type ProgressSink,
} from "./events";
import { mapWithConcurrency } from "./pool";
import { discoverFiles, readFiles, resolveRoot } from "./scanner";
import { IndexRunLock, type StatusManager } from "./status";
import type { NewChunk } from "./types";
import type { VectorStore } from "./vector-store";

/**
 * Options required to construct an {@link Indexer}. Resource knobs (batch
 * sizes, worker counts) only affect throughput, never the resulting index.
 */
export interface IndexerOptions {
  store: VectorStore;
  embedder: Embedder;
  allowedExt: string[]; // list of file extensions WITHOUT leading dot
  excludedFolders: string[];
  batchSize?: number; // default 32
  acceleratedBatchSize?: number; // default 128, used when the embedder runs on a gpu
  embedWorkers?: number; // default 2
  readWorkers?: number; // default 8
  minParallelChunks?: number; // below this, embedding batches run one at a time
  lock?: IndexRunLock;
  status?: StatusManager;
  verbose?: boolean;
}

export type RunState =
  | "idle"
  | "scanning"
  | "classifying"
  | "processing"
  | "embedding"
  | "persisting"
  | "done"
  | "fatal_error";

export type IndexOutcome =
  | { ok: true; summary: IndexSummary }
  | { ok: false; error: string; cancelled: boolean };

/**
 * Drives one incremental index run: scan -> classify -> chunk -> embed ->
 * commit -> persist, reporting progress through a caller supplied sink.
 *
 * Store mutations are staged and applied only after every chunk has a
 * vector, so a run that fails or is cancelled before the commit leaves the
 * store as it was. If persisting fails after the commit, memory is ahead of
 * disk until the next successful run saves again.
 */
export class Indexer {
  private readonly store: VectorStore;
  private readonly embedder: Embedder;
  private readonly allowedExt: string[];
  private readonly excludedFolders: string[];
  private readonly batchSize: number;
  private readonly acceleratedBatchSize: number;
  private readonly embedWorkers: number;
  private readonly readWorkers: number;
  private readonly minParallelChunks: number;
  private readonly lock: IndexRunLock;
  private readonly status?: StatusManager;
  private readonly verbose: boolean;
  private runState: RunState = "idle";

  public constructor(opts: IndexerOptions) {
    this.store = opts.store;
    this.embedder = opts.embedder;
    this.allowedExt = opts.allowedExt;
    this.excludedFolders = opts.excludedFolders;
    this.batchSize = Math.max(1, opts.batchSize ?? 32);
    this.acceleratedBatchSize = Math.max(1, opts.acceleratedBatchSize ?? 128);
    this.embedWorkers = Math.max(1, opts.embedWorkers ?? 2);
    this.readWorkers = Math.max(1, opts.readWorkers ?? 8);
    this.minParallelChunks = Math.max(0, opts.minParallelChunks ?? 256);
    this.lock = opts.lock ?? new IndexRunLock();
    this.status = opts.status;
    this.verbose = !!opts.verbose;
  }

  /** State of the current (or last) run. */
  public get state(): RunState {
    return this.runState;
  }

  public isRunning(): boolean {
    return this.lock.isHeld;
  }

  /**
   * Start a run. Input validation and the single-run check happen
   * synchronously, so callers can reject the request before streaming.
   *
   * @throws {InvalidRequestError} Empty directory.
   * @throws {IndexBusyError} Another run is active.
   * @returns Resolves when the run ends; never rejects.
   */
  public start(directory: string, sink: ProgressSink, signal?: AbortSignal): Promise<IndexOutcome> {
    const dir = directory.trim();
    if (!dir) throw new InvalidRequestError("No directory provided");
    const release = this.lock.tryAcquire();
    if (!release) throw new IndexBusyError();
    this.status?.markRunStarted(dir);
    return this.execute(dir, sink, signal).finally(release);
  }

  private async execute(
    directory: string,
    sink: ProgressSink,
    signal?: AbortSignal,
  ): Promise<IndexOutcome> {
    // Once the caller goes away nothing more is forwarded.
    const emit = (event: ProgressEvent) => {
      if (!signal?.aborted) emitSafely(sink, event);
    };

    try {
      this.runState = "scanning";
      emit({ type: "scan_start", data: { directory } });
      // Retry a load that failed earlier; it throws again while the artifacts stay corrupt.
      if (this.store.corruption) await this.store.load();
      const root = await resolveRoot(directory);
      const paths = await discoverFiles(root, {
        allowedExt: this.allowedExt,
        excludedFolders: this.excludedFolders,
      });
      console.error(`[RAG] Scanning ${root} ... (${paths.length} files)`);
      const scan = await readFiles(paths, this.readWorkers, signal);
      for (const failure of scan.failures) {
        console.error(`[RAG] Cannot read ${failure.path}: ${failure.message}`);
        emit({ type: "error", data: { message: `Cannot read file: ${failure.message}`, file: failure.path } });
      }

      this.runState = "classifying";
      const unreadable = new Set(scan.failures.map((f) => f.path));
      const buckets = classify(scan.files, this.store.getFileHashes(), unreadable);
      const blank = new Set(scan.files.filter((f) => !f.text.trim()).map((f) => f.path));
      // A blank file that was never indexed has nothing to add or replace.
      const fresh = new Set(buckets.new.filter((p) => !blank.has(p)));
      const modified = new Set(buckets.modified);

      this.runState = "processing";
      for (const p of buckets.deleted) emit({ type: "file_deleted", data: { file: p } });

      const additions: NewChunk[] = [];
      const hashes = new Map<string, string>();
      const { chunkSize, chunkOverlap } = this.store.getProfile();
      for (const f of scan.files) {
        const isNew = fresh.has(f.path);
        if (!isNew && !modified.has(f.path)) {
          emit({ type: "file_skipped", data: { file: f.path } });
          continue;
        }
        emit({ type: "file_processing", data: { file: f.path, status: isNew ? "new" : "modified" } });
        let count = 0;
        if (!blank.has(f.path)) {
          for (const text of splitChunks(f.text, chunkSize, chunkOverlap)) {
            additions.push({ path: f.path, chunkIndex: count++, text });
          }
        }
        hashes.set(f.path, f.hash);
        emit({ type: "file_processed", data: { file: f.path, chunks: count } });
        if (this.verbose) console.error(`[RAG][verbose] ${f.path}: ${count} chunks`);
      }

      this.runState = "embedding";
      const vectors = additions.length ? await this.embedAll(additions, emit, signal) : [];
      signal?.throwIfAborted();

      this.store.commit({
        softDelete: [...buckets.deleted, ...buckets.modified],
        forget: buckets.deleted,
        additions,
        vectors,
        hashes,
      });

      this.runState = "persisting";
      emit({ type: "saving", data: {} });
      await this.store.persist();
      emit({ type: "save_complete", data: {} });

      const summary: IndexSummary = {
        files: scan.files.length - (buckets.new.length - fresh.size),
        chunks: additions.length,
        new: fresh.size,
        modified: buckets.modified.length,
        unchanged: buckets.unchanged.length,
        deleted: buckets.deleted.length,
      };
      emit({ type: "stats", data: summary });
      emit({ type: "done", data: {} });
      this.runState = "done";
      this.status?.markRunFinished({ summary });
      console.error(
        `[RAG] Index run complete. new: ${summary.new}, modified: ${summary.modified}, unchanged: ${summary.unchanged}, deleted: ${summary.deleted}. Total chunks: ${this.store.stats().total_chunks}`,
      );
      return { ok: true, summary };
    } catch (e) {
      this.runState = "fatal_error";
      const message = errorMessage(e);
      this.status?.markRunFinished({ error: message });
      if (signal?.aborted) {
        console.error(`[RAG] Index run for ${directory} cancelled by caller.`);
        return { ok: false, error: message, cancelled: true };
      }
      console.error(`[RAG] Index run for ${directory} failed:`, e);
      emit({ type: "fatal_error", data: { message } });
      return { ok: false, error: message, cancelled: false };
    }
  }

  /**
   * Embed all staged chunks in fixed-size batches. Large jobs on the CPU run
   * several batches concurrently; small ones run sequentially.
   */
  private async embedAll(
    chunks: readonly NewChunk[],
    emit: (event: ProgressEvent) => void,
    signal?: AbortSignal,
  ): Promise<Float32Array[]> {
    const device = this.embedder.device;
    const batchSize = device === "gpu" ? this.acceleratedBatchSize : this.batchSize;
    const total = chunks.length;
    const workers =
      device === "cpu" && total >= this.minParallelChunks ? this.embedWorkers : 1;

    const batches: string[][] = [];
    for (let i = 0; i < total; i += batchSize) {
      batches.push(chunks.slice(i, i + batchSize).map((c) => c.text));
    }

    console.error(`[RAG] Embedding ${total} chunks (${batches.length} batches, ${workers} worker(s))`);
    emit({ type: "embedding_start", data: { total_chunks: total, device, batch_size: batchSize } });
    let processed = 0;
    const results = await mapWithConcurrency(
      batches,
      workers,
      async (batch) => {
        const vectors = await this.embedBatchWithRetry(batch, emit);
        processed += batch.length;
        emit({
          type: "embedding_progress",
          data: { processed, total, percent: Math.round((processed / total) * 100) },
        });
        return vectors;
      },
      signal,
    );
    emit({ type: "embedding_complete", data: {} });
    return results.flat();
  }

  /**
   * One batch; if it fails, retry chunk by chunk before giving up. Only a
   * failure at single-chunk granularity is fatal.
   */
  private async embedBatchWithRetry(
    batch: string[],
    emit: (event: ProgressEvent) => void,
  ): Promise<Float32Array[]> {
    try {
      const vectors = await this.embedder.embedBatch(batch);
      if (vectors.length !== batch.length) {
        throw new EmbeddingError(`Embedder returned ${vectors.length} vectors for ${batch.length} texts`);
      }
      return vectors;
    } catch (e) {
      if (batch.length === 1) throw new EmbeddingError(`Embedding failed: ${errorMessage(e)}`, { cause: e });
      console.error(`[RAG] Embedding batch of ${batch.length} failed, retrying per chunk:`, e);
      emit({
        type: "error",
        data: { message: `Embedding batch of ${batch.length} failed (${errorMessage(e)}); retrying per chunk` },
      });
    }
    const out: Float32Array[] = [];
    for (const text of batch) {
      try {
        const [vector] = await this.embedder.embedBatch([text]);
        if (!vector) throw new EmbeddingError("Embedder returned no vector");
        out.push(vector);
      } catch (e) {
        throw new EmbeddingError(`Embedding failed: ${errorMessage(e)}`, { cause: e });
      }
    }
    return out;
  }
}
