import path from "node:path";
import { DimensionMismatchError, StoreCorruptError } from "./errors";
import { FlatIndex } from "./flat-index";
import type { Persistence, StoreSnapshot } from "./persistence";
import type {
  ChunkRecord,
  FileListing,
  NewChunk,
  SearchHit,
  StoreProfile,
  StoreStats,
} from "./types";

/** Initial candidate pool is `k * OVERFETCH`; it doubles while too few survive filtering. */
const OVERFETCH = 4;

/** Everything one indexing run changes, applied by {@link VectorStore.commit}. */
export interface ChangeSet {
  /** Paths whose live chunks become soft-deleted (deleted and modified files). */
  softDelete: readonly string[];
  /** Paths whose hash-table entry is dropped (deleted files). */
  forget: readonly string[];
  additions: readonly NewChunk[];
  vectors: readonly Float32Array[];
  /** New or updated content hashes. */
  hashes: ReadonlyMap<string, string>;
}

export interface VectorStoreOptions {
  profile: StoreProfile;
  /** Omit for a purely in-memory store (persist/load become no-ops). */
  persistence?: Persistence;
}

/**
 * Append-only vector index plus a parallel metadata table and the file hash
 * table. Chunks are never physically removed: deletion flips a flag and
 * search post-filters, since the underlying index has no cheap removal.
 *
 * One instance is owned by the process and handed to both the indexing and
 * the query path; writers are serialized by the indexer's run lock.
 */
export class VectorStore {
  private index = new FlatIndex();
  private chunks: ChunkRecord[] = [];
  private readonly byPath = new Map<string, number[]>();
  private fileHashes = new Map<string, string>();
  private loadError: StoreCorruptError | null = null;
  private readonly profile: StoreProfile;
  private readonly persistence?: Persistence;

  public constructor(opts: VectorStoreOptions) {
    this.profile = opts.profile;
    this.persistence = opts.persistence;
  }

  public getProfile(): StoreProfile {
    return this.profile;
  }

  /**
   * Append chunks with their vectors. The whole batch fails with
   * {@link DimensionMismatchError} if any vector disagrees with the pinned
   * dimension; an empty store adopts the first vector's dimension.
   */
  public add(chunks: readonly NewChunk[], vectors: readonly Float32Array[]): void {
    if (chunks.length !== vectors.length) {
      throw new RangeError(`add() got ${chunks.length} chunks but ${vectors.length} vectors`);
    }
    this.assertDimension(vectors);
    const first = this.index.add(vectors);
    chunks.forEach((c, i) => {
      const record: ChunkRecord = {
        position: first + i,
        path: c.path,
        chunkIndex: c.chunkIndex,
        text: c.text,
        deleted: false,
      };
      this.chunks.push(record);
      this.track(record);
    });
  }

  /**
   * Mark every live chunk owned by `filePath` as deleted. Idempotent.
   *
   * @returns Number of chunks that transitioned to deleted.
   */
  public softDelete(filePath: string): number {
    let changed = 0;
    for (const pos of this.byPath.get(filePath) ?? []) {
      const record = this.chunks[pos];
      if (!record.deleted) {
        record.deleted = true;
        changed++;
      }
    }
    return changed;
  }

  /**
   * The `k` nearest live chunks, descending score, ties by insertion order.
   * Over-fetches from the index and widens the pool until `k` survive the
   * deleted filter or every row has been considered.
   */
  public search(query: Float32Array, k: number): SearchHit[] {
    const dim = this.index.dimension;
    if (k <= 0 || dim === null || this.index.size === 0) return [];
    if (query.length !== dim) throw new DimensionMismatchError(dim, query.length);

    let pool = Math.min(this.index.size, k * OVERFETCH);
    for (;;) {
      const hits: SearchHit[] = [];
      for (const hit of this.index.search(query, pool)) {
        const chunk = this.chunks[hit.position];
        if (!chunk.deleted) hits.push({ chunk, score: hit.score });
      }
      if (hits.length >= k || pool >= this.index.size) return hits.slice(0, k);
      pool = Math.min(this.index.size, pool * 2);
    }
  }

  public stats(): StoreStats {
    let live = 0;
    for (const c of this.chunks) if (!c.deleted) live++;
    return { total_chunks: live, dimension: this.index.dimension };
  }

  /** Physical row count, including soft-deleted rows. */
  public physicalSize(): number {
    return this.index.size;
  }

  /** Live chunks owned by a path, in chunk order. */
  public chunksFor(filePath: string): ChunkRecord[] {
    return (this.byPath.get(filePath) ?? [])
      .map((pos) => this.chunks[pos])
      .filter((c) => !c.deleted)
      .sort((a, b) => a.chunkIndex - b.chunkIndex);
  }

  /**
   * Per-file listing of every path in the hash table, optionally restricted
   * to files below `directory`. Read-only.
   */
  public listFiles(directory?: string): FileListing[] {
    const root = directory ? path.resolve(directory) + path.sep : null;
    const out: FileListing[] = [];
    for (const [filePath, hash] of this.fileHashes) {
      if (root && !filePath.startsWith(root)) continue;
      out.push({
        file_path: filePath,
        file_name: path.basename(filePath),
        extension: path.extname(filePath),
        chunk_count: this.chunksFor(filePath).length,
        hash,
      });
    }
    return out.sort((a, b) => a.file_path.localeCompare(b.file_path));
  }

  public getFileHashes(): ReadonlyMap<string, string> {
    return this.fileHashes;
  }

  /**
   * Apply one run's changes: soft-delete first, then append, then update the
   * hash table. Dimensions are checked before anything is touched, so a
   * rejected change set leaves the store as it was.
   */
  public commit(changes: ChangeSet): void {
    if (changes.additions.length !== changes.vectors.length) {
      throw new RangeError(
        `commit() got ${changes.additions.length} chunks but ${changes.vectors.length} vectors`,
      );
    }
    this.assertDimension(changes.vectors);
    for (const p of changes.softDelete) this.softDelete(p);
    this.add(changes.additions, changes.vectors);
    for (const p of changes.forget) this.fileHashes.delete(p);
    for (const [p, h] of changes.hashes) this.fileHashes.set(p, h);
  }

  /** Save vectors, metadata and hash table as one unit. */
  public async persist(): Promise<void> {
    if (!this.persistence) return;
    await this.persistence.save({
      profile: this.profile,
      dimension: this.index.dimension,
      chunks: this.chunks.map((c) => {
        const emb = this.index.row(c.position);
        if (!emb) throw new RangeError(`No vector at position ${c.position}`);
        return { path: c.path, chunkIndex: c.chunkIndex, text: c.text, deleted: c.deleted, emb };
      }),
      fileHashes: Object.fromEntries(this.fileHashes),
    });
  }

  /**
   * Replace in-memory state with the persisted snapshot. No artifact yields an
   * empty store; an artifact saved under a different model or chunking
   * profile is ignored (with a warning) so the next run rebuilds from scratch.
   *
   * @throws {StoreCorruptError} When the artifacts exist but are malformed.
   */
  public async load(): Promise<void> {
    this.reset();
    let snapshot: StoreSnapshot | null | undefined;
    try {
      snapshot = await this.persistence?.load();
    } catch (e) {
      if (e instanceof StoreCorruptError) this.loadError = e;
      throw e;
    }
    this.loadError = null;
    if (!snapshot) return;
    const saved = snapshot.profile;
    if (
      saved.modelName !== this.profile.modelName ||
      saved.chunkSize !== this.profile.chunkSize ||
      saved.chunkOverlap !== this.profile.chunkOverlap
    ) {
      console.error(
        `[RAG] Stored index incompatible (model/chunk params differ: ${saved.modelName} ${saved.chunkSize}/${saved.chunkOverlap}). Performing cold rebuild.`,
      );
      return;
    }
    this.index.add(snapshot.chunks.map((c) => c.emb));
    snapshot.chunks.forEach((c, position) => {
      const record: ChunkRecord = { position, path: c.path, chunkIndex: c.chunkIndex, text: c.text, deleted: c.deleted };
      this.chunks.push(record);
      this.track(record);
    });
    this.fileHashes = new Map(Object.entries(snapshot.fileHashes));
  }

  /**
   * Startup variant of {@link load}: corrupt artifacts are logged and the
   * store starts empty, with the failure kept in {@link corruption} until a
   * later load succeeds.
   */
  public async hydrate(): Promise<void> {
    try {
      await this.load();
    } catch (e) {
      if (!(e instanceof StoreCorruptError)) throw e;
      console.error(`[RAG] ${e.message}. Starting with an empty index; index runs fail until the store is repaired or removed.`);
    }
  }

  /** The error of the last failed load, or null when the store loaded cleanly. */
  public get corruption(): StoreCorruptError | null {
    return this.loadError;
  }

  private reset(): void {
    this.index = new FlatIndex();
    this.chunks = [];
    this.byPath.clear();
    this.fileHashes = new Map();
  }

  private track(record: ChunkRecord): void {
    let positions = this.byPath.get(record.path);
    if (!positions) {
      positions = [];
      this.byPath.set(record.path, positions);
    }
    positions.push(record.position);
  }

  private assertDimension(vectors: readonly Float32Array[]): void {
    if (!vectors.length) return;
    const expected = this.index.dimension ?? vectors[0].length;
    for (const v of vectors) {
      if (v.length !== expected) throw new DimensionMismatchError(expected, v.length);
    }
  }
}
