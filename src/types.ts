/**
 * Shared chunk / listing types used throughout the store, indexing and
 * persistence layers.
 */

/** A chunk as produced by the indexer, before it has a vector. */
export interface NewChunk {
  /** Absolute, canonical path of the owning file. */
  readonly path: string;
  /** Position within the file's chunk sequence at creation time (0-based). */
  readonly chunkIndex: number;
  /** Chunk text content. */
  readonly text: string;
}

/** A stored chunk. `position` is its row in the underlying vector index. */
export interface ChunkRecord extends NewChunk {
  readonly position: number;
  /** Soft-delete flag; set once and never cleared. */
  deleted: boolean;
}

/** One search hit, score is cosine similarity. */
export interface SearchHit {
  readonly chunk: ChunkRecord;
  readonly score: number;
}

/** Store statistics; `total_chunks` counts only live (non-deleted) chunks. */
export interface StoreStats {
  total_chunks: number;
  dimension: number | null;
}

/** Per-file introspection row. */
export interface FileListing {
  file_path: string;
  file_name: string;
  extension: string;
  chunk_count: number;
  hash: string | null;
}

/**
 * What a store is pinned to. A persisted store is only reused when the
 * profile it was saved with matches the running one.
 */
export interface StoreProfile {
  modelName: string;
  chunkSize: number;
  chunkOverlap: number;
}
