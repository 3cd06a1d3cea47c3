/**
 * Closed record unions for the two streaming channels. Every record is
 * `{type, data}` on the wire (one JSON object per line).
 */
import type { EmbedDevice } from "./embeddings";

type Empty = Record<string, never>;

/** Final per-run counts, also carried by the `stats` record. */
export interface IndexSummary {
  files: number;
  chunks: number;
  new: number;
  modified: number;
  unchanged: number;
  deleted: number;
}

export type ProgressEvent =
  | { type: "scan_start"; data: { directory: string } }
  | { type: "file_processing"; data: { file: string; status: "new" | "modified" } }
  | { type: "file_processed"; data: { file: string; chunks: number } }
  | { type: "file_skipped"; data: { file: string } }
  | { type: "file_deleted"; data: { file: string } }
  | {
      type: "embedding_start";
      data: { total_chunks: number; device: EmbedDevice; batch_size: number };
    }
  | { type: "embedding_progress"; data: { processed: number; total: number; percent: number } }
  | { type: "embedding_complete"; data: Empty }
  | { type: "saving"; data: Empty }
  | { type: "save_complete"; data: Empty }
  | { type: "stats"; data: IndexSummary }
  | { type: "done"; data: Empty }
  /** Non-fatal; the run continues. */
  | { type: "error"; data: { message: string; file?: string } }
  /** The run aborted; nothing was persisted. */
  | { type: "fatal_error"; data: { message: string } };

export type ProgressEventType = ProgressEvent["type"];

/** Provenance entry of the `sources` chat record. */
export interface SourceRef {
  file: string;
  path: string;
  chunk: number;
  score: number;
}

export type ChatEvent =
  | { type: "sources"; data: SourceRef[] }
  | { type: "content"; data: string }
  | { type: "done"; data: Empty }
  | { type: "error"; data: { message: string } };

/**
 * One-way, push-only receiver of progress records. Returning a promise is
 * allowed but never awaited by the producer.
 */
export type ProgressSink = (event: ProgressEvent) => void | Promise<void>;

/**
 * Deliver an event without letting the sink block or break the producer:
 * sync throws and async rejections are logged and dropped.
 */
export function emitSafely(sink: ProgressSink, event: ProgressEvent): void {
  try {
    const pending = sink(event);
    if (pending instanceof Promise) {
      pending.catch((e: unknown) => console.error(`[RAG] Progress sink rejected '${event.type}':`, e));
    }
  } catch (e) {
    console.error(`[RAG] Progress sink threw on '${event.type}':`, e);
  }
}
