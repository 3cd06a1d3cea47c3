import { APP_VERSION } from "./config";
import type { IndexSummary } from "./events";

/** Indexing lifecycle as seen from /health. */
export interface IndexingStatus {
  state: "idle" | "running";
  /** Root of the active (or most recent) run. */
  directory: string | null;
  lastRunAt: string | null;
  lastSummary: IndexSummary | null;
  lastError: string | null;
}

/** What GET /health reports. */
export interface ServerStatus {
  version: string;
  /** Embedding model id; empty until the model is loaded. */
  modelName: string;
  storePath: string;
  startedAt: string;
  indexing: IndexingStatus;
}

/** Owner of the process status; the indexer records run transitions here. */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<Omit<ServerStatus, "indexing">>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      modelName: initial?.modelName ?? "",
      storePath: initial?.storePath ?? "",
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      indexing: {
        state: "idle",
        directory: null,
        lastRunAt: null,
        lastSummary: null,
        lastError: null,
      },
    };
  }

  public setModelName(name: string) {
    this.data.modelName = name;
  }

  public markRunStarted(directory: string) {
    this.data.indexing.state = "running";
    this.data.indexing.directory = directory;
  }

  /** Record the outcome of a run; exactly one of summary / error is set. */
  public markRunFinished(outcome: { summary: IndexSummary } | { error: string }) {
    const idx = this.data.indexing;
    idx.state = "idle";
    idx.lastRunAt = new Date().toISOString();
    if ("summary" in outcome) {
      idx.lastSummary = outcome.summary;
      idx.lastError = null;
    } else {
      idx.lastError = outcome.error;
    }
  }

  /** Live object; callers must not mutate it. */
  public getStatus(): ServerStatus {
    return this.data;
  }
}

/**
 * Single-writer token for indexing runs. `tryAcquire` never waits: it hands
 * out a release function, or null while another run holds the lock.
 */
export class IndexRunLock {
  private held = false;

  public get isHeld(): boolean {
    return this.held;
  }

  public tryAcquire(): (() => void) | null {
    if (this.held) return null;
    this.held = true;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.held = false;
    };
  }
}
