/**
 * Error taxonomy shared by the indexing and conversation pipelines.
 *
 * Orchestrators translate these into progress / chat records; the HTTP layer
 * maps the client-facing ones onto status codes before any streaming starts.
 */

/** Client supplied an empty or malformed request (query, directory). */
export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestError";
  }
}

/** Root directory of an indexing run is missing or not a directory. */
export class InvalidDirectoryError extends Error {
  constructor(public readonly directory: string, reason: string) {
    super(`Invalid directory '${directory}': ${reason}`);
    this.name = "InvalidDirectoryError";
  }
}

/** A vector's length disagrees with the store's pinned dimension. */
export class DimensionMismatchError extends Error {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(`Vector dimension mismatch: expected ${expected}, got ${actual}`);
    this.name = "DimensionMismatchError";
  }
}

/** Persisted artifacts exist but cannot be parsed. */
export class StoreCorruptError extends Error {
  constructor(file: string, reason: string) {
    super(`Persisted store at ${file} is unreadable: ${reason}`);
    this.name = "StoreCorruptError";
  }
}

/** Only one indexing run may mutate the store at a time. */
export class IndexBusyError extends Error {
  constructor() {
    super("An indexing run is already in progress");
    this.name = "IndexBusyError";
  }
}

/** Embedding backend failed in a way a smaller retry could not recover. */
export class EmbeddingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EmbeddingError";
  }
}

/** Normalize any thrown value into a single-line message for event payloads. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}

