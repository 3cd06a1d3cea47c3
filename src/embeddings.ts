import fs from "node:fs/promises";
import path from "node:path";
import { env, pipeline } from "@huggingface/transformers";

/** Where an embedder runs; "gpu" selects the accelerated batch size. */
export type EmbedDevice = "cpu" | "gpu";

/** The slice of the feature-extraction pipeline this module calls. */
type Extractor = (
  texts: string[],
  opts: { pooling: "mean"; normalize: boolean },
) => Promise<{ data: Float32Array; dims: number[] }>;

/**
 * Point the transformers model cache at a filesystem directory (created if
 * missing). Must run before the first pipeline is built.
 *
 * @returns The directory in use.
 */
export async function configureModelCache(cacheDir?: string): Promise<string> {
  const dir = cacheDir?.trim() || path.resolve(".cache/transformers");
  await fs.mkdir(dir, { recursive: true });
  env.useBrowserCache = false;
  env.allowLocalModels = true;
  env.cacheDir = dir;
  console.error(`[RAG] Model cache: ${dir}`);
  return dir;
}

/** Error thrown when attempting to embed before initialization. */
export class EmbedderNotInitializedError extends Error {
  constructor() {
    super("Embedder not initialized. Call init() first.");
    this.name = "EmbedderNotInitializedError";
  }
}

/**
 * Text -> vector function used at index time and at query time. Both paths
 * must share one instance (one model) or similarity scores are meaningless.
 */
export interface Embedder {
  /** Where embedding executes; selects the batch size the indexer uses. */
  readonly device: EmbedDevice;
  getModelName(): string;
  embed(text: string): Promise<Float32Array>;
  embedBatch(texts: readonly string[]): Promise<Float32Array[]>;
}

/**
 * Local feature-extraction pipeline (mean pooling + L2 normalization).
 * A single instance can be reused for any number of embed() calls.
 */
export class Embeddings implements Embedder {
  public readonly device: EmbedDevice = "cpu";
  private readonly modelName: string;
  private embedder: Extractor | null = null;

  public constructor(modelName = "Xenova/all-MiniLM-L6-v2") {
    this.modelName = modelName;
  }

  /** @returns Underlying model identifier, stamped into the persisted store. */
  public getModelName(): string {
    return this.modelName;
  }

  /** Lazily initialize the underlying embedding pipeline (idempotent). */
  public async init(): Promise<void> {
    if (this.embedder) return; // already initialized
    console.error(`[RAG] Loading embedding model: ${this.modelName}`);
    this.embedder = (await pipeline("feature-extraction", this.modelName, { device: "cpu" })) as unknown as Extractor;
    console.error(`[RAG] Model ready: ${this.modelName}`);
  }

  /** @throws {EmbedderNotInitializedError} If {@link init} has not been called. */
  public async embed(text: string): Promise<Float32Array> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  /**
   * Embed a batch in one pipeline call. The output tensor is `[n, dim]`;
   * rows are copied out so callers own independent vectors.
   */
  public async embedBatch(texts: readonly string[]): Promise<Float32Array[]> {
    if (!this.embedder) throw new EmbedderNotInitializedError();
    if (!texts.length) return [];
    const output = await this.embedder([...texts], { pooling: "mean", normalize: true });
    const { data, dims } = output;
    const dim = dims[dims.length - 1];
    return texts.map((_, i) => data.slice(i * dim, (i + 1) * dim));
  }
}
