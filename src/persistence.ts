import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { StoreCorruptError } from "./errors";
import type { StoreProfile } from "./types";

/** A chunk row as written to disk, in physical index order. */
export interface PersistedChunk {
  path: string;
  chunkIndex: number;
  text: string;
  deleted: boolean;
  emb: Float32Array;
}

/**
 * Everything that must be saved or restored together: the vector rows with
 * their metadata, and the path -> content hash table.
 */
export interface StoreSnapshot {
  profile: StoreProfile;
  dimension: number | null;
  chunks: PersistedChunk[];
  fileHashes: Record<string, string>;
}

const FORMAT_VERSION = 3;
export const STORE_FILE = "store.json";
export const HASHES_FILE = "file-hashes.json";
/** Names the generation directory the live pair lives in. */
export const CURRENT_FILE = "CURRENT";
const GENERATION_PREFIX = "gen-";

type JsonRecord = Record<string, unknown>;

function isRecord(v: unknown): v is JsonRecord {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function encodeVector(v: Float32Array): string {
  return Buffer.from(v.buffer, v.byteOffset, v.byteLength).toString("base64");
}

function decodeVector(raw: string): Float32Array | null {
  const buf = Buffer.from(raw, "base64");
  if (buf.byteLength === 0 || buf.byteLength % 4 !== 0) return null;
  // Copy out of the (possibly unaligned) pooled Buffer before viewing as f32.
  const copy = buf.buffer.slice(buf.byteOffset, buf.byteOffset + buf.byteLength);
  return new Float32Array(copy);
}

/**
 * Encapsulates persistence logic (load/save) for the chunk/embedding store.
 *
 * Each save writes `store.json` (vectors as base64-encoded little-endian f32
 * plus chunk metadata) and `file-hashes.json` into a fresh `gen-<id>`
 * directory, then swaps the one-line `CURRENT` pointer by rename. A crash
 * before the swap leaves the previous generation live; older generations are
 * pruned after it.
 */
export class Persistence {
  private readonly storeDir: string;
  private readonly verbose: boolean;

  /**
   * @param storeDir Directory holding the persisted artifacts (created on save).
   * @param verbose  Whether to emit verbose logging.
   */
  public constructor(storeDir: string, verbose = false) {
    this.storeDir = storeDir;
    this.verbose = verbose;
  }

  public get directory(): string {
    return this.storeDir;
  }

  /** Generation id named by the pointer file, or null when nothing was saved. */
  public async currentGeneration(): Promise<string | null> {
    const pointer = path.join(this.storeDir, CURRENT_FILE);
    if (!fsSync.existsSync(pointer)) return null;
    const generation = (await fs.readFile(pointer, "utf8")).trim();
    if (!/^[\w-]+$/.test(generation)) throw new StoreCorruptError(pointer, "bad generation pointer");
    return generation;
  }

  /**
   * Load the live pair. Returns null when nothing was saved yet (or the live
   * generation is incomplete). Throws {@link StoreCorruptError} when an
   * artifact exists but cannot be parsed.
   */
  public async load(): Promise<StoreSnapshot | null> {
    const generation = await this.currentGeneration();
    if (generation === null) return null;
    const genDir = path.join(this.storeDir, GENERATION_PREFIX + generation);
    const storePath = path.join(genDir, STORE_FILE);
    const hashesPath = path.join(genDir, HASHES_FILE);
    if (!fsSync.existsSync(storePath) || !fsSync.existsSync(hashesPath)) {
      console.error(`[RAG] Incomplete index artifacts in ${genDir}. Performing cold rebuild.`);
      return null;
    }

    const store = await this.readJson(storePath);
    const hashes = await this.readJson(hashesPath);

    if (store.generation !== generation || hashes.generation !== generation) {
      console.error(`[RAG] Index artifacts in ${genDir} do not match ${CURRENT_FILE}. Performing cold rebuild.`);
      return null;
    }

    const meta = store.meta;
    if (
      !isRecord(meta) ||
      typeof meta.modelName !== "string" ||
      typeof meta.chunkSize !== "number" ||
      typeof meta.chunkOverlap !== "number" ||
      !(meta.dimension === null || typeof meta.dimension === "number")
    ) {
      throw new StoreCorruptError(storePath, "missing or malformed meta");
    }
    const dimension = meta.dimension;

    if (!Array.isArray(store.chunks)) throw new StoreCorruptError(storePath, "chunks is not an array");
    const rows: unknown[] = store.chunks;
    const chunks: PersistedChunk[] = [];
    for (const [i, row] of rows.entries()) {
      if (
        !isRecord(row) ||
        typeof row.path !== "string" ||
        typeof row.chunk !== "number" ||
        typeof row.text !== "string" ||
        typeof row.deleted !== "boolean" ||
        typeof row.emb !== "string"
      ) {
        throw new StoreCorruptError(storePath, `malformed chunk row ${i}`);
      }
      const emb = decodeVector(row.emb);
      if (!emb || emb.length !== dimension) {
        throw new StoreCorruptError(storePath, `bad embedding in chunk row ${i}`);
      }
      chunks.push({ path: row.path, chunkIndex: row.chunk, text: row.text, deleted: row.deleted, emb });
    }

    if (!isRecord(hashes.hashes)) throw new StoreCorruptError(hashesPath, "hashes is not an object");
    const fileHashes: Record<string, string> = {};
    for (const [p, h] of Object.entries(hashes.hashes)) {
      if (typeof h !== "string") throw new StoreCorruptError(hashesPath, `bad hash for ${p}`);
      fileHashes[p] = h;
    }

    console.error(`[RAG] Loaded persisted index: ${chunks.length} chunk rows, ${Object.keys(fileHashes).length} files.`);
    if (this.verbose) console.error(`[RAG][verbose] Loaded from ${this.storeDir}`);
    return {
      profile: { modelName: meta.modelName, chunkSize: meta.chunkSize, chunkOverlap: meta.chunkOverlap },
      dimension,
      chunks,
      fileHashes,
    };
  }

  /**
   * Persist both artifacts into a new generation and make it live. I/O errors
   * before the pointer swap propagate and leave the previous generation live.
   */
  public async save(snapshot: StoreSnapshot): Promise<void> {
    const generation = randomUUID();
    const genDir = path.join(this.storeDir, GENERATION_PREFIX + generation);
    await fs.mkdir(genDir, { recursive: true });
    const storeOut = {
      version: FORMAT_VERSION,
      generation,
      meta: {
        ...snapshot.profile,
        dimension: snapshot.dimension,
        savedAt: new Date().toISOString(),
        embEncoding: "f32-base64",
      },
      chunks: snapshot.chunks.map((c) => ({
        path: c.path,
        chunk: c.chunkIndex,
        text: c.text,
        deleted: c.deleted,
        emb: encodeVector(c.emb),
      })),
    };
    const hashesOut = { version: FORMAT_VERSION, generation, hashes: snapshot.fileHashes };

    await fs.writeFile(path.join(genDir, STORE_FILE), JSON.stringify(storeOut));
    await fs.writeFile(path.join(genDir, HASHES_FILE), JSON.stringify(hashesOut));
    const pointer = path.join(this.storeDir, CURRENT_FILE);
    await fs.writeFile(`${pointer}.tmp`, `${generation}\n`);
    await fs.rename(`${pointer}.tmp`, pointer);
    if (this.verbose) console.error(`[RAG][verbose] Persisted index generation ${generation} to ${this.storeDir}`);

    await this.pruneGenerations(generation).catch((e: unknown) =>
      console.error(`[RAG] Could not remove old index generations in ${this.storeDir}:`, e),
    );
  }

  private async pruneGenerations(keep: string): Promise<void> {
    const entries = await fs.readdir(this.storeDir);
    const stale = entries.filter((name) => name.startsWith(GENERATION_PREFIX) && name !== GENERATION_PREFIX + keep);
    await Promise.all(stale.map((name) => fs.rm(path.join(this.storeDir, name), { recursive: true, force: true })));
  }

  private async readJson(file: string): Promise<JsonRecord> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.readFile(file, "utf8"));
    } catch (e) {
      throw new StoreCorruptError(file, e instanceof Error ? e.message : String(e));
    }
    if (!isRecord(parsed)) throw new StoreCorruptError(file, "not a JSON object");
    return parsed;
  }
}
