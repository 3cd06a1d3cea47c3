import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { EmbedDevice, Embedder } from "../embeddings";
import type { ProgressEvent } from "../events";
import type { GenerationClient, GenerationRequest } from "../generation";

export const FAKE_DIM = 64;

/** FNV-1a over UTF-16 code units. */
function bucket(token: string, dim: number): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    h ^= token.charCodeAt(i);
    h = Math.imul(h, 0x01000193) >>> 0;
  }
  return h % dim;
}

/** Bag of lower-cased word tokens hashed into `dim` counters. */
export function bagOfWords(text: string, dim = FAKE_DIM): Float32Array {
  const v = new Float32Array(dim);
  for (const token of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) v[bucket(token, dim)] += 1;
  return v;
}

export interface FakeEmbedderOptions {
  device?: EmbedDevice;
  /** Any batch containing a matching text fails. */
  failOn?: (text: string) => boolean;
  /** Batches larger than this fail (single texts still succeed). */
  failBatchesLargerThan?: number;
}

/** Deterministic in-process embedder; records the size of every batch. */
export class FakeEmbedder implements Embedder {
  public readonly device: EmbedDevice;
  public readonly batches: number[] = [];
  private readonly opts: FakeEmbedderOptions;

  public constructor(opts: FakeEmbedderOptions = {}) {
    this.device = opts.device ?? "cpu";
    this.opts = opts;
  }

  public getModelName(): string {
    return "fake-bow";
  }

  public async embed(text: string): Promise<Float32Array> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  public async embedBatch(texts: readonly string[]): Promise<Float32Array[]> {
    this.batches.push(texts.length);
    const { failOn, failBatchesLargerThan } = this.opts;
    if (failOn && texts.some(failOn)) throw new Error("backend down");
    if (failBatchesLargerThan !== undefined && texts.length > failBatchesLargerThan) {
      throw new Error("batch too large");
    }
    return texts.map((t) => bagOfWords(t));
  }
}

/** Streams fixed fragments; optionally throws before fragment `failAt`. */
export class FakeGenerator implements GenerationClient {
  public readonly requests: GenerationRequest[] = [];

  public constructor(
    private readonly fragments: string[],
    private readonly failAt?: number,
  ) {}

  public async *stream(request: GenerationRequest): AsyncIterable<string> {
    this.requests.push(request);
    for (const [i, fragment] of this.fragments.entries()) {
      if (i === this.failAt) throw new Error("upstream 529");
      yield fragment;
    }
    if (this.failAt === this.fragments.length) throw new Error("upstream 529");
  }
}

/** Fresh directory under the OS temp dir, returned as its canonical path. */
export async function makeTempDir(prefix: string): Promise<string> {
  return fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), prefix)));
}

export function collectEvents(): { events: ProgressEvent[]; sink: (e: ProgressEvent) => void } {
  const events: ProgressEvent[] = [];
  return { events, sink: (e) => void events.push(e) };
}
