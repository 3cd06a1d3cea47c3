import type { Embedder } from "./embeddings";
import { InvalidRequestError } from "./errors";
import type { VectorStore } from "./vector-store";

/** One retrieved chunk with its provenance. */
export interface RetrievalResult {
  text: string;
  filePath: string;
  chunkIndex: number;
  score: number;
}

/**
 * Query side of the index: embeds the query with the indexing embedder and
 * returns the top live chunks. Reads may run while an index run is active
 * and then see whatever the store holds at that moment.
 */
export class Retriever {
  public constructor(
    private readonly store: VectorStore,
    private readonly embedder: Embedder,
    private readonly defaultK = 5,
  ) {}

  /**
   * @returns At most `min(k, total_chunks)` results, by non-increasing score.
   * @throws {InvalidRequestError} Empty query or non-positive k.
   */
  public async retrieve(query: string, k = this.defaultK): Promise<RetrievalResult[]> {
    if (!query.trim()) throw new InvalidRequestError("Missing query");
    if (!Number.isFinite(k) || k < 1) throw new InvalidRequestError("k must be a positive number");
    // Nothing to rank against: skip the embedding call entirely.
    if (this.store.stats().total_chunks === 0) return [];
    const vector = await this.embedder.embed(query);
    return this.store.search(vector, Math.floor(k)).map((hit) => ({
      text: hit.chunk.text,
      filePath: hit.chunk.path,
      chunkIndex: hit.chunk.chunkIndex,
      score: hit.score,
    }));
  }
}
