import { DimensionMismatchError } from "./errors";

/** One candidate returned by {@link FlatIndex.search}. */
export interface IndexHit {
  /** Physical row position, assigned on add and never reused. */
  position: number;
  score: number;
}

/**
 * Compute cosine similarity between two Float32 vectors. Length mismatch is
 * handled by comparing up to the shortest length.
 *
 * @returns Cosine similarity in range [-1, 1]
 */
export function cosine(a: Float32Array, b: Float32Array): number {
  let dot = 0,
    na = 0,
    nb = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i],
      y = b[i];
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  return dot / (Math.sqrt(na) * Math.sqrt(nb) + 1e-10);
}

/**
 * Exhaustive (brute force) nearest-neighbour index over append-only rows.
 *
 * Rows cannot be removed or filtered; callers that need logical deletion keep
 * a parallel metadata table and post-filter the hits.
 */
export class FlatIndex {
  private readonly rows: Float32Array[] = [];
  private dim: number | null = null;

  /** Physical row count, deleted or not. */
  public get size(): number {
    return this.rows.length;
  }

  /** Dimension pinned by the first row ever added (null while empty). */
  public get dimension(): number | null {
    return this.dim;
  }

  /**
   * Append rows. The whole batch is rejected if any row disagrees with the
   * pinned dimension (or with the first row of the batch when still empty).
   *
   * @returns Position assigned to the first row of the batch.
   */
  public add(vectors: readonly Float32Array[]): number {
    const first = this.rows.length;
    if (!vectors.length) return first;
    const expected = this.dim ?? vectors[0].length;
    for (const v of vectors) {
      if (v.length !== expected) throw new DimensionMismatchError(expected, v.length);
    }
    this.dim = expected;
    for (const v of vectors) this.rows.push(v);
    return first;
  }

  /** Row at a physical position (undefined when out of range). */
  public row(position: number): Float32Array | undefined {
    return this.rows[position];
  }

  /**
   * Top `n` rows by cosine similarity, descending score, ties broken by
   * lower position so results are deterministic.
   */
  public search(query: Float32Array, n: number): IndexHit[] {
    if (n <= 0 || !this.rows.length) return [];
    const scored: IndexHit[] = this.rows.map((row, position) => ({
      position,
      score: cosine(row, query),
    }));
    scored.sort((a, b) => b.score - a.score || a.position - b.position);
    return scored.slice(0, n);
  }
}
