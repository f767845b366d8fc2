import { IndexBuildError, RetrievalError } from "./errors";
import { Persistence, type LoadExpectations, type StoreMeta } from "./persistence";
import type { IndexEntry, SearchHit } from "./types";

/**
 * Cosine similarity between two vectors. Length mismatch is handled by
 * comparing up to the shortest length.
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

/** Parameters recorded with a freshly built index. */
export type BuildMeta = Omit<StoreMeta, "savedAt" | "embEncoding" | "entryCount" | "dimensions">;

/**
 * In-memory (text, vector) store with cosine similarity search. Entries are
 * fixed once the index exists; a new index is either built (and persisted) or
 * loaded from a previous run.
 */
export class VectorIndex {
  private readonly entries: readonly IndexEntry[];
  /** Dimensionality shared by every stored vector. */
  public readonly dimensions: number;

  private constructor(entries: readonly IndexEntry[], dimensions: number) {
    this.entries = entries;
    this.dimensions = dimensions;
  }

  /**
   * Build a fresh index and persist it before returning.
   * @throws {IndexBuildError} If `entries` is empty, dimensionalities differ, or the write fails.
   */
  public static async build(entries: readonly IndexEntry[], store: Persistence, meta: BuildMeta): Promise<VectorIndex> {
    if (entries.length === 0) throw new IndexBuildError("Cannot build an index from zero entries");
    const dimensions = entries[0].vector.length;
    if (dimensions === 0) throw new IndexBuildError("Embedding vectors are empty");
    const odd = entries.find((e) => e.vector.length !== dimensions);
    if (odd) {
      throw new IndexBuildError(
        `Entry ${odd.id} has dimensionality ${odd.vector.length}, expected ${dimensions}`,
      );
    }
    const index = new VectorIndex([...entries], dimensions);
    try {
      await store.save({ ...meta, dimensions }, index.entries);
    } catch (e) {
      throw new IndexBuildError(`Failed to persist index to ${store.location}`, { cause: e });
    }
    return index;
  }

  /**
   * Reconstruct an index from persisted state without re-embedding anything.
   * @throws {IndexLoadError} Propagated from the store on corrupt / incompatible data.
   */
  public static async load(store: Persistence, expected: LoadExpectations): Promise<VectorIndex> {
    const { meta, entries } = await store.load(expected);
    return new VectorIndex(entries, meta.dimensions);
  }

  /** Number of stored entries. */
  public get size(): number {
    return this.entries.length;
  }

  /** Read-only view of all entries in insertion order. */
  public getEntries(): readonly IndexEntry[] {
    return this.entries;
  }

  /**
   * Rank entries by cosine similarity to `query`, highest first. Ties keep
   * insertion order (Array.prototype.sort is stable).
   *
   * @param k Maximum number of hits (>= 1); fewer are returned when the index is smaller.
   * @throws {RangeError} If `k` is not a positive integer.
   * @throws {RetrievalError} If the query dimensionality differs from the index.
   */
  public search(query: Float32Array, k: number): SearchHit[] {
    if (!Number.isInteger(k) || k < 1) throw new RangeError(`k must be a positive integer, got ${k}`);
    if (query.length !== this.dimensions) {
      throw new RetrievalError(
        `Query vector has dimensionality ${query.length}, index expects ${this.dimensions}`,
      );
    }
    const scored = this.entries.map((entry) => ({ entry, score: cosine(entry.vector, query) }));
    scored.sort((a, b) => b.score - a.score); // descending score
    return scored.slice(0, k);
  }
}
