/**
 * Shared data types used by the chunking, indexing and answering layers.
 */

/** Source document: read once at ingestion, never mutated afterwards. */
export interface Document {
  /** Path the content was read from. */
  readonly path: string;
  /** Full UTF-8 text content. */
  readonly content: string;
}

/**
 * A contiguous slice of a {@link Document}. Produced deterministically from
 * (content, chunkSize, chunkOverlap, separator).
 */
export interface Chunk {
  /** Stable id derived from the position (`chunk-<n>`). */
  readonly id: string;
  /** Back-reference to the source document path. */
  readonly documentPath: string;
  /** 0-based order within the document. */
  readonly position: number;
  /** Character offset of the chunk's first character in the document (-1 if not located). */
  readonly offset: number;
  /** Chunk text content. */
  readonly text: string;
}

/** Stored (text, vector) pair plus its opaque id and original order. */
export interface IndexEntry {
  readonly id: string;
  readonly position: number;
  readonly offset: number;
  readonly text: string;
  readonly vector: Float32Array;
}

/** One ranked search result. */
export interface SearchHit {
  readonly entry: IndexEntry;
  /** Cosine similarity in range [-1, 1]. */
  readonly score: number;
}

/** Value-or-error return used by the pipeline entry points. */
export type Result<T, E> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });
