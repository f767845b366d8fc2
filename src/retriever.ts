import type { EmbeddingProvider } from "./embeddings";
import { RetrievalError } from "./errors";
import type { SearchHit } from "./types";
import type { VectorIndex } from "./vector-index";

/**
 * Embeds a question with the build-time provider and looks it up in the index.
 */
export class Retriever {
  public constructor(
    private readonly embeddings: EmbeddingProvider,
    private readonly index: VectorIndex | null,
  ) {}

  /** Top-k hits with their similarity scores. */
  public async retrieveScored(question: string, k: number): Promise<SearchHit[]> {
    if (!this.index) throw new RetrievalError("Vector index is not initialized");
    let query: Float32Array;
    try {
      query = await this.embeddings.embed(question);
    } catch (e) {
      throw new RetrievalError("Failed to embed question", { cause: e });
    }
    return this.index.search(query, k);
  }

  /** Top-k chunk texts, most similar first. */
  public async retrieve(question: string, k: number): Promise<string[]> {
    const hits = await this.retrieveScored(question, k);
    return hits.map((h) => h.entry.text);
  }
}
