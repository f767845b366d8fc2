import { embed, type EmbeddingModel } from "ai";
import { createOllama } from "ollama-ai-provider-v2";
import type { Config } from "./config";
import { normalizeOllamaBaseUrl } from "./generator";

/**
 * Text → vector capability. The same instance must embed chunks at build time
 * and questions at query time; two different functions would silently break
 * the similarity geometry.
 */
export interface EmbeddingProvider {
  /** Model identifier recorded with a persisted index. */
  readonly modelName: string;
  /** Output dimensionality when known up front (checked against a loaded index). */
  readonly dimensions?: number;
  embed(text: string): Promise<Float32Array>;
}

/** Error thrown when the model returns a vector of another size than declared. */
export class EmbeddingDimensionError extends Error {
  constructor(modelName: string, expected: number, actual: number) {
    super(`Embedding model '${modelName}' returned ${actual} dimensions, expected ${expected}`);
    this.name = "EmbeddingDimensionError";
  }
}

export interface OllamaEmbeddingsOptions {
  model: string;
  baseUrl: string;
  /** Declared output size; unset when the model's size is not configured. */
  dimensions?: number;
}

/** Embeddings served by an Ollama host through the AI SDK. */
export class OllamaEmbeddings implements EmbeddingProvider {
  public readonly modelName: string;
  public readonly dimensions?: number;
  private readonly model: EmbeddingModel<string>;

  public constructor(opts: OllamaEmbeddingsOptions) {
    this.modelName = opts.model;
    this.dimensions = opts.dimensions;
    const client = createOllama({ baseURL: normalizeOllamaBaseUrl(opts.baseUrl) });
    this.model = client.textEmbeddingModel(opts.model);
  }

  /** @throws {EmbeddingDimensionError} If the vector size differs from the declared one. */
  public async embed(text: string): Promise<Float32Array> {
    const result = await embed({ model: this.model, value: text, maxRetries: 0 });
    const vector = Float32Array.from(result.embedding);
    if (this.dimensions !== undefined && vector.length !== this.dimensions) {
      throw new EmbeddingDimensionError(this.modelName, this.dimensions, vector.length);
    }
    return vector;
  }
}

/** Construct the embedding backend selected by configuration. */
export function createEmbeddingProvider(config: Config): EmbeddingProvider {
  return new OllamaEmbeddings({
    model: config.EMBEDDING_MODEL,
    baseUrl: config.OLLAMA_BASE_URL,
    dimensions: config.EMBEDDING_DIMENSIONS,
  });
}
