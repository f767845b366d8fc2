import { describe, it, expect, vi } from "vitest";
import { getConfig } from "./config";
import { EmbeddingDimensionError, OllamaEmbeddings, createEmbeddingProvider } from "./embeddings";

vi.mock("ai", async (importOriginal) => ({
  ...(await importOriginal<typeof import("ai")>()),
  embed: vi.fn(async () => ({ embedding: [0.5, 0.25, 0.125] })),
}));

describe("createEmbeddingProvider", () => {
  it("carries the configured model and declared size", () => {
    const provider = createEmbeddingProvider(
      getConfig({ EMBEDDING_MODEL: "nomic-embed-text", EMBEDDING_DIMENSIONS: "768" }),
    );
    expect(provider.modelName).toBe("nomic-embed-text");
    expect(provider.dimensions).toBe(768);
  });

  it("declares no size unless configured", () => {
    expect(createEmbeddingProvider(getConfig({})).dimensions).toBeUndefined();
  });
});

describe("OllamaEmbeddings", () => {
  it("returns the model's vector as float32", async () => {
    const provider = new OllamaEmbeddings({ model: "mistral", baseUrl: "http://localhost:11434", dimensions: 3 });
    expect(Array.from(await provider.embed("text"))).toEqual([0.5, 0.25, 0.125]);
  });

  it("rejects a vector of another size than declared", async () => {
    const provider = new OllamaEmbeddings({ model: "mistral", baseUrl: "http://localhost:11434", dimensions: 4 });
    await expect(provider.embed("text")).rejects.toBeInstanceOf(EmbeddingDimensionError);
    await expect(provider.embed("text")).rejects.toThrow(
      "Embedding model 'mistral' returned 3 dimensions, expected 4",
    );
  });
});
