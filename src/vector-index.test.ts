import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { IndexBuildError, IndexLoadError, RetrievalError } from "./errors";
import { INDEX_FILE_NAME, Persistence, decodeVector, encodeVector } from "./persistence";
import { makeTempDir } from "./testing/stubs";
import type { IndexEntry } from "./types";
import { VectorIndex, type BuildMeta } from "./vector-index";

const meta: BuildMeta = {
  modelName: "test-model",
  chunkSize: 100,
  chunkOverlap: 20,
  separator: "\n",
  documentPath: "doc.txt",
};

function entry(id: string, position: number, values: number[]): IndexEntry {
  return { id, position, offset: position * 10, text: `text ${id}`, vector: Float32Array.from(values) };
}

const entries: IndexEntry[] = [
  entry("e0", 0, [1, 0]),
  entry("e1", 1, [0, 1]),
  entry("e2", 2, [1, 0]),
  entry("e3", 3, [0.6, 0.8]),
];

describe("VectorIndex", () => {
  let dir: string;
  let store: Persistence;

  beforeEach(async () => {
    dir = await makeTempDir();
    store = new Persistence(path.join(dir, "index"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("refuses to build from zero entries", async () => {
    await expect(VectorIndex.build([], store, meta)).rejects.toBeInstanceOf(IndexBuildError);
    expect(await store.hasStoredIndex()).toBe(false);
  });

  it("refuses entries of differing dimensionality", async () => {
    const mixed = [entry("a", 0, [1, 0]), entry("b", 1, [1, 0, 0])];
    await expect(VectorIndex.build(mixed, store, meta)).rejects.toThrow(
      "Entry b has dimensionality 3, expected 2",
    );
  });

  it("persists the index while building", async () => {
    const index = await VectorIndex.build(entries, store, meta);
    expect(index.size).toBe(4);
    expect(index.dimensions).toBe(2);
    const raw = JSON.parse(await fs.readFile(path.join(dir, "index", INDEX_FILE_NAME), "utf8"));
    expect(raw.version).toBe(1);
    expect(raw.meta.dimensions).toBe(2);
    expect(raw.meta.entryCount).toBe(4);
    expect(raw.entries.map((e: { id: string }) => e.id)).toEqual(["e0", "e1", "e2", "e3"]);
  });

  it("replaces the index file whole and leaves no temporary file behind", async () => {
    await VectorIndex.build(entries, store, meta);
    await VectorIndex.build(entries.slice(0, 2), store, meta);
    expect(await fs.readdir(path.join(dir, "index"))).toEqual([INDEX_FILE_NAME]);
    const reloaded = await VectorIndex.load(store, { modelName: "test-model" });
    expect(reloaded.size).toBe(2);
  });

  it("ranks by descending cosine similarity with ties in insertion order", async () => {
    const index = await VectorIndex.build(entries, store, meta);
    const hits = index.search(Float32Array.from([1, 0]), 10);
    expect(hits.map((h) => h.entry.id)).toEqual(["e0", "e2", "e3", "e1"]);
    expect(hits[0].score).toBeCloseTo(1, 6);
    expect(hits[2].score).toBeCloseTo(0.6, 5);
    expect(hits[3].score).toBeCloseTo(0, 6);
  });

  it("returns min(k, size) hits", async () => {
    const index = await VectorIndex.build(entries, store, meta);
    expect(index.search(Float32Array.from([1, 0]), 2).map((h) => h.entry.id)).toEqual(["e0", "e2"]);
    expect(index.search(Float32Array.from([0, 1]), 1).map((h) => h.entry.id)).toEqual(["e1"]);
    expect(index.search(Float32Array.from([0, 1]), 50)).toHaveLength(4);
  });

  it("rejects k below 1", async () => {
    const index = await VectorIndex.build(entries, store, meta);
    expect(() => index.search(Float32Array.from([1, 0]), 0)).toThrow(RangeError);
  });

  it("rejects a query of the wrong dimensionality", async () => {
    const index = await VectorIndex.build(entries, store, meta);
    expect(() => index.search(Float32Array.from([1, 0, 0]), 1)).toThrow(RetrievalError);
  });

  it("gives identical search results after persist and reload", async () => {
    const built = await VectorIndex.build(entries, store, meta);
    const loaded = await VectorIndex.load(store, { modelName: "test-model", dimensions: 2 });
    expect(loaded.getEntries()).toEqual(built.getEntries());
    const q = Float32Array.from([0.7, 0.3]);
    expect(loaded.search(q, 3)).toEqual(built.search(q, 3));
  });

  it("rejects a store written for another embedding model", async () => {
    await VectorIndex.build(entries, store, meta);
    await expect(VectorIndex.load(store, { modelName: "other-model" })).rejects.toBeInstanceOf(IndexLoadError);
  });

  it("rejects a store whose dimensionality differs from the provider", async () => {
    await VectorIndex.build(entries, store, meta);
    await expect(VectorIndex.load(store, { modelName: "test-model", dimensions: 384 })).rejects.toThrow(
      "Persisted index dimensionality 2 does not match embedding provider (384)",
    );
  });

  it("rejects a corrupt store", async () => {
    await fs.mkdir(store.location, { recursive: true });
    await fs.writeFile(store.filePath, "{not json");
    await expect(VectorIndex.load(store, { modelName: "test-model" })).rejects.toBeInstanceOf(IndexLoadError);
  });

  it("rejects a non-empty location without an index file", async () => {
    await fs.mkdir(store.location, { recursive: true });
    await fs.writeFile(path.join(store.location, "stray.txt"), "x");
    expect(await store.hasStoredIndex()).toBe(true);
    await expect(VectorIndex.load(store, { modelName: "test-model" })).rejects.toBeInstanceOf(IndexLoadError);
  });

  it("rejects entries whose vector length disagrees with the metadata", async () => {
    await VectorIndex.build(entries, store, meta);
    const raw = JSON.parse(await fs.readFile(store.filePath, "utf8"));
    raw.entries[1].emb = encodeVector(Float32Array.from([1, 2, 3]));
    await fs.writeFile(store.filePath, JSON.stringify(raw));
    await expect(VectorIndex.load(store, { modelName: "test-model" })).rejects.toThrow(
      "Entry #1 has a vector of length 3, expected 2",
    );
  });
});

describe("Persistence", () => {
  it("treats a missing or empty directory as no stored index", async () => {
    const dir = await makeTempDir();
    try {
      expect(await new Persistence(path.join(dir, "missing")).hasStoredIndex()).toBe(false);
      expect(await new Persistence(dir).hasStoredIndex()).toBe(false);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it("encodes vectors as base64 float32", () => {
    const v = Float32Array.from([0.5, -1.25, 3]);
    expect(Array.from(decodeVector(encodeVector(v)) ?? [])).toEqual([0.5, -1.25, 3]);
    expect(decodeVector("")).toBeNull();
    expect(decodeVector(Buffer.from([1, 2, 3]).toString("base64"))).toBeNull();
  });
});
