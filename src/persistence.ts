import fs from "node:fs/promises";
import path from "node:path";
import { IndexLoadError } from "./errors";
import type { IndexEntry } from "./types";

/** File written inside the index directory. */
export const INDEX_FILE_NAME = "index.json";
export const STORE_VERSION = 1;

/**
 * Metadata stored alongside the entries so a later load can verify it is
 * compatible with the currently configured embedding model.
 */
export interface StoreMeta {
  modelName: string;
  dimensions: number;
  chunkSize: number;
  chunkOverlap: number;
  separator: string;
  documentPath: string;
  entryCount: number;
  savedAt: string;
  embEncoding: "f32-base64";
}

export interface StoredIndex {
  meta: StoreMeta;
  entries: IndexEntry[];
}

/** Expectations checked by {@link Persistence.load}. */
export interface LoadExpectations {
  modelName: string;
  /** Provider dimensionality when known; omitted means "trust the stored value". */
  dimensions?: number;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Float32 vector → base64 of its little-endian bytes. */
export function encodeVector(v: Float32Array): string {
  return Buffer.from(v.buffer, v.byteOffset, v.byteLength).toString("base64");
}

/** Inverse of {@link encodeVector}; null when the payload is not whole float32 values. */
export function decodeVector(b64: string): Float32Array | null {
  const buf = Buffer.from(b64, "base64");
  if (buf.byteLength === 0 || buf.byteLength % 4 !== 0) return null;
  const view = new Float32Array(buf.buffer, buf.byteOffset, buf.byteLength / 4);
  return new Float32Array(view); // copy
}

/**
 * Directory-backed store for the vector index. The location is a directory;
 * the index itself lives in `<location>/index.json`.
 */
export class Persistence {
  /** Directory holding the persisted index. */
  public readonly location: string;
  private readonly verbose: boolean;

  public constructor(location: string, verbose = false) {
    this.location = location;
    this.verbose = verbose;
  }

  /** Absolute path of the index file. */
  public get filePath(): string {
    return path.resolve(this.location, INDEX_FILE_NAME);
  }

  /**
   * Whether the location is an existing directory with at least one entry in
   * it. This is only the build-vs-load discriminant; validity is checked on load.
   */
  public async hasStoredIndex(): Promise<boolean> {
    try {
      const st = await fs.stat(this.location);
      if (!st.isDirectory()) return false;
      const names = await fs.readdir(this.location);
      return names.length > 0;
    } catch (e) {
      if (isRecord(e) && e.code === "ENOENT") return false;
      throw e;
    }
  }

  /**
   * Read and validate the persisted index.
   * @throws {IndexLoadError} On a missing, unparsable or incompatible store.
   */
  public async load(expected: LoadExpectations): Promise<StoredIndex> {
    const file = this.filePath;
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (e) {
      throw new IndexLoadError(`Cannot read persisted index at ${file}`, { cause: e });
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new IndexLoadError(`Persisted index at ${file} is not valid JSON`, { cause: e });
    }
    if (!isRecord(parsed) || !Array.isArray(parsed.entries) || !isRecord(parsed.meta)) {
      throw new IndexLoadError(`Persisted index at ${file} has an unrecognized layout`);
    }
    if (parsed.version !== STORE_VERSION) {
      throw new IndexLoadError(`Unsupported persisted index version: ${String(parsed.version)}`);
    }

    const meta = Persistence.readMeta(parsed.meta);
    if (!meta) throw new IndexLoadError(`Persisted index at ${file} has invalid metadata`);
    if (meta.modelName !== expected.modelName) {
      throw new IndexLoadError(
        `Persisted index was built with embedding model '${meta.modelName}', configured model is '${expected.modelName}'`,
      );
    }
    if (expected.dimensions !== undefined && meta.dimensions !== expected.dimensions) {
      throw new IndexLoadError(
        `Persisted index dimensionality ${meta.dimensions} does not match embedding provider (${expected.dimensions})`,
      );
    }

    const entries: IndexEntry[] = [];
    parsed.entries.forEach((d: unknown, i: number) => {
      if (!isRecord(d)) throw new IndexLoadError(`Entry #${i} is not an object`);
      const { id, position, offset, text, emb } = d;
      if (
        typeof id !== "string" ||
        typeof position !== "number" ||
        typeof offset !== "number" ||
        typeof text !== "string" ||
        typeof emb !== "string"
      ) {
        throw new IndexLoadError(`Entry #${i} is missing required fields`);
      }
      const vector = decodeVector(emb);
      if (!vector || vector.length !== meta.dimensions) {
        throw new IndexLoadError(
          `Entry #${i} has a vector of length ${vector?.length ?? 0}, expected ${meta.dimensions}`,
        );
      }
      entries.push({ id, position, offset, text, vector });
    });
    if (entries.length === 0) throw new IndexLoadError(`Persisted index at ${file} holds no entries`);

    console.error(`[RAG] Loaded persisted index: ${entries.length} chunks.`);
    if (this.verbose) console.error(`[RAG][verbose] Loaded from ${file}`);
    return { meta, entries };
  }

  /** Persist the index (creating the directory). Write errors propagate to the caller. */
  public async save(meta: Omit<StoreMeta, "savedAt" | "embEncoding" | "entryCount">, entries: readonly IndexEntry[]): Promise<void> {
    const out = {
      version: STORE_VERSION,
      meta: {
        ...meta,
        entryCount: entries.length,
        savedAt: new Date().toISOString(),
        embEncoding: "f32-base64",
      } satisfies StoreMeta,
      entries: entries.map((e) => ({
        id: e.id,
        position: e.position,
        offset: e.offset,
        text: e.text,
        emb: encodeVector(e.vector),
      })),
    };
    await fs.mkdir(this.location, { recursive: true });
    // Temp file + rename: index.json is either the previous or the new index, never partial.
    const tmp = `${this.filePath}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(out));
    await fs.rename(tmp, this.filePath);
    if (this.verbose) console.error(`[RAG][verbose] Persisted index to ${this.filePath}`);
  }

  private static readMeta(m: Record<string, unknown>): StoreMeta | null {
    const { modelName, dimensions, chunkSize, chunkOverlap, separator, documentPath, entryCount, savedAt } = m;
    if (
      typeof modelName !== "string" ||
      typeof dimensions !== "number" ||
      !Number.isInteger(dimensions) ||
      dimensions <= 0 ||
      typeof chunkSize !== "number" ||
      typeof chunkOverlap !== "number" ||
      typeof separator !== "string" ||
      typeof documentPath !== "string" ||
      typeof entryCount !== "number" ||
      typeof savedAt !== "string" ||
      m.embEncoding !== "f32-base64"
    ) {
      return null;
    }
    return {
      modelName,
      dimensions,
      chunkSize,
      chunkOverlap,
      separator,
      documentPath,
      entryCount,
      savedAt,
      embEncoding: "f32-base64",
    };
  }
}
