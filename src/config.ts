import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Centralized single dotenv.config() call.
// Prefer the .env at the project root (one level above src/), else the default lookup in cwd.
(() => {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = path.dirname(__filename);
    const rootEnv = path.resolve(__dirname, "../.env");
    if (fsSync.existsSync(rootEnv)) {
      dotenv.config({ path: rootEnv });
      return;
    }
  } catch (e) {
    console.error("[RAG] Could not resolve project .env, using default lookup:", e);
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export type RunMode = "cli" | "stdio" | "http";

export interface Config {
  DOCUMENT_PATH: string;
  INDEX_STORE_PATH: string;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  CHUNK_SEPARATOR: string;
  TOP_K: number;
  EMBEDDING_MODEL: string;
  /** Declared embedding size; undefined when not configured. */
  EMBEDDING_DIMENSIONS: number | undefined;
  GENERATION_MODEL: string;
  GENERATION_TEMPERATURE: number;
  GENERATION_TIMEOUT_MS: number;
  OLLAMA_BASE_URL: string;
  VERBOSE: boolean;
  RAG_MODE: RunMode;
}

export const DEFAULT_OLLAMA_MODEL = "mistral";
export const OLLAMA_DEFAULT_BASE = "http://localhost:11434";

/** Parse a bounded integer, falling back on anything missing or malformed. */
function intVar(raw: string | undefined, fallback: number, min: number, max: number): number {
  const v = raw?.trim();
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n >= min ? Math.min(max, Math.floor(n)) : fallback;
}

/** Tolerant truthy parsing ("1", "true", "yes", "on"). */
function boolVar(raw: string | undefined): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

/** `\n`, `\t` and `\r` written literally in .env files become the real characters. */
function unescapeSeparator(raw: string): string {
  return raw.replace(/\\([ntr])/g, (_m, c: string) => (c === "n" ? "\n" : c === "t" ? "\t" : "\r"));
}

/**
 * Resolve the runtime configuration from environment variables. Everything is
 * fixed here at start-up; nothing is reconfigured while the process runs.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const DOCUMENT_PATH = env.DOCUMENT_PATH?.trim() || "speech.txt";

  // Directory holding the persisted index; its presence decides build vs. load.
  const INDEX_STORE_PATH = env.INDEX_STORE_PATH?.trim() || "./index_store";

  // Chunk size impacts recall (too large) vs. precision (too small).
  const CHUNK_SIZE = intVar(env.CHUNK_SIZE, 500, 1, 8000);
  const CHUNK_OVERLAP = intVar(env.CHUNK_OVERLAP, 100, 0, 4000);

  const CHUNK_SEPARATOR = env.CHUNK_SEPARATOR === undefined ? "\n" : unescapeSeparator(env.CHUNK_SEPARATOR);

  const TOP_K = intVar(env.TOP_K, 1, 1, 50);

  // Embedding and generation default to the same Ollama model.
  const EMBEDDING_MODEL = env.EMBEDDING_MODEL?.trim() || DEFAULT_OLLAMA_MODEL;

  // Checked against a persisted index before it is used; 0 or unset skips the check.
  const EMBEDDING_DIMENSIONS = (() => {
    const n = intVar(env.EMBEDDING_DIMENSIONS, 0, 0, 65_536);
    return n > 0 ? n : undefined;
  })();

  const GENERATION_MODEL = env.GENERATION_MODEL?.trim() || DEFAULT_OLLAMA_MODEL;

  // Low temperature favours faithfulness to the excerpt over creativity.
  const GENERATION_TEMPERATURE = (() => {
    const raw = env.GENERATION_TEMPERATURE?.trim();
    if (!raw) return 0.1;
    const n = Number(raw);
    return Number.isFinite(n) && n >= 0 ? Math.min(2, n) : 0.1;
  })();

  const GENERATION_TIMEOUT_MS = intVar(env.GENERATION_TIMEOUT_MS, 120_000, 1, 3_600_000);

  const OLLAMA_BASE_URL = env.OLLAMA_BASE_URL?.trim() || OLLAMA_DEFAULT_BASE;

  const VERBOSE = boolVar(env.VERBOSE);

  const RAG_MODE: RunMode = (() => {
    const v = (env.RAG_MODE ?? "").trim().toLowerCase();
    if (v === "stdio") return "stdio";
    if (v === "http" || v === "streamable-http") return "http";
    return "cli";
  })();

  return {
    DOCUMENT_PATH,
    INDEX_STORE_PATH,
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    CHUNK_SEPARATOR,
    TOP_K,
    EMBEDDING_MODEL,
    EMBEDDING_DIMENSIONS,
    GENERATION_MODEL,
    GENERATION_TEMPERATURE,
    GENERATION_TIMEOUT_MS,
    OLLAMA_BASE_URL,
    VERBOSE,
    RAG_MODE,
  };
}
