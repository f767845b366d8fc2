import fs from "node:fs/promises";
import type { Config } from "./config";

export interface PrerequisiteReport {
  ok: boolean;
  problems: string[];
}

interface OllamaTagsResponse {
  models?: Array<{ name?: string }>;
}

const DEFAULT_OLLAMA_TIMEOUT_MS = 10_000;

/**
 * List the model names an Ollama host has pulled.
 * @throws When the host cannot be reached or answers with a non-2xx status.
 */
export async function listOllamaModels(baseUrl: string, fetchImpl: typeof fetch = fetch): Promise<string[]> {
  const apiUrl = `${baseUrl.replace(/\/+$/, "").replace(/\/api$/, "")}/api/tags`;
  const response = await fetchImpl(apiUrl, {
    method: "GET",
    headers: { "Content-Type": "application/json" },
    signal: AbortSignal.timeout(DEFAULT_OLLAMA_TIMEOUT_MS),
  });
  if (!response.ok) throw new Error(`Ollama API error: ${response.status}`);
  const data = (await response.json()) as OllamaTagsResponse;
  return (data.models ?? []).map((m) => m.name ?? "").filter(Boolean);
}

/** `mistral` matches `mistral:latest`; a tagged name must match exactly. */
export function hasModel(available: readonly string[], wanted: string): boolean {
  return available.some((name) => name === wanted || (!wanted.includes(":") && name.split(":")[0] === wanted));
}

/**
 * Checks made before the core is initialized: the document exists, and the
 * Ollama host serves every Ollama model the configuration names.
 */
export async function checkPrerequisites(config: Config, fetchImpl: typeof fetch = fetch): Promise<PrerequisiteReport> {
  const problems: string[] = [];
  try {
    const st = await fs.stat(config.DOCUMENT_PATH);
    if (!st.isFile()) problems.push(`${config.DOCUMENT_PATH} is not a file`);
  } catch {
    problems.push(`${config.DOCUMENT_PATH} file not found`);
  }

  const wanted = [config.GENERATION_MODEL, config.EMBEDDING_MODEL];
  try {
    const available = await listOllamaModels(config.OLLAMA_BASE_URL, fetchImpl);
    for (const model of new Set(wanted)) {
      if (!hasModel(available, model)) problems.push(`${model} model not found. Please run: ollama pull ${model}`);
    }
  } catch (e) {
    problems.push(`Ollama not accessible at ${config.OLLAMA_BASE_URL}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return { ok: problems.length === 0, problems };
}
