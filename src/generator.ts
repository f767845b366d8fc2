import { generateText, type LanguageModel } from "ai";
import { createOllama } from "ollama-ai-provider-v2";

/** Prompt → text capability, bound to one model at a fixed temperature. */
export interface TextGenerator {
  readonly modelName: string;
  generate(prompt: string): Promise<string>;
}

export interface OllamaGeneratorOptions {
  model: string;
  baseUrl: string;
  temperature: number;
  /** Upper bound for a single generation call. */
  timeoutMs: number;
}

/**
 * Normalize an Ollama base URL for ollama-ai-provider-v2, which expects the
 * `/api` suffix (e.g. http://localhost:11434/api).
 */
export function normalizeOllamaBaseUrl(baseUrl: string): string {
  // Remove trailing slashes and /v1 suffix if present
  let normalized = baseUrl.replace(/\/v1\/?$/, "").replace(/\/+$/, "");
  if (!normalized.endsWith("/api")) {
    normalized = `${normalized}/api`;
  }
  return normalized;
}

/** Text generation against a local Ollama model through the AI SDK. */
export class OllamaGenerator implements TextGenerator {
  public readonly modelName: string;
  private readonly model: LanguageModel;
  private readonly temperature: number;
  private readonly timeoutMs: number;

  public constructor(opts: OllamaGeneratorOptions) {
    this.modelName = opts.model;
    this.temperature = opts.temperature;
    this.timeoutMs = opts.timeoutMs;
    const client = createOllama({ baseURL: normalizeOllamaBaseUrl(opts.baseUrl) });
    this.model = client(opts.model);
  }

  public async generate(prompt: string): Promise<string> {
    const result = await generateText({
      model: this.model,
      prompt,
      temperature: this.temperature,
      maxRetries: 0,
      abortSignal: AbortSignal.timeout(this.timeoutMs),
    });
    return result.text;
  }
}
