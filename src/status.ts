import { APP_VERSION } from "./config";

/** How the active index came to exist (or not yet). */
export type IndexOrigin = "uninitialized" | "loaded" | "built";

/**
 * Counters for the indexing pipeline. Monotonic, non-negative integers
 * updated in place.
 */
export interface IndexingStatus {
  /** Chunks produced from the document (or found in the loaded index). */
  chunksTotal: number;
  /** Chunks embedded during this process (stays 0 on the load path). */
  chunksEmbedded: number;
}

export interface QuestionStatus {
  answered: number;
  failed: number;
}

/**
 * Mutable in-memory snapshot of lifecycle + progress, exposed read-only via
 * `getStatus()` (and `/health` in HTTP mode).
 */
export interface ServerStatus {
  version: string;
  documentPath: string;
  indexLocation: string;
  embeddingModel: string;
  generationModel: string;
  /** Active surface: 'cli' | 'stdio' | 'http' | 'unknown'. */
  transport: string;
  /** True once the index is built or loaded and the synthesizer is configured. */
  ready: boolean;
  origin: IndexOrigin;
  startedAt: string;
  indexing: IndexingStatus;
  questions: QuestionStatus;
}

/** Class wrapper around mutable status state. */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      documentPath: initial?.documentPath ?? "",
      indexLocation: initial?.indexLocation ?? "",
      embeddingModel: initial?.embeddingModel ?? "",
      generationModel: initial?.generationModel ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      origin: initial?.origin ?? "uninitialized",
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      indexing: initial?.indexing ?? { chunksTotal: 0, chunksEmbedded: 0 },
      questions: initial?.questions ?? { answered: 0, failed: 0 },
    };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setSources(documentPath: string, indexLocation: string) {
    this.data.documentPath = documentPath;
    this.data.indexLocation = indexLocation;
  }

  public setModels(embeddingModel: string, generationModel: string) {
    this.data.embeddingModel = embeddingModel;
    this.data.generationModel = generationModel;
  }

  public setChunksTotal(chunks: number) {
    this.data.indexing.chunksTotal = chunks;
  }

  /** Increment the number of chunks that have embeddings generated. */
  public incEmbedded(count = 1) {
    this.data.indexing.chunksEmbedded += count;
  }

  /** Transition ready=false -> true, recording how the index was obtained. */
  public markReady(origin: Exclude<IndexOrigin, "uninitialized">) {
    this.data.origin = origin;
    this.data.ready = true;
  }

  public recordQuestion(succeeded: boolean) {
    if (succeeded) this.data.questions.answered++;
    else this.data.questions.failed++;
  }

  /** Access a live reference to current status (treat as read-only). */
  public getStatus(): ServerStatus {
    return this.data;
  }

  public toJSON() {
    return this.data;
  }
}

// Process-wide instance used by the session and the transports.
export const statusManager = new StatusManager();
