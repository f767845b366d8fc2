import { RetrievalError, type QueryError, type SetupError } from "./errors";
import { answer, initialize, type PipelineDeps, type PipelineOptions, type Ready } from "./pipeline";
import { statusManager, type StatusManager } from "./status";
import { err, type Result } from "./types";

/**
 * Question-handling boundary shared by the CLI and MCP surfaces. Holds the
 * ready handle once start-up succeeded; every question is answered in
 * isolation, so a failed one never ends the session.
 */
export class QaSession {
  private ready: Ready | null = null;
  private readonly status: StatusManager;

  public constructor(
    private readonly opts: PipelineOptions,
    private readonly deps: PipelineDeps,
  ) {
    this.status = deps.status ?? statusManager;
    this.status.setSources(opts.documentPath, opts.indexLocation);
    this.status.setModels(deps.embeddings.modelName, deps.generator.modelName);
  }

  /** Initialize once; later calls return the existing handle. */
  public async start(): Promise<Result<Ready, SetupError>> {
    if (this.ready) return { ok: true, value: this.ready };
    const result = await initialize(this.opts, { ...this.deps, status: this.status });
    if (result.ok) this.ready = result.value;
    return result;
  }

  public isReady(): boolean {
    return this.ready !== null;
  }

  /** The active handle, or null before a successful {@link start}. */
  public getReady(): Ready | null {
    return this.ready;
  }

  public async ask(question: string): Promise<Result<string, QueryError>> {
    if (!this.ready) {
      this.status.recordQuestion(false);
      return err(new RetrievalError("Vector index is not initialized; start the session first"));
    }
    const result = await answer(this.ready, question);
    this.status.recordQuestion(result.ok);
    if (!result.ok) console.error(`[RAG] Question failed (${result.error.code}): ${result.error.message}`);
    return result;
  }
}
