/**
 * Error taxonomy.
 *
 * SetupError (fatal, initialization never reaches ready):
 *   - document missing / empty, embedding capability failure
 *   - IndexBuildError / IndexLoadError as the cause
 *
 * QueryError (recovered per question, session continues):
 *   - RetrievalError: index not initialized or incompatible query vector
 *   - SynthesisError: generative model call failed or timed out
 */

export type RagErrorCode =
  | "SETUP_FAILED"
  | "INDEX_BUILD_FAILED"
  | "INDEX_LOAD_FAILED"
  | "QUERY_FAILED"
  | "RETRIEVAL_FAILED"
  | "SYNTHESIS_FAILED";

/** Base class carrying a stable machine-readable code. */
export class RagError extends Error {
  public readonly code: RagErrorCode;

  public constructor(code: RagErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = "RagError";
  }
}

export class SetupError extends RagError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("SETUP_FAILED", message, options);
    this.name = "SetupError";
  }
}

/** Thrown by VectorIndex.build for empty / inconsistent entries or a failed persist. */
export class IndexBuildError extends RagError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("INDEX_BUILD_FAILED", message, options);
    this.name = "IndexBuildError";
  }
}

/** Thrown by VectorIndex.load when the persisted state is corrupt or incompatible. */
export class IndexLoadError extends RagError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("INDEX_LOAD_FAILED", message, options);
    this.name = "IndexLoadError";
  }
}

export class QueryError extends RagError {
  public constructor(message: string, options?: { cause?: unknown }, code: RagErrorCode = "QUERY_FAILED") {
    super(code, message, options);
    this.name = "QueryError";
  }
}

export class RetrievalError extends QueryError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options, "RETRIEVAL_FAILED");
    this.name = "RetrievalError";
  }
}

export class SynthesisError extends QueryError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options, "SYNTHESIS_FAILED");
    this.name = "SynthesisError";
  }
}

/** Render an unknown thrown value as a one-line message. */
export function describeError(e: unknown): string {
  if (e instanceof Error) {
    const cause = e.cause instanceof Error ? `: ${e.cause.message}` : "";
    return `${e.message}${cause}`;
  }
  return String(e);
}
