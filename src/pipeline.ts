/**
 * Start-up and per-question entry points of the question-answering pipeline.
 *
 * Start-up is a single decision made once per process:
 *
 *   decideStartup()  ──► can-load     ──► VectorIndex.load   (no embedding calls)
 *                    └─► needs-build  ──► read → chunk → embed → VectorIndex.build
 *
 * Either branch ends in an immutable {@link Ready} handle that every question
 * is answered against, so there is no way to ask before the index exists.
 */
import fs from "node:fs/promises";
import { Chunker } from "./chunker";
import type { Config } from "./config";
import type { EmbeddingProvider } from "./embeddings";
import { QueryError, RagError, RetrievalError, SetupError, SynthesisError } from "./errors";
import type { TextGenerator } from "./generator";
import { Persistence } from "./persistence";
import { Retriever } from "./retriever";
import type { StatusManager } from "./status";
import { AnswerSynthesizer } from "./synthesizer";
import { err, ok, type Document, type IndexEntry, type Result } from "./types";
import { VectorIndex } from "./vector-index";

/** The only two reachable start-up states. */
export type StartupPlan =
  | { readonly kind: "needs-build"; readonly documentPath: string; readonly location: string }
  | { readonly kind: "can-load"; readonly location: string };

export interface PipelineOptions {
  documentPath: string;
  indexLocation: string;
  chunkSize: number;
  chunkOverlap: number;
  separator: string;
  /** Chunks handed to the synthesizer per question. */
  topK: number;
  verbose?: boolean;
}

export interface PipelineDeps {
  embeddings: EmbeddingProvider;
  generator: TextGenerator;
  /** Progress sink; nothing is recorded when omitted. */
  status?: StatusManager;
}

/** Everything a question needs, fixed for the rest of the process. */
export interface Ready {
  readonly index: VectorIndex;
  readonly retriever: Retriever;
  readonly synthesizer: AnswerSynthesizer;
  readonly topK: number;
  readonly origin: "loaded" | "built";
}

/** Map resolved configuration onto pipeline options. */
export function pipelineOptionsFromConfig(config: Config): PipelineOptions {
  return {
    documentPath: config.DOCUMENT_PATH,
    indexLocation: config.INDEX_STORE_PATH,
    chunkSize: config.CHUNK_SIZE,
    chunkOverlap: config.CHUNK_OVERLAP,
    separator: config.CHUNK_SEPARATOR,
    topK: config.TOP_K,
    verbose: config.VERBOSE,
  };
}

/** Check the index location once: a non-empty directory means a prior run persisted an index. */
export async function decideStartup(documentPath: string, location: string): Promise<StartupPlan> {
  const store = new Persistence(location);
  if (await store.hasStoredIndex()) return { kind: "can-load", location };
  return { kind: "needs-build", documentPath, location };
}

/** Read the source document as UTF-8. */
export async function readDocument(documentPath: string): Promise<Document> {
  try {
    const content = await fs.readFile(documentPath, "utf8");
    return { path: documentPath, content };
  } catch (e) {
    throw new SetupError(`Cannot read document ${documentPath}`, { cause: e });
  }
}

async function buildIndex(
  opts: PipelineOptions,
  deps: PipelineDeps,
  store: Persistence,
): Promise<VectorIndex> {
  const { embeddings, status } = deps;
  const doc = await readDocument(opts.documentPath);
  const chunker = new Chunker({
    chunkSize: opts.chunkSize,
    chunkOverlap: opts.chunkOverlap,
    separator: opts.separator,
    verbose: opts.verbose,
  });
  const chunks = chunker.split(doc);
  if (chunks.length === 0) throw new SetupError(`Document ${doc.path} is empty; nothing to index`);
  console.error(`[RAG] Created ${chunks.length} chunks. Generating embeddings...`);
  status?.setChunksTotal(chunks.length);

  const entries: IndexEntry[] = [];
  for (let i = 0; i < chunks.length; i++) {
    if (opts.verbose && i % 50 === 0) {
      const pct = ((i / chunks.length) * 100).toFixed(1);
      console.error(`[RAG][verbose] Embedding progress: ${i}/${chunks.length} (${pct}%)`);
    }
    const c = chunks[i];
    const vector = await embeddings.embed(c.text);
    entries.push({ id: c.id, position: c.position, offset: c.offset, text: c.text, vector });
    status?.incEmbedded();
  }
  console.error(`[RAG] Embeddings ready.`);

  return VectorIndex.build(entries, store, {
    modelName: embeddings.modelName,
    chunkSize: chunker.chunkSize,
    chunkOverlap: chunker.chunkOverlap,
    separator: chunker.separator,
    documentPath: doc.path,
  });
}

/**
 * Build or load the index and configure the synthesizer.
 *
 * @returns A ready handle, or the SetupError that stopped initialization
 *          (index build/load failures are attached as the cause).
 */
export async function initialize(opts: PipelineOptions, deps: PipelineDeps): Promise<Result<Ready, SetupError>> {
  try {
    const plan = await decideStartup(opts.documentPath, opts.indexLocation);
    const store = new Persistence(plan.location, opts.verbose);
    let index: VectorIndex;
    if (plan.kind === "can-load") {
      console.error(`[RAG] Loading existing index from ${plan.location}`);
      index = await VectorIndex.load(store, {
        modelName: deps.embeddings.modelName,
        dimensions: deps.embeddings.dimensions,
      });
      deps.status?.setChunksTotal(index.size);
    } else {
      console.error(`[RAG] No index at ${plan.location}; processing ${plan.documentPath} for the first time`);
      index = await buildIndex(opts, deps, store);
    }
    const origin = plan.kind === "can-load" ? "loaded" : "built";
    deps.status?.markReady(origin);
    return ok({
      index,
      retriever: new Retriever(deps.embeddings, index),
      synthesizer: new AnswerSynthesizer(deps.generator),
      topK: opts.topK,
      origin,
    });
  } catch (e) {
    if (e instanceof SetupError) return err(e);
    const message = e instanceof RagError ? e.message : "Initialization failed";
    return err(new SetupError(message, { cause: e }));
  }
}

/**
 * Answer one question against a ready pipeline. Failures come back as values
 * so the caller can report them and keep going.
 */
export async function answer(ready: Ready, question: string): Promise<Result<string, QueryError>> {
  const q = question.trim();
  if (!q) return err(new QueryError("Question is empty"));
  let context: string[];
  try {
    context = await ready.retriever.retrieve(q, ready.topK);
  } catch (e) {
    return err(e instanceof RetrievalError ? e : new RetrievalError("Retrieval failed", { cause: e }));
  }
  try {
    return ok(await ready.synthesizer.synthesize(q, context));
  } catch (e) {
    return err(e instanceof SynthesisError ? e : new SynthesisError("Answer generation failed", { cause: e }));
  }
}
