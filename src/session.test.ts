import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { RetrievalError, SynthesisError } from "./errors";
import type { PipelineOptions } from "./pipeline";
import { QaSession } from "./session";
import { StatusManager } from "./status";
import { KeywordEmbeddings, REFERENCE_DOCUMENT, ScriptedGenerator, makeTempDir } from "./testing/stubs";

describe("QaSession", () => {
  let dir: string;
  let opts: PipelineOptions;

  beforeEach(async () => {
    dir = await makeTempDir();
    opts = {
      documentPath: path.join(dir, "speech.txt"),
      indexLocation: path.join(dir, "index_store"),
      chunkSize: 100,
      chunkOverlap: 20,
      separator: "\n",
      topK: 2,
    };
    await fs.writeFile(opts.documentPath, REFERENCE_DOCUMENT, "utf8");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("refuses questions before start", async () => {
    const status = new StatusManager();
    const session = new QaSession(opts, { embeddings: new KeywordEmbeddings(), generator: new ScriptedGenerator(), status });
    const result = await session.ask("anything?");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(RetrievalError);
    expect(status.getStatus().questions).toEqual({ answered: 0, failed: 1 });
  });

  it("survives a failed question and records both outcomes", async () => {
    const status = new StatusManager();
    const embeddings = new KeywordEmbeddings("session-model");
    const generator = new ScriptedGenerator(new Error("model crashed"), "recovered");
    const session = new QaSession(opts, { embeddings, generator, status });

    const started = await session.start();
    expect(started.ok).toBe(true);
    expect(session.isReady()).toBe(true);

    const first = await session.ask("What is the real remedy?");
    expect(first.ok).toBe(false);
    if (!first.ok) expect(first.error).toBeInstanceOf(SynthesisError);

    expect(await session.ask("What about the garden?")).toEqual({ ok: true, value: "recovered" });

    const s = status.getStatus();
    expect(s.ready).toBe(true);
    expect(s.origin).toBe("built");
    expect(s.embeddingModel).toBe("session-model");
    expect(s.generationModel).toBe("scripted-stub");
    expect(s.questions).toEqual({ answered: 1, failed: 1 });
  });

  it("passes top-k chunks to the model", async () => {
    const generator = new ScriptedGenerator("ok");
    const session = new QaSession(opts, { embeddings: new KeywordEmbeddings(), generator, status: new StatusManager() });
    await session.start();
    await session.ask("real remedy for caste");
    // k = 2: the remedy line first, then the caste garden line.
    expect(generator.prompts[0]).toContain(
      "EXCERPT FROM DOCUMENT:\nThe real remedy is to destroy the belief in the sanctity of the shastras.\n\nSocial reform is like gardening, and the caste garden needs patient and steady tending.\n",
    );
  });

  it("initializes only once", async () => {
    const embeddings = new KeywordEmbeddings();
    const session = new QaSession(opts, { embeddings, generator: new ScriptedGenerator(), status: new StatusManager() });
    const a = await session.start();
    const callsAfterFirst = embeddings.calls.length;
    const b = await session.start();
    expect(embeddings.calls).toHaveLength(callsAfterFirst);
    expect(a.ok && b.ok && a.value === b.value).toBe(true);
  });
});
