import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { Client, InMemoryTransport } from "./mcp-sdk";
import { createServer } from "./server";
import { QaSession } from "./session";
import { StatusManager } from "./status";
import { KeywordEmbeddings, REFERENCE_DOCUMENT, REFERENCE_LINES, ScriptedGenerator, makeTempDir } from "./testing/stubs";

function firstText(result: unknown): string {
  if (typeof result === "object" && result !== null && "content" in result && Array.isArray(result.content)) {
    const item: unknown = result.content[0];
    if (typeof item === "object" && item !== null && "text" in item && typeof item.text === "string") return item.text;
  }
  throw new Error("tool result has no text content");
}

describe("MCP server", () => {
  let dir: string;
  let client: Client;
  let status: StatusManager;

  beforeEach(async () => {
    dir = await makeTempDir();
    const documentPath = path.join(dir, "speech.txt");
    await fs.writeFile(documentPath, REFERENCE_DOCUMENT, "utf8");
    status = new StatusManager();
    const session = new QaSession(
      {
        documentPath,
        indexLocation: path.join(dir, "index_store"),
        chunkSize: 100,
        chunkOverlap: 20,
        separator: "\n",
        topK: 1,
      },
      { embeddings: new KeywordEmbeddings(), generator: new ScriptedGenerator(new Error("down"), "grounded answer"), status },
    );
    await session.start();

    const server = createServer(session, status, 1);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: "test-client", version: "0.0.0" });
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("lists the tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name)).toEqual(["ask_question", "rag_query", "index_status"]);
  });

  it("reports a failed question as a tool error and answers the next one", async () => {
    const failed = await client.callTool({ name: "ask_question", arguments: { question: "What is the remedy?" } });
    expect(failed.isError).toBe(true);
    expect(firstText(failed)).toBe("SynthesisError: Answer generation with 'scripted-stub' failed");

    const answered = await client.callTool({ name: "ask_question", arguments: { question: "What is the remedy?" } });
    expect(firstText(answered)).toBe("grounded answer");
  });

  it("returns scored matches for rag_query", async () => {
    const result = await client.callTool({
      name: "rag_query",
      arguments: { query: "real remedy for caste", top_k: 2 },
    });
    const { matches } = JSON.parse(firstText(result));
    expect(matches.map((m: { snippet: string }) => m.snippet)).toEqual([REFERENCE_LINES[1], REFERENCE_LINES[0]]);
    expect(matches[0]).toMatchObject({ id: "chunk-1", position: 1, offset: 88 });
  });

  it("exposes the status snapshot", async () => {
    const result = await client.callTool({ name: "index_status", arguments: {} });
    const snapshot = JSON.parse(firstText(result));
    expect(snapshot).toMatchObject({ ready: true, origin: "built", indexing: { chunksTotal: 3, chunksEmbedded: 3 } });
  });
});
