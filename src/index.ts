/**
 * Application entry point.
 *
 * High-level flow:
 * 1. Load environment configuration (.env via dotenv, see config.ts).
 * 2. Check prerequisites: document file present, Ollama serving the configured models.
 * 3. Create the embedding provider and the generator, both fixed for the process.
 * 4. Start the session: load the persisted index if INDEX_STORE_PATH already holds
 *    one, otherwise chunk + embed the document and persist the new index.
 * 5. Serve questions over the selected surface (RAG_MODE):
 *      - cli (default): interactive terminal loop.
 *      - stdio:         MCP server over stdio.
 *      - http:          MCP streamable HTTP with /health.
 *
 * Any failure before the session is ready is fatal and exits with status 1.
 */
import { getConfig, type Config } from "./config";
import { createEmbeddingProvider } from "./embeddings";
import { describeError } from "./errors";
import { OllamaGenerator } from "./generator";
import { pipelineOptionsFromConfig } from "./pipeline";
import { checkPrerequisites } from "./prerequisites";
import { createServer } from "./server";
import { QaSession } from "./session";
import { statusManager } from "./status";
import { formatWelcome, loadExampleQuestions, runCli } from "./transport/cli";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

function fail(message: string): never {
  console.error(`[RAG] ${message}`);
  process.exit(1);
}

const config: Config = getConfig();
const { RAG_MODE } = config;

if (RAG_MODE === "cli") process.stdout.write(formatWelcome(config.DOCUMENT_PATH, config.GENERATION_MODEL));

const report = await checkPrerequisites(config);
if (!report.ok) {
  for (const p of report.problems) console.error(`[RAG] ${p}`);
  fail("Prerequisites not met; the Q&A system was not started.");
}

const embeddings = createEmbeddingProvider(config);

const generator = new OllamaGenerator({
  model: config.GENERATION_MODEL,
  baseUrl: config.OLLAMA_BASE_URL,
  temperature: config.GENERATION_TEMPERATURE,
  timeoutMs: config.GENERATION_TIMEOUT_MS,
});

const session = new QaSession(pipelineOptionsFromConfig(config), {
  embeddings,
  generator,
  status: statusManager,
});

const started = await session.start();
if (!started.ok) fail(`Failed to initialize the Q&A system: ${describeError(started.error)}`);
console.error(`[RAG] Q&A system ready (${started.value.origin} index, ${started.value.index.size} chunks).`);

if (RAG_MODE === "cli") {
  statusManager.markTransport("cli");
  await runCli(session, { examples: await loadExampleQuestions() });
} else if (RAG_MODE === "http") {
  statusManager.markTransport("http");
  try {
    await startHttpTransport(() => createServer(session, statusManager, config.TOP_K), statusManager);
  } catch (e) {
    fail(`Could not start the HTTP transport: ${describeError(e)}`);
  }
} else {
  statusManager.markTransport("stdio");
  await startStdioTransport(() => createServer(session, statusManager, config.TOP_K));
}
