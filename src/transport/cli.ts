import fs from "node:fs/promises";
import path from "node:path";
import readline from "node:readline";
import { fileURLToPath } from "node:url";
import type { Readable, Writable } from "node:stream";
import { describeError } from "../errors";
import type { QaSession } from "../session";

const RULE = "=".repeat(70);
const EXIT_WORDS = new Set(["quit", "exit", "q"]);

export const DEFAULT_EXAMPLES_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "../../data/example-questions.json",
);

/** Example questions shown at start-up; an unreadable file just means none are shown. */
export async function loadExampleQuestions(file = DEFAULT_EXAMPLES_PATH): Promise<string[]> {
  try {
    const parsed: unknown = JSON.parse(await fs.readFile(file, "utf8"));
    return Array.isArray(parsed) ? parsed.filter((q): q is string => typeof q === "string") : [];
  } catch (e) {
    console.error(`[RAG] Could not read example questions from ${file}:`, e);
    return [];
  }
}

export function formatWelcome(documentPath: string, generationModel: string): string {
  return [
    RULE,
    "DOCUMENT Q&A",
    `Answering questions about ${documentPath}`,
    RULE,
    "",
    "Answers are generated only from the most relevant excerpt of the document.",
    `It uses ${generationModel} via Ollama and retrieval-augmented generation.`,
    "",
  ].join("\n");
}

export function formatExamples(examples: readonly string[]): string {
  if (examples.length === 0) return "";
  const lines = examples.map((q, i) => `   ${i + 1}. ${q}`);
  return ["Example questions you can ask:", ...lines, ""].join("\n");
}

export interface CliOptions {
  input?: Readable;
  output?: Writable;
  examples?: readonly string[];
}

/**
 * Interactive question loop. Empty input is rejected, `quit`/`exit`/`q` or
 * end of input ends the session, and a failed question is reported without
 * leaving the loop.
 */
export async function runCli(session: QaSession, opts: CliOptions = {}): Promise<void> {
  const output = opts.output ?? process.stdout;
  const write = (s: string) => output.write(`${s}\n`);
  const rl = readline.createInterface({ input: opts.input ?? process.stdin, output, terminal: false });

  write(`\n${RULE}`);
  write("READY: You can now ask questions about the document");
  write("Type 'quit' or 'exit' to end the session");
  write(RULE);
  write(formatExamples(opts.examples ?? []));
  output.write("Your question: ");

  let ended = false;
  let closed = false;
  rl.on("close", () => {
    closed = true;
  });
  // Input is not a TTY stream here, so Ctrl+C arrives as a process signal.
  const onSigint = () => {
    write("\n\nSession ended. Thank you!");
    ended = true;
    rl.close();
  };
  process.once("SIGINT", onSigint);

  for await (const line of rl) {
    const question = line.trim();
    if (EXIT_WORDS.has(question.toLowerCase())) {
      write("\nThank you for exploring the document!");
      ended = true;
      break;
    }
    if (!question) {
      write("Please enter a question");
    } else {
      write(`\nQuestion: ${question}`);
      write("Searching the document...");
      const result = await session.ask(question);
      if (result.ok) write(`\nAnswer: ${result.value}\n\n${"-".repeat(60)}`);
      else write(`Error finding answer: ${describeError(result.error)}`);
    }
    output.write("\nYour question: ");
  }
  process.off("SIGINT", onSigint);
  if (!closed) rl.close();
  if (!ended) write("\nSession ended. Thank you!");
}
