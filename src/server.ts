/**
 * MCP server exposing the question-answering session as tools.
 *
 * Tool contracts:
 *  ask_question
 *    Input:  { question: string }
 *    Output: text answer grounded in the retrieved excerpt (isError on a failed question)
 *  rag_query
 *    Input:  { query: string, top_k?: number }
 *    Output: { matches: Array<{ id, position, offset, score, snippet }> }
 *  index_status
 *    Input:  {}
 *    Output: current status snapshot
 */
import {
  Server,
  ListToolsRequestSchema,
  CallToolRequestSchema,
  ErrorCode,
  McpError,
} from "./mcp-sdk";
import { APP_VERSION } from "./config";
import type { QaSession } from "./session";
import type { StatusManager } from "./status";

type ToolText = { content: Array<{ type: "text"; text: string }>; isError?: boolean };

const text = (t: string, isError = false): ToolText => ({ content: [{ type: "text", text: t }], isError });

function stringArg(args: Record<string, unknown> | undefined, name: string): string {
  const v = args?.[name];
  if (typeof v !== "string" || !v.trim()) throw new McpError(ErrorCode.InvalidParams, `Missing ${name}`);
  return v;
}

/**
 * Factory for a new MCP Server bound to the shared session. A fresh server is
 * created per transport session (HTTP mode may have several); the index and
 * models are shared through `session`.
 */
export function createServer(session: QaSession, status: StatusManager, defaultTopK: number): Server {
  const server = new Server(
    { name: "doc-qa-rag", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        {
          name: "ask_question",
          description:
            "Answer a question about the indexed document. The answer is generated only from the most relevant excerpt.",
          inputSchema: {
            type: "object",
            properties: {
              question: { type: "string", description: "Natural language question about the document." },
            },
            required: ["question"],
          },
        },
        {
          name: "rag_query",
          description:
            "Semantically search the indexed document and return matching chunks with id, position, offset, score and snippet.",
          inputSchema: {
            type: "object",
            properties: {
              query: { type: "string", description: "Natural language search query." },
              top_k: {
                type: "number",
                description: `Maximum number of matches to return (1-50). Defaults to ${defaultTopK}.`,
                minimum: 1,
                maximum: 50,
              },
            },
            required: ["query"],
          },
        },
        {
          name: "index_status",
          description: "Report readiness, models and index counters.",
          inputSchema: { type: "object", properties: {} },
        },
      ],
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (req) => {
    const args = req.params.arguments;

    if (req.params.name === "ask_question") {
      const question = stringArg(args, "question");
      const result = await session.ask(question);
      if (!result.ok) return text(`${result.error.name}: ${result.error.message}`, true);
      return text(result.value);
    }

    if (req.params.name === "rag_query") {
      const query = stringArg(args, "query");
      const rawK = args?.top_k;
      const k = typeof rawK === "number" && Number.isFinite(rawK) ? Math.max(1, Math.min(50, Math.floor(rawK))) : defaultTopK;
      const ready = session.getReady();
      if (!ready) throw new McpError(ErrorCode.InternalError, "Index is not ready");
      const hits = await ready.retriever.retrieveScored(query, k);
      const matches = hits.map((h) => ({
        id: h.entry.id,
        position: h.entry.position,
        offset: h.entry.offset,
        score: Number(h.score.toFixed(4)),
        snippet: h.entry.text,
      }));
      return text(JSON.stringify({ matches }));
    }

    if (req.params.name === "index_status") {
      return text(JSON.stringify(status.getStatus()));
    }

    throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${req.params.name}`);
  });

  return server;
}
