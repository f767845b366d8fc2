/**
 * Streamable HTTP transport: an Express app wired to the MCP SDK's
 * `StreamableHTTPServerTransport`, one MCP Server + transport pair per session.
 *
 * Endpoints:
 *  - POST /mcp    : JSON-RPC requests; a request without `mcp-session-id` must be `initialize`.
 *  - GET  /mcp    : streaming / follow-up channel for an existing session.
 *  - DELETE /mcp  : session teardown.
 *  - GET  /health : status snapshot; 503 until the index is ready, 200 after.
 *
 * Environment variables (see {@link httpOptionsFromEnv}):
 *  MCP_PORT (default 3000), HOST (default 127.0.0.1),
 *  ALLOWED_HOSTS (comma list host[:port]), ENABLE_DNS_REBINDING_PROTECTION ("false" disables).
 */
import express from "express";
import type { Server as HttpServer } from "node:http";
import { randomUUID } from "node:crypto";
import { Server, StreamableHTTPServerTransport, isInitializeRequest } from "../mcp-sdk";
import type { StatusManager } from "../status";

export interface HttpTransportOptions {
  port: number;
  host: string;
  /** Explicit host[:port] whitelist; derived from host and bound port when unset. */
  allowedHosts?: string[];
  dnsRebindingProtection: boolean;
}

export function httpOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): HttpTransportOptions {
  const port = Number(env.MCP_PORT ?? 3000);
  const allowed = env.ALLOWED_HOSTS?.split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return {
    port: Number.isInteger(port) && port >= 0 ? port : 3000,
    host: (env.HOST ?? "127.0.0.1").trim(),
    allowedHosts: allowed && allowed.length > 0 ? allowed : undefined,
    dnsRebindingProtection: (env.ENABLE_DNS_REBINDING_PROTECTION ?? "true") !== "false",
  };
}

function localHosts(host: string, port: number): string[] {
  return Array.from(new Set([host, "127.0.0.1", "localhost"].flatMap((h) => [h, `${h}:${port}`])));
}

function rpcError(res: express.Response, status: number, code: number, message: string): void {
  res.status(status).json({ jsonrpc: "2.0", error: { code, message }, id: null });
}

function sessionIdOf(req: express.Request): string | undefined {
  const h = req.headers["mcp-session-id"];
  return typeof h === "string" ? h : undefined;
}

/**
 * Build the Express app. `boundPort` reports the listening port, which may
 * differ from the configured one when that was 0.
 */
export function createHttpApp(
  createServer: () => Server,
  status: StatusManager,
  opts: HttpTransportOptions,
  boundPort: () => number = () => opts.port,
): express.Express {
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  const sessions = new Map<string, StreamableHTTPServerTransport>();

  /** New transport + MCP server pair; registered once the SDK assigns the session id. */
  async function openSession(): Promise<StreamableHTTPServerTransport> {
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sid: string) => {
        sessions.set(sid, transport);
      },
      enableDnsRebindingProtection: opts.dnsRebindingProtection,
      allowedHosts: opts.allowedHosts ?? localHosts(opts.host, boundPort()),
    });
    const server = createServer();
    transport.onclose = () => {
      // server.close() closes the transport again; detach first.
      transport.onclose = undefined;
      if (transport.sessionId) sessions.delete(transport.sessionId);
      server.close().catch((e: unknown) => console.error("[RAG] Error closing MCP session:", e));
    };
    await server.connect(transport);
    return transport;
  }

  app.post("/mcp", async (req: express.Request, res: express.Response) => {
    try {
      const sessionId = sessionIdOf(req);
      let transport = sessionId ? sessions.get(sessionId) : undefined;
      if (!transport && !sessionId && isInitializeRequest(req.body)) transport = await openSession();
      if (!transport) {
        rpcError(res, 400, -32000, "Bad Request: No valid session ID provided");
        return;
      }
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("[RAG] HTTP POST error:", err);
      if (!res.headersSent) rpcError(res, 500, -32603, "Internal server error");
    }
  });

  /** GET / DELETE /mcp: only valid for an existing session. */
  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId ? sessions.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      console.error("[RAG] HTTP session request error:", err);
      if (!res.headersSent) res.status(500).send("Internal server error");
    }
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.get("/health", (_req, res) => {
    const s = status.getStatus();
    res.status(s.ready ? 200 : 503).json(s);
  });

  return app;
}

/**
 * Start listening. Resolves with the bound HTTP server once it accepts
 * connections; rejects if binding fails.
 */
export async function startHttpTransport(
  createServer: () => Server,
  status: StatusManager,
  opts: HttpTransportOptions = httpOptionsFromEnv(),
): Promise<HttpServer> {
  let listener: HttpServer | undefined;
  const boundPort = () => {
    const addr = listener?.address();
    return addr !== null && typeof addr === "object" ? addr.port : opts.port;
  };
  const app = createHttpApp(createServer, status, opts, boundPort);

  return new Promise<HttpServer>((resolve, reject) => {
    const server = app.listen(opts.port, opts.host, () => {
      server.off("error", reject);
      console.error(`[RAG] Streamable HTTP listening at http://${opts.host}:${boundPort()}/mcp`);
      resolve(server);
    });
    listener = server;
    server.once("error", reject);
  });
}
