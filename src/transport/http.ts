/**
 * HTTP transport bootstrap: an Express app wired to the MCP SDK's
 * `StreamableHTTPServerTransport`, one transport + server pair per session.
 *
 * Session model:
 *  - A client sends a JSON-RPC `initialize` request to POST /mcp without an
 *    `mcp-session-id` header; a new transport and MCP Server are created and
 *    the generated session id is returned in the response headers.
 *  - Every later request of that session carries the same header.
 *  - When the transport closes, the session is evicted from the map.
 *
 * Endpoints:
 *  - POST /mcp    : JSON-RPC requests (initial + subsequent).
 *  - GET  /mcp    : streaming channel of an existing session.
 *  - DELETE /mcp  : session teardown.
 *  - GET  /health : status / readiness snapshot from `statusManager`.
 *
 * Environment variables:
 *  MCP_PORT: Port to bind (default 3000)
 *  HOST: Interface to bind (default 127.0.0.1)
 *  ALLOWED_HOSTS: Comma-separated host[:port] whitelist; defaults to local-only hosts.
 *  ENABLE_DNS_REBINDING_PROTECTION: "false" disables the protection.
 *
 * Errors: unknown sessions => 400 with JSON-RPC error -32000; anything else
 * => 500 with -32603.
 */
import express from "express";
import { randomUUID } from "node:crypto";
import { Server, StreamableHTTPServerTransport, isInitializeRequest } from "../mcp-sdk";
import { statusManager } from "../status";

/**
 * Bootstraps the Express HTTP server & per-session MCP transport layer.
 *
 * @param createServer Factory producing a new, unconnected MCP `Server` instance for each session.
 * @returns Resolves once the HTTP listener is bound and ready.
 */
export async function startHttpTransport(createServer: () => Server) {
  const app = express();
  app.use(express.json({ limit: "8mb" })); // ingest_policy may carry full page text

  const port = Number(process.env.MCP_PORT ?? 3000);
  const host = (process.env.HOST ?? "127.0.0.1").trim();
  const defaultAllowedHosts = Array.from(
    new Set<string>([
      "127.0.0.1",
      `127.0.0.1:${port}`,
      "localhost",
      `localhost:${port}`,
      host,
      `${host}:${port}`,
    ]),
  );

  /** Active session transports mapped by session id. */
  const transports = new Map<string, StreamableHTTPServerTransport>();

  async function openSession(): Promise<StreamableHTTPServerTransport> {
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sid: string) => {
        transports.set(sid, transport);
      },
      enableDnsRebindingProtection:
        (process.env.ENABLE_DNS_REBINDING_PROTECTION ?? "true") !== "false",
      allowedHosts: (process.env.ALLOWED_HOSTS ?? defaultAllowedHosts.join(","))
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean),
    });

    const server = createServer();
    let closing = false;
    transport.onclose = () => {
      if (closing) return; // server.close() closes the transport again
      closing = true;
      if (transport.sessionId) transports.delete(transport.sessionId);
      transport.onclose = undefined;
      server.close().catch((e: unknown) => console.error("[Policy] Failed to close session:", e));
    };
    await server.connect(transport);
    return transport;
  }

  app.post("/mcp", async (req: express.Request, res: express.Response) => {
    try {
      const sessionId = req.get("mcp-session-id");
      let transport = sessionId ? transports.get(sessionId) : undefined;

      // Session creation path: only when no header AND the body is a valid initialize request.
      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        transport = await openSession();
      }

      if (!transport) {
        res.status(400).json({
          jsonrpc: "2.0",
          error: { code: -32000, message: "Bad Request: No valid session ID provided" },
          id: null,
        });
        return;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("[Policy] HTTP POST error:", err);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  /** GET and DELETE /mcp are only valid for an existing session. */
  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = req.get("mcp-session-id");
    const transport = sessionId ? transports.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    await transport.handleRequest(req, res);
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.get("/health", (_req, res) => {
    res.json(statusManager.getStatus());
  });

  await new Promise<void>((resolve) => {
    app.listen(port, host, () => {
      console.error(`[Policy] Streamable HTTP listening at http://${host}:${port}/mcp`);
      resolve();
    });
  });
}
