import { randomUUID } from "node:crypto";

import express from "express";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { createMcpExpressApp } from "@modelcontextprotocol/sdk/server/express.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";

import { MappedError, SuperFakturaService } from "../core/service.js";
import { ResultEnvelope } from "../core/types.js";
import { isFailureEnvelope, isPlainObject, logInfo, logWarn } from "../core/utils.js";

export const SERVER_NAME = "superfaktura-mcp-server";
export const SERVER_VERSION = "0.1.0";

type SessionState = {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
  lastSeenAt: number;
};

function toMcpErrorResult(core: SuperFakturaService, error: unknown) {
  const mapped = core.mapErrorToHttp(error);
  return {
    isError: true,
    content: [{ type: "text" as const, text: `${mapped.status}: ${mapped.message}` }],
    structuredContent: {
      error: mapped.message,
      status: mapped.status,
      details: core.redactForLog(mapped.details),
    },
  };
}

function toMcpToolResult(result: ResultEnvelope) {
  if (isFailureEnvelope(result)) {
    return {
      isError: true,
      content: [{ type: "text" as const, text: result.error }],
      structuredContent: { ...result },
    };
  }

  const text = JSON.stringify(result) ?? "null";
  if (isPlainObject(result)) {
    return {
      content: [{ type: "text" as const, text }],
      structuredContent: result,
    };
  }
  return { content: [{ type: "text" as const, text }] };
}

/** One MCP server per session (or per stdio process), exposing every tool the service allows. */
export function createSuperFakturaMcpServer(core: SuperFakturaService): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        logging: {},
      },
    },
  );

  for (const op of core.allowedOperations()) {
    server.registerTool(
      op.name,
      {
        description: op.description,
        inputSchema: op.inputSchema,
        annotations: {
          readOnlyHint: op.readOnly,
          destructiveHint: op.destructive,
          idempotentHint: op.readOnly || op.destructive,
        },
      },
      async (args, extra) => {
        try {
          const result = await core.callTool(op.name, args, { headers: extra.requestInfo?.headers });
          return toMcpToolResult(result);
        } catch (error) {
          return toMcpErrorResult(core, error);
        }
      },
    );
  }

  return server;
}

export function createMcpApp(core: SuperFakturaService): express.Express {
  const app = createMcpExpressApp({ host: core.config.host });
  const sessions = new Map<string, SessionState>();
  const maxSessions = core.config.mcpMaxSessions;
  const ttlMs = core.config.mcpSessionTtlMs;
  // Initializations in flight count against the limit until their session id is registered.
  let pendingInitializations = 0;

  app.disable("x-powered-by");
  app.use((req, res, next) => {
    const requestId = String(req.header("x-request-id") || "").trim() || randomUUID();
    const startedAt = Date.now();
    res.setHeader("x-request-id", requestId);
    res.on("finish", () => {
      logInfo("http.request", {
        requestId,
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - startedAt,
      });
    });
    next();
  });

  async function closeState(sessionId: string, state: SessionState): Promise<void> {
    try {
      await state.transport.close();
      await state.server.close();
    } catch (error) {
      logWarn("mcp.session_close_failed", { sessionId, error: error instanceof Error ? error.message : String(error) });
    }
  }

  async function closeSession(sessionId: string): Promise<void> {
    const state = sessions.get(sessionId);
    if (!state) return;
    sessions.delete(sessionId);
    await closeState(sessionId, state);
  }

  function sweepExpiredSessions(now = Date.now()): void {
    for (const [sessionId, state] of sessions) {
      if (now - state.lastSeenAt < ttlMs) continue;
      sessions.delete(sessionId);
      logInfo("mcp.session_expired", { sessionId });
      void closeState(sessionId, state);
    }
  }

  const sweepTimer = setInterval(() => sweepExpiredSessions(), Math.max(25, Math.min(Math.floor(ttlMs / 2), 30_000)));
  sweepTimer.unref();

  function touchSession(sessionId: string): SessionState | undefined {
    const state = sessions.get(sessionId);
    if (!state) return undefined;
    if (Date.now() - state.lastSeenAt >= ttlMs) {
      sweepExpiredSessions();
      return undefined;
    }
    state.lastSeenAt = Date.now();
    return state;
  }

  function writeJsonRpcError(res: express.Response, code: number, mapped: MappedError): void {
    if (res.headersSent) return;
    res.status(mapped.status).json({
      jsonrpc: "2.0",
      error: { code, message: mapped.message, data: core.redactForLog(mapped.details) },
      id: null,
    });
  }

  function unknownSession(res: express.Response, sessionId: string): void {
    writeJsonRpcError(res, -32001, { status: 404, message: `Unknown MCP session '${sessionId}'.` });
  }

  app.post(core.config.mcpPath, async (req, res) => {
    try {
      core.requireServerKey(String(req.header("x-server-key") || ""));
      const sessionId = String(req.header("mcp-session-id") || "").trim();

      if (sessionId) {
        const state = touchSession(sessionId);
        if (!state) {
          unknownSession(res, sessionId);
          return;
        }
        await state.transport.handleRequest(req, res, req.body);
        return;
      }

      if (!isInitializeRequest(req.body)) {
        writeJsonRpcError(res, -32000, { status: 400, message: "Missing mcp-session-id header for non-initialize request." });
        return;
      }

      sweepExpiredSessions();
      if (sessions.size + pendingInitializations >= maxSessions) {
        writeJsonRpcError(res, -32000, { status: 429, message: `MCP session limit reached (${maxSessions}).` });
        return;
      }

      pendingInitializations++;
      const mcpServer = createSuperFakturaMcpServer(core);
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: (newSessionId) => {
          sessions.set(newSessionId, { server: mcpServer, transport, lastSeenAt: Date.now() });
        },
      });

      transport.onclose = () => {
        const sid = transport.sessionId;
        if (sid) {
          sessions.delete(sid);
        }
      };

      try {
        await mcpServer.connect(transport);
        await transport.handleRequest(req, res, req.body);
      } catch (error) {
        const sid = transport.sessionId;
        if (sid) sessions.delete(sid);
        await closeState(sid ?? "pending", { server: mcpServer, transport, lastSeenAt: 0 });
        throw error;
      } finally {
        pendingInitializations--;
      }
    } catch (error) {
      writeJsonRpcError(res, -32603, core.mapErrorToHttp(error));
    }
  });

  app.get(core.config.mcpPath, async (req, res) => {
    try {
      core.requireServerKey(String(req.header("x-server-key") || ""));
      const sessionId = String(req.header("mcp-session-id") || "").trim();
      if (!sessionId) {
        writeJsonRpcError(res, -32000, { status: 400, message: "Missing mcp-session-id header." });
        return;
      }

      const state = touchSession(sessionId);
      if (!state) {
        unknownSession(res, sessionId);
        return;
      }

      await state.transport.handleRequest(req, res);
    } catch (error) {
      writeJsonRpcError(res, -32603, core.mapErrorToHttp(error));
    }
  });

  app.delete(core.config.mcpPath, async (req, res) => {
    try {
      core.requireServerKey(String(req.header("x-server-key") || ""));
      const sessionId = String(req.header("mcp-session-id") || "").trim();
      if (!sessionId) {
        writeJsonRpcError(res, -32000, { status: 400, message: "Missing mcp-session-id header." });
        return;
      }

      const state = sessions.get(sessionId);
      if (!state) {
        unknownSession(res, sessionId);
        return;
      }

      await state.transport.handleRequest(req, res);
      await closeSession(sessionId);
    } catch (error) {
      writeJsonRpcError(res, -32603, core.mapErrorToHttp(error));
    }
  });

  app.get(core.config.healthPath, (_req, res) => {
    sweepExpiredSessions();
    res.json({
      ok: true,
      transport: "mcp-streamable-http",
      mcpPath: core.config.mcpPath,
      readOnly: core.config.readOnly,
      defaultClient: core.hasDefaultClient,
      toolCount: core.allowedOperations().length,
      activeSessions: sessions.size,
    });
  });

  return app;
}
