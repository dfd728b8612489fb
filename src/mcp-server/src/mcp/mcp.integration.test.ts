import test from "node:test";
import assert from "node:assert/strict";
import http from "node:http";
import type { AddressInfo } from "node:net";

import { SuperFakturaService } from "../core/service.js";
import { CoreConfig } from "../core/types.js";
import { isPlainObject } from "../core/utils.js";
import { createMcpApp } from "./server.js";

type JsonRpcEnvelope = {
  jsonrpc: "2.0";
  id: string | number | null;
  result?: Record<string, unknown>;
  error?: Record<string, unknown>;
};

type SeenRequest = {
  url: string;
  authorization: string;
};

const TENANT_HEADERS = {
  "x-superfaktura-email": "tenant@example.com",
  "x-superfaktura-api-key": "test-secret",
  "x-superfaktura-company-id": "5",
};

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function parseStreamableJsonRpc(text: string): JsonRpcEnvelope {
  const trimmed = text.trim();
  if (trimmed.startsWith("{")) {
    return JSON.parse(trimmed) as JsonRpcEnvelope;
  }

  const lines = text.split(/\r?\n/);
  const dataLines: string[] = [];
  for (const line of lines) {
    if (line.startsWith("data:")) {
      dataLines.push(line.slice(5).trimStart());
    } else if (dataLines.length > 0 && line.trim() === "") {
      break;
    }
  }
  if (dataLines.length === 0) {
    throw new Error(`Unable to parse Streamable HTTP response: ${text}`);
  }
  return JSON.parse(dataLines.join("\n")) as JsonRpcEnvelope;
}

async function postMcp(
  url: string,
  payload: Record<string, unknown>,
  sessionId?: string,
  extraHeaders: Record<string, string> = {},
): Promise<{
  response: Response;
  message: JsonRpcEnvelope;
}> {
  const headers: Record<string, string> = {
    "content-type": "application/json",
    accept: "application/json, text/event-stream",
    ...extraHeaders,
  };
  if (sessionId) headers["mcp-session-id"] = sessionId;

  const response = await fetch(url, {
    method: "POST",
    headers,
    body: JSON.stringify(payload),
  });
  const bodyText = await response.text();
  return {
    response,
    message: parseStreamableJsonRpc(bodyText),
  };
}

function makeInitializePayload(id: number): Record<string, unknown> {
  return {
    jsonrpc: "2.0",
    id,
    method: "initialize",
    params: {
      protocolVersion: "2025-06-18",
      capabilities: {},
      clientInfo: {
        name: "mcp-integration-test",
        version: "1.0.0",
      },
    },
  };
}

function makeToolCall(id: number, name: string, args: Record<string, unknown>): Record<string, unknown> {
  return {
    jsonrpc: "2.0",
    id,
    method: "tools/call",
    params: { name, arguments: args },
  };
}

function createTestCore(configOverrides: Partial<CoreConfig> = {}): SuperFakturaService {
  return new SuperFakturaService(process.cwd(), {
    env: {},
    config: {
      host: "127.0.0.1",
      port: 0,
      mcpPath: "/mcp",
      healthPath: "/healthz",
      serverApiKey: "",
      logRequestPayloads: false,
      ...configOverrides,
    },
  });
}

async function startUpstream(t: test.TestContext, status: number, payload: unknown): Promise<{ apiUrl: string; seen: SeenRequest[] }> {
  const seen: SeenRequest[] = [];
  const server = http.createServer((req, res) => {
    seen.push({ url: req.url ?? "", authorization: String(req.headers.authorization ?? "") });
    res.writeHead(status, { "content-type": "application/json" });
    res.end(JSON.stringify(payload));
  });
  server.listen(0, "127.0.0.1");
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  t.after(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });
  const address = server.address() as AddressInfo;
  return { apiUrl: `http://127.0.0.1:${address.port}`, seen };
}

async function startTestServer(t: test.TestContext, core: SuperFakturaService): Promise<{ mcpUrl: string; healthUrl: string }> {
  const app = createMcpApp(core);
  const server = app.listen(0, "127.0.0.1");
  t.after(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address() as AddressInfo;
  return {
    mcpUrl: `http://127.0.0.1:${address.port}/mcp`,
    healthUrl: `http://127.0.0.1:${address.port}/healthz`,
  };
}

async function initializeSession(mcpUrl: string, extraHeaders: Record<string, string> = {}): Promise<string> {
  const initialize = await postMcp(mcpUrl, makeInitializePayload(1), undefined, extraHeaders);

  assert.equal(initialize.response.status, 200);
  assert.ok(!initialize.message.error);

  const sessionId = initialize.response.headers.get("mcp-session-id");
  assert.ok(sessionId && sessionId.trim().length > 0, "Expected mcp-session-id response header.");
  return sessionId;
}

async function terminateSession(mcpUrl: string, sessionId: string, extraHeaders: Record<string, string> = {}): Promise<void> {
  const terminate = await fetch(mcpUrl, {
    method: "DELETE",
    headers: {
      accept: "application/json, text/event-stream",
      "mcp-session-id": sessionId,
      ...extraHeaders,
    },
  });
  assert.equal(terminate.status, 200);
  await terminate.text();
}

function toolResult(message: JsonRpcEnvelope): Record<string, unknown> {
  assert.ok(!message.error, `Unexpected JSON-RPC error: ${JSON.stringify(message.error)}`);
  assert.ok(message.result);
  return message.result;
}

test("MCP Streamable HTTP server lists every tool with an object input schema", async (t) => {
  const core = createTestCore();
  const { mcpUrl } = await startTestServer(t, core);
  const sessionId = await initializeSession(mcpUrl);

  const listTools = await postMcp(mcpUrl, { jsonrpc: "2.0", id: 2, method: "tools/list", params: {} }, sessionId);
  assert.equal(listTools.response.status, 200);

  const tools = toolResult(listTools.message).tools;
  assert.ok(Array.isArray(tools));
  const names = tools.map((tool: unknown) => (isPlainObject(tool) ? String(tool.name) : "")).sort();
  assert.deepEqual(names, [
    "create_client",
    "create_expense",
    "create_invoice",
    "delete_client",
    "delete_expense",
    "delete_invoice",
    "edit_expense",
    "edit_invoice",
    "get_client",
    "get_expense",
    "get_invoice",
    "get_invoice_pdf",
    "list_clients",
    "list_expenses",
    "list_invoices",
    "mark_invoice_paid",
    "send_invoice",
    "set_invoice_language",
    "update_client",
  ]);

  for (const tool of tools) {
    assert.ok(isPlainObject(tool));
    const schema = tool.inputSchema;
    assert.ok(isPlainObject(schema), `Tool ${String(tool.name)} is missing inputSchema.`);
    assert.equal(schema.type, "object");
    assert.ok(isPlainObject(schema.properties));
  }

  await terminateSession(mcpUrl, sessionId);
});

test("tools/call resolves credentials from the HTTP request headers", async (t) => {
  const upstream = await startUpstream(t, 200, { items: [], itemCount: 0 });
  const core = createTestCore({ apiUrl: upstream.apiUrl, allowInsecureHttp: true });
  const { mcpUrl } = await startTestServer(t, core);
  const sessionId = await initializeSession(mcpUrl);

  const call = await postMcp(mcpUrl, makeToolCall(3, "list_invoices", { status: "2" }), sessionId, TENANT_HEADERS);
  assert.equal(call.response.status, 200);

  const result = toolResult(call.message);
  assert.equal(result.isError, undefined);
  assert.deepEqual(result.structuredContent, { items: [], itemCount: 0 });
  assert.deepEqual(upstream.seen, [
    {
      url: "/invoices/index.json/page:1/per_page:50/listinfo:1/direction:DESC/sort:regular_count/status:2",
      authorization: "SFAPI email=tenant%40example.com&apikey=test-secret&module=superfaktura-mcp&company_id=5",
    },
  ]);

  await terminateSession(mcpUrl, sessionId);
});

test("remote failures and configuration errors come back as tool errors", async (t) => {
  const upstream = await startUpstream(t, 404, { error: 1 });
  const core = createTestCore({ apiUrl: upstream.apiUrl, allowInsecureHttp: true });
  const { mcpUrl } = await startTestServer(t, core);
  const sessionId = await initializeSession(mcpUrl);

  const failed = toolResult((await postMcp(mcpUrl, makeToolCall(4, "get_client", { client_id: 9 }), sessionId, TENANT_HEADERS)).message);
  assert.equal(failed.isError, true);
  assert.deepEqual(failed.structuredContent, { error: "Request failed with status code 404", status: "failed" });

  const unconfigured = toolResult((await postMcp(mcpUrl, makeToolCall(5, "get_client", { client_id: 9 }), sessionId)).message);
  assert.equal(unconfigured.isError, true);
  const structured = unconfigured.structuredContent;
  assert.ok(isPlainObject(structured));
  assert.equal(structured.status, 500);
  assert.equal(
    structured.error,
    "Missing SuperFaktura credentials: email, apiKey. Send x-superfaktura-email / x-superfaktura-api-key headers or set SUPERFAKTURA_EMAIL / SUPERFAKTURA_API_KEY.",
  );
  assert.equal(upstream.seen.length, 1);

  await terminateSession(mcpUrl, sessionId);
});

test("read-only mode registers only read tools", async (t) => {
  const core = createTestCore({ readOnly: true });
  const { mcpUrl, healthUrl } = await startTestServer(t, core);
  const sessionId = await initializeSession(mcpUrl);

  const listTools = await postMcp(mcpUrl, { jsonrpc: "2.0", id: 6, method: "tools/list", params: {} }, sessionId);
  const tools = toolResult(listTools.message).tools;
  assert.ok(Array.isArray(tools));
  assert.equal(tools.length, 7);

  const health = (await (await fetch(healthUrl)).json()) as Record<string, unknown>;
  assert.equal(health.readOnly, true);
  assert.equal(health.toolCount, 7);

  await terminateSession(mcpUrl, sessionId);
});

test("MCP session delete closes state and rejects reuse", async (t) => {
  const core = createTestCore();
  const { mcpUrl, healthUrl } = await startTestServer(t, core);
  const sessionId = await initializeSession(mcpUrl);

  const healthBefore = await fetch(healthUrl);
  assert.equal(healthBefore.status, 200);
  const bodyBefore = (await healthBefore.json()) as Record<string, unknown>;
  assert.equal(bodyBefore.activeSessions, 1);

  await terminateSession(mcpUrl, sessionId);

  const healthAfter = await fetch(healthUrl);
  const bodyAfter = (await healthAfter.json()) as Record<string, unknown>;
  assert.equal(bodyAfter.activeSessions, 0);

  const reuse = await postMcp(mcpUrl, { jsonrpc: "2.0", id: 2, method: "tools/list", params: {} }, sessionId);
  assert.equal(reuse.response.status, 404);
  assert.equal(reuse.message.error?.message, `Unknown MCP session '${sessionId}'.`);
});

test("MCP requests without a session must be initialize", async (t) => {
  const core = createTestCore();
  const { mcpUrl } = await startTestServer(t, core);

  const stray = await postMcp(mcpUrl, { jsonrpc: "2.0", id: 7, method: "tools/list", params: {} });
  assert.equal(stray.response.status, 400);
  assert.equal(stray.message.error?.message, "Missing mcp-session-id header for non-initialize request.");
});

test("MCP initialize is rejected when max sessions are reached", async (t) => {
  const core = createTestCore({
    mcpMaxSessions: 1,
    mcpSessionTtlMs: 60000,
  });
  const { mcpUrl } = await startTestServer(t, core);
  const sessionId = await initializeSession(mcpUrl);

  const blocked = await postMcp(mcpUrl, makeInitializePayload(99));
  assert.equal(blocked.response.status, 429);
  assert.equal(blocked.message.error?.message, "MCP session limit reached (1).");

  await terminateSession(mcpUrl, sessionId);
});

test("MCP concurrent initialize enforces max sessions under race", async (t) => {
  const maxSessions = 3;
  const attempts = 12;
  const core = createTestCore({
    mcpMaxSessions: maxSessions,
    mcpSessionTtlMs: 60000,
  });
  const { mcpUrl, healthUrl } = await startTestServer(t, core);

  const initResults = await Promise.all(
    Array.from({ length: attempts }).map((_v, idx) => postMcp(mcpUrl, makeInitializePayload(1000 + idx))),
  );

  const successResults = initResults.filter((r) => r.response.status === 200);
  const blockedResults = initResults.filter((r) => r.response.status === 429);

  assert.equal(successResults.length, maxSessions);
  assert.equal(blockedResults.length, attempts - maxSessions);
  for (const blocked of blockedResults) {
    assert.equal(blocked.message.error?.message, `MCP session limit reached (${maxSessions}).`);
  }

  const health = await fetch(healthUrl);
  const healthBody = (await health.json()) as Record<string, unknown>;
  assert.equal(healthBody.activeSessions, maxSessions);

  for (const result of successResults) {
    const sessionId = result.response.headers.get("mcp-session-id");
    assert.ok(sessionId, "Expected successful initialize to include mcp-session-id.");
    await terminateSession(mcpUrl, sessionId);
  }
});

test("MCP session TTL expires idle sessions and rejects stale session id", async (t) => {
  const sessionTtlMs = 120;
  const core = createTestCore({
    mcpSessionTtlMs: sessionTtlMs,
    mcpMaxSessions: 10,
  });
  const { mcpUrl, healthUrl } = await startTestServer(t, core);
  const sessionId = await initializeSession(mcpUrl);

  const deadline = Date.now() + 5000;
  let active = 1;
  while (Date.now() < deadline) {
    const health = await fetch(healthUrl);
    assert.equal(health.status, 200);
    const healthBody = (await health.json()) as Record<string, unknown>;
    active = Number(healthBody.activeSessions ?? -1);
    if (active === 0) {
      break;
    }
    await wait(30);
  }
  assert.equal(active, 0, "Expected idle session to expire and be cleaned up.");

  const staleUse = await postMcp(mcpUrl, { jsonrpc: "2.0", id: 4, method: "tools/list", params: {} }, sessionId);
  assert.equal(staleUse.response.status, 404);
  assert.equal(staleUse.message.error?.message, `Unknown MCP session '${sessionId}'.`);
});

test("MCP endpoint enforces x-server-key when configured", async (t) => {
  const serverApiKey = "test-server-key";
  const core = createTestCore({
    serverApiKey,
  });
  const { mcpUrl } = await startTestServer(t, core);

  const unauthorized = await postMcp(mcpUrl, makeInitializePayload(501));
  assert.equal(unauthorized.response.status, 401);
  assert.equal(unauthorized.message.error?.message, "Unauthorized: missing/invalid X-Server-Key.");

  const sessionId = await initializeSession(mcpUrl, { "x-server-key": serverApiKey });
  await terminateSession(mcpUrl, sessionId, { "x-server-key": serverApiKey });
});
