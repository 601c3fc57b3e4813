import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { Server } from "node:http";
import { Writable } from "node:stream";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { SSEClientTransport } from "@modelcontextprotocol/sdk/client/sse.js";
import { createLoggerWithDestination } from "../logger.js";
import { defineTool, ToolRegistry } from "../tools/registry.js";
import { createHttpApp, listen } from "./http.js";
import type { HttpApp } from "./http.js";
import { createServer } from "./server.js";

const silent = createLoggerWithDestination(
  new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  }),
  "fatal"
);

const registry = new ToolRegistry().add(
  defineTool({
    name: "gmail_list_labels",
    description: "List labels",
    args: {},
    run: async () => [{ id: "INBOX", name: "INBOX" }],
  })
);

let http: HttpApp;
let server: Server;
let base: string;

beforeEach(async () => {
  http = createHttpApp({
    createServer: () => createServer({ registry, backend: "api" }),
    backend: "api",
    logger: silent,
  });
  server = await listen(http.app, 0, "127.0.0.1");
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("expected a TCP address");
  base = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

describe("HTTP transport", () => {
  it("answers health checks", async () => {
    const res = await fetch(`${base}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "ok",
      server: "google-workspace",
      version: "0.3.0",
      backend: "api",
      sessions: 0,
    });
  });

  it("allows cross-origin requests", async () => {
    const res = await fetch(`${base}/messages`, { method: "OPTIONS" });
    expect(res.status).toBe(204);
    expect(res.headers.get("access-control-allow-origin")).toBe("*");
    expect(res.headers.get("access-control-allow-methods")).toBe("GET, POST, OPTIONS");
  });

  it("requires a session ID on messages", async () => {
    const res = await fetch(`${base}/messages`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{}",
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Missing sessionId query parameter" });
  });

  it("rejects unknown sessions", async () => {
    const res = await fetch(`${base}/messages?sessionId=nope`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{}",
    });
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Unknown session: nope" });
  });

  it("serves MCP over SSE", async () => {
    const client = new Client({ name: "test-client", version: "1.0.0" });
    await client.connect(new SSEClientTransport(new URL(`${base}/sse`)));

    expect(http.sessions.size).toBe(1);
    const tools = await client.listTools();
    expect(tools.tools.map((t) => t.name)).toEqual(["gmail_list_labels"]);

    await client.close();
    await vi.waitFor(() => expect(http.sessions.size).toBe(0));
  });
});
