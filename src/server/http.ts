import type { Server } from "node:http";
import express from "express";
import type { NextFunction, Request, Response } from "express";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import type { Logger } from "pino";
import type { Backend } from "../config.js";
import { errorMessage } from "../errors.js";
import { logger as rootLogger } from "../logger.js";
import { SERVER_NAME, SERVER_VERSION } from "./server.js";

export interface HttpAppOptions {
  /** Builds a fresh MCP server for each SSE session. */
  createServer: () => McpServer;
  backend: Backend;
  version?: string;
  logger?: Logger;
}

export interface HttpApp {
  app: express.Express;
  sessions: Map<string, SSEServerTransport>;
}

function cors(req: Request, res: Response, next: NextFunction): void {
  res.setHeader("Access-Control-Allow-Origin", "*");
  res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization");
  if (req.method === "OPTIONS") {
    res.sendStatus(204);
    return;
  }
  next();
}

export function createHttpApp(options: HttpAppOptions): HttpApp {
  const log = (options.logger ?? rootLogger).child({ component: "http" });
  const sessions = new Map<string, SSEServerTransport>();
  const app = express();
  app.use(cors);

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      server: SERVER_NAME,
      version: options.version ?? SERVER_VERSION,
      backend: options.backend,
      sessions: sessions.size,
    });
  });

  app.get("/sse", async (_req, res) => {
    const server = options.createServer();
    const transport = new SSEServerTransport("/messages", res);
    const sessionId = transport.sessionId;
    sessions.set(sessionId, transport);
    log.info({ sessionId }, "sse session opened");

    res.on("close", () => {
      sessions.delete(sessionId);
      log.info({ sessionId }, "sse session closed");
      server.close().catch((error: unknown) =>
        log.warn({ sessionId, error: errorMessage(error) }, "failed to close mcp server")
      );
    });

    try {
      await server.connect(transport);
    } catch (error) {
      sessions.delete(sessionId);
      log.error({ sessionId, error: errorMessage(error) }, "failed to start sse session");
      if (!res.headersSent) {
        res.status(500).json({ error: "Internal server error" });
      }
    }
  });

  app.post("/messages", express.json({ limit: "10mb" }), async (req, res) => {
    const sessionId = req.query.sessionId;
    if (typeof sessionId !== "string" || sessionId === "") {
      res.status(400).json({ error: "Missing sessionId query parameter" });
      return;
    }
    const transport = sessions.get(sessionId);
    if (!transport) {
      res.status(404).json({ error: `Unknown session: ${sessionId}` });
      return;
    }

    try {
      await transport.handlePostMessage(req, res, req.body);
    } catch (error) {
      log.error({ sessionId, error: errorMessage(error) }, "failed to handle message");
      if (!res.headersSent) {
        res.status(500).json({ error: "Internal server error" });
      }
    }
  });

  return { app, sessions };
}

export function listen(app: express.Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => resolve(server));
    server.once("error", reject);
  });
}
