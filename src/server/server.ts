import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import type { Tool as McpTool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import type { Backend } from "../config.js";
import { errorMessage } from "../errors.js";
import type { GogRunner } from "../gogcli/runner.js";
import { logger } from "../logger.js";
import { toCallToolResult } from "../tools/registry.js";
import type { Tool, ToolRegistry } from "../tools/registry.js";

export const SERVER_NAME = "google-workspace";
export const SERVER_VERSION = "0.3.0";

export interface ServerOptions {
  registry: ToolRegistry;
  backend: Backend;
  version?: string;
  gog?: GogRunner;
}

/** Service prefixes of the registered tools: gmail, sheets, ... */
export function servicesOf(registry: ToolRegistry): string[] {
  return [...new Set(registry.names().map((name) => name.split("_")[0]))].sort();
}

export function describeServer(options: ServerOptions): string {
  const services = servicesOf(options.registry);
  return [
    `${SERVER_NAME} MCP server v${options.version ?? SERVER_VERSION}`,
    `Backend: ${options.backend}`,
    `Services: ${services.join(", ")}`,
    `Tools: ${options.registry.size}`,
  ].join("\n");
}

const objectSchema = z.object({
  properties: z.record(z.object({}).passthrough()).default({}),
  required: z.array(z.string()).optional(),
});

/** JSON Schema advertised in tools/list for a tool's argument shape. */
export function inputSchemaOf(tool: Tool): McpTool["inputSchema"] {
  const { properties, required } = objectSchema.parse(
    zodToJsonSchema(z.object(tool.shape), { $refStrategy: "none" })
  );
  return { type: "object", properties, ...(required && required.length > 0 ? { required } : {}) };
}

export function createServer(options: ServerOptions): McpServer {
  const { registry, backend, gog } = options;
  const version = options.version ?? SERVER_VERSION;

  const server = new McpServer({ name: SERVER_NAME, version });

  // Tools go through the registry so argument errors come back as tool results, not protocol errors.
  server.server.registerCapabilities({ tools: {} });
  server.server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.list().map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: inputSchemaOf(tool),
    })),
  }));
  server.server.setRequestHandler(CallToolRequestSchema, async (request) =>
    toCallToolResult(await registry.call(request.params.name, request.params.arguments ?? {}))
  );

  server.resource("info", "workspace://info", async (uri) => ({
    contents: [{ uri: uri.href, mimeType: "text/plain", text: describeServer(options) }],
  }));

  server.resource("stats", "workspace://stats", async (uri) => ({
    contents: [
      {
        uri: uri.href,
        mimeType: "application/json",
        text: JSON.stringify(
          {
            server: SERVER_NAME,
            version,
            backend,
            services: servicesOf(registry),
            tools: registry.size,
            timestamp: new Date().toISOString(),
          },
          null,
          2
        ),
      },
    ],
  }));

  if (gog) {
    server.resource("gogcli-version", "workspace://gogcli-version", async (uri) => {
      let text: string;
      try {
        text = await gog.version();
      } catch (error) {
        logger.warn({ error: errorMessage(error) }, "gogcli version check failed");
        text = `gogcli unavailable: ${errorMessage(error)}`;
      }
      return { contents: [{ uri: uri.href, mimeType: "text/plain", text }] };
    });
  }

  return server;
}
