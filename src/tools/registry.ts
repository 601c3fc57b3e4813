import { z } from "zod";
import { nanoid } from "nanoid";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { Logger } from "pino";
import { errorCode, errorMessage, ValidationError } from "../errors.js";
import type { ErrorCode } from "../errors.js";
import { createToolLogger, logger as rootLogger } from "../logger.js";

export type ToolResponse =
  | { success: true; data: unknown }
  | { success: false; error: string; code: ErrorCode };

export interface ToolDefinition<S extends z.ZodRawShape> {
  name: string;
  description: string;
  args: S;
  run: (args: z.infer<z.ZodObject<S>>) => Promise<unknown>;
}

export interface Tool {
  name: string;
  description: string;
  shape: z.ZodRawShape;
  invoke(raw: unknown, log?: Logger): Promise<ToolResponse>;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const key = issue.path.join(".");
      if (issue.code === "invalid_type" && issue.received === "undefined") {
        return `Missing required argument: ${key}`;
      }
      return key ? `Invalid argument ${key}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

export function failure(error: unknown): ToolResponse {
  return { success: false, error: errorMessage(error), code: errorCode(error) };
}

export function defineTool<S extends z.ZodRawShape>(definition: ToolDefinition<S>): Tool {
  const schema = z.object(definition.args);

  return {
    name: definition.name,
    description: definition.description,
    shape: definition.args,
    async invoke(raw, log = rootLogger) {
      const parsed = schema.safeParse(raw ?? {});
      if (!parsed.success) {
        const error = new ValidationError(formatIssues(parsed.error));
        log.warn({ error: error.message }, "tool arguments rejected");
        return failure(error);
      }

      try {
        const data = await definition.run(parsed.data);
        return { success: true, data: data ?? null };
      } catch (error) {
        log.warn({ error: errorMessage(error), code: errorCode(error) }, "tool failed");
        return failure(error);
      }
    },
  };
}

export class ToolRegistry {
  private tools = new Map<string, Tool>();

  add(...tools: Tool[]): this {
    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        throw new Error(`Duplicate tool name: ${tool.name}`);
      }
      this.tools.set(tool.name, tool);
    }
    return this;
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  names(): string[] {
    return [...this.tools.keys()].sort();
  }

  list(): Tool[] {
    return [...this.tools.values()];
  }

  get size(): number {
    return this.tools.size;
  }

  async call(name: string, args: unknown): Promise<ToolResponse> {
    const tool = this.tools.get(name);
    if (!tool) {
      return { success: false, error: `Unknown tool: ${name}`, code: "unknown_tool" };
    }

    const log = createToolLogger(name, nanoid(8));
    log.debug("tool call started");
    const started = Date.now();
    const response = await tool.invoke(args, log);
    if (response.success) {
      log.info({ ms: Date.now() - started }, "tool call finished");
    }
    return response;
  }
}

export function toCallToolResult(response: ToolResponse): CallToolResult {
  return {
    content: [
      {
        type: "text" as const,
        text: JSON.stringify(response, null, 2),
      },
    ],
    ...(response.success ? {} : { isError: true }),
  };
}
