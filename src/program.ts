import { Command, Option } from "commander";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig, parsePort } from "./config.js";
import type { Config } from "./config.js";
import { ConfigError } from "./errors.js";
import { logger, setLogLevel } from "./logger.js";
import { authProvider, buildRuntime } from "./runtime.js";
import type { Runtime, RuntimeOverrides } from "./runtime.js";
import { detach, releasePidFile, stopDetached } from "./server/detach.js";
import type { DetachOptions, DetachResult, StopResult } from "./server/detach.js";
import { createHttpApp, listen } from "./server/http.js";
import { SERVER_VERSION, createServer } from "./server/server.js";

interface RootOptions {
  serverOnly?: string | true;
  port?: string;
  detach?: boolean;
  backend?: string;
}

export interface ProgramDeps {
  env?: NodeJS.ProcessEnv;
  /** Line writer for command output (stdout by default). */
  out?: (line: string) => void;
  overrides?: RuntimeOverrides;
  detach?: (options: DetachOptions) => Promise<DetachResult>;
  stop?: (pidFile: string) => Promise<StopResult>;
  /** Arguments and script path the foreground process was started with. */
  argv?: string[];
}

function resolvePort(opts: RootOptions): string | undefined {
  if (typeof opts.serverOnly === "string") return opts.serverOnly;
  return opts.port;
}

/** Environment config with command-line overrides applied on top. */
export function configFor(opts: RootOptions, env: NodeJS.ProcessEnv): Config {
  const port = resolvePort(opts);
  if (port !== undefined) parsePort(port);
  const config = loadConfig({
    ...env,
    ...(opts.backend ? { WORKSPACE_MCP_BACKEND: opts.backend } : {}),
    ...(port !== undefined ? { WORKSPACE_MCP_PORT: port } : {}),
  });
  setLogLevel(config.logLevel);
  return config;
}

function serverFor(runtime: Runtime) {
  return createServer({ registry: runtime.registry, backend: runtime.backend, gog: runtime.gog });
}

async function serveStdio(config: Config, overrides?: RuntimeOverrides): Promise<void> {
  const runtime = buildRuntime(config, overrides);
  const server = serverFor(runtime);
  await server.connect(new StdioServerTransport());
  logger.info({ backend: runtime.backend, tools: runtime.registry.size }, "serving over stdio");
}

async function serveHttp(config: Config, overrides?: RuntimeOverrides): Promise<void> {
  const runtime = buildRuntime(config, overrides);
  const { app } = createHttpApp({ createServer: () => serverFor(runtime), backend: runtime.backend });
  const http = await listen(app, config.server.port, config.server.host);
  logger.info(
    {
      host: config.server.host,
      port: config.server.port,
      backend: runtime.backend,
      tools: runtime.registry.size,
    },
    "serving over sse"
  );

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "shutting down");
    http.close();
    releasePidFile(config.server.pidFile)
      .catch((error: unknown) => logger.warn({ err: error }, "failed to remove pid file"))
      .finally(() => process.exit(0));
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const env = deps.env ?? process.env;
  const out = deps.out ?? ((line: string) => process.stdout.write(`${line}\n`));
  const program = new Command();
  const rootOptions = () => program.opts<RootOptions>();

  program
    .name("workspace-mcp")
    .description("MCP server exposing Gmail, Sheets, Docs, Slides, Drive, Calendar and Maps tools")
    .version(SERVER_VERSION)
    .option("--server-only [port]", "Serve MCP over HTTP/SSE instead of stdio")
    .option("--port <port>", "HTTP port for --server-only")
    .option("--detach", "With --server-only: start in the background and return")
    .addOption(
      new Option("--backend <backend>", "Tool backend").choices(["gogcli", "api"])
    )
    .action(async (opts: RootOptions) => {
      if (opts.serverOnly === undefined) {
        if (opts.detach) {
          throw new ConfigError("--detach requires --server-only");
        }
        await serveStdio(configFor(opts, env), deps.overrides);
        return;
      }

      const config = configFor(opts, env);
      if (!opts.detach) {
        await serveHttp(config, deps.overrides);
        return;
      }

      const [script = "", ...argv] = deps.argv ?? process.argv.slice(1);
      const result = await (deps.detach ?? detach)({
        argv,
        script,
        host: config.server.host,
        port: config.server.port,
        pidFile: config.server.pidFile,
        logFile: config.server.logFile,
      });
      out(
        result.ready
          ? `Server running in background (pid ${result.pid}) at ${result.url}`
          : `Server started (pid ${result.pid}) but ${result.url} did not answer yet`
      );
      out(`Stop it with: workspace-mcp stop`);
    });

  program
    .command("auth [account]")
    .description("Authorize a Google account for the api backend")
    .action(async (account?: string) => {
      const config = configFor(rootOptions(), env);
      const file = await authProvider(config).authorize(account);
      out(`Saved token to ${file}`);
    });

  program
    .command("tools")
    .description("List the tools the configured backend exposes")
    .option("--json", "Output as JSON")
    .action((opts: { json?: boolean }) => {
      const config = configFor(rootOptions(), env);
      const names = buildRuntime(config, deps.overrides).registry.names();
      if (opts.json) {
        out(JSON.stringify({ backend: config.backend, tools: names }, null, 2));
        return;
      }
      for (const name of names) out(name);
    });

  program
    .command("stop")
    .description("Stop a server started with --detach")
    .action(async () => {
      const config = configFor(rootOptions(), env);
      const result = await (deps.stop ?? stopDetached)(config.server.pidFile);
      out(result.message);
    });

  return program;
}
