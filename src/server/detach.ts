import { spawn as nodeSpawn } from "node:child_process";
import type { ChildProcess, SpawnOptions } from "node:child_process";
import { open, readFile, rm, writeFile } from "node:fs/promises";
import type { Logger } from "pino";
import { WorkspaceError, errorMessage } from "../errors.js";
import { logger as rootLogger } from "../logger.js";

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildProcess;
export type ProbeFn = (url: string) => Promise<boolean>;
export type KillFn = (pid: number, signal: NodeJS.Signals) => void;

export interface DetachOptions {
  /** Arguments after the script, as given to the foreground process. */
  argv: string[];
  script: string;
  execPath?: string;
  execArgv?: string[];
  host: string;
  port: number;
  pidFile: string;
  logFile?: string;
  waitMs?: number;
  intervalMs?: number;
  spawn?: SpawnFn;
  probe?: ProbeFn;
  logger?: Logger;
}

export interface DetachResult {
  pid: number;
  ready: boolean;
  url: string;
}

const DEFAULT_WAIT_MS = 10_000;
const DEFAULT_INTERVAL_MS = 200;

/** The foreground arguments minus `--detach`, so the child runs the server in place. */
export function childArgs(argv: string[]): string[] {
  return argv.filter((arg) => arg !== "--detach");
}

export function healthUrl(host: string, port: number): string {
  const target = host === "0.0.0.0" || host === "::" ? "127.0.0.1" : host;
  return `http://${target}:${port}/health`;
}

export async function probeHealth(url: string, timeoutMs = 1000): Promise<boolean> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetch(url, { signal: controller.signal });
    return res.ok;
  } catch {
    return false;
  } finally {
    clearTimeout(timer);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Re-launch the server in its own session with no terminal attached, record
 * its pid and wait (bounded) for `/health` to answer. The caller exits
 * afterwards; the child keeps running.
 */
export async function detach(options: DetachOptions): Promise<DetachResult> {
  const log = (options.logger ?? rootLogger).child({ component: "detach" });
  const spawn = options.spawn ?? nodeSpawn;
  const probe = options.probe ?? ((url: string) => probeHealth(url));
  const waitMs = options.waitMs ?? DEFAULT_WAIT_MS;
  const intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;

  const output = options.logFile ? await open(options.logFile, "a") : undefined;
  let child: ChildProcess;
  try {
    child = spawn(
      options.execPath ?? process.execPath,
      [...(options.execArgv ?? process.execArgv), options.script, ...childArgs(options.argv)],
      {
        detached: true,
        stdio: output ? ["ignore", output.fd, output.fd] : "ignore",
        env: process.env,
      }
    );
  } finally {
    await output?.close();
  }

  const pid = child.pid;
  if (pid === undefined) {
    throw new WorkspaceError("internal", "Failed to start the background server");
  }
  const exit: { exited: boolean; code: number | null } = { exited: false, code: null };
  child.once("exit", (code: number | null) => {
    exit.exited = true;
    exit.code = code;
  });
  child.unref();

  await writeFile(options.pidFile, `${pid}\n`);
  log.info({ pid, pidFile: options.pidFile }, "server started in background");

  const url = healthUrl(options.host, options.port);
  const deadline = Date.now() + waitMs;
  let ready = false;
  while (!exit.exited && Date.now() < deadline) {
    if (await probe(url)) {
      ready = true;
      break;
    }
    await sleep(intervalMs);
  }

  if (exit.exited && !ready) {
    await rm(options.pidFile, { force: true });
    const where = options.logFile ? `; see ${options.logFile}` : "";
    throw new WorkspaceError(
      "internal",
      `Background server exited with code ${exit.code ?? "unknown"} before answering ${url}${where}`
    );
  }
  if (!ready) {
    log.warn({ pid, url }, "background server did not report healthy in time");
  }
  return { pid, ready, url };
}

/** Remove the pid file if it records this process; a foreground server leaves others alone. */
export async function releasePidFile(pidFile: string, pid = process.pid): Promise<boolean> {
  let text: string;
  try {
    text = await readFile(pidFile, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return false;
    throw error;
  }
  if (Number.parseInt(text.trim(), 10) !== pid) return false;
  await rm(pidFile, { force: true });
  return true;
}

export interface StopResult {
  stopped: boolean;
  pid?: number;
  message: string;
}

/** Send SIGTERM to the pid recorded by `detach` and remove the pid file. */
export async function stopDetached(
  pidFile: string,
  kill: KillFn = (pid, signal) => {
    process.kill(pid, signal);
  }
): Promise<StopResult> {
  let text: string;
  try {
    text = await readFile(pidFile, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return { stopped: false, message: `No pid file at ${pidFile}` };
    }
    throw error;
  }

  const pid = Number.parseInt(text.trim(), 10);
  if (!Number.isInteger(pid) || pid <= 0) {
    await rm(pidFile, { force: true });
    return { stopped: false, message: `Pid file ${pidFile} is invalid; removed it` };
  }

  try {
    kill(pid, "SIGTERM");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ESRCH") {
      await rm(pidFile, { force: true });
      return { stopped: false, pid, message: `Process ${pid} is not running; removed stale pid file` };
    }
    throw new WorkspaceError("internal", `Failed to stop process ${pid}: ${errorMessage(error)}`);
  }

  await rm(pidFile, { force: true });
  return { stopped: true, pid, message: `Stopped server (pid ${pid})` };
}
