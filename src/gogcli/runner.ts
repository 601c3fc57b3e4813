import type { Logger } from "pino";
import type { PassphraseMode } from "../config.js";
import {
  CommandFailedError,
  CommandNotFoundError,
  CommandTimeoutError,
} from "../errors.js";
import { logger as rootLogger } from "../logger.js";
import { execFileExecutor } from "./executor.js";
import type { ProcessExecutor, ProcessResult } from "./executor.js";
import { buildExpectScript, cleanTranscript, EXPECT_TIMEOUT_EXIT } from "./expect.js";

export const GOGCLI_INSTALL_HINT =
  "Install it from https://github.com/steipete/gogcli/releases";

// Grace period on top of the script's own timeout so expect can report first.
const EXPECT_GRACE_SECONDS = 5;

export interface GogRunnerOptions {
  bin: string;
  defaultAccount?: string;
  timeoutSeconds: number;
  passphraseMode: PassphraseMode;
  passphrasePrompt: string;
  expectBin: string;
  executor?: ProcessExecutor;
  logger?: Logger;
}

export interface GogCallOptions {
  account?: string;
  timeoutSeconds?: number;
}

export type GogOutput = { output: string } | Record<string, unknown> | unknown[];

/** JSON output is passed through parsed; anything else is wrapped as text. */
export function parseGogOutput(text: string): GogOutput {
  if (text.startsWith("{") || text.startsWith("[")) {
    try {
      const parsed: unknown = JSON.parse(text);
      if (Array.isArray(parsed)) return parsed;
      if (parsed !== null && typeof parsed === "object") {
        return Object.fromEntries(Object.entries(parsed));
      }
    } catch {
      // not JSON after all; fall through to plain text
    }
  }
  return { output: text };
}

export class GogRunner {
  private readonly executor: ProcessExecutor;
  private readonly log: Logger;

  constructor(private readonly options: GogRunnerOptions) {
    this.executor = options.executor ?? execFileExecutor;
    this.log = options.logger ?? rootLogger.child({ component: "gogcli" });
  }

  get bin(): string {
    return this.options.bin;
  }

  /** Arguments after the binary: `<service> <command> [--account a] ...args` */
  argv(service: string, command: string, args: string[], account?: string): string[] {
    const acc = account ?? this.options.defaultAccount;
    return [service, command, ...(acc ? ["--account", acc] : []), ...args];
  }

  async run(
    service: string,
    command: string,
    args: string[],
    call: GogCallOptions = {}
  ): Promise<GogOutput> {
    const argv = this.argv(service, command, args, call.account);
    const timeout = call.timeoutSeconds ?? this.options.timeoutSeconds;
    const text =
      this.options.passphraseMode === "expect"
        ? await this.runWithPassphrase(argv, timeout)
        : await this.runDirect(argv, timeout);
    return parseGogOutput(text);
  }

  async version(): Promise<string> {
    return this.runDirect(["--version"], 10);
  }

  private async runDirect(argv: string[], timeoutSeconds: number): Promise<string> {
    this.log.debug({ argv }, "running gogcli");
    let result: ProcessResult;
    try {
      result = await this.executor.run(this.options.bin, argv, {
        timeoutMs: timeoutSeconds * 1000,
      });
    } catch (error) {
      if (error instanceof CommandNotFoundError) {
        throw new CommandNotFoundError(this.options.bin, GOGCLI_INSTALL_HINT);
      }
      throw error;
    }

    if (result.timedOut) {
      throw new CommandTimeoutError(timeoutSeconds);
    }
    if (result.exitCode !== 0) {
      throw new CommandFailedError(
        result.stderr.trim() || result.stdout.trim(),
        result.exitCode
      );
    }
    return result.stdout.trim();
  }

  private async runWithPassphrase(argv: string[], timeoutSeconds: number): Promise<string> {
    const { expectBin, passphrasePrompt } = this.options;
    const script = buildExpectScript({
      argv: [this.options.bin, ...argv],
      prompt: passphrasePrompt,
      timeoutSeconds,
    });

    this.log.debug({ argv }, "running gogcli under expect");
    let result: ProcessResult;
    try {
      result = await this.executor.run(expectBin, ["-c", script], {
        timeoutMs: (timeoutSeconds + EXPECT_GRACE_SECONDS) * 1000,
      });
    } catch (error) {
      if (error instanceof CommandNotFoundError) {
        this.log.warn({ expectBin }, "expect not found, running gogcli directly");
        return this.runDirect(argv, timeoutSeconds);
      }
      throw error;
    }

    if (result.timedOut || result.exitCode === EXPECT_TIMEOUT_EXIT) {
      throw new CommandTimeoutError(timeoutSeconds);
    }

    const output = cleanTranscript(result.stdout, passphrasePrompt);
    if (result.exitCode !== 0) {
      const message = result.stderr.trim() || output;
      if (message.includes("couldn't execute")) {
        throw new CommandNotFoundError(this.options.bin, GOGCLI_INSTALL_HINT);
      }
      throw new CommandFailedError(message, result.exitCode);
    }
    return output;
  }
}
