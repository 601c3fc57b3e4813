import { execFile } from "node:child_process";
import { CommandNotFoundError } from "../errors.js";

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface RunOptions {
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
}

export interface ProcessExecutor {
  run(file: string, args: string[], options: RunOptions): Promise<ProcessResult>;
}

const MAX_BUFFER = 32 * 1024 * 1024;

/**
 * Runs a binary without a shell. Resolves for any exit status; rejects only
 * when the binary cannot be started at all.
 */
export const execFileExecutor: ProcessExecutor = {
  run(file, args, options) {
    return new Promise((resolve, reject) => {
      execFile(
        file,
        args,
        {
          timeout: options.timeoutMs,
          env: options.env ?? process.env,
          maxBuffer: MAX_BUFFER,
          encoding: "utf8",
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ exitCode: 0, stdout, stderr, timedOut: false });
            return;
          }

          const code: unknown = error.code;
          if (code === "ENOENT") {
            reject(new CommandNotFoundError(file));
            return;
          }

          resolve({
            exitCode: typeof code === "number" ? code : 1,
            stdout,
            stderr,
            timedOut: error.killed === true,
          });
        }
      );
    });
  },
};
