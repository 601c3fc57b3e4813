import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const DEFAULT_PORT = 9001;
export const DEFAULT_PASSPHRASE_PROMPT = "Enter passphrase";

export type Backend = "gogcli" | "api";
export type PassphraseMode = "expect" | "direct";
export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== "" ? v.trim() : undefined));

const envSchema = z.object({
  WORKSPACE_MCP_BACKEND: z.enum(["gogcli", "api"]).default("gogcli"),
  WORKSPACE_MCP_PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  WORKSPACE_MCP_HOST: z.string().default("0.0.0.0"),
  WORKSPACE_MCP_PID_FILE: z.string().default(".workspace-mcp.pid"),
  WORKSPACE_MCP_LOG_FILE: optionalString,
  WORKSPACE_MCP_EXPORT_DIR: optionalString,
  GOGCLI_BIN: z.string().min(1).default("gogcli"),
  GOGCLI_ACCOUNT: optionalString,
  GOGCLI_TIMEOUT: z.coerce.number().int().positive().default(60),
  GOGCLI_PASSPHRASE_MODE: z.enum(["expect", "direct"]).default("expect"),
  GOGCLI_PASSPHRASE_PROMPT: z.string().min(1).default(DEFAULT_PASSPHRASE_PROMPT),
  EXPECT_BIN: z.string().min(1).default("expect"),
  GOOGLE_OAUTH_CLIENT_ID: optionalString,
  GOOGLE_OAUTH_CLIENT_SECRET: optionalString,
  GOOGLE_TOKEN_FILE: z.string().default("token.json"),
  GOOGLE_ACCOUNTS_DIR: z.string().default("accounts"),
  GOOGLE_MAPS_API_KEY: optionalString,
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "fatal"]).default("info"),
});

export interface Config {
  backend: Backend;
  server: {
    port: number;
    host: string;
    pidFile: string;
    logFile?: string;
  };
  gogcli: {
    bin: string;
    account?: string;
    timeoutSeconds: number;
    passphraseMode: PassphraseMode;
    passphrasePrompt: string;
    expectBin: string;
  };
  google: {
    clientId?: string;
    clientSecret?: string;
    tokenFile: string;
    accountsDir: string;
    exportDir: string;
  };
  mapsApiKey?: string;
  logLevel: LogLevel;
}

/**
 * Build the runtime configuration from environment variables. Blank values
 * count as unset so a half-filled `.env` behaves like a missing key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const blanksRemoved = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v !== "")
  );
  const parsed = envSchema.safeParse(blanksRemoved);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue.path.join(".");
    throw new ConfigError(`Invalid ${key}: ${issue.message}`);
  }
  const e = parsed.data;

  return {
    backend: e.WORKSPACE_MCP_BACKEND,
    server: {
      port: e.WORKSPACE_MCP_PORT,
      host: e.WORKSPACE_MCP_HOST,
      pidFile: e.WORKSPACE_MCP_PID_FILE,
      logFile: e.WORKSPACE_MCP_LOG_FILE,
    },
    gogcli: {
      bin: e.GOGCLI_BIN,
      account: e.GOGCLI_ACCOUNT,
      timeoutSeconds: e.GOGCLI_TIMEOUT,
      passphraseMode: e.GOGCLI_PASSPHRASE_MODE,
      passphrasePrompt: e.GOGCLI_PASSPHRASE_PROMPT,
      expectBin: e.EXPECT_BIN,
    },
    google: {
      clientId: e.GOOGLE_OAUTH_CLIENT_ID,
      clientSecret: e.GOOGLE_OAUTH_CLIENT_SECRET,
      tokenFile: e.GOOGLE_TOKEN_FILE,
      accountsDir: e.GOOGLE_ACCOUNTS_DIR,
      exportDir:
        e.WORKSPACE_MCP_EXPORT_DIR ?? path.join(os.tmpdir(), "workspace-mcp"),
    },
    mapsApiKey: e.GOOGLE_MAPS_API_KEY,
    logLevel: e.LOG_LEVEL,
  };
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Invalid port: ${value}`);
  }
  return port;
}
