export type ErrorCode =
  | "validation"
  | "config"
  | "authentication"
  | "command_not_found"
  | "command_failed"
  | "command_timeout"
  | "upstream"
  | "unknown_tool"
  | "internal";

export class WorkspaceError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = "WorkspaceError";
    this.code = code;
  }
}

export class ValidationError extends WorkspaceError {
  constructor(message: string) {
    super("validation", message);
    this.name = "ValidationError";
  }
}

export class ConfigError extends WorkspaceError {
  constructor(message: string) {
    super("config", message);
    this.name = "ConfigError";
  }
}

export class AuthenticationError extends WorkspaceError {
  constructor(message: string) {
    super("authentication", message);
    this.name = "AuthenticationError";
  }
}

export class CommandNotFoundError extends WorkspaceError {
  readonly command: string;

  constructor(command: string, hint?: string) {
    super(
      "command_not_found",
      hint ? `${command} not found. ${hint}` : `${command} not found`
    );
    this.name = "CommandNotFoundError";
    this.command = command;
  }
}

export class CommandFailedError extends WorkspaceError {
  readonly exitCode: number;

  constructor(message: string, exitCode: number) {
    super("command_failed", message || `Command exited with code ${exitCode}`);
    this.name = "CommandFailedError";
    this.exitCode = exitCode;
  }
}

export class CommandTimeoutError extends WorkspaceError {
  readonly timeoutSeconds: number;

  constructor(timeoutSeconds: number) {
    super("command_timeout", `Command timed out after ${timeoutSeconds} seconds`);
    this.name = "CommandTimeoutError";
    this.timeoutSeconds = timeoutSeconds;
  }
}

/** A Google (or Maps) API call failed; the message is the upstream text. */
export class UpstreamError extends WorkspaceError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super("upstream", message);
    this.name = "UpstreamError";
    this.status = status;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function errorCode(error: unknown): ErrorCode {
  if (error instanceof WorkspaceError) return error.code;
  return "upstream";
}
