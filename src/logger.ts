import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import type { LogLevel } from "./config.js";

const validLevels = new Set<string>(["debug", "info", "warn", "error", "fatal"]);

function resolveLevel(value: string | undefined): LogLevel {
  switch (value) {
    case "debug":
    case "info":
    case "warn":
    case "error":
    case "fatal":
      return value;
    default:
      return "info";
  }
}

function createPinoOptions(level: LogLevel): pino.LoggerOptions {
  return {
    name: "workspace-mcp",
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    messageKey: "message",
    formatters: {
      level(label) {
        return { level: label };
      },
    },
  };
}

// stdout belongs to the stdio transport, so logs go to stderr.
export const logger: Logger = pino(
  createPinoOptions(resolveLevel(process.env.LOG_LEVEL)),
  pino.destination(2)
);

export function setLogLevel(level: string): void {
  if (validLevels.has(level)) {
    logger.level = level;
  }
}

export function createToolLogger(tool: string, callId: string): Logger {
  return logger.child({ tool, callId });
}

/** Test helper: create a logger writing to a custom destination */
export function createLoggerWithDestination(
  destination: DestinationStream,
  level: LogLevel = "debug"
): Logger {
  return pino(createPinoOptions(level), destination);
}
