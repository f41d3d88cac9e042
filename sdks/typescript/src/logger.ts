import pino from "pino";
import type { DestinationStream, Logger } from "pino";

export type LogLevel = "silent" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const validLevels = new Set<string>(["silent", "trace", "debug", "info", "warn", "error", "fatal"]);

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && validLevels.has(value);
}

/** Level from LOG_LEVEL; a library stays quiet unless asked. */
export function resolveLogLevel(envLevel: string | undefined = process.env.LOG_LEVEL): LogLevel {
  return isLogLevel(envLevel) ? envLevel : "silent";
}

function createPinoOptions(level: LogLevel): pino.LoggerOptions {
  return {
    name: "band-cloud",
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

export const logger: Logger = pino(createPinoOptions(resolveLogLevel()));

/** Test helper: create a logger writing to a custom destination */
export function createLoggerWithDestination(destination: DestinationStream, level: LogLevel = "debug"): Logger {
  return pino(createPinoOptions(level), destination);
}
