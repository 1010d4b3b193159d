/**
 * Process-wide pino logger.
 *
 * Everything goes to stderr: stdout carries the JSON-RPC stream and must never
 * see a diagnostic line. Subsystems log through child loggers
 * (`getLogger("router")`).
 */

import pino from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

let rootLogger: pino.Logger | null = null;

function createLogger(level: LogLevel): pino.Logger {
  return pino(
    {
      name: "resolve-mcp",
      level,
      formatters: {
        level: (label: string) => ({ level: label.toUpperCase() }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2)
  );
}

/** Create (or replace) the root logger. Call once the config is known. */
export function initLogger(level: LogLevel): pino.Logger {
  rootLogger = createLogger(level);
  return rootLogger;
}

/**
 * Child logger for a subsystem. Before `initLogger` runs this falls back to a
 * warn-level root so early startup code and tests stay quiet.
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    rootLogger = createLogger("warn");
  }
  return rootLogger.child({ subsystem });
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}
