/**
 * Structured logger
 *
 * pino-based logger shared by the engine and the CLI. Progress goes to
 * stderr so the run summary on stdout stays machine-readable.
 */

import pino from "pino";

export type Logger = pino.Logger;

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export function createLogger(level: LogLevel = "info"): Logger {
  return pino({ level, base: null }, pino.destination(2));
}

/** Logger that discards everything. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
