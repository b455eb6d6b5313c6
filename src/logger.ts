import { pino, type Logger, type LoggerOptions } from "pino";

export type { Logger } from "pino";

/**
 * Creates a pino logger for the planner.
 *
 * The level defaults to `LOG_LEVEL` from the environment, then `info`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: "submission-planner",
    level: process.env["LOG_LEVEL"] ?? "info",
    ...options,
  });
}

/** Shared logger used when a strategy is not given its own. */
export const logger: Logger = createLogger();
