// pattern: Imperative Shell

import { createLogger, type LogLevel, parseLogLevel } from "./config.js";

import type { Logger } from "pino";

// Shared logger instance, created on first use
let LOGGER: Logger | undefined;

/**
 * The logger every policy and transport falls back to
 * Level comes from PIPEWRIGHT_LOG_LEVEL, defaulting to warn
 */
export function getPipelineLogger(): Logger {
  if (!LOGGER) {
    LOGGER = createLogger({
      level: parseLogLevel(process.env["PIPEWRIGHT_LOG_LEVEL"], "warn"),
    });
  }
  return LOGGER;
}

// Replace the shared logger, e.g. with the host application's own
export function setPipelineLogger(logger: Logger): void {
  LOGGER = logger;
}

// Set the log level on the shared logger
export function setPipelineLogLevel(level: LogLevel): void {
  getPipelineLogger().level = level;
}

/**
 * Child logger tagged with the component name, or the caller's own logger
 */
export function componentLogger(
  component: string,
  logger?: Logger
): Logger {
  return (logger ?? getPipelineLogger()).child({ component });
}
