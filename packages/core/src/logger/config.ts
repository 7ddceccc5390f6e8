// pattern: Functional Core

import pino, { type DestinationStream, type Level, type Logger } from "pino";

export type LogLevel = Level | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  /** Where JSON lines go; stderr when omitted */
  destination?: DestinationStream;
}

export const LOG_LEVELS: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

/**
 * Narrow an arbitrary string (env var, config value) to a pino level
 * Unknown values fall back to the given default
 */
export function parseLogLevel(
  value: string | undefined,
  fallback: LogLevel
): LogLevel {
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find(level => level === normalized) ?? fallback;
}

// Create pino logger with stream configuration
export function createLogger(options: LoggerOptions = {}): Logger {
  const baseConfig: pino.LoggerOptions = {
    name: "pipewright",
    level: options.level ?? "warn",
    serializers: {
      err: (err: unknown) => {
        if (err instanceof Error) {
          return pino.stdSerializers.err(err);
        }
        return { message: String(err) };
      },
    },
  };

  return pino(baseConfig, options.destination ?? pino.destination(2));
}
