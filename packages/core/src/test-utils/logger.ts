// pattern: Imperative Shell

import pino, { type Logger } from "pino";

export interface LogLine {
  level: number;
  msg: string;
  component?: string;
  [key: string]: unknown;
}

export interface MemoryLogger {
  logger: Logger;
  lines: LogLine[];
  /** Lines with the given message */
  messages: (msg: string) => LogLine[];
}

function isLogLine(value: unknown): value is LogLine {
  return (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    typeof value.level === "number" &&
    "msg" in value &&
    typeof value.msg === "string"
  );
}

/**
 * pino logger that keeps its JSON lines in memory
 */
export function createMemoryLogger(level: pino.LevelWithSilent = "trace"): MemoryLogger {
  const lines: LogLine[] = [];
  const logger = pino(
    { level },
    {
      write(chunk: string): void {
        const parsed: unknown = JSON.parse(chunk);
        if (isLogLine(parsed)) {
          lines.push(parsed);
        }
      },
    }
  );
  return {
    logger,
    lines,
    messages: msg => lines.filter(line => line.msg === msg),
  };
}
