// pattern: Functional Core

import { describe, expect, it } from "vitest";

import { createLogger, parseLogLevel } from "./config.js";

describe("parseLogLevel", () => {
  it("should accept known levels in any case", () => {
    expect(parseLogLevel(" DEBUG ", "warn")).toBe("debug");
    expect(parseLogLevel("silent", "warn")).toBe("silent");
  });

  it("should fall back on missing or unknown values", () => {
    expect(parseLogLevel(undefined, "info")).toBe("info");
    expect(parseLogLevel("verbose", "error")).toBe("error");
  });
});

describe("createLogger", () => {
  function capture(level?: "info" | "error"): { lines: string[]; logger: ReturnType<typeof createLogger> } {
    const lines: string[] = [];
    const logger = createLogger({
      level,
      destination: {
        write(chunk: string): void {
          lines.push(chunk);
        },
      },
    });
    return { lines, logger };
  }

  it("should default to warn and name the logger", () => {
    const { lines, logger } = capture();

    logger.info("hidden");
    logger.warn("shown");

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({ level: 40, name: "pipewright", msg: "shown" });
  });

  it("should serialize errors and other thrown values", () => {
    const { lines, logger } = capture("error");

    logger.error({ err: new RangeError("out of range") }, "first");
    logger.error({ err: "plain string" }, "second");

    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      err: { type: "RangeError", message: "out of range" },
    });
    expect(JSON.parse(lines[1] ?? "{}")).toMatchObject({ err: { message: "plain string" } });
  });
});
