import { describe, it, expect, afterEach, vi } from "vitest";
import { createLogger } from "./logger";

function capture(): { lines: Array<string>; write: (msg: string) => void } {
  const lines: Array<string> = [];
  return {
    lines,
    write: (msg: string) => {
      lines.push(msg);
    },
  };
}

describe("createLogger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should emit JSON lines with a string level and ISO timestamp", () => {
    const sink = capture();
    const logger = createLogger("info", sink);

    logger.info({ names: 2 }, "extraction complete");

    const entry = JSON.parse(sink.lines[0] ?? "{}");
    expect(entry.level).toBe("info");
    expect(entry.msg).toBe("extraction complete");
    expect(entry.names).toBe(2);
    expect(new Date(entry.time).toISOString()).toBe(entry.time);
  });

  it("should drop messages below the configured level", () => {
    const sink = capture();
    const logger = createLogger("warn", sink);

    logger.info("ignored");
    logger.warn("kept");

    expect(sink.lines).toHaveLength(1);
    expect(JSON.parse(sink.lines[0] ?? "{}").msg).toBe("kept");
  });

  it("should read the level from LOG_LEVEL when none is given", () => {
    vi.stubEnv("LOG_LEVEL", "error");

    const logger = createLogger(undefined, capture());

    expect(logger.level).toBe("error");
  });

  it("should default to info", () => {
    const original = process.env["LOG_LEVEL"];
    delete process.env["LOG_LEVEL"];

    try {
      const logger = createLogger(undefined, capture());
      expect(logger.level).toBe("info");
    } finally {
      if (original !== undefined) process.env["LOG_LEVEL"] = original;
    }
  });
});
