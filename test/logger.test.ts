import { describe, expect, it } from "vitest";
import {
  createLogger,
  isLogLevel,
  type LogEntry,
  silentLogger,
} from "../src/logger.ts";

function capture(level: "debug" | "info" | "warn" | "error" = "info") {
  const entries: LogEntry[] = [];
  const logger = createLogger("test", {
    level,
    now: () => new Date("2024-01-01T00:00:00.000Z"),
    write: (entry) => entries.push(entry),
  });
  return { entries, logger };
}

describe("createLogger", () => {
  it("writes structured entries with component and metadata", () => {
    const { entries, logger } = capture();
    logger.info("Listening", { port: 8086 });
    expect(entries).toEqual([
      {
        component: "test",
        level: "info",
        message: "Listening",
        port: 8086,
        timestamp: "2024-01-01T00:00:00.000Z",
      },
    ]);
  });

  it("drops entries below the minimum level", () => {
    const { entries, logger } = capture("warn");
    logger.debug("noise");
    logger.info("noise");
    logger.warn("careful");
    logger.error("broken");
    expect(entries.map((entry) => entry.level)).toEqual(["warn", "error"]);
  });

  it("merges child context into every entry", () => {
    const { entries, logger } = capture();
    const child = logger.child({ connection: 3 }).child({ peer: "10.0.0.2" });
    child.warn("Closed");
    expect(entries[0]).toMatchObject({
      component: "test",
      connection: 3,
      message: "Closed",
      peer: "10.0.0.2",
    });
  });

  it("does not let metadata override level or message", () => {
    const { entries, logger } = capture();
    logger.info("real", { level: "error", message: "fake" });
    expect(entries[0]).toMatchObject({ level: "info", message: "real" });
  });
});

describe("isLogLevel", () => {
  it("recognises the four levels only", () => {
    expect(["debug", "info", "warn", "error"].every(isLogLevel)).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
  });
});

describe("silentLogger", () => {
  it("returns itself as child", () => {
    expect(silentLogger.child({ component: "x" })).toBe(silentLogger);
  });
});
