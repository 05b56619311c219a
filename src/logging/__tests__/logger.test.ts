import { describe, it, expect, vi, afterEach } from "vitest";
import { consoleLogger, createMemoryLogger, createRunLogger, describeError } from "../logger.js";

describe("createRunLogger", () => {
  afterEach(() => vi.useRealTimers());

  it("stamps entries with the time and the run id", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-02T03:04:05.000Z"));
    const sink = createMemoryLogger();
    createRunLogger(sink, "run-7").emit("warn", "chunk:forced", { reason: "iteration cap" }, 2);
    expect(sink.entries).toEqual([
      {
        timestamp: Date.parse("2026-01-02T03:04:05.000Z"),
        level: "warn",
        event: "chunk:forced",
        runId: "run-7",
        chunkIndex: 2,
        data: { reason: "iteration cap" },
      },
    ]);
  });
});

describe("consoleLogger", () => {
  afterEach(() => vi.restoreAllMocks());

  it("prints a timestamped line", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleLogger({
      timestamp: Date.parse("2026-01-02T03:04:05.000Z"),
      level: "info",
      event: "chunk:start",
      runId: "run-1",
      chunkIndex: 0,
      data: { length: 12 },
    });
    expect(spy).toHaveBeenCalledWith("[2026-01-02T03:04:05.000Z] [info] chunk:start chunk=0", { length: 12 });
  });

  it("omits the chunk for run-level events", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleLogger({ timestamp: 0, level: "info", event: "run:start", runId: "run-1" });
    expect(spy).toHaveBeenCalledWith("[1970-01-01T00:00:00.000Z] [info] run:start", "");
  });
});

describe("describeError", () => {
  it("keeps the name and message of errors", () => {
    expect(describeError(new TypeError("bad"))).toEqual({ name: "TypeError", message: "bad" });
    expect(describeError("plain")).toBe("plain");
  });
});
