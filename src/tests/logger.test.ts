import {
  formatLogLine,
  memorySink,
  NullLogger,
  parseLogLevel,
  StructuredLogger,
} from "../logger.js";
import { combineObservers, loggerProgressObserver } from "../progress.js";

describe("logger", () => {
  test("formats a line with level marker, scope and metadata", () => {
    expect(
      formatLogLine({
        ts: 0,
        level: "warn",
        scope: "x",
        message: "m",
        meta: { a: 1 },
      }),
    ).toBe('⚠️ [x] m {"a":1}');
    expect(formatLogLine({ ts: 0, level: "debug", message: "plain" })).toBe(
      "· plain",
    );
  });

  test("children extend the scope and share the sink", () => {
    const sink = memorySink();
    const root = new StructuredLogger({ scope: "scan", sink, clock: () => 42 });
    root.child("digest").info("started", { workers: 2 });
    expect(sink.entries).toEqual([
      {
        ts: 42,
        level: "info",
        scope: "scan.digest",
        message: "started",
        meta: { workers: 2 },
      },
    ]);
  });

  test("entries below the minimum level are dropped", () => {
    const sink = memorySink();
    const logger = new StructuredLogger({ sink, minLevel: "warn" });
    logger.info("quiet");
    logger.error("loud");
    expect(sink.entries.map((e) => e.message)).toEqual(["loud"]);
    expect(logger.isLevelEnabled("debug")).toBe(false);
  });

  test("echo goes to the writer only at or above its level", () => {
    const echoed: string[] = [];
    const logger = new StructuredLogger({
      echo: { minLevel: "warn", writer: (e) => echoed.push(e.message) },
    });
    logger.info("not echoed");
    logger.warn("echoed");
    expect(echoed).toEqual(["echoed"]);
  });

  test("parseLogLevel falls back on unknown input", () => {
    expect(parseLogLevel(" DEBUG ")).toBe("debug");
    expect(parseLogLevel("chatty")).toBe("info");
    expect(parseLogLevel(undefined, "warn")).toBe("warn");
  });

  test("the null logger ignores everything", () => {
    const logger = new NullLogger();
    expect(logger.child("x")).toBe(logger);
    expect(logger.isLevelEnabled("error")).toBe(false);
  });
});

describe("progress observers", () => {
  test("the logging observer throttles progress lines per interval", () => {
    const sink = memorySink();
    let now = 0;
    const observer = loggerProgressObserver(new StructuredLogger({ sink }), {
      intervalMs: 1000,
      clock: () => now,
    });
    observer.stageStart?.("partial", 4);
    for (const t of [100, 900, 1200, 1500, 2400]) {
      now = t;
      observer.progress?.({ stage: "partial", completedFiles: t / 100, totalFiles: 40 });
    }
    observer.stageEnd?.("partial", 2);
    expect(sink.entries.map((e) => e.message)).toEqual([
      "stage start",
      "progress",
      "progress",
      "stage complete",
    ]);
    expect(sink.entries[1].meta).toMatchObject({ completedFiles: 12, percent: 30 });
    expect(sink.entries[2].meta).toMatchObject({ completedFiles: 24, percent: 60 });
  });

  test("combined observers all see every event", () => {
    const a: string[] = [];
    const b: string[] = [];
    const both = combineObservers(
      { stageStart: (s) => a.push(s) },
      undefined,
      { stageStart: (s) => b.push(s), stageEnd: (s) => b.push(`${s}!`) },
    );
    both.stageStart?.("walk");
    both.stageEnd?.("walk", 0);
    expect(a).toEqual(["walk"]);
    expect(b).toEqual(["walk", "walk!"]);
  });
});
