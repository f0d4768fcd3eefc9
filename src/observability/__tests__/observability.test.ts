import { afterEach, describe, expect, it, vi } from "vitest";

import { Logger, MetricsRegistry, createRunId, createSilentLogger } from "../index";

afterEach(() => {
  vi.restoreAllMocks();
});

function parseLines(calls: unknown[][]): Array<Record<string, unknown>> {
  return calls.map(([line]) => JSON.parse(String(line)));
}

describe("createRunId", () => {
  it("stamps the start time and the entropy bytes", () => {
    const runId = createRunId(new Date("2024-01-02T03:04:05.678Z"), Buffer.from([0x1a, 0x2b, 0x3c]));

    expect(runId).toBe("newsarchive-20240102T030405Z-1a2b3c");
  });

  it("differs between calls by default", () => {
    const now = new Date("2024-01-02T03:04:05.000Z");

    expect(createRunId(now)).toMatch(/^newsarchive-20240102T030405Z-[0-9a-f]{6}$/);
  });
});

describe("Logger", () => {
  it("writes one JSON line per event with context and fields", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const logger = new Logger({ component: "cli", runId: "run-1" }).child("download");

    logger.info("item_complete", { itemId: "/lccn/sn1/1910-05-01/ed-1/seq-1/", files: 2 });

    expect(parseLines(log.mock.calls)).toEqual([
      {
        ts: expect.any(String),
        level: "info",
        msg: "item_complete",
        component: "download",
        runId: "run-1",
        itemId: "/lccn/sn1/1910-05-01/ed-1/seq-1/",
        files: 2,
      },
    ]);
  });

  it("drops events below the threshold and sends errors to stderr", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = new Logger({ component: "cli", runId: "run-1", level: "warn" });

    logger.debug("noise");
    logger.info("noise");
    logger.warn("rate_limited");
    logger.error("download_failed");

    expect(parseLines(log.mock.calls).map((line) => line.msg)).toEqual(["rate_limited"]);
    expect(parseLines(error.mock.calls).map((line) => line.msg)).toEqual(["download_failed"]);
  });

  it("stays quiet when silent", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    createSilentLogger().error("download_failed");

    expect(log).not.toHaveBeenCalled();
    expect(error).not.toHaveBeenCalled();
  });
});

describe("MetricsRegistry", () => {
  it("aggregates counters and timers", () => {
    const ticks = [0, 100, 1_000, 1_300];
    const metrics = new MetricsRegistry(() => ticks.shift() ?? 0);

    metrics.incrementCounter("requests_sent");
    metrics.incrementCounter("requests_sent", 2);
    const first = metrics.startTimer("request_ms");
    expect(first()).toBe(100);
    const second = metrics.startTimer("request_ms");
    expect(second()).toBe(300);

    const snapshot = metrics.snapshot();
    expect(snapshot.counters.requests_sent).toBe(3);
    expect(snapshot.counters.downloads_failed).toBe(0);
    expect(snapshot.timers.request_ms).toEqual({ count: 2, totalMs: 400, minMs: 100, maxMs: 300, avgMs: 200 });
    expect(snapshot.timers.download_ms).toEqual({ count: 0, totalMs: 0, minMs: 0, maxMs: 0, avgMs: 0 });
  });

  it("logs the summary through the logger", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const metrics = new MetricsRegistry(() => 0);
    metrics.incrementCounter("captchas_detected");

    metrics.logSummary(new Logger({ component: "cli", runId: "run-1" }));

    const [line] = parseLines(log.mock.calls);
    expect(line.msg).toBe("metrics_summary");
    expect(line.counters).toMatchObject({ captchas_detected: 1, requests_sent: 0 });
  });
});
