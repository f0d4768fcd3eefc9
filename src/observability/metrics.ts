import type { Logger } from "./logger";
import type { MetricCounterName, MetricTimerName } from "./types";

export interface TimerSummary {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  avgMs: number;
}

export interface MetricsSnapshot {
  counters: Record<MetricCounterName, number>;
  timers: Record<MetricTimerName, TimerSummary>;
}

const EMPTY_TIMER: TimerSummary = { count: 0, totalMs: 0, minMs: 0, maxMs: 0, avgMs: 0 };

/** Process-wide counters and timers; timers keep running aggregates, not samples. */
export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, TimerSummary>();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  /** Returns a stop function that records and returns the elapsed milliseconds. */
  startTimer(name: MetricTimerName): () => number {
    const startedAt = this.now();
    return () => {
      const durationMs = this.now() - startedAt;
      this.record(name, durationMs);
      return durationMs;
    };
  }

  snapshot(): MetricsSnapshot {
    const counters = zeroCounters();
    for (const [name, value] of this.counters) {
      counters[name] = value;
    }
    const timers = emptyTimers();
    for (const [name, summary] of this.timers) {
      timers[name] = { ...summary };
    }
    return { counters, timers };
  }

  logSummary(logger: Logger): void {
    const { counters, timers } = this.snapshot();
    logger.info("metrics_summary", { counters, timers });
  }

  private record(name: MetricTimerName, durationMs: number): void {
    const current = this.timers.get(name);
    if (!current) {
      this.timers.set(name, { count: 1, totalMs: durationMs, minMs: durationMs, maxMs: durationMs, avgMs: durationMs });
      return;
    }
    const count = current.count + 1;
    const totalMs = current.totalMs + durationMs;
    this.timers.set(name, {
      count,
      totalMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs),
      avgMs: Number((totalMs / count).toFixed(2)),
    });
  }
}

function zeroCounters(): Record<MetricCounterName, number> {
  return {
    requests_sent: 0,
    captchas_detected: 0,
    rate_limited: 0,
    network_retries: 0,
    pages_discovered: 0,
    pages_enqueued: 0,
    downloads_ok: 0,
    downloads_failed: 0,
  };
}

function emptyTimers(): Record<MetricTimerName, TimerSummary> {
  return { request_ms: { ...EMPTY_TIMER }, download_ms: { ...EMPTY_TIMER }, facet_page_ms: { ...EMPTY_TIMER } };
}
