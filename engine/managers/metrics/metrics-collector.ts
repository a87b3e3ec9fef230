/**
 * Metrics Collector
 *
 * Per-stream rolling window of frame timings. Fixed capacity ring buffer:
 * record() is O(1) and evicts the oldest sample once the window is full.
 * Lifetime counters (frames, skips) are kept separately from the window.
 */

import { METRICS } from "@framecast/types";
import type { DurationStats, MetricsSnapshot } from "@framecast/types";
import { systemClock, type Clock } from "../../utils/async";

/**
 * One measurement per produced (non-skipped) frame
 */
export interface FrameMetricSample {
  readonly captureMs: number;
  readonly encodeMs: number;
  readonly totalMs: number;
  readonly timestamp: number;
}

export interface MetricsCollectorOptions {
  windowSize?: number;
  /** Number of most recent samples averaged for currentFps */
  rateWindow?: number;
  clock?: Clock;
}

const EMPTY_STATS: DurationStats = { mean: 0, min: 0, max: 0 };

/**
 * Percentile over an ascending-sorted array
 *
 * Index is ceil(p * n) - 1 clamped to [0, n - 1]. The epsilon absorbs
 * floating point noise in p * n (0.95 * 20 must give 19, not 19.000000000000004).
 */
export function percentile(sorted: readonly number[], p: number): number {
  const n = sorted.length;
  if (n === 0) return 0;
  const index = Math.min(n - 1, Math.max(0, Math.ceil(p * n - 1e-9) - 1));
  return sorted[index];
}

function durationStats(values: readonly number[]): DurationStats {
  if (values.length === 0) {
    return { ...EMPTY_STATS };
  }
  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const value of values) {
    sum += value;
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return { mean: sum / values.length, min, max };
}

/**
 * Rolling-window frame metrics for one stream
 */
export class MetricsCollector {
  private readonly capacity: number;
  private readonly rateWindow: number;
  private readonly clock: Clock;
  private readonly ring: Array<FrameMetricSample | undefined>;
  private head: number = 0; // next write position
  private count: number = 0;
  private lifetimeFrames: number = 0;
  private skippedFrames: number = 0;
  private startedAt: number;

  constructor(options: MetricsCollectorOptions = {}) {
    this.capacity = Math.max(1, Math.floor(options.windowSize ?? METRICS.WINDOW_SIZE));
    this.rateWindow = Math.max(1, Math.floor(options.rateWindow ?? METRICS.RATE_WINDOW));
    this.clock = options.clock ?? systemClock;
    this.ring = new Array<FrameMetricSample | undefined>(this.capacity).fill(undefined);
    this.startedAt = this.clock.now();
  }

  /**
   * Record a produced frame
   */
  record(sample: FrameMetricSample): void {
    this.ring[this.head] = Object.freeze({ ...sample });
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) {
      this.count++;
    }
    this.lifetimeFrames++;
  }

  /**
   * Record a skipped (or failed) tick
   */
  recordSkip(): void {
    this.skippedFrames++;
  }

  /**
   * Samples currently in the window, oldest first (copy)
   */
  samples(): FrameMetricSample[] {
    const result: FrameMetricSample[] = [];
    const start = (this.head - this.count + this.capacity) % this.capacity;
    for (let i = 0; i < this.count; i++) {
      const sample = this.ring[(start + i) % this.capacity];
      if (sample) {
        result.push(sample);
      }
    }
    return result;
  }

  /**
   * Aggregate view of the window plus lifetime counters
   */
  snapshot(): MetricsSnapshot {
    const window = this.samples();
    const sessionDurationMs = Math.max(0, this.clock.now() - this.startedAt);
    const totals = window.map((s) => s.totalMs);
    const sortedTotals = [...totals].sort((a, b) => a - b);

    const recent = totals.slice(-this.rateWindow);
    const recentMean = recent.length > 0 ? recent.reduce((sum, v) => sum + v, 0) / recent.length : 0;
    const currentFps = recentMean > 0 ? 1000 / recentMean : 0;

    const seenTicks = this.lifetimeFrames + this.skippedFrames;

    return {
      currentFps,
      avgSessionFps: sessionDurationMs > 0 ? this.lifetimeFrames / (sessionDurationMs / 1000) : 0,
      capture: durationStats(window.map((s) => s.captureMs)),
      encode: durationStats(window.map((s) => s.encodeMs)),
      total: durationStats(totals),
      p50: percentile(sortedTotals, 0.5),
      p95: percentile(sortedTotals, 0.95),
      p99: percentile(sortedTotals, 0.99),
      frameCount: window.length,
      lifetimeFrameCount: this.lifetimeFrames,
      skippedFrameCount: this.skippedFrames,
      skipRate: seenTicks > 0 ? this.skippedFrames / seenTicks : 0,
      windowSize: this.capacity,
      sessionDurationMs,
    };
  }

  /**
   * Reset window and counters
   */
  reset(): void {
    this.ring.fill(undefined);
    this.head = 0;
    this.count = 0;
    this.lifetimeFrames = 0;
    this.skippedFrames = 0;
    this.startedAt = this.clock.now();
  }

  get size(): number {
    return this.count;
  }
}
