import { describe, it, expect } from "vitest";
import { MetricsCollector, percentile, type FrameMetricSample } from "../../engine/managers/metrics/metrics-collector";
import { ManualClock } from "../helpers";

function sample(totalMs: number, captureMs: number = totalMs / 2): FrameMetricSample {
  return { captureMs, encodeMs: totalMs - captureMs, totalMs, timestamp: 0 };
}

describe("percentile", () => {
  const oneToTwenty = Array.from({ length: 20 }, (_, i) => i + 1);

  it("uses the nearest-rank index", () => {
    expect(percentile(oneToTwenty, 0.5)).toBe(10);
    expect(percentile(oneToTwenty, 0.95)).toBe(19);
    expect(percentile(oneToTwenty, 0.99)).toBe(20);
  });

  it("clamps to the ends of the array", () => {
    expect(percentile(oneToTwenty, 0)).toBe(1);
    expect(percentile(oneToTwenty, 1)).toBe(20);
    expect(percentile([7], 0.5)).toBe(7);
  });

  it("returns 0 for an empty array", () => {
    expect(percentile([], 0.5)).toBe(0);
  });
});

describe("MetricsCollector", () => {
  it("reports zeros before any frame", () => {
    const snapshot = new MetricsCollector({ clock: new ManualClock() }).snapshot();

    expect(snapshot).toMatchObject({
      currentFps: 0,
      avgSessionFps: 0,
      p50: 0,
      p95: 0,
      p99: 0,
      frameCount: 0,
      lifetimeFrameCount: 0,
      skippedFrameCount: 0,
      skipRate: 0,
      windowSize: 100,
    });
    expect(snapshot.total).toEqual({ mean: 0, min: 0, max: 0 });
  });

  it("keeps only the most recent samples in the window", () => {
    const collector = new MetricsCollector({ windowSize: 3, clock: new ManualClock() });
    [10, 20, 30, 40].forEach((ms) => collector.record(sample(ms)));

    expect(collector.size).toBe(3);
    expect(collector.samples().map((s) => s.totalMs)).toEqual([20, 30, 40]);
  });

  it("aggregates the window and lifetime counters", () => {
    const clock = new ManualClock();
    const collector = new MetricsCollector({ windowSize: 3, rateWindow: 2, clock });
    [10, 20, 30, 40].forEach((ms) => collector.record(sample(ms)));
    collector.recordSkip();
    clock.advance(2000);

    const snapshot = collector.snapshot();

    expect(snapshot.total).toEqual({ mean: 30, min: 20, max: 40 });
    expect(snapshot.capture).toEqual({ mean: 15, min: 10, max: 20 });
    expect(snapshot.p50).toBe(30);
    expect(snapshot.p95).toBe(40);
    expect(snapshot.currentFps).toBeCloseTo(1000 / 35, 10);
    expect(snapshot.avgSessionFps).toBe(2);
    expect(snapshot.frameCount).toBe(3);
    expect(snapshot.lifetimeFrameCount).toBe(4);
    expect(snapshot.skippedFrameCount).toBe(1);
    expect(snapshot.skipRate).toBe(0.2);
    expect(snapshot.sessionDurationMs).toBe(2000);
  });

  it("stores samples as immutable copies", () => {
    const collector = new MetricsCollector({ clock: new ManualClock() });
    const input = { captureMs: 1, encodeMs: 2, totalMs: 3, timestamp: 0 };
    collector.record(input);
    input.totalMs = 99;

    const [stored] = collector.samples();
    expect(stored.totalMs).toBe(3);
    expect(Object.isFrozen(stored)).toBe(true);
  });

  it("resets the window, the counters and the session start", () => {
    const clock = new ManualClock();
    const collector = new MetricsCollector({ clock });
    collector.record(sample(10));
    collector.recordSkip();
    clock.advance(500);

    collector.reset();

    const snapshot = collector.snapshot();
    expect(snapshot.frameCount).toBe(0);
    expect(snapshot.lifetimeFrameCount).toBe(0);
    expect(snapshot.skippedFrameCount).toBe(0);
    expect(snapshot.sessionDurationMs).toBe(0);
  });
});
