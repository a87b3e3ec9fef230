import { describe, expect } from "vitest";
import { it, fc } from "@fast-check/vitest";
import { computeNextQuality, createQualityState } from "../../../engine/managers/quality/quality-controller";

const bounds = fc
  .tuple(fc.integer({ min: 1, max: 100 }), fc.integer({ min: 1, max: 100 }))
  .map(([a, b]) => ({ min: Math.min(a, b), max: Math.max(a, b) }));

const state = fc
  .record({
    bounds,
    quality: fc.integer({ min: 1, max: 100 }),
    targetFps: fc.integer({ min: 1, max: 120 }),
  })
  .map(({ bounds: b, quality, targetFps }) => createQualityState(quality, b.min, b.max, targetFps));

const fps = fc.double({ min: 0, max: 240, noNaN: true });
const load = fc.option(fc.double({ min: 0, max: 1, noNaN: true }), { nil: undefined });

describe("quality control properties", () => {
  it.prop([state, fps, load])("never leaves [minQuality, maxQuality]", (s, currentFps, l) => {
    const next = computeNextQuality(s, { currentFps }, undefined, l);

    expect(next.quality).toBeGreaterThanOrEqual(s.minQuality);
    expect(next.quality).toBeLessThanOrEqual(s.maxQuality);
  });

  it.prop([state, fps, load])("returns the same state for the same inputs", (s, currentFps, l) => {
    expect(computeNextQuality(s, { currentFps }, undefined, l)).toEqual(computeNextQuality(s, { currentFps }, undefined, l));
  });

  it.prop([state, fps, load])("moves by at most one step in the reported direction", (s, currentFps, l) => {
    const next = computeNextQuality(s, { currentFps }, undefined, l);

    expect(Math.abs(next.lastDelta)).toBeLessThanOrEqual(5);
    expect(next.quality - s.quality).toBe(next.lastDelta);
    expect(next.lastDirection).toBe(next.lastDelta > 0 ? "up" : next.lastDelta < 0 ? "down" : "none");
  });

  it.prop([state, fc.double({ min: 0.8, max: 1, noNaN: true })])("never increases under high load", (s, l) => {
    const next = computeNextQuality(s, { currentFps: s.targetFps * 2 }, undefined, l);

    expect(next.lastDelta).toBeLessThanOrEqual(0);
  });
});

describe("quality control steady state", () => {
  it.prop([state, fc.double({ min: 0.9, max: 0.999, noNaN: true })])(
    "leaves quality fixed while the rate stays inside the band",
    (s, ratio) => {
      const snapshot = { currentFps: s.targetFps * ratio };
      const once = computeNextQuality(s, snapshot);
      const twice = computeNextQuality(once, snapshot);

      expect(once.quality).toBe(s.quality);
      expect(twice.quality).toBe(s.quality);
    }
  );
});
