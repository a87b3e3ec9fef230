/**
 * Adaptive Quality Controller
 *
 * Keeps a stream's achieved frame rate near its target by trading image
 * quality. Fixed-step adjustments with a hysteresis band between
 * lowerBandRatio x target and target, so a stream sitting in the band is
 * left alone.
 */

import { QUALITY_CONTROL } from "@framecast/types";
import type { MetricsSnapshot, QualityState } from "@framecast/types";

export interface QualityControlOptions {
  step: number;
  /** Below this fraction of the target fps, quality goes down */
  lowerBandRatio: number;
  /** External load at or above this suppresses increases */
  highLoad: number;
}

export const DEFAULT_QUALITY_CONTROL: QualityControlOptions = {
  step: QUALITY_CONTROL.STEP,
  lowerBandRatio: QUALITY_CONTROL.LOWER_BAND_RATIO,
  highLoad: QUALITY_CONTROL.HIGH_LOAD,
};

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Build the initial state for a stream
 */
export function createQualityState(
  quality: number,
  minQuality: number,
  maxQuality: number,
  targetFps: number
): QualityState {
  return {
    quality: clamp(quality, minQuality, maxQuality),
    minQuality,
    maxQuality,
    targetFps,
    lastDirection: "none",
    lastDelta: 0,
  };
}

/**
 * One control cycle
 *
 * Pure: the same state, snapshot, options and load always produce the same
 * next state.
 *
 * @param load - optional external load indicator in [0, 1]
 */
export function computeNextQuality(
  state: QualityState,
  snapshot: Pick<MetricsSnapshot, "currentFps">,
  options: QualityControlOptions = DEFAULT_QUALITY_CONTROL,
  load?: number
): QualityState {
  const current = clamp(state.quality, state.minQuality, state.maxQuality);
  const fps = snapshot.currentFps;
  const overloaded = load !== undefined && load >= options.highLoad;

  let next = current;
  if (fps < state.targetFps * options.lowerBandRatio) {
    next = clamp(current - options.step, state.minQuality, state.maxQuality);
  } else if (fps >= state.targetFps && current < state.maxQuality && !overloaded) {
    next = clamp(current + options.step, state.minQuality, state.maxQuality);
  }

  const delta = next - current;
  return {
    ...state,
    quality: next,
    lastDirection: delta > 0 ? "up" : delta < 0 ? "down" : "none",
    lastDelta: delta,
  };
}

/**
 * Stateful wrapper owning one stream's QualityState
 */
export class AdaptiveQualityController {
  private state: QualityState;
  private readonly options: QualityControlOptions;

  constructor(initial: QualityState, options: Partial<QualityControlOptions> = {}) {
    this.state = { ...initial };
    this.options = { ...DEFAULT_QUALITY_CONTROL, ...options };
  }

  /**
   * Run a control cycle and return the new quality
   */
  adjust(snapshot: Pick<MetricsSnapshot, "currentFps">, load?: number): number {
    this.state = computeNextQuality(this.state, snapshot, this.options, load);
    return this.state.quality;
  }

  /**
   * Manual override, clamped to the bounds
   */
  override(quality: number): number {
    const next = clamp(Math.round(quality), this.state.minQuality, this.state.maxQuality);
    const delta = next - this.state.quality;
    this.state = {
      ...this.state,
      quality: next,
      lastDirection: delta > 0 ? "up" : delta < 0 ? "down" : "none",
      lastDelta: delta,
    };
    return next;
  }

  getQuality(): number {
    return this.state.quality;
  }

  getState(): QualityState {
    return { ...this.state };
  }
}
