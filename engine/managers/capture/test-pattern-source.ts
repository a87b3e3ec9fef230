/**
 * Test Pattern Source
 *
 * Synthetic FrameSource: a horizontal gradient with a vertical bar that moves
 * one step per captured frame. Used by the demo entry point and wherever a
 * real screen is unavailable.
 */

import { CaptureError, CancelledError } from "../../core/app-error";
import { systemClock, type Clock } from "../../utils/async";
import type { CaptureRequest, FrameSource, MonitorBounds, RawFrame } from "./frame-source";

export interface TestPatternOptions {
  width?: number;
  height?: number;
  /** Number of virtual monitors; requests for others fail */
  monitors?: number;
  barWidth?: number;
  clock?: Clock;
}

const DEFAULT_WIDTH = 320;
const DEFAULT_HEIGHT = 240;
const CHANNELS = 3;

export class TestPatternSource implements FrameSource {
  readonly name = "test-pattern";
  private readonly width: number;
  private readonly height: number;
  private readonly monitors: number;
  private readonly barWidth: number;
  private readonly clock: Clock;
  private frameIndex: number = 0;

  constructor(options: TestPatternOptions = {}) {
    this.width = options.width ?? DEFAULT_WIDTH;
    this.height = options.height ?? DEFAULT_HEIGHT;
    this.monitors = options.monitors ?? 1;
    this.barWidth = options.barWidth ?? Math.max(1, Math.floor(this.width / 16));
    this.clock = options.clock ?? systemClock;
  }

  monitorBounds(monitor: number): MonitorBounds | null {
    if (!Number.isInteger(monitor) || monitor < 0 || monitor >= this.monitors) {
      return null;
    }
    return { width: this.width, height: this.height };
  }

  async capture(request: CaptureRequest, signal: AbortSignal): Promise<RawFrame> {
    if (signal.aborted) {
      throw new CancelledError();
    }

    if (!this.monitorBounds(request.monitor)) {
      throw new CaptureError(`Monitor ${request.monitor} not available`, undefined, {
        monitor: request.monitor,
        monitors: this.monitors,
      });
    }

    const region = request.region ?? { x: 0, y: 0, width: this.width, height: this.height };
    if (region.x + region.width > this.width || region.y + region.height > this.height) {
      throw new CaptureError("Capture region outside monitor bounds", undefined, {
        region,
        monitor: { width: this.width, height: this.height },
      });
    }

    const barStart = (this.frameIndex * this.barWidth) % this.width;
    this.frameIndex++;

    const data = Buffer.alloc(region.width * region.height * CHANNELS);
    for (let row = 0; row < region.height; row++) {
      const y = region.y + row;
      for (let col = 0; col < region.width; col++) {
        const x = region.x + col;
        const offset = (row * region.width + col) * CHANNELS;
        const onBar = x >= barStart && x < barStart + this.barWidth;
        data[offset] = onBar ? 255 : Math.floor((x * 255) / Math.max(1, this.width - 1));
        data[offset + 1] = onBar ? 255 : Math.floor((y * 255) / Math.max(1, this.height - 1));
        data[offset + 2] = onBar ? 255 : 96;
      }
    }

    return {
      data,
      width: region.width,
      height: region.height,
      channels: CHANNELS,
      timestamp: this.clock.wallTime(),
    };
  }
}
