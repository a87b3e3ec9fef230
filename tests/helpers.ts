/**
 * Test helpers: virtual clock, in-process capture/encode fakes
 */

import type { ImageFormat } from "@framecast/types";
import { CancelledError } from "../engine/core/app-error";
import type { CaptureRequest, FrameSource, MonitorBounds, RawFrame } from "../engine/managers/capture/frame-source";
import type { FrameEncoder } from "../engine/managers/encode/frame-encoder";
import type { Clock } from "../engine/utils/async";
import type { RegistrySettings } from "../engine/managers/stream/stream-registry";

export const WALL_CLOCK_BASE = 1_700_000_000_000;

/** Every fake source reports one 1920x1080 monitor */
export const FAKE_MONITOR: MonitorBounds = { width: 1920, height: 1080 };

function fakeMonitorBounds(monitor: number): MonitorBounds | null {
  return monitor === 0 ? { ...FAKE_MONITOR } : null;
}

/**
 * Virtual clock. sleep() resolves on the next macrotask and advances the
 * clock by the requested amount, so a pacing loop runs at full speed while
 * its timing stays exact.
 */
export class ManualClock implements Clock {
  private current: number = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.current;
  }

  wallTime(): number {
    return WALL_CLOCK_BASE + this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError());
    }
    return new Promise((resolve, reject) => {
      const onAbort = () => {
        clearImmediate(handle);
        reject(new CancelledError());
      };
      const handle = setImmediate(() => {
        signal?.removeEventListener("abort", onAbort);
        this.sleeps.push(ms);
        this.current += Math.max(0, ms);
        resolve();
      });
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}

export interface FakeSourceOptions {
  clock?: ManualClock;
  width?: number;
  height?: number;
  /** Virtual time each capture takes, by 1-based call number */
  captureMs?: (call: number) => number;
  /** Return an error to fail that call */
  failOn?: (call: number) => Error | null;
}

/**
 * FrameSource returning a solid frame whose byte value is the call number
 */
export class FakeSource implements FrameSource {
  readonly name = "fake";
  calls: number = 0;
  readonly requests: CaptureRequest[] = [];

  constructor(private readonly options: FakeSourceOptions = {}) {}

  monitorBounds(monitor: number): MonitorBounds | null {
    return fakeMonitorBounds(monitor);
  }

  async capture(request: CaptureRequest): Promise<RawFrame> {
    this.calls++;
    this.requests.push(request);
    const call = this.calls;

    const error = this.options.failOn?.(call) ?? null;
    if (error) {
      throw error;
    }

    this.options.clock?.advance(this.options.captureMs?.(call) ?? 0);

    const width = this.options.width ?? 4;
    const height = this.options.height ?? 2;
    return {
      data: Buffer.alloc(width * height * 3, call % 256),
      width,
      height,
      channels: 3,
      timestamp: this.options.clock?.wallTime() ?? WALL_CLOCK_BASE,
    };
  }
}

/**
 * FrameSource whose capture never completes until its signal aborts
 */
export class HangingSource implements FrameSource {
  readonly name = "hanging";
  calls: number = 0;
  aborted: number = 0;

  monitorBounds(monitor: number): MonitorBounds | null {
    return fakeMonitorBounds(monitor);
  }

  capture(_request: CaptureRequest, signal: AbortSignal): Promise<RawFrame> {
    this.calls++;
    return new Promise((_resolve, reject) => {
      signal.addEventListener(
        "abort",
        () => {
          this.aborted++;
          reject(new CancelledError());
        },
        { once: true }
      );
    });
  }
}

export interface FakeEncoderOptions {
  clock?: ManualClock;
  encodeMs?: number;
  failOn?: (call: number) => Error | null;
}

/**
 * FrameEncoder producing a short text payload naming the call and quality
 */
export class FakeEncoder implements FrameEncoder {
  readonly name = "fake";
  calls: number = 0;
  readonly qualities: number[] = [];
  readonly formats: ImageFormat[] = [];

  constructor(private readonly options: FakeEncoderOptions = {}) {}

  async encode(_frame: RawFrame, format: ImageFormat, quality: number): Promise<Buffer> {
    this.calls++;
    this.qualities.push(quality);
    this.formats.push(format);

    const error = this.options.failOn?.(this.calls) ?? null;
    if (error) {
      throw error;
    }

    this.options.clock?.advance(this.options.encodeMs ?? 0);
    return Buffer.from(`frame-${this.calls}-q${quality}`);
  }
}

export const TEST_SETTINGS: RegistrySettings = {
  maxStreamFps: 60,
  defaultStreamFps: 10,
  defaultQuality: 75,
  defaultFormat: "jpeg",
  maxConcurrentStreams: 25,
  metricsWindowSize: 100,
  operationTimeoutMs: 2000,
  maxBackoffMs: 2000,
  qualityStep: 5,
};

/**
 * Poll until the predicate holds
 */
export async function waitFor(predicate: () => boolean, timeoutMs: number = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 1));
  }
}
