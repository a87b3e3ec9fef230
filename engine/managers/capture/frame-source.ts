/**
 * Frame Source
 *
 * The pixel-capture backend as seen by the scheduler: one call per tick,
 * returning an uncompressed frame. Backends may be slow and must honour the
 * abort signal where they can.
 */

import type { CaptureRegion } from "@framecast/types";

/**
 * Uncompressed frame, row-major, interleaved channels
 */
export interface RawFrame {
  data: Buffer;
  width: number;
  height: number;
  channels: 3 | 4;
  /** Wall clock ms when the pixels were read */
  timestamp: number;
}

export interface CaptureRequest {
  monitor: number;
  /** Absent = full monitor */
  region?: CaptureRegion;
}

export interface MonitorBounds {
  width: number;
  height: number;
}

export interface FrameSource {
  readonly name: string;
  /** Size of a monitor, or null when it does not exist */
  monitorBounds(monitor: number): MonitorBounds | null;
  capture(request: CaptureRequest, signal: AbortSignal): Promise<RawFrame>;
}
