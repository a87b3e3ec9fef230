/**
 * Frame Encoder
 *
 * Turns a raw frame into image bytes at a given quality.
 */

import type { ImageFormat } from "@framecast/types";
import type { RawFrame } from "../capture/frame-source";

export interface FrameEncoder {
  readonly name: string;
  /**
   * @param quality - 1-100; lossless formats map it to compression effort
   */
  encode(frame: RawFrame, format: ImageFormat, quality: number, signal: AbortSignal): Promise<Buffer>;
}
