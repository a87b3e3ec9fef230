/**
 * Sharp Encoder
 *
 * FrameEncoder backed by libvips through sharp. JPEG takes the quality
 * directly; PNG is lossless, so quality selects the zlib compression level.
 */

import sharp from "sharp";
import type { ImageFormat } from "@framecast/types";
import { CancelledError, EncodeError, toError } from "../../core/app-error";
import type { RawFrame } from "../capture/frame-source";
import type { FrameEncoder } from "./frame-encoder";

// Frames are never re-read, so the libvips operation cache only costs memory
sharp.cache(false);

/**
 * Map a 1-100 quality to a PNG compression level (0-9)
 */
export function pngCompressionLevel(quality: number): number {
  return Math.max(0, Math.min(9, Math.round((quality / 100) * 9)));
}

export interface SharpEncoderOptions {
  /** Use mozjpeg defaults: smaller output, slower */
  mozjpeg?: boolean;
}

export class SharpEncoder implements FrameEncoder {
  readonly name = "sharp";
  private readonly mozjpeg: boolean;

  constructor(options: SharpEncoderOptions = {}) {
    this.mozjpeg = options.mozjpeg ?? false;
  }

  async encode(frame: RawFrame, format: ImageFormat, quality: number, signal: AbortSignal): Promise<Buffer> {
    if (signal.aborted) {
      throw new CancelledError();
    }

    try {
      const pipeline = sharp(frame.data, {
        raw: { width: frame.width, height: frame.height, channels: frame.channels },
      });
      if (format === "jpeg") {
        return await pipeline.jpeg({ quality, mozjpeg: this.mozjpeg }).toBuffer();
      }
      return await pipeline.png({ compressionLevel: pngCompressionLevel(quality) }).toBuffer();
    } catch (error) {
      throw new EncodeError(`Failed to encode ${format} frame`, toError(error), {
        width: frame.width,
        height: frame.height,
        quality,
      });
    }
  }
}
