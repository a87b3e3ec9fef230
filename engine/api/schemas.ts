/**
 * Command Validation Schemas
 *
 * Zod schemas for stream requests, preset files and command payloads.
 * Bounds that depend on runtime settings (maxStreamFps) are enforced by the
 * registry; these schemas hold the absolute limits.
 */

import { z } from "zod";
import { CACHE, LIMITS } from "@framecast/types";

// =============================================================================
// Common Schemas
// =============================================================================

/**
 * Stream ID validation
 * Stream IDs are in format: stream_XXXXXXXXXXXXXXXX (stream_ prefix + 16 hex chars)
 */
export const streamIdSchema = z
  .string()
  .regex(/^stream_[a-f0-9]{16}$/, "Invalid stream ID format. Expected stream_ followed by 16 hex chars.");

/**
 * Resource URI validation
 */
export const resourceUriSchema = z
  .string()
  .min(1, "URI cannot be empty")
  .max(256, "URI too long")
  .startsWith(CACHE.URI_PREFIX, `URI must start with ${CACHE.URI_PREFIX}`);

const qualitySchema = z.number().int().min(LIMITS.MIN_QUALITY).max(LIMITS.MAX_QUALITY);

/**
 * Capture region: non-negative origin, positive size
 */
export const captureRegionSchema = z
  .object({
    x: z.number().int().nonnegative(),
    y: z.number().int().nonnegative(),
    width: z.number().int().positive().max(LIMITS.MAX_REGION_DIMENSION),
    height: z.number().int().positive().max(LIMITS.MAX_REGION_DIMENSION),
  })
  .strict();

/**
 * Stream settings shared by requests and preset entries
 */
export const streamFieldsSchema = z
  .object({
    targetFps: z.number().int().min(LIMITS.MIN_FPS).max(LIMITS.ABSOLUTE_MAX_FPS).optional(),
    format: z.enum(["jpeg", "png"]).optional(),
    quality: qualitySchema.optional(),
    minQuality: qualitySchema.optional(),
    maxQuality: qualitySchema.optional(),
    region: captureRegionSchema.optional(),
    monitor: z.number().int().nonnegative().optional(),
    frameSkip: z.boolean().optional(),
    adaptiveQuality: z.boolean().optional(),
  })
  .strict();

// =============================================================================
// Stream Command Schemas
// =============================================================================

/**
 * stream:create - Create a stream from an optional preset plus overrides
 */
export const streamRequestSchema = streamFieldsSchema
  .extend({
    preset: z.string().min(1).max(64).optional(),
  })
  .strict();

/**
 * stream:start / stream:stop / stream:get / stream:metrics
 */
export const streamIdPayloadSchema = z
  .object({
    streamId: streamIdSchema,
  })
  .strict();

/**
 * stream:set-quality - Manual quality override
 */
export const setQualitySchema = z
  .object({
    streamId: streamIdSchema,
    quality: qualitySchema,
  })
  .strict();

/**
 * resource:get - Fetch a cached frame
 */
export const resourceGetSchema = z
  .object({
    uri: resourceUriSchema,
    encoding: z.enum(["binary", "base64"]).default("base64"),
  })
  .strict();

// =============================================================================
// Preset File Schema
// =============================================================================

export const presetFileSchema = z.object({
  presets: z.record(
    z.object({
      name: z.string(),
      description: z.string(),
      config: streamFieldsSchema,
      expectedLatencyMs: z.number().nonnegative().optional(),
      useCases: z.array(z.string()).optional(),
    })
  ),
  derived: z
    .record(
      z.object({
        name: z.string(),
        parent: z.string(),
        overrides: streamFieldsSchema,
        notes: z.string().optional(),
      })
    )
    .default({}),
});
