/**
 * Settings Resolution
 *
 * Merges persisted settings with FRAMECAST_* environment overrides and
 * validates the result.
 */

import { z } from "zod";
import { LIMITS } from "@framecast/types";
import { ConfigError } from "../core/app-error";
import { logger } from "../utils/logger";
import { DEFAULT_SETTINGS } from "./store";
import type { AppSettings } from "./types";

const intInRange = (min: number, max: number = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().min(min).max(max);

/**
 * Validated settings schema
 */
export const settingsSchema = z
  .object({
    maxStreamFps: intInRange(LIMITS.MIN_FPS, LIMITS.ABSOLUTE_MAX_FPS),
    defaultStreamFps: intInRange(LIMITS.MIN_FPS, LIMITS.ABSOLUTE_MAX_FPS),
    defaultQuality: intInRange(LIMITS.MIN_QUALITY, LIMITS.MAX_QUALITY),
    defaultFormat: z.enum(["jpeg", "png"]),
    maxConcurrentStreams: intInRange(1, 1000),
    cacheMaxEntries: intInRange(1, 10000),
    maxFrameBytes: intInRange(1024),
    metricsWindowSize: intInRange(2, 10000),
    operationTimeoutMs: intInRange(50, 60000),
    maxBackoffMs: intInRange(0, 60000),
    qualityStep: intInRange(1, 50),
    logLevel: z.enum(["debug", "info", "warn", "error", "silent"]),
    logDirectory: z.string(),
  })
  .refine((settings) => settings.defaultStreamFps <= settings.maxStreamFps, {
    message: "defaultStreamFps cannot exceed maxStreamFps",
    path: ["defaultStreamFps"],
  });

/**
 * Environment variable for each setting
 */
export const ENV_OVERRIDES: Record<keyof AppSettings, string> = {
  maxStreamFps: "FRAMECAST_MAX_STREAM_FPS",
  defaultStreamFps: "FRAMECAST_DEFAULT_STREAM_FPS",
  defaultQuality: "FRAMECAST_DEFAULT_QUALITY",
  defaultFormat: "FRAMECAST_DEFAULT_FORMAT",
  maxConcurrentStreams: "FRAMECAST_MAX_CONCURRENT_STREAMS",
  cacheMaxEntries: "FRAMECAST_CACHE_MAX_ENTRIES",
  maxFrameBytes: "FRAMECAST_MAX_FRAME_BYTES",
  metricsWindowSize: "FRAMECAST_METRICS_WINDOW_SIZE",
  operationTimeoutMs: "FRAMECAST_OPERATION_TIMEOUT_MS",
  maxBackoffMs: "FRAMECAST_MAX_BACKOFF_MS",
  qualityStep: "FRAMECAST_QUALITY_STEP",
  logLevel: "FRAMECAST_LOG_LEVEL",
  logDirectory: "FRAMECAST_LOG_DIR",
};

/**
 * Resolve effective settings
 *
 * Precedence: environment > persisted values > defaults.
 *
 * @throws ConfigError when the merged settings fail validation
 */
export function resolveSettings(
  persisted: Partial<AppSettings> = {},
  env: NodeJS.ProcessEnv = process.env
): AppSettings {
  const merged: Record<string, unknown> = { ...DEFAULT_SETTINGS, ...persisted };
  const overridden: string[] = [];

  for (const [key, variable] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable];
    if (value !== undefined && value !== "") {
      merged[key] = value.trim();
      overridden.push(key);
    }
  }

  const result = settingsSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid settings: ${issues.join(", ")}`, undefined, { issues });
  }

  if (overridden.length > 0) {
    logger.debug("Settings overridden from environment", { keys: overridden });
  }

  return result.data;
}
