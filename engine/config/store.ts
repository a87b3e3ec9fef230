/**
 * Settings Store Configuration
 *
 * Persistent settings backed by conf, with JSON-schema defaults and bounds.
 */

import Conf from "conf";
import { CACHE, LIMITS, METRICS, QUALITY_CONTROL, SCHEDULER, STREAM_DEFAULTS } from "@framecast/types";
import type { AppSettings } from "./types";

export const DEFAULT_SETTINGS: AppSettings = {
  maxStreamFps: STREAM_DEFAULTS.MAX_FPS,
  defaultStreamFps: STREAM_DEFAULTS.FPS,
  defaultQuality: STREAM_DEFAULTS.QUALITY,
  defaultFormat: STREAM_DEFAULTS.FORMAT,
  maxConcurrentStreams: STREAM_DEFAULTS.MAX_CONCURRENT_STREAMS,
  cacheMaxEntries: CACHE.MAX_ENTRIES,
  maxFrameBytes: CACHE.MAX_FRAME_BYTES,
  metricsWindowSize: METRICS.WINDOW_SIZE,
  operationTimeoutMs: SCHEDULER.OPERATION_TIMEOUT_MS,
  maxBackoffMs: SCHEDULER.MAX_BACKOFF_MS,
  qualityStep: QUALITY_CONTROL.STEP,
  logLevel: "info",
  logDirectory: "",
};

export interface SettingsStoreOptions {
  /** Directory holding config.json; defaults to the per-user config dir */
  cwd?: string;
}

/**
 * Main application settings store
 */
export function createSettingsStore(options: SettingsStoreOptions = {}): Conf<AppSettings> {
  return new Conf<AppSettings>({
    projectName: "framecast",
    cwd: options.cwd,
    defaults: DEFAULT_SETTINGS,
    schema: {
      maxStreamFps: {
        type: "number",
        default: DEFAULT_SETTINGS.maxStreamFps,
        minimum: LIMITS.MIN_FPS,
        maximum: LIMITS.ABSOLUTE_MAX_FPS,
      },
      defaultStreamFps: {
        type: "number",
        default: DEFAULT_SETTINGS.defaultStreamFps,
        minimum: LIMITS.MIN_FPS,
        maximum: LIMITS.ABSOLUTE_MAX_FPS,
      },
      defaultQuality: {
        type: "number",
        default: DEFAULT_SETTINGS.defaultQuality,
        minimum: LIMITS.MIN_QUALITY,
        maximum: LIMITS.MAX_QUALITY,
      },
      defaultFormat: { type: "string", enum: ["jpeg", "png"], default: DEFAULT_SETTINGS.defaultFormat },
      maxConcurrentStreams: {
        type: "number",
        default: DEFAULT_SETTINGS.maxConcurrentStreams,
        minimum: 1,
        maximum: 1000,
      },
      cacheMaxEntries: { type: "number", default: DEFAULT_SETTINGS.cacheMaxEntries, minimum: 1, maximum: 10000 },
      maxFrameBytes: { type: "number", default: DEFAULT_SETTINGS.maxFrameBytes, minimum: 1024 },
      metricsWindowSize: { type: "number", default: DEFAULT_SETTINGS.metricsWindowSize, minimum: 2, maximum: 10000 },
      operationTimeoutMs: {
        type: "number",
        default: DEFAULT_SETTINGS.operationTimeoutMs,
        minimum: 50,
        maximum: 60000,
      },
      maxBackoffMs: { type: "number", default: DEFAULT_SETTINGS.maxBackoffMs, minimum: 0, maximum: 60000 },
      qualityStep: { type: "number", default: DEFAULT_SETTINGS.qualityStep, minimum: 1, maximum: 50 },
      logLevel: {
        type: "string",
        enum: ["debug", "info", "warn", "error", "silent"],
        default: DEFAULT_SETTINGS.logLevel,
      },
      logDirectory: { type: "string", default: DEFAULT_SETTINGS.logDirectory },
    },
  });
}
