/**
 * Configuration Type Definitions
 */

import type { CaptureRegion, ImageFormat } from "@framecast/types";
import type { LogLevel } from "../utils/logger";

/**
 * Application settings schema
 */
export interface AppSettings {
  maxStreamFps: number; // 1-240 fps
  defaultStreamFps: number; // 1-240 fps
  defaultQuality: number; // 1-100
  defaultFormat: ImageFormat;
  maxConcurrentStreams: number; // 1-1000
  cacheMaxEntries: number; // 1-10000
  maxFrameBytes: number; // >= 1KB
  metricsWindowSize: number; // 2-10000 samples
  operationTimeoutMs: number; // 50-60000ms
  maxBackoffMs: number; // 0-60000ms
  qualityStep: number; // 1-50
  logLevel: LogLevel;
  logDirectory: string; // "" = console only
}

/**
 * Stream creation request (what callers send)
 *
 * Every field except the preset is optional; omitted fields come from the
 * preset, then from the settings defaults.
 */
export interface StreamRequest {
  preset?: string;
  targetFps?: number;
  format?: ImageFormat;
  quality?: number;
  minQuality?: number;
  maxQuality?: number;
  region?: CaptureRegion;
  monitor?: number;
  frameSkip?: boolean;
  adaptiveQuality?: boolean;
}

/**
 * Stream preset entry (presets.json)
 */
export interface StreamPreset {
  name: string;
  description: string;
  config: Omit<StreamRequest, "preset">;
  expectedLatencyMs?: number;
  useCases?: string[];
}

/**
 * Derived preset: a parent preset plus overrides
 */
export interface DerivedPreset {
  name: string;
  parent: string;
  overrides: Omit<StreamRequest, "preset">;
  notes?: string;
}

export interface PresetFile {
  presets: Record<string, StreamPreset>;
  derived: Record<string, DerivedPreset>;
}
