/**
 * framecast Shared Types
 * Common types used between the frame engine and its transports
 */

// Stream configuration
export type ImageFormat = "jpeg" | "png";

export interface CaptureRegion {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface StreamConfig {
  id: string;
  targetFps: number;
  format: ImageFormat;
  quality: number;
  minQuality: number;
  maxQuality: number;
  region?: CaptureRegion;
  monitor: number;
  frameSkip: boolean;
  adaptiveQuality: boolean;
  preset?: string;
}

export type StreamState = "idle" | "running" | "stopping" | "stopped";

// Frame delivery
export interface FrameMetadata {
  streamId: string;
  sequence: number;
  format: ImageFormat;
  mimeType: string;
  quality: number;
  width: number;
  height: number;
  size: number;
  timestamp: number;
}

export type FrameCallback = (uri: string, metadata: FrameMetadata) => void | Promise<void>;

export type ResourceEncoding = "binary" | "base64";

// Metrics
export interface DurationStats {
  mean: number;
  min: number;
  max: number;
}

export interface MetricsSnapshot {
  currentFps: number;
  avgSessionFps: number;
  capture: DurationStats;
  encode: DurationStats;
  total: DurationStats;
  p50: number;
  p95: number;
  p99: number;
  frameCount: number;
  lifetimeFrameCount: number;
  skippedFrameCount: number;
  skipRate: number;
  windowSize: number;
  sessionDurationMs: number;
}

// Quality control
export type QualityDirection = "up" | "down" | "none";

export interface QualityState {
  quality: number;
  minQuality: number;
  maxQuality: number;
  targetFps: number;
  lastDirection: QualityDirection;
  lastDelta: number;
}

export interface StreamStatus {
  id: string;
  state: StreamState;
  degraded: boolean;
  quality: QualityState;
  ticks: number;
  framesProduced: number;
  failedFrames: number;
  consecutiveFailures: number;
}

// API Types
export type CommandResult<T = unknown> =
  | { success: true; data: T }
  | { success: false; error: SerializedError };

export interface SerializedError {
  name: string;
  message: string;
  code: string;
  statusCode?: number;
  metadata?: Record<string, unknown>;
}
