/**
 * framecast engine
 *
 * Library entry point. engine/main.ts is the runnable demo.
 */

export * from "@framecast/types";

export { AppContext, type AppContextOptions } from "./core/app-context";
export {
  AppError,
  CancelledError,
  CaptureError,
  ConfigError,
  EncodeError,
  InvalidConfigError,
  ResourceExhaustedError,
  ResourceNotFoundError,
  StreamNotFoundError,
  StreamStateError,
  getErrorMessage,
  toError,
} from "./core/app-error";

export { CommandRouter, CommandValidationError, UnknownCommandError, registerAllHandlers, serializeError } from "./api";
export * as schemas from "./api/schemas";

export { resolveSettings, settingsSchema, ENV_OVERRIDES } from "./config/settings";
export { createSettingsStore, DEFAULT_SETTINGS } from "./config/store";
export { PresetCatalog, recommendedCacheSize, DEFAULT_PRESET_FILE } from "./config/presets";
export type { AppSettings, StreamRequest, StreamPreset, DerivedPreset, PresetFile } from "./config/types";

export {
  ResourceCache,
  frameDigest,
  type CachedResource,
  type ResourceMetadata,
  type ResourceSummary,
  type ResourceCacheStats,
  type ResourceCacheOptions,
} from "./managers/cache/resource-cache";
export type { FrameSource, RawFrame, CaptureRequest, MonitorBounds } from "./managers/capture/frame-source";
export { TestPatternSource, type TestPatternOptions } from "./managers/capture/test-pattern-source";
export type { FrameEncoder } from "./managers/encode/frame-encoder";
export { SharpEncoder, pngCompressionLevel, type SharpEncoderOptions } from "./managers/encode/sharp-encoder";
export {
  MetricsCollector,
  percentile,
  type FrameMetricSample,
  type MetricsCollectorOptions,
} from "./managers/metrics/metrics-collector";
export { MetricsAggregator, type AggregateSummary, type StreamTotals } from "./managers/metrics/metrics-aggregator";
export {
  AdaptiveQualityController,
  computeNextQuality,
  createQualityState,
  DEFAULT_QUALITY_CONTROL,
  type QualityControlOptions,
} from "./managers/quality/quality-controller";
export {
  FrameScheduler,
  type SchedulerDependencies,
  type SchedulerEvents,
  type SchedulerOptions,
} from "./managers/stream/frame-scheduler";
export {
  StreamRegistry,
  generateStreamId,
  type RegistrySettings,
  type StreamRegistryOptions,
} from "./managers/stream/stream-registry";

export { systemClock, sleep, withTimeout, type Clock } from "./utils/async";
export { configureLogger, formatLogLine, logger, type LogLevel } from "./utils/logger";
export { cpuLoad, memoryPressure, systemLoad } from "./utils/platform";
