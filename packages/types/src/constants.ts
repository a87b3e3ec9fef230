/**
 * framecast Constants
 */

// Hard limits a stream configuration can never exceed
export const LIMITS = {
  MIN_FPS: 1,
  ABSOLUTE_MAX_FPS: 240,
  MIN_QUALITY: 1,
  MAX_QUALITY: 100,
  MAX_REGION_DIMENSION: 16384,
} as const;

// Stream defaults
export const STREAM_DEFAULTS = {
  FPS: 10,
  MAX_FPS: 60,
  QUALITY: 75,
  MIN_QUALITY: 30,
  MAX_QUALITY: 95,
  FORMAT: "jpeg",
  MONITOR: 0,
  MAX_CONCURRENT_STREAMS: 25,
  // Stopped ids remembered for idempotent stop; older ones become unknown
  RETIRED_ID_LIMIT: 1024,
} as const;

// Scheduler tuning
export const SCHEDULER = {
  // A tick is skipped when the previous one took longer than this many periods
  SKIP_OVERRUN_FACTOR: 2,
  DEGRADED_AFTER_FAILURES: 3,
  OPERATION_TIMEOUT_MS: 2000,
  MAX_BACKOFF_MS: 2000,
  // Per-tick failures are logged for the first few, then every Nth
  FAILURE_LOG_EVERY: 50,
} as const;

// Adaptive quality
export const QUALITY_CONTROL = {
  STEP: 5,
  LOWER_BAND_RATIO: 0.9,
  HIGH_LOAD: 0.8,
} as const;

// Metrics
export const METRICS = {
  WINDOW_SIZE: 100,
  RATE_WINDOW: 10,
} as const;

// Resource cache
export const CACHE = {
  MAX_ENTRIES: 60,
  MIN_RECOMMENDED_ENTRIES: 30,
  MAX_RECOMMENDED_ENTRIES: 600,
  BUFFER_SECONDS: 2,
  MAX_FRAME_BYTES: 2 * 1024 * 1024,
  URI_SCHEME: "screen",
  URI_PREFIX: "screen://capture/",
} as const;

export const MIME_TYPES = {
  jpeg: "image/jpeg",
  png: "image/png",
} as const;
