export * from "./constants";
export type {
  ImageFormat,
  CaptureRegion,
  StreamConfig,
  StreamState,
  FrameMetadata,
  FrameCallback,
  ResourceEncoding,
  DurationStats,
  MetricsSnapshot,
  QualityDirection,
  QualityState,
  StreamStatus,
  CommandResult,
  SerializedError,
} from "./types";
