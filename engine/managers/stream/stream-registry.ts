/**
 * Stream Registry
 *
 * Single source of truth for which streams exist. Validates creation
 * requests, expands presets, enforces the concurrent stream limit and owns
 * one FrameScheduler per stream.
 */

import * as crypto from "crypto";
import { STREAM_DEFAULTS } from "@framecast/types";
import type {
  CaptureRegion,
  FrameCallback,
  MetricsSnapshot,
  QualityState,
  StreamConfig,
  StreamState,
  StreamStatus,
} from "@framecast/types";
import { streamRequestSchema } from "../../api/schemas";
import type { PresetCatalog } from "../../config/presets";
import type { AppSettings, StreamRequest } from "../../config/types";
import {
  InvalidConfigError,
  ResourceExhaustedError,
  StreamNotFoundError,
  StreamStateError,
} from "../../core/app-error";
import type { Clock } from "../../utils/async";
import { logger } from "../../utils/logger";
import type { ResourceCache } from "../cache/resource-cache";
import type { FrameSource } from "../capture/frame-source";
import type { FrameEncoder } from "../encode/frame-encoder";
import type { MetricsAggregator } from "../metrics/metrics-aggregator";
import { FrameScheduler } from "./frame-scheduler";

export type RegistrySettings = Pick<
  AppSettings,
  | "maxStreamFps"
  | "defaultStreamFps"
  | "defaultQuality"
  | "defaultFormat"
  | "maxConcurrentStreams"
  | "metricsWindowSize"
  | "operationTimeoutMs"
  | "maxBackoffMs"
  | "qualityStep"
>;

export interface StreamRegistryOptions {
  settings: RegistrySettings;
  source: FrameSource;
  encoder: FrameEncoder;
  cache: ResourceCache;
  aggregator?: MetricsAggregator;
  presets?: PresetCatalog;
  clock?: Clock;
  loadProvider?: () => number;
  qualityCycleTicks?: number;
  /** Stopped ids remembered before the oldest is forgotten */
  retiredIdLimit?: number;
}

function copyConfig(config: Readonly<StreamConfig>): StreamConfig {
  return { ...config, region: config.region && { ...config.region } };
}

/**
 * Generate a stream id: stream_ + 16 hex chars
 */
export function generateStreamId(): string {
  return `stream_${crypto.randomBytes(8).toString("hex")}`;
}

export class StreamRegistry {
  private readonly streams = new Map<string, FrameScheduler>();
  private readonly stopped = new Set<string>();
  private readonly options: StreamRegistryOptions;
  private readonly retiredIdLimit: number;

  constructor(options: StreamRegistryOptions) {
    this.options = options;
    this.retiredIdLimit = Math.max(1, Math.floor(options.retiredIdLimit ?? STREAM_DEFAULTS.RETIRED_ID_LIMIT));
  }

  /**
   * Validate a request and register an idle stream
   *
   * @throws InvalidConfigError for malformed or out-of-bounds requests
   * @throws ResourceExhaustedError once maxConcurrentStreams streams exist
   */
  create(request: unknown = {}): string {
    const config = this.buildConfig(request);

    if (this.streams.size >= this.options.settings.maxConcurrentStreams) {
      throw new ResourceExhaustedError("Maximum concurrent streams reached", undefined, {
        maxConcurrentStreams: this.options.settings.maxConcurrentStreams,
      });
    }

    const { settings } = this.options;
    const scheduler = new FrameScheduler(
      config,
      {
        source: this.options.source,
        encoder: this.options.encoder,
        cache: this.options.cache,
        aggregator: this.options.aggregator,
        clock: this.options.clock,
        loadProvider: this.options.loadProvider,
      },
      {
        operationTimeoutMs: settings.operationTimeoutMs,
        maxBackoffMs: settings.maxBackoffMs,
        qualityStep: settings.qualityStep,
        metricsWindowSize: settings.metricsWindowSize,
        qualityCycleTicks: this.options.qualityCycleTicks,
      }
    );

    scheduler.on("state-changed", (state: StreamState) => {
      if (state === "stopped") {
        this.streams.delete(config.id);
        this.retire(config.id);
      }
    });

    this.streams.set(config.id, scheduler);
    logger.info("Stream created", {
      streamId: config.id,
      preset: config.preset,
      targetFps: config.targetFps,
      format: config.format,
      quality: config.quality,
    });
    return config.id;
  }

  /**
   * @throws StreamStateError when the stream was stopped or is already running
   */
  start(streamId: string): void {
    if (this.stopped.has(streamId)) {
      throw new StreamStateError(`Stream ${streamId} is stopped and cannot be restarted`, {
        streamId,
        state: "stopped",
      });
    }
    this.require(streamId).start();
  }

  /**
   * Stop a stream. Stopping a recently stopped stream is a no-op.
   */
  async stop(streamId: string): Promise<void> {
    if (this.stopped.has(streamId)) {
      return;
    }
    await this.require(streamId).stop();
  }

  /**
   * Configs of streams not yet stopped, in creation order
   */
  list(): StreamConfig[] {
    return [...this.streams.values()].map((scheduler) => copyConfig(scheduler.config));
  }

  get(streamId: string): StreamConfig {
    return copyConfig(this.require(streamId).config);
  }

  onFrame(streamId: string, callback: FrameCallback): () => void {
    return this.require(streamId).onFrame(callback);
  }

  snapshot(streamId: string): MetricsSnapshot {
    return this.require(streamId).getMetrics();
  }

  status(streamId: string): StreamStatus {
    return this.require(streamId).getStatus();
  }

  /**
   * Manual quality override, clamped to the stream's bounds
   */
  setQuality(streamId: string, quality: number): QualityState {
    if (!Number.isFinite(quality)) {
      throw new InvalidConfigError("Quality must be a finite number", undefined, { streamId, quality });
    }
    return this.require(streamId).setQuality(quality);
  }

  /**
   * Stop every stream. Called at process exit.
   */
  async shutdown(): Promise<void> {
    const ids = [...this.streams.keys()];
    if (ids.length === 0) return;
    logger.info("Stopping all streams", { count: ids.length });
    await Promise.all(ids.map((id) => this.stop(id)));
  }

  get activeCount(): number {
    return this.streams.size;
  }

  /**
   * Remember a stopped id, forgetting the oldest past retiredIdLimit
   */
  private retire(streamId: string): void {
    this.stopped.add(streamId);
    while (this.stopped.size > this.retiredIdLimit) {
      const oldest = this.stopped.values().next();
      if (oldest.done) break;
      this.stopped.delete(oldest.value);
    }
  }

  private require(streamId: string): FrameScheduler {
    const scheduler = this.streams.get(streamId);
    if (!scheduler) {
      throw new StreamNotFoundError(streamId);
    }
    return scheduler;
  }

  /**
   * Merge defaults, preset and request, then check the runtime bounds
   *
   * Precedence: request > preset > settings defaults. A preset's rate above
   * maxStreamFps is clamped; an explicit one is rejected. Inherited quality
   * is clamped into [minQuality, maxQuality]; an explicit one must fit.
   */
  private buildConfig(request: unknown): StreamConfig {
    const parsed = streamRequestSchema.safeParse(request ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`);
      throw new InvalidConfigError(`Invalid stream request: ${issues.join(", ")}`, undefined, { issues });
    }

    const { preset: presetName, ...fields } = parsed.data;
    const { settings } = this.options;
    const presetFields: Omit<StreamRequest, "preset"> = presetName ? this.resolvePreset(presetName) : {};

    if (presetFields.targetFps !== undefined && presetFields.targetFps > settings.maxStreamFps) {
      logger.debug("Preset frame rate clamped", {
        preset: presetName,
        requested: presetFields.targetFps,
        maxStreamFps: settings.maxStreamFps,
      });
      presetFields.targetFps = settings.maxStreamFps;
    }

    if (fields.targetFps !== undefined && fields.targetFps > settings.maxStreamFps) {
      throw new InvalidConfigError(`targetFps ${fields.targetFps} exceeds maximum ${settings.maxStreamFps}`, undefined, {
        targetFps: fields.targetFps,
        maxStreamFps: settings.maxStreamFps,
      });
    }

    const merged: Omit<StreamRequest, "preset"> = {
      ...presetFields,
      ...fields,
    };

    const minQuality = merged.minQuality ?? STREAM_DEFAULTS.MIN_QUALITY;
    const maxQuality = merged.maxQuality ?? STREAM_DEFAULTS.MAX_QUALITY;
    if (minQuality > maxQuality) {
      throw new InvalidConfigError(`minQuality ${minQuality} exceeds maxQuality ${maxQuality}`, undefined, {
        minQuality,
        maxQuality,
      });
    }

    if (fields.quality !== undefined && (fields.quality < minQuality || fields.quality > maxQuality)) {
      throw new InvalidConfigError(`quality ${fields.quality} outside [${minQuality}, ${maxQuality}]`, undefined, {
        quality: fields.quality,
        minQuality,
        maxQuality,
      });
    }
    const inherited = merged.quality ?? settings.defaultQuality;
    const quality = Math.max(minQuality, Math.min(maxQuality, inherited));

    const monitor = merged.monitor ?? STREAM_DEFAULTS.MONITOR;
    this.checkCaptureArea(monitor, merged.region);

    return {
      id: generateStreamId(),
      targetFps: Math.min(merged.targetFps ?? settings.defaultStreamFps, settings.maxStreamFps),
      format: merged.format ?? settings.defaultFormat,
      quality,
      minQuality,
      maxQuality,
      region: merged.region && { ...merged.region },
      monitor,
      frameSkip: merged.frameSkip ?? true,
      adaptiveQuality: merged.adaptiveQuality ?? true,
      preset: presetName,
    };
  }

  /**
   * @throws InvalidConfigError when the monitor does not exist or the region leaves it
   */
  private checkCaptureArea(monitor: number, region: CaptureRegion | undefined): void {
    const bounds = this.options.source.monitorBounds(monitor);
    if (!bounds) {
      throw new InvalidConfigError(`Monitor ${monitor} not available`, undefined, { monitor });
    }
    if (region && (region.x + region.width > bounds.width || region.y + region.height > bounds.height)) {
      throw new InvalidConfigError(
        `Region ${region.width}x${region.height}+${region.x}+${region.y} exceeds monitor ${monitor} (${bounds.width}x${bounds.height})`,
        undefined,
        { monitor, region, bounds }
      );
    }
  }

  private resolvePreset(name: string): Omit<StreamRequest, "preset"> {
    if (!this.options.presets) {
      throw new InvalidConfigError(`Unknown preset: ${name}`, undefined, { preset: name });
    }
    return this.options.presets.resolve(name);
  }
}
