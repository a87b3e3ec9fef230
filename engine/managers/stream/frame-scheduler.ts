/**
 * Frame Scheduler
 *
 * One pacing loop per stream. Each tick either skips (when the previous tick
 * overran by more than SKIP_OVERRUN_FACTOR periods and frame skipping is on)
 * or captures, encodes, caches and notifies subscribers. Capture and encode
 * are bounded by operationTimeoutMs and race the stream's abort signal, so
 * stop() takes effect within one tick period.
 *
 * Lifecycle: idle -> running -> stopping -> stopped. Not restartable.
 */

import { EventEmitter } from "events";
import { MIME_TYPES, SCHEDULER } from "@framecast/types";
import type {
  FrameCallback,
  FrameMetadata,
  MetricsSnapshot,
  QualityState,
  StreamConfig,
  StreamState,
  StreamStatus,
} from "@framecast/types";
import { AppError, CancelledError, CaptureError, EncodeError, StreamStateError, getErrorMessage, toError } from "../../core/app-error";
import { systemClock, withTimeout, type Clock } from "../../utils/async";
import { logger } from "../../utils/logger";
import type { ResourceCache } from "../cache/resource-cache";
import type { FrameSource, RawFrame } from "../capture/frame-source";
import type { FrameEncoder } from "../encode/frame-encoder";
import type { MetricsAggregator } from "../metrics/metrics-aggregator";
import { MetricsCollector } from "../metrics/metrics-collector";
import { AdaptiveQualityController, createQualityState } from "../quality/quality-controller";

/**
 * Collaborators shared with other streams or supplied by the host
 */
export interface SchedulerDependencies {
  source: FrameSource;
  encoder: FrameEncoder;
  cache: ResourceCache;
  aggregator?: MetricsAggregator;
  clock?: Clock;
  /** External load indicator in [0, 1]; high load suppresses quality increases */
  loadProvider?: () => number;
}

export interface SchedulerOptions {
  operationTimeoutMs?: number;
  maxBackoffMs?: number;
  qualityStep?: number;
  metricsWindowSize?: number;
  /** Ticks between quality control cycles (default: targetFps, about once a second) */
  qualityCycleTicks?: number;
}

/**
 * Events emitted by FrameScheduler
 */
export interface SchedulerEvents {
  "state-changed": (state: StreamState) => void;
  "quality-changed": (quality: QualityState) => void;
  degraded: (consecutiveFailures: number) => void;
  recovered: () => void;
}

type TickOutcome = "produced" | "skipped" | "failed";

function isCancellation(error: unknown, signal: AbortSignal): boolean {
  return error instanceof CancelledError && signal.aborted;
}

export class FrameScheduler extends EventEmitter {
  readonly config: Readonly<StreamConfig>;
  private readonly source: FrameSource;
  private readonly encoder: FrameEncoder;
  private readonly cache: ResourceCache;
  private readonly aggregator: MetricsAggregator | null;
  private readonly clock: Clock;
  private readonly loadProvider: (() => number) | null;
  private readonly metrics: MetricsCollector;
  private readonly quality: AdaptiveQualityController;
  private readonly sinks = new Set<FrameCallback>();

  private readonly periodMs: number;
  private readonly operationTimeoutMs: number;
  private readonly maxBackoffMs: number;
  private readonly qualityCycleTicks: number;

  private state: StreamState = "idle";
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private completion: Promise<void> | null = null;

  private ticks: number = 0;
  private framesProduced: number = 0;
  private failedFrames: number = 0;
  private consecutiveFailures: number = 0;
  private degraded: boolean = false;

  constructor(config: StreamConfig, deps: SchedulerDependencies, options: SchedulerOptions = {}) {
    super();
    this.config = Object.freeze({ ...config, region: config.region && Object.freeze({ ...config.region }) });
    this.source = deps.source;
    this.encoder = deps.encoder;
    this.cache = deps.cache;
    this.aggregator = deps.aggregator ?? null;
    this.clock = deps.clock ?? systemClock;
    this.loadProvider = deps.loadProvider ?? null;

    this.periodMs = 1000 / config.targetFps;
    this.operationTimeoutMs = options.operationTimeoutMs ?? SCHEDULER.OPERATION_TIMEOUT_MS;
    this.maxBackoffMs = options.maxBackoffMs ?? SCHEDULER.MAX_BACKOFF_MS;
    this.qualityCycleTicks = Math.max(1, Math.floor(options.qualityCycleTicks ?? config.targetFps));

    this.metrics = new MetricsCollector({ windowSize: options.metricsWindowSize, clock: this.clock });
    this.quality = new AdaptiveQualityController(
      createQualityState(config.quality, config.minQuality, config.maxQuality, config.targetFps),
      options.qualityStep !== undefined ? { step: options.qualityStep } : {}
    );
  }

  // ==================== Lifecycle ====================

  /**
   * Launch the pacing loop
   *
   * @throws StreamStateError unless the scheduler is idle
   */
  start(): void {
    if (this.state !== "idle") {
      throw new StreamStateError(`Stream ${this.config.id} cannot start from state ${this.state}`, {
        streamId: this.config.id,
        state: this.state,
      });
    }

    this.controller = new AbortController();
    this.aggregator?.registerStream(this.config.id);
    this.setState("running");

    logger.info("Stream started", {
      streamId: this.config.id,
      targetFps: this.config.targetFps,
      format: this.config.format,
      quality: this.quality.getQuality(),
      source: this.source.name,
      encoder: this.encoder.name,
    });

    this.loop = this.run(this.controller.signal);
  }

  /**
   * Stop the loop and release the stream
   *
   * Idempotent: concurrent and repeated calls share one completion.
   */
  stop(): Promise<void> {
    if (this.completion) {
      return this.completion;
    }

    if (this.state === "idle") {
      this.setState("stopped");
      this.closeChannel();
      this.completion = Promise.resolve();
      return this.completion;
    }

    this.setState("stopping");
    this.controller?.abort();
    this.completion = this.finish();
    return this.completion;
  }

  private async finish(): Promise<void> {
    if (this.loop) {
      await this.loop;
    }
    this.aggregator?.releaseStream(this.config.id);
    this.setState("stopped");
    this.closeChannel();

    logger.info("Stream stopped", {
      streamId: this.config.id,
      ticks: this.ticks,
      framesProduced: this.framesProduced,
      failedFrames: this.failedFrames,
      skippedFrames: this.metrics.snapshot().skippedFrameCount,
    });
  }

  // ==================== Subscribers ====================

  /**
   * Register a frame sink. Returns an unsubscribe function.
   */
  onFrame(callback: FrameCallback): () => void {
    if (this.state === "stopped") {
      throw new StreamStateError(`Stream ${this.config.id} is stopped`, { streamId: this.config.id });
    }
    this.sinks.add(callback);
    return () => {
      this.sinks.delete(callback);
    };
  }

  get subscriberCount(): number {
    return this.sinks.size;
  }

  // ==================== Quality ====================

  /**
   * Manual quality override, clamped to the stream bounds. Applies from the
   * next frame; the control cycle may move it again if adaptive quality is on.
   */
  setQuality(quality: number): QualityState {
    this.quality.override(quality);
    const state = this.quality.getState();
    logger.debug("Stream quality overridden", { streamId: this.config.id, quality: state.quality });
    this.emit("quality-changed", state);
    return state;
  }

  // ==================== Introspection ====================

  getState(): StreamState {
    return this.state;
  }

  getMetrics(): MetricsSnapshot {
    return this.metrics.snapshot();
  }

  getStatus(): StreamStatus {
    return {
      id: this.config.id,
      state: this.state,
      degraded: this.degraded,
      quality: this.quality.getState(),
      ticks: this.ticks,
      framesProduced: this.framesProduced,
      failedFrames: this.failedFrames,
      consecutiveFailures: this.consecutiveFailures,
    };
  }

  // ==================== Loop ====================

  private async run(signal: AbortSignal): Promise<void> {
    let previousTickMs = 0;

    try {
      while (!signal.aborted) {
        const tickStart = this.clock.now();
        this.ticks++;

        let outcome: TickOutcome;
        if (this.config.frameSkip && previousTickMs > this.periodMs * SCHEDULER.SKIP_OVERRUN_FACTOR) {
          this.metrics.recordSkip();
          this.aggregator?.recordSkip(this.config.id);
          outcome = "skipped";
        } else {
          outcome = await this.tick(signal);
        }

        if (this.config.adaptiveQuality && this.ticks % this.qualityCycleTicks === 0) {
          this.runQualityCycle();
        }

        previousTickMs = this.clock.now() - tickStart;

        const delay =
          outcome === "skipped" ? this.periodMs : Math.max(0, this.periodMs - previousTickMs) + this.backoffMs();
        await this.clock.sleep(delay, signal);
      }
    } catch (error) {
      if (isCancellation(error, signal)) {
        return;
      }
      // Per-tick failures are handled in tick(); anything here is a bug
      logger.error("Stream loop terminated unexpectedly", {
        streamId: this.config.id,
        error: getErrorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      if (this.state === "running") {
        this.setState("stopping");
        this.completion = this.finish();
      }
    }
  }

  /**
   * Capture, encode, cache and notify. Returns the outcome; rethrows only
   * cancellation.
   */
  private async tick(signal: AbortSignal): Promise<TickOutcome> {
    const tickStart = this.clock.now();
    const quality = this.quality.getQuality();

    try {
      const frame = await this.capture(signal);
      const captureMs = this.clock.now() - tickStart;

      const encodeStart = this.clock.now();
      const data = await this.encode(frame, quality, signal);
      const encodeMs = this.clock.now() - encodeStart;

      const mimeType = MIME_TYPES[this.config.format];
      const uri = this.cache.put(data, mimeType, {
        streamId: this.config.id,
        width: frame.width,
        height: frame.height,
        timestamp: frame.timestamp,
        format: this.config.format,
        quality,
      });

      this.framesProduced++;
      this.aggregator?.recordFrame(this.config.id, data.length);
      this.markSuccess();

      this.notify(uri, {
        streamId: this.config.id,
        sequence: this.framesProduced,
        format: this.config.format,
        mimeType,
        quality,
        width: frame.width,
        height: frame.height,
        size: data.length,
        timestamp: frame.timestamp,
      });

      this.metrics.record({
        captureMs,
        encodeMs,
        totalMs: this.clock.now() - tickStart,
        timestamp: frame.timestamp,
      });
      return "produced";
    } catch (error) {
      if (isCancellation(error, signal)) {
        throw error;
      }
      this.markFailure(error);
      return "failed";
    }
  }

  private async capture(signal: AbortSignal): Promise<RawFrame> {
    try {
      return await withTimeout(
        (opSignal) =>
          this.source.capture({ monitor: this.config.monitor, region: this.config.region }, opSignal),
        this.operationTimeoutMs,
        () => new CaptureError("Capture timed out", undefined, { timeoutMs: this.operationTimeoutMs }),
        signal
      );
    } catch (error) {
      if (error instanceof CaptureError || isCancellation(error, signal)) {
        throw error;
      }
      throw new CaptureError(`Capture failed: ${getErrorMessage(error)}`, toError(error));
    }
  }

  private async encode(frame: RawFrame, quality: number, signal: AbortSignal): Promise<Buffer> {
    try {
      return await withTimeout(
        (opSignal) => this.encoder.encode(frame, this.config.format, quality, opSignal),
        this.operationTimeoutMs,
        () => new EncodeError("Encode timed out", undefined, { timeoutMs: this.operationTimeoutMs }),
        signal
      );
    } catch (error) {
      if (error instanceof EncodeError || isCancellation(error, signal)) {
        throw error;
      }
      throw new EncodeError(`Encode failed: ${getErrorMessage(error)}`, toError(error));
    }
  }

  private notify(uri: string, metadata: FrameMetadata): void {
    for (const sink of this.sinks) {
      try {
        const result = sink(uri, metadata);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.logSinkError(error));
        }
      } catch (error) {
        this.logSinkError(error);
      }
    }
  }

  private logSinkError(error: unknown): void {
    logger.warn("Frame subscriber failed", { streamId: this.config.id, error: getErrorMessage(error) });
  }

  private runQualityCycle(): void {
    const before = this.quality.getQuality();
    const after = this.quality.adjust(this.metrics.snapshot(), this.loadProvider?.());
    if (after !== before) {
      const state = this.quality.getState();
      logger.debug("Stream quality adjusted", {
        streamId: this.config.id,
        from: before,
        to: after,
        direction: state.lastDirection,
      });
      this.emit("quality-changed", state);
    }
  }

  // ==================== Failure tracking ====================

  private markSuccess(): void {
    if (this.degraded) {
      this.degraded = false;
      logger.info("Stream recovered", { streamId: this.config.id, failures: this.consecutiveFailures });
      this.emit("recovered");
    }
    this.consecutiveFailures = 0;
  }

  private markFailure(error: unknown): void {
    this.failedFrames++;
    this.consecutiveFailures++;
    this.metrics.recordSkip();
    this.aggregator?.recordFailure(this.config.id);

    if (this.failedFrames <= 3 || this.failedFrames % SCHEDULER.FAILURE_LOG_EVERY === 0) {
      logger.warn("Frame failed", {
        streamId: this.config.id,
        code: AppError.isAppError(error) ? error.code : undefined,
        error: getErrorMessage(error),
        failedFrames: this.failedFrames,
      });
    }

    if (!this.degraded && this.consecutiveFailures >= SCHEDULER.DEGRADED_AFTER_FAILURES) {
      this.degraded = true;
      logger.warn("Stream degraded", {
        streamId: this.config.id,
        consecutiveFailures: this.consecutiveFailures,
      });
      this.emit("degraded", this.consecutiveFailures);
    }
  }

  /**
   * Extra delay while degraded: period x 2^(failures - 2), capped
   */
  private backoffMs(): number {
    if (!this.degraded) {
      return 0;
    }
    return Math.min(this.periodMs * 2 ** (this.consecutiveFailures - 2), this.maxBackoffMs);
  }

  // ==================== Internals ====================

  private setState(state: StreamState): void {
    this.state = state;
    this.emit("state-changed", state);
  }

  private closeChannel(): void {
    this.sinks.clear();
    this.removeAllListeners();
  }
}
