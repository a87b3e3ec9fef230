/**
 * Metrics Aggregator
 *
 * Process-wide counters across all streams. Every scheduler reports into the
 * single aggregator owned by AppContext; a periodic summary is written to the
 * log while the aggregator is running.
 */

import { logger } from "../../utils/logger";

// Constants
const REPORT_INTERVAL_MS = 30_000; // 30 seconds

/**
 * Counters for one stream
 */
export interface StreamTotals {
  framesProduced: number;
  framesSkipped: number;
  framesFailed: number;
  bytesProduced: number;
  lastFrameAt: number | null;
}

/**
 * Process-wide summary
 */
export interface AggregateSummary {
  startedAt: number;
  uptimeMs: number;
  activeStreams: number;
  streamsCreated: number;
  framesProduced: number;
  framesSkipped: number;
  framesFailed: number;
  bytesProduced: number;
  streams: Record<string, StreamTotals>;
}

function emptyTotals(): StreamTotals {
  return {
    framesProduced: 0,
    framesSkipped: 0,
    framesFailed: 0,
    bytesProduced: 0,
    lastFrameAt: null,
  };
}

/**
 * Metrics Aggregator
 *
 * Collects totals from every stream's scheduler.
 */
export class MetricsAggregator {
  private readonly startedAt: number = Date.now();
  private reportInterval: NodeJS.Timeout | null = null;
  private streamsCreated: number = 0;
  private readonly active = new Map<string, StreamTotals>();
  private readonly retired = emptyTotals();

  /**
   * Start periodic summary logging
   */
  start(intervalMs: number = REPORT_INTERVAL_MS): void {
    if (this.reportInterval) {
      this.stop();
    }

    this.reportInterval = setInterval(() => {
      const summary = this.getSummary();
      logger.info("Stream metrics summary", {
        activeStreams: summary.activeStreams,
        framesProduced: summary.framesProduced,
        framesSkipped: summary.framesSkipped,
        framesFailed: summary.framesFailed,
        megabytes: Math.round((summary.bytesProduced / (1024 * 1024)) * 100) / 100,
      });
    }, intervalMs);
    this.reportInterval.unref();
  }

  /**
   * Stop periodic summary logging
   */
  stop(): void {
    if (this.reportInterval) {
      clearInterval(this.reportInterval);
      this.reportInterval = null;
    }
  }

  registerStream(streamId: string): void {
    if (!this.active.has(streamId)) {
      this.active.set(streamId, emptyTotals());
      this.streamsCreated++;
    }
  }

  /**
   * Fold a stopped stream's totals into the retired bucket
   */
  releaseStream(streamId: string): void {
    const totals = this.active.get(streamId);
    if (!totals) return;
    this.retired.framesProduced += totals.framesProduced;
    this.retired.framesSkipped += totals.framesSkipped;
    this.retired.framesFailed += totals.framesFailed;
    this.retired.bytesProduced += totals.bytesProduced;
    this.active.delete(streamId);
  }

  recordFrame(streamId: string, bytes: number): void {
    const totals = this.active.get(streamId);
    if (!totals) return;
    totals.framesProduced++;
    totals.bytesProduced += bytes;
    totals.lastFrameAt = Date.now();
  }

  recordSkip(streamId: string): void {
    const totals = this.active.get(streamId);
    if (totals) totals.framesSkipped++;
  }

  recordFailure(streamId: string): void {
    const totals = this.active.get(streamId);
    if (totals) totals.framesFailed++;
  }

  /**
   * Get current summary snapshot
   */
  getSummary(): AggregateSummary {
    const streams: Record<string, StreamTotals> = {};
    const sum = { ...this.retired };

    for (const [streamId, totals] of this.active) {
      streams[streamId] = { ...totals };
      sum.framesProduced += totals.framesProduced;
      sum.framesSkipped += totals.framesSkipped;
      sum.framesFailed += totals.framesFailed;
      sum.bytesProduced += totals.bytesProduced;
    }

    return {
      startedAt: this.startedAt,
      uptimeMs: Date.now() - this.startedAt,
      activeStreams: this.active.size,
      streamsCreated: this.streamsCreated,
      framesProduced: sum.framesProduced,
      framesSkipped: sum.framesSkipped,
      framesFailed: sum.framesFailed,
      bytesProduced: sum.bytesProduced,
      streams,
    };
  }

  isRunning(): boolean {
    return this.reportInterval !== null;
  }
}
