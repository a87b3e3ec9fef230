/**
 * Dependency Injection Container
 *
 * Owns the process-lifetime objects: the shared ResourceCache, the
 * MetricsAggregator, the preset catalog, the StreamRegistry and the command
 * router. Created once at startup and torn down by cleanup() at shutdown;
 * nothing here is a module-level singleton.
 *
 * Instances are created lazily on first access.
 */

import { registerAllHandlers } from "../api";
import { CommandRouter } from "../api/validation";
import { PresetCatalog } from "../config/presets";
import type { AppSettings } from "../config/types";
import { ResourceCache } from "../managers/cache/resource-cache";
import type { FrameSource } from "../managers/capture/frame-source";
import type { FrameEncoder } from "../managers/encode/frame-encoder";
import { MetricsAggregator } from "../managers/metrics/metrics-aggregator";
import { StreamRegistry } from "../managers/stream/stream-registry";
import type { Clock } from "../utils/async";
import { logger } from "../utils/logger";

export interface AppContextOptions {
  settings: AppSettings;
  source: FrameSource;
  encoder: FrameEncoder;
  /** Defaults to the bundled presets.json */
  presets?: PresetCatalog;
  clock?: Clock;
  loadProvider?: () => number;
  qualityCycleTicks?: number;
}

/**
 * Application context - dependency injection container
 */
export class AppContext {
  private readonly options: AppContextOptions;

  private resourceCache: ResourceCache | null = null;
  private metricsAggregator: MetricsAggregator | null = null;
  private presetCatalog: PresetCatalog | null = null;
  private streamRegistry: StreamRegistry | null = null;
  private commandRouter: CommandRouter | null = null;

  constructor(options: AppContextOptions) {
    this.options = options;
  }

  getSettings(): Readonly<AppSettings> {
    return this.options.settings;
  }

  /**
   * Get the shared frame cache (lazy initialization)
   */
  getResourceCache(): ResourceCache {
    if (!this.resourceCache) {
      this.resourceCache = new ResourceCache({
        maxEntries: this.options.settings.cacheMaxEntries,
        maxEntryBytes: this.options.settings.maxFrameBytes,
      });
    }
    return this.resourceCache;
  }

  /**
   * Get the process-wide metrics aggregator (lazy initialization)
   */
  getMetricsAggregator(): MetricsAggregator {
    if (!this.metricsAggregator) {
      this.metricsAggregator = new MetricsAggregator();
    }
    return this.metricsAggregator;
  }

  /**
   * Get the preset catalog (lazy initialization)
   *
   * @throws ConfigError when the bundled preset file is unreadable
   */
  getPresetCatalog(): PresetCatalog {
    if (!this.presetCatalog) {
      this.presetCatalog = this.options.presets ?? PresetCatalog.fromFile();
    }
    return this.presetCatalog;
  }

  /**
   * Get the stream registry (lazy initialization)
   */
  getStreamRegistry(): StreamRegistry {
    if (!this.streamRegistry) {
      this.streamRegistry = new StreamRegistry({
        settings: this.options.settings,
        source: this.options.source,
        encoder: this.options.encoder,
        cache: this.getResourceCache(),
        aggregator: this.getMetricsAggregator(),
        presets: this.getPresetCatalog(),
        clock: this.options.clock,
        loadProvider: this.options.loadProvider,
        qualityCycleTicks: this.options.qualityCycleTicks,
      });
    }
    return this.streamRegistry;
  }

  /**
   * Get the command router with every handler registered (lazy initialization)
   */
  getCommandRouter(): CommandRouter {
    if (!this.commandRouter) {
      this.commandRouter = new CommandRouter();
      registerAllHandlers(this.commandRouter, this);
    }
    return this.commandRouter;
  }

  /**
   * Cleanup all resources
   *
   * Stops every stream, stops periodic reporting and drops the cache.
   * Should be called on shutdown.
   */
  async cleanup(): Promise<void> {
    if (this.streamRegistry) {
      await this.streamRegistry.shutdown();
    }
    this.metricsAggregator?.stop();
    this.resourceCache?.clear();
    this.commandRouter?.removeAll();

    logger.debug("Application context cleaned up");

    // Clear all references
    this.streamRegistry = null;
    this.commandRouter = null;
    this.resourceCache = null;
    this.metricsAggregator = null;
    this.presetCatalog = null;
  }
}
