/**
 * Process Entry Point
 *
 * Loads settings, builds the application context and runs one stream from
 * the synthetic test-pattern source until SIGINT/SIGTERM. Usage:
 *
 *   tsx engine/main.ts [preset]
 */

import { z } from "zod";
import { streamIdSchema } from "./api/schemas";
import { resolveSettings } from "./config/settings";
import { createSettingsStore } from "./config/store";
import { AppContext } from "./core/app-context";
import { getErrorMessage } from "./core/app-error";
import { TestPatternSource } from "./managers/capture/test-pattern-source";
import { SharpEncoder } from "./managers/encode/sharp-encoder";
import { configureLogger, logger } from "./utils/logger";
import { PLATFORM, systemLoad } from "./utils/platform";

const DEFAULT_PRESET = "balanced";

const createdStreamSchema = z.object({ streamId: streamIdSchema });

// Application context (dependency injection container)
let appContext: AppContext | null = null;
let shuttingDown = false;

/**
 * Initialize application
 */
async function initializeApp(presetName: string): Promise<void> {
  const settings = resolveSettings(createSettingsStore().store);
  configureLogger({ level: settings.logLevel, directory: settings.logDirectory || null });

  logger.info("framecast starting", {
    platform: PLATFORM.PLATFORM,
    arch: PLATFORM.ARCH,
    cpus: PLATFORM.CPU_COUNT,
    node: PLATFORM.NODE_VERSION,
    logFile: logger.getLogFilePath(),
  });

  appContext = new AppContext({
    settings,
    source: new TestPatternSource(),
    encoder: new SharpEncoder(),
    loadProvider: systemLoad,
  });

  const router = appContext.getCommandRouter();
  appContext.getMetricsAggregator().start();

  const created = await router.dispatch("stream:create", { preset: presetName });
  if (!created.success) {
    throw new Error(`Cannot create stream: ${created.error.message}`);
  }

  const { streamId } = createdStreamSchema.parse(created.data);
  const registry = appContext.getStreamRegistry();
  const config = registry.get(streamId);
  registry.onFrame(streamId, (uri, metadata) => {
    if (metadata.sequence % config.targetFps === 0) {
      logger.info("Frame delivered", { uri, quality: metadata.quality, size: metadata.size });
    }
  });

  const started = await router.dispatch("stream:start", { streamId });
  if (!started.success) {
    throw new Error(`Cannot start stream: ${started.error.message}`);
  }
}

/**
 * Stop every stream and exit
 */
async function shutdown(signal: string, exitCode: number = 0): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info("Shutting down", { signal });

  if (appContext) {
    await appContext.cleanup();
    appContext = null;
  }
  process.exit(exitCode);
}

function requestShutdown(signal: string, exitCode: number = 0): void {
  shutdown(signal, exitCode).catch((error: unknown) => {
    logger.error("Shutdown failed", { error: getErrorMessage(error) });
    process.exit(1);
  });
}

process.on("SIGINT", () => requestShutdown("SIGINT"));
process.on("SIGTERM", () => requestShutdown("SIGTERM"));

initializeApp(process.argv[2] ?? DEFAULT_PRESET).catch((error: unknown) => {
  logger.error("Failed to initialize", { error: getErrorMessage(error) });
  requestShutdown("startup-failure", 1);
});
