/**
 * Server Command Handlers
 *
 * Presets and process-wide statistics.
 */

import { recommendedCacheSize } from "../config/presets";
import type { AppContext } from "../core/app-context";
import type { CommandRouter } from "./validation";

export function registerServerHandlers(router: CommandRouter, context: AppContext): void {
  // presets:list - Standard and derived presets with their resolved rate
  router.handleNoArgs("presets:list", () => {
    const catalog = context.getPresetCatalog();
    const settings = context.getSettings();
    return catalog.list().map((preset) => {
      const targetFps = Math.min(
        catalog.resolve(preset.name).targetFps ?? settings.defaultStreamFps,
        settings.maxStreamFps
      );
      return { ...preset, targetFps, recommendedCacheSize: recommendedCacheSize(targetFps) };
    });
  });

  // server:stats - Cache statistics plus aggregated stream totals
  router.handleNoArgs("server:stats", () => ({
    activeStreams: context.getStreamRegistry().activeCount,
    cache: context.getResourceCache().stats(),
    metrics: context.getMetricsAggregator().getSummary(),
  }));
}
