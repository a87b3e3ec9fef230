/**
 * Stream Preset Loader
 *
 * Named starting configurations (quality / balanced / performance / extreme)
 * plus derived presets that inherit a parent and override a few fields.
 */

import * as fs from "fs";
import { fileURLToPath } from "url";
import { CACHE } from "@framecast/types";
import { presetFileSchema } from "../api/schemas";
import { ConfigError, InvalidConfigError, getErrorMessage } from "../core/app-error";
import { logger } from "../utils/logger";
import type { PresetFile, StreamRequest } from "./types";

export const DEFAULT_PRESET_FILE = fileURLToPath(new URL("./presets.json", import.meta.url));

/**
 * Calculate recommended cache size for a frame rate
 *
 * Keeps bufferSeconds worth of frames, within [30, 600] entries.
 */
export function recommendedCacheSize(fps: number, bufferSeconds: number = CACHE.BUFFER_SECONDS): number {
  const size = Math.ceil(fps * bufferSeconds);
  return Math.max(CACHE.MIN_RECOMMENDED_ENTRIES, Math.min(CACHE.MAX_RECOMMENDED_ENTRIES, size));
}

/**
 * Preset catalog
 */
export class PresetCatalog {
  private readonly data: PresetFile;

  constructor(data: PresetFile) {
    this.data = data;
  }

  /**
   * Load presets from a JSON file
   *
   * @throws ConfigError when the file is unreadable or malformed
   */
  static fromFile(filePath: string = DEFAULT_PRESET_FILE): PresetCatalog {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    } catch (error) {
      throw new ConfigError(`Cannot read preset file: ${getErrorMessage(error)}`, undefined, { filePath });
    }

    const result = presetFileSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      throw new ConfigError(`Invalid preset file: ${issues.join(", ")}`, undefined, { filePath });
    }

    const catalog = new PresetCatalog(result.data);
    logger.debug("Loaded stream presets", {
      presets: Object.keys(result.data.presets).length,
      derived: Object.keys(result.data.derived).length,
    });
    return catalog;
  }

  /**
   * Resolve a preset (standard or derived) to its stream fields
   *
   * @throws InvalidConfigError for unknown names or a derived preset with a missing parent
   */
  resolve(name: string): Omit<StreamRequest, "preset"> {
    if (Object.hasOwn(this.data.presets, name)) {
      return { ...this.data.presets[name].config };
    }

    if (Object.hasOwn(this.data.derived, name)) {
      const derived = this.data.derived[name];
      if (!Object.hasOwn(this.data.presets, derived.parent)) {
        throw new InvalidConfigError(`Preset ${name} refers to unknown parent ${derived.parent}`, undefined, {
          preset: name,
        });
      }
      return { ...this.data.presets[derived.parent].config, ...derived.overrides };
    }

    throw new InvalidConfigError(`Unknown preset: ${name}`, undefined, {
      preset: name,
      available: this.names(),
    });
  }

  has(name: string): boolean {
    return Object.hasOwn(this.data.presets, name) || Object.hasOwn(this.data.derived, name);
  }

  names(): string[] {
    return [...Object.keys(this.data.presets), ...Object.keys(this.data.derived)];
  }

  /**
   * List presets with a one-line description
   */
  list(): Array<{ name: string; title: string; description: string }> {
    const standard = Object.entries(this.data.presets).map(([name, preset]) => ({
      name,
      title: preset.name,
      description: preset.description,
    }));
    const derived = Object.entries(this.data.derived).map(([name, preset]) => ({
      name,
      title: preset.name,
      description: preset.notes ?? `Based on ${preset.parent}`,
    }));
    return [...standard, ...derived];
  }
}
