import { existsSync, rmSync } from "fs";
import { join } from "path";
import { config as appConfig } from "../config";
import { PipelineError, describeError, pipelineError } from "../errors";
import { Result, err, ok } from "../result";
import { SiteKey, normalizeSiteKey, siteKeyFileName } from "../site-key";
import { JsonObject, readJsonObject, writeJsonAtomic } from "../storage/json-files";
import { deepFreeze, mergeLayers } from "./merge";
import { ConfigLayer, ConfigLayerName, MergedConfig, configLayerSchema, formatSchemaIssues } from "./schema";

export interface ConfigStoreOptions {
  /** Directory holding `base.json` and the manual `<name>.json` layers. */
  configDir?: string;
  /** Directory holding generated layers, one `<safe-key>.json` per site. */
  generatedDir?: string;
}

const BASE_FILE = "base.json";

/**
 * Loads the three configuration layers for a site and hands out their merge
 * (`manual > generated > base`). Merged configs are memoised per SiteKey for
 * the lifetime of the store and are deep-frozen.
 *
 * Nothing here throws: unreadable, malformed or schema-invalid layer files
 * are logged and treated as empty layers.
 */
export class ConfigStore {
  readonly configDir: string;
  readonly generatedDir: string;

  private baseLayer: JsonObject | null = null;
  private readonly generatedLayers = new Map<SiteKey, JsonObject>();
  private readonly merged = new Map<SiteKey, MergedConfig>();

  constructor(options: ConfigStoreOptions = {}) {
    this.configDir = options.configDir ?? appConfig.configDir;
    this.generatedDir = options.generatedDir ?? appConfig.generatedConfigDir;
  }

  getBaseConfig(): MergedConfig {
    return this.finish(this.loadBase(), "base");
  }

  getConfig(siteKey: SiteKey): MergedConfig {
    const key = normalizeSiteKey(siteKey);
    const memoised = this.merged.get(key);
    if (memoised) return memoised;

    const merged = this.finish(
      mergeLayers([this.loadBase(), this.loadGenerated(key), this.loadManual(key)]),
      key
    );
    this.merged.set(key, merged);
    return merged;
  }

  /**
   * Store a generated layer in memory and on disk. The memory copy is kept
   * even when the disk write fails, so the current process still uses it.
   */
  cacheGeneratedConfig(layer: ConfigLayer, siteKey: SiteKey): Result<string, PipelineError> {
    const key = normalizeSiteKey(siteKey);
    const parsed = configLayerSchema.safeParse(layer);
    if (!parsed.success) {
      return err(pipelineError("validation", `Generated config for ${key} is invalid: ${formatSchemaIssues(parsed.error)}`));
    }

    this.generatedLayers.set(key, parsed.data);
    this.merged.delete(key);

    const path = this.generatedPath(key);
    try {
      writeJsonAtomic(path, parsed.data);
    } catch (error) {
      console.error(`[config] Failed to write generated config ${path}:`, error);
      return err(pipelineError("config_load", `Cannot write ${path}: ${describeError(error)}`, error));
    }
    console.log(`[config] Cached generated config for ${key} at ${path}`);
    return ok(path);
  }

  /**
   * Whether a usable generated layer exists. A file that is unreadable,
   * malformed or empty is removed so the next run regenerates it.
   */
  hasGeneratedConfig(siteKey: SiteKey): boolean {
    const key = normalizeSiteKey(siteKey);
    if (Object.keys(this.loadGenerated(key)).length > 0) return true;

    const path = this.generatedPath(key);
    if (existsSync(path)) {
      console.warn(`[config] Generated config ${path} is unusable; removing it`);
      this.invalidateGeneratedConfig(key);
    }
    return false;
  }

  /** Drop the generated layer from memory and disk. Returns whether one existed. */
  invalidateGeneratedConfig(siteKey: SiteKey): boolean {
    const key = normalizeSiteKey(siteKey);
    const existed = this.generatedLayers.has(key) || existsSync(this.generatedPath(key));
    this.generatedLayers.delete(key);
    this.merged.delete(key);
    rmSync(this.generatedPath(key), { force: true });
    if (existed) console.log(`[config] Invalidated generated config for ${key}`);
    return existed;
  }

  generatedPath(siteKey: SiteKey): string {
    return join(this.generatedDir, `${siteKeyFileName(normalizeSiteKey(siteKey))}.json`);
  }

  /** Manual layer file names to try, in order. */
  manualCandidates(siteKey: SiteKey): string[] {
    const names = [siteKey, siteKey.replace(/[^a-z0-9]+/g, "_")];
    const dot = siteKey.indexOf(".");
    if (dot > 0) names.push(siteKey.slice(0, dot));
    return [...new Set(names)]
      .filter((name) => name && `${name}.json` !== BASE_FILE)
      .map((name) => join(this.configDir, `${siteKeyFileName(name)}.json`));
  }

  private loadBase(): JsonObject {
    if (!this.baseLayer) {
      this.baseLayer = this.readLayer(join(this.configDir, BASE_FILE), "base") ?? {};
    }
    return this.baseLayer;
  }

  private loadGenerated(key: SiteKey): JsonObject {
    const cached = this.generatedLayers.get(key);
    if (cached) return cached;

    const layer = this.readLayer(this.generatedPath(key), "generated");
    if (!layer) return {};
    this.generatedLayers.set(key, layer);
    return layer;
  }

  private loadManual(key: SiteKey): JsonObject {
    for (const path of this.manualCandidates(key)) {
      if (!existsSync(path)) continue;
      return this.readLayer(path, "manual") ?? {};
    }
    return {};
  }

  /** `null` when the file does not exist; `{}` when it exists but is unusable. */
  private readLayer(path: string, layer: ConfigLayerName): JsonObject | null {
    const read = readJsonObject(path);
    if (!read.ok) {
      console.warn(`[config] ${read.error.message}; using an empty ${layer} layer`);
      return {};
    }
    if (read.value === null) return null;

    const parsed = configLayerSchema.safeParse(read.value);
    if (!parsed.success) {
      console.warn(
        `[config] Invalid ${layer} layer ${path} (${formatSchemaIssues(parsed.error)}); using an empty layer`
      );
      return {};
    }
    return parsed.data;
  }

  private finish(raw: JsonObject, label: string): MergedConfig {
    const parsed = configLayerSchema.safeParse(raw);
    if (parsed.success) return deepFreeze(parsed.data);
    // Each layer passed the schema on its own, so this only trips on schema drift.
    console.warn(`[config] Merged config for ${label} failed validation: ${formatSchemaIssues(parsed.error)}`);
    return deepFreeze({});
  }
}
