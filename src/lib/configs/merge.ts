import { JsonObject, isJsonObject } from "../storage/json-files";
import { ConfigLayer, MergedConfig, configLayerSchema, formatSchemaIssues } from "./schema";

/**
 * Merge `override` onto `base` without touching either. Nested objects merge
 * key by key; any other value (scalar, list, null) from `override` replaces
 * the base value outright. Keys whose override value is `undefined` are
 * ignored so that optional-but-absent fields never erase a lower layer.
 */
export function deepMerge(base: JsonObject, override: JsonObject): JsonObject {
  const result: JsonObject = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = result[key];
    if (isJsonObject(current) && isJsonObject(value)) {
      result[key] = deepMerge(current, value);
    } else {
      result[key] = cloneJson(value);
    }
  }

  return result;
}

/** Merge any number of layers, lowest precedence first. */
export function mergeLayers(layers: JsonObject[]): JsonObject {
  return layers.reduce<JsonObject>((merged, layer) => deepMerge(merged, layer), {});
}

function cloneJson(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(cloneJson);
  if (isJsonObject(value)) {
    const copy: JsonObject = {};
    for (const [key, nested] of Object.entries(value)) copy[key] = cloneJson(nested);
    return copy;
  }
  return value;
}

/**
 * New frozen config with `override` merged onto `config`. The input is left
 * as it is; if the merge does not validate, the input is returned.
 */
export function overlayConfig(config: MergedConfig, override: ConfigLayer): MergedConfig {
  const parsed = configLayerSchema.safeParse(deepMerge(config, override));
  if (!parsed.success) {
    console.warn(`[config] Discarding invalid config override: ${formatSchemaIssues(parsed.error)}`);
    return config;
  }
  return deepFreeze(parsed.data);
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) deepFreeze(nested);
  }
  return value;
}
