import type { AnalysisResult } from "../llm/types";
import type { SiteKey } from "../site-key";
import type { ConfigLayer, FieldConfig, InputField, Interactions } from "./schema";

const GENERATED_BY = "structure_analyst";

function isPlausibleSelector(selector: string): boolean {
  return selector.trim().length >= 2;
}

/**
 * Turn an analysis into a generated config layer. Only values worth
 * overriding the base layer with are kept: non-empty selector lists, numeric
 * timings that are not negative, fields that name a selector.
 */
export function generateConfigFromAnalysis(
  analysis: AnalysisResult,
  siteKey: SiteKey,
  url: string,
  now: Date = new Date()
): ConfigLayer {
  const selectors: Record<string, string[]> = {};
  for (const [kind, list] of Object.entries(analysis.selectors)) {
    const kept = list.filter(isPlausibleSelector);
    if (kept.length > 0) selectors[kind] = kept;
  }

  const interactions: Interactions = {};
  for (const [name, value] of Object.entries(analysis.interactions)) {
    if (typeof value === "number" && Number.isFinite(value) && value >= 0) {
      interactions[name] = value;
    }
  }
  if (analysis.interactions.search_sequence?.length) {
    interactions.search_sequence = [...analysis.interactions.search_sequence];
  }
  if (analysis.interactions.pagination_type) {
    interactions.pagination_type = analysis.interactions.pagination_type;
  }

  const dataFields: Record<string, FieldConfig> = {};
  for (const [field, fieldConfig] of Object.entries(analysis.dataFields)) {
    if (fieldConfig.selector) dataFields[field] = { ...fieldConfig };
  }

  const extraction: Record<string, string[]> = {};
  for (const [name, list] of Object.entries(analysis.extraction)) {
    if (list.length > 0) extraction[name] = [...list];
  }

  const inputFields: Record<string, InputField> = {};
  for (const [name, field] of Object.entries(analysis.inputFields)) {
    if (field.selector) inputFields[name] = { ...field };
  }

  const layer: ConfigLayer = {
    site: siteKey,
    base_url: url,
    generated_by: GENERATED_BY,
    generated_date: now.toISOString(),
    confidence: analysis.confidence,
    notes: analysis.notes,
    selectors,
    interactions,
  };
  if (Object.keys(dataFields).length > 0) layer.data_fields = dataFields;
  if (Object.keys(extraction).length > 0) layer.extraction = extraction;
  if (Object.keys(inputFields).length > 0) layer.input_fields = inputFields;
  return layer;
}
