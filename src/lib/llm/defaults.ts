import { z } from "zod";
import type { FieldConfig, InputField, Interactions, SelectorKind } from "../configs/schema";
import type { JsonObject } from "../storage/json-files";
import type { AnalysisResult } from "./types";

export const DEFAULT_DATA_FIELDS: Readonly<Record<string, Readonly<FieldConfig>>> = {
  name: { selector: null, type: "text", fallback_patterns: ["h2", "h3", "h4", "[class*='name']"] },
  address: { selector: null, type: "text", fallback_patterns: ["[class*='address']", "[class*='location']"] },
  phone: { selector: null, type: "href", attribute: "href", fallback_patterns: ["a[href^='tel:']", "[class*='phone']"] },
  website: { selector: null, type: "href", attribute: "href", fallback_patterns: ["a[href^='http']", "[class*='website']"] },
};

export const DEFAULT_INTERACTIONS: Readonly<Interactions> = {
  search_sequence: ["fill_input", "press_enter"],
  pagination_type: "view_more",
  wait_after_search: 4,
  wait_after_page_load: 3,
  scroll_delay: 0.5,
  view_more_delay: 2,
  click_delay: 0.3,
};

export const DEFAULT_CONFIDENCE = 0.5;

// Models return lists as single strings, with nulls mixed in, or not at all.
const lenientList = z
  .preprocess(
    (value) => (typeof value === "string" ? [value] : value),
    z.array(z.unknown())
  )
  .transform((items) => items.filter((item): item is string => typeof item === "string" && item.trim() !== ""))
  .catch([]);

const replyFieldSchema = z.object({
  selector: z.string().nullable().optional().catch(undefined),
  type: z.enum(["text", "href"]).optional().catch(undefined),
  attribute: z.string().optional().catch(undefined),
  fallback_patterns: lenientList.optional(),
});

const replyInputFieldSchema = z.object({
  selector: z.string().nullable().optional().catch(undefined),
  type: z.string().optional().catch(undefined),
  required: z.boolean().optional().catch(undefined),
  default_value: z.coerce.string().optional().catch(undefined),
});

const analysisReplySchema = z.object({
  selectors: z.record(z.string(), lenientList).catch({}),
  data_fields: z.record(z.string(), replyFieldSchema.catch({})).catch({}),
  interactions: z.record(z.string(), z.unknown()).catch({}),
  input_fields: z.record(z.string(), replyInputFieldSchema.catch({})).catch({}),
  extraction: z.record(z.string(), lenientList).catch({}),
  confidence: z.number().catch(DEFAULT_CONFIDENCE),
  notes: z.string().catch(""),
});

const TIMING_KEYS = [
  "wait_after_search",
  "wait_after_page_load",
  "scroll_delay",
  "view_more_delay",
  "click_delay",
  "max_view_more_clicks",
] as const;

const PAGINATION_TYPES = ["view_more", "scroll", "pagination", "none"] as const;

function isPaginationType(value: unknown): value is (typeof PAGINATION_TYPES)[number] {
  return PAGINATION_TYPES.some((type) => type === value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function normalizeInteractions(raw: Record<string, unknown>): Interactions {
  const interactions: Interactions = {};

  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === "number" || typeof value === "string" || typeof value === "boolean" || isStringList(value)) {
      interactions[key] = value;
    }
  }

  for (const key of TIMING_KEYS) {
    const value = interactions[key];
    if (value !== undefined && (typeof value !== "number" || !Number.isFinite(value) || value < 0)) {
      delete interactions[key];
    }
  }
  if (interactions.max_view_more_clicks !== undefined && !Number.isInteger(interactions.max_view_more_clicks)) {
    delete interactions.max_view_more_clicks;
  }
  if (interactions.search_sequence !== undefined && !isStringList(interactions.search_sequence)) {
    delete interactions.search_sequence;
  }
  if (!isPaginationType(raw.pagination_type)) delete interactions.pagination_type;

  for (const [key, value] of Object.entries(DEFAULT_INTERACTIONS)) {
    if (interactions[key] === undefined && value !== undefined) {
      interactions[key] = Array.isArray(value) ? [...value] : value;
    }
  }
  return interactions;
}

function withFieldDefaults(field: FieldConfig, defaults: Readonly<FieldConfig>): FieldConfig {
  const filled: FieldConfig = { ...field };
  if (filled.selector === undefined) filled.selector = defaults.selector;
  if (filled.type === undefined) filled.type = defaults.type;
  if (filled.attribute === undefined && defaults.attribute !== undefined) filled.attribute = defaults.attribute;
  if (filled.fallback_patterns === undefined && defaults.fallback_patterns) {
    filled.fallback_patterns = [...defaults.fallback_patterns];
  }
  return filled;
}

/**
 * Conform a parsed model reply to the canonical analysis shape. Nothing in
 * the reply is required: each recognised key, and each sub-key of the
 * recognised data fields, falls back to its default when absent or invalid.
 */
export function normalizeAnalysis(raw: JsonObject): AnalysisResult {
  const reply = analysisReplySchema.parse(raw);

  const selectors: Record<SelectorKind, string[]> & Record<string, string[]> = {
    search_input: [],
    search_button: [],
    apply_button: [],
    view_more_button: [],
    dealer_cards: [],
    scroll_container: [],
    cookie_accept: [],
    ...reply.selectors,
  };

  const dataFields: Record<string, FieldConfig> = {};
  for (const [name, field] of Object.entries(reply.data_fields)) dataFields[name] = { ...field };
  for (const [name, defaults] of Object.entries(DEFAULT_DATA_FIELDS)) {
    dataFields[name] = withFieldDefaults(dataFields[name] ?? {}, defaults);
  }

  const inputFields: Record<string, InputField> = {};
  for (const [name, field] of Object.entries(reply.input_fields)) inputFields[name] = { ...field };

  return {
    selectors,
    dataFields,
    interactions: normalizeInteractions(reply.interactions),
    inputFields,
    extraction: { ...reply.extraction },
    confidence: Math.min(1, Math.max(0, reply.confidence)),
    notes: reply.notes,
  };
}
