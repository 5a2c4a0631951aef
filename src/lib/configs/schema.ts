import { z } from "zod";

/**
 * Schema of one configuration layer (base, generated or manual). Every field
 * is optional: an absent key means "this layer says nothing", while an empty
 * list is an explicit value that overrides lower layers.
 */

export const SELECTOR_KINDS = [
  "search_input",
  "search_button",
  "apply_button",
  "view_more_button",
  "dealer_cards",
  "scroll_container",
  "cookie_accept",
] as const;

export type SelectorKind = (typeof SELECTOR_KINDS)[number];

const selectorList = z.array(z.string());

export const selectorsSchema = z
  .object({
    search_input: selectorList,
    search_button: selectorList,
    apply_button: selectorList,
    view_more_button: selectorList,
    dealer_cards: selectorList,
    scroll_container: selectorList,
    cookie_accept: selectorList,
  })
  .partial()
  .catchall(selectorList);

export const fieldConfigSchema = z.object({
  selector: z.string().nullable().optional(),
  /** "text" reads visible text, "href" reads `attribute` (default `href`). */
  type: z.enum(["text", "href"]).optional(),
  attribute: z.string().optional(),
  fallback_patterns: selectorList.optional(),
});

export const interactionsSchema = z
  .object({
    search_sequence: z.array(z.string()),
    pagination_type: z.enum(["view_more", "scroll", "pagination", "none"]),
    wait_after_search: z.number().nonnegative(),
    wait_after_page_load: z.number().nonnegative(),
    scroll_delay: z.number().nonnegative(),
    view_more_delay: z.number().nonnegative(),
    click_delay: z.number().nonnegative(),
    max_view_more_clicks: z.number().int().nonnegative(),
  })
  .partial()
  .catchall(z.union([z.number(), z.string(), z.boolean(), z.array(z.string())]));

export const inputFieldSchema = z.object({
  selector: z.string().nullable().optional(),
  type: z.string().optional(),
  required: z.boolean().optional(),
  default_value: z.string().optional(),
});

export const metadataSchema = z
  .object({
    post_search_validated: z.boolean(),
    llm_refined: z.boolean(),
    validation_confidence: z.number(),
    dealer_count: z.number(),
    validation_notes: z.string(),
  })
  .partial();

export const configLayerSchema = z.object({
  site: z.string().optional(),
  base_url: z.string().optional(),
  generated_by: z.string().optional(),
  generated_date: z.string().optional(),
  confidence: z.number().min(0).max(1).optional(),
  notes: z.string().optional(),
  selectors: selectorsSchema.optional(),
  data_fields: z.record(z.string(), fieldConfigSchema).optional(),
  interactions: interactionsSchema.optional(),
  input_fields: z.record(z.string(), inputFieldSchema).optional(),
  extraction: z.record(z.string(), selectorList).optional(),
  post_search_validation: z.object({ enabled: z.boolean().optional() }).optional(),
  metadata: metadataSchema.optional(),
});

export type FieldConfig = z.infer<typeof fieldConfigSchema>;
export type Interactions = z.infer<typeof interactionsSchema>;
export type InputField = z.infer<typeof inputFieldSchema>;
export type ConfigLayer = z.infer<typeof configLayerSchema>;

/** Which source a layer came from, lowest precedence first. */
export type ConfigLayerName = "base" | "generated" | "manual";

/**
 * Result of merging the three layers for one SiteKey. Instances handed out by
 * the store are deep-frozen; refinement builds a new object.
 */
export type MergedConfig = Readonly<ConfigLayer>;

export function formatSchemaIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}
