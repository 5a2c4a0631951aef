import type { MergedConfig } from "../configs/schema";

export interface SearchRequest {
  /** Locator page to open. */
  url: string;
  /** Postal code or other term typed into the search box. */
  term: string;
  config: MergedConfig;
  timeoutMs: number;
}

/**
 * Performs one search on a live locator page and returns the rendered HTML.
 * The pipeline only reads that HTML back through `PageElement`.
 */
export interface SearchDriver {
  search(request: SearchRequest): Promise<string>;
  close(): Promise<void>;
}

/** Search steps understood in `interactions.search_sequence`. */
export const SEARCH_STEPS = [
  "fill_input",
  "press_enter",
  "click_search",
  "click_apply",
  "wait",
] as const;

export type SearchStep = (typeof SEARCH_STEPS)[number];

const STEP_NAMES: ReadonlySet<string> = new Set(SEARCH_STEPS);

export function isSearchStep(step: string): step is SearchStep {
  return STEP_NAMES.has(step);
}

/** Seconds-valued interaction setting in milliseconds, or `fallback` when absent. */
export function interactionMs(config: MergedConfig, key: string, fallback: number): number {
  const value = config.interactions?.[key];
  return typeof value === "number" && Number.isFinite(value) && value >= 0 ? value * 1000 : fallback;
}
