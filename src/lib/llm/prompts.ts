import type { Candidate } from "../discovery/scorer";
import { CONCISE_EXCERPT, FULL_EXCERPT, buildExcerpt } from "./excerpt";

export type PromptVariant = "full" | "concise";

function hostOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return url;
  }
}

export function buildAnalysisPrompt(content: string, url: string, variant: PromptVariant): string {
  const excerpt = buildExcerpt(content, variant === "full" ? FULL_EXCERPT : CONCISE_EXCERPT);
  const listRule =
    variant === "concise"
      ? "Keep every list to at most 3 items and keep notes under 20 words."
      : "List the most specific selectors first.";

  return `You are analyzing a locator page (a page where visitors enter a zip code to find nearby dealers or stores) so that a scraper can be configured for it.

Website URL: ${url}
Domain: ${hostOf(url)}

Page content:
${excerpt}

Return ONLY a JSON object with this shape:
{
  "selectors": {
    "search_input": ["CSS selector"],
    "search_button": ["CSS selector"],
    "apply_button": [],
    "view_more_button": ["CSS selector"],
    "dealer_cards": ["CSS selector for one repeated result card"],
    "scroll_container": [],
    "cookie_accept": []
  },
  "data_fields": {
    "name": {"selector": "CSS selector inside a card", "type": "text", "fallback_patterns": ["h2", "h3"]},
    "address": {"selector": "...", "type": "text", "fallback_patterns": []},
    "phone": {"selector": "...", "type": "href", "attribute": "href", "fallback_patterns": ["a[href^='tel:']"]},
    "website": {"selector": "...", "type": "href", "attribute": "href", "fallback_patterns": []}
  },
  "interactions": {
    "search_sequence": ["fill_input", "press_enter"],
    "pagination_type": "view_more | scroll | pagination | none",
    "wait_after_search": 4,
    "wait_after_page_load": 3,
    "scroll_delay": 0.5,
    "view_more_delay": 2,
    "click_delay": 0.3
  },
  "input_fields": {
    "zip_code": {"selector": "CSS selector", "type": "text", "required": true}
  },
  "extraction": {
    "phone_patterns": ["regex"],
    "address_patterns": ["regex"]
  },
  "confidence": 0.0,
  "notes": "short observations"
}

Use valid CSS selectors. Use null or [] for anything that does not exist. ${listRule}
Return only the JSON, no markdown.`;
}

export function buildLocatorCheckPrompt(content: string, url: string): string {
  return `Decide whether this page is a locator page, where a visitor enters a zip code or city to find nearby dealers or stores.

URL: ${url}

Page content:
${buildExcerpt(content, CONCISE_EXCERPT)}

Return ONLY JSON: {"is_locator": true or false, "confidence": 0.0-1.0, "reason": "short reason"}`;
}

export function buildCandidateChoicePrompt(candidates: Candidate[], baseUrl: string): string {
  const list = candidates.map((c) => `- ${c.url} (score: ${c.score})`).join("\n");
  return `These links were found on ${baseUrl}. Pick the ONE that is most likely the locator page where visitors enter a zip code to find nearby dealers or stores. Prefer general pages over pages about one specific location.

${list}

Return ONLY JSON: {"locator_url": "one URL copied exactly from the list", "confidence": 0.0-1.0, "reasoning": "short reason"}`;
}

export function buildRefinementPrompt(snippets: string[], pageText: string, url: string): string {
  const samples = snippets.length > 0 ? snippets.map((s, i) => `--- sample ${i + 1} ---\n${s}`).join("\n\n") : "(no samples)";
  return `A search was run on ${url} but the configured result-card selectors matched nothing. Find the repeated element that holds one search result (one dealer or store) in this rendered page.

HTML samples of likely result elements:
${samples}

Visible page text:
${pageText}

Return ONLY JSON:
{
  "dealers_found": true or false,
  "dealer_cards_selector": "CSS selector matching every result card",
  "data_fields": {
    "name": {"selector": "CSS selector inside a card", "type": "text"},
    "address": {"selector": "...", "type": "text"},
    "phone": {"selector": "...", "type": "href", "attribute": "href"},
    "website": {"selector": "...", "type": "href", "attribute": "href"}
  },
  "confidence": 0.0-1.0,
  "notes": "short observations"
}
Set "dealers_found" to false if the page shows no results.`;
}
