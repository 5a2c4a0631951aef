import { describe, it, expect, vi } from "vitest";
import { readFileSync } from "fs";
import { resolve } from "path";
import { deepFreeze } from "../lib/configs/merge";
import type { MergedConfig } from "../lib/configs/schema";
import { loadDocument } from "../lib/extraction/dom";
import type { TextGenerator } from "../lib/llm/types";
import { guessCards, looksLikeListing } from "../lib/validation/heuristics";
import { PostSearchValidator } from "../lib/validation/validator";
import { config } from "../lib/config";

const RESULTS_HTML = readFileSync(resolve(__dirname, "fixtures/dealer-results.html"), "utf-8");
const PAGE_URL = "https://www.example.com/dealers";

const CONFIG: MergedConfig = deepFreeze({
  selectors: { dealer_cards: ["li.dealer"] },
  post_search_validation: { enabled: true },
});

function dealerCards(count: number): string {
  const cards = Array.from(
    { length: count },
    (_, i) =>
      `<div class="dealer-${i}">Dealer Number ${i} Sales and Service, 10 Elm Street, Dover, DE 19901, call 302-555-01${i}0</div>`
  );
  return `<html><body>${cards.join("")}</body></html>`;
}

function generator(reply: string | null) {
  return vi.fn<TextGenerator>(async () => reply);
}

const TABLE_HTML = `<html><body><table>
  <tr class="row"><td>Harbor Boats</td><td>5 Pier Rd, Newport, RI 02840</td></tr>
  <tr class="row"><td>Bay Marine</td><td>9 Shore Ave, Bristol, RI 02809</td></tr>
</table></body></html>`;

describe("heuristics", () => {
  it("judges listing-like text by state abbreviation or digits", () => {
    expect(looksLikeListing("Dover, DE")).toBe(true);
    expect(looksLikeListing("Call 555")).toBe(true);
    expect(looksLikeListing("Sign up for our newsletter")).toBe(false);
  });

  it("picks the generic pattern with the most substantial elements", () => {
    const guess = guessCards(loadDocument(RESULTS_HTML), config.confidence);
    expect(guess?.selector).toBe('[class*="dealer"]');
    // the hidden card and the short chrome card are not substantial
    expect(guess?.elements).toHaveLength(4);
    expect(guess?.dealerLike).toBe(4);
    expect(guess?.confidence).toBe(0.9);
  });

  it("needs more than two substantial elements", () => {
    expect(guessCards(loadDocument(dealerCards(2)), config.confidence)).toBeNull();
  });
});

describe("PostSearchValidator.validate", () => {
  const validator = new PostSearchValidator({ generate: null });

  it("finds five dealer-like cards heuristically with confidence of at least 0.7", () => {
    const result = validator.validate(dealerCards(5), PAGE_URL, CONFIG);
    expect(result.dealersFound).toBe(true);
    expect(result.confidence).toBeGreaterThanOrEqual(0.7);
    expect(result.needsRefinement).toBe(true);
    expect(result.suggestedSelectors).toEqual({ dealer_cards: ['[class*="dealer"]'] });
    expect(result.dealerCount).toBe(5);
  });

  it("accepts the first configured selector that matches", () => {
    const cfg: MergedConfig = deepFreeze({ selectors: { dealer_cards: ["li.nothing", ".dealer-entry"] } });
    const result = validator.validate(RESULTS_HTML, PAGE_URL, cfg);
    expect(result).toEqual({
      dealersFound: true,
      confidence: 0.9,
      needsRefinement: false,
      dealerCount: 6,
      matchedSelector: ".dealer-entry",
      notes: "Found 6 cards with .dealer-entry",
    });
  });

  it("reports nothing found at the unresolved confidence", () => {
    const result = validator.validate("<html><body><p>No dealers near you.</p></body></html>", PAGE_URL, CONFIG);
    expect(result).toEqual({
      dealersFound: false,
      confidence: 0.1,
      needsRefinement: true,
      dealerCount: 0,
      notes: "No result cards detected in HTML",
    });
  });

  it("survives a configured selector the engine cannot parse", () => {
    const cfg: MergedConfig = deepFreeze({ selectors: { dealer_cards: ["div[[["] } });
    expect(validator.validate(RESULTS_HTML, PAGE_URL, cfg).dealersFound).toBe(true);
  });
});

describe("PostSearchValidator.refine", () => {
  it("applies the suggestion to a new config with provenance", () => {
    const validator = new PostSearchValidator({ generate: null });
    const validation = validator.validate(RESULTS_HTML, PAGE_URL, CONFIG);
    const refined = validator.refine(validation, CONFIG);

    expect(refined).not.toBe(CONFIG);
    expect(CONFIG.selectors?.dealer_cards).toEqual(["li.dealer"]);
    expect(refined.selectors?.dealer_cards).toEqual(['[class*="dealer"]']);
    expect(refined.metadata).toEqual({
      post_search_validated: true,
      validation_confidence: 0.9,
      dealer_count: 4,
      validation_notes: 'Found 4 cards using heuristic pattern [class*="dealer"]',
    });
  });
});

describe("PostSearchValidator.resolve", () => {
  it("is skipped when post-search validation is disabled", async () => {
    const cfg: MergedConfig = deepFreeze({ confidence: 0.95, post_search_validation: { enabled: false } });
    const resolution = await new PostSearchValidator({ generate: null }).resolve(RESULTS_HTML, PAGE_URL, cfg);
    expect(resolution).toEqual({ state: "skipped", config: cfg, confidence: 0.95, validation: null });
  });

  it("keeps a config whose selectors match", async () => {
    const cfg: MergedConfig = deepFreeze({ selectors: { dealer_cards: [".dealer-entry"] } });
    const resolution = await new PostSearchValidator({ generate: null }).resolve(RESULTS_HTML, PAGE_URL, cfg);
    expect(resolution.state).toBe("validated");
    expect(resolution.config).toBe(cfg);
  });

  it("uses a confident heuristic without asking the model", async () => {
    const generate = generator("{}");
    const resolution = await new PostSearchValidator({ generate }).resolve(RESULTS_HTML, PAGE_URL, CONFIG);
    expect(resolution.state).toBe("heuristic_refined");
    expect(resolution.config.selectors?.dealer_cards).toEqual(['[class*="dealer"]']);
    expect(generate).not.toHaveBeenCalled();
  });

  it("asks the model when heuristics find nothing and checks its selector", async () => {
    const generate = generator(
      '{"dealers_found": true, "dealer_cards_selector": "tr.row", "data_fields": {"name": {"selector": "td:first-child", "type": "text"}}, "confidence": 0.75}'
    );
    const resolution = await new PostSearchValidator({ generate }).resolve(TABLE_HTML, PAGE_URL, CONFIG);

    expect(resolution.state).toBe("model_refined");
    expect(resolution.confidence).toBe(0.75);
    expect(resolution.config.selectors?.dealer_cards).toEqual(["tr.row"]);
    expect(resolution.config.data_fields?.name).toEqual({ selector: "td:first-child", type: "text" });
    expect(resolution.config.metadata?.llm_refined).toBe(true);
    expect(resolution.config.metadata?.dealer_count).toBe(2);
  });

  it("keeps the heuristic confidence when the model gives none", async () => {
    const generate = generator('{"dealers_found": true, "dealer_cards_selector": "tr.row"}');
    const resolution = await new PostSearchValidator({ generate }).resolve(TABLE_HTML, PAGE_URL, CONFIG);

    expect(resolution.state).toBe("model_refined");
    expect(resolution.confidence).toBe(0.1);
    expect(resolution.config.metadata?.validation_confidence).toBeUndefined();
    expect(resolution.config.metadata?.dealer_count).toBe(2);
  });

  it("rejects a model selector that matches nothing", async () => {
    const generate = generator('{"dealers_found": true, "dealer_cards_selector": "div.made-up"}');
    const resolution = await new PostSearchValidator({ generate }).resolve(TABLE_HTML, PAGE_URL, CONFIG);
    expect(resolution.state).toBe("unresolved");
    expect(resolution.confidence).toBe(0.1);
    expect(resolution.config).toBe(CONFIG);
  });

  it("rejects a model answer that reports no results", async () => {
    const generate = generator('{"dealers_found": false, "dealer_cards_selector": "tr.row"}');
    const resolution = await new PostSearchValidator({ generate }).resolve(TABLE_HTML, PAGE_URL, CONFIG);
    expect(resolution.state).toBe("unresolved");
  });

  it("ends unresolved without a model", async () => {
    const resolution = await new PostSearchValidator({ generate: null }).resolve(TABLE_HTML, PAGE_URL, CONFIG);
    expect(resolution).toMatchObject({ state: "unresolved", confidence: 0.1, config: CONFIG });
  });
});
