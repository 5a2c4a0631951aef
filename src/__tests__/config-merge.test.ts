import { describe, it, expect } from "vitest";
import { deepFreeze, deepMerge, mergeLayers, overlayConfig } from "../lib/configs/merge";
import type { MergedConfig } from "../lib/configs/schema";

describe("mergeLayers", () => {
  it("takes each key from the highest layer that has it", () => {
    expect(mergeLayers([{ a: 1, b: 2 }, { b: 3, c: 4 }, { c: 5 }])).toEqual({ a: 1, b: 3, c: 5 });
  });

  it("merges nested objects key by key", () => {
    const merged = mergeLayers([
      { selectors: { search_input: ["input.zip"], dealer_cards: ["li.dealer"] } },
      { selectors: { dealer_cards: ["div.card"] } },
    ]);
    expect(merged).toEqual({ selectors: { search_input: ["input.zip"], dealer_cards: ["div.card"] } });
  });

  it("replaces lists outright, including with an empty list", () => {
    expect(mergeLayers([{ list: ["a", "b"] }, { list: [] }])).toEqual({ list: [] });
  });

  it("ignores undefined override values", () => {
    expect(deepMerge({ a: 1 }, { a: undefined })).toEqual({ a: 1 });
  });

  it("lets null replace a lower value", () => {
    expect(deepMerge({ field: { selector: "h2" } }, { field: { selector: null } })).toEqual({
      field: { selector: null },
    });
  });

  it("does not share nested structure with its inputs", () => {
    const override = { selectors: { dealer_cards: ["li.x"] } };
    const merged = deepMerge({}, override);
    override.selectors.dealer_cards.push("li.y");
    expect(merged).toEqual({ selectors: { dealer_cards: ["li.x"] } });
  });
});

describe("overlayConfig", () => {
  const base: MergedConfig = deepFreeze({
    selectors: { dealer_cards: ["li.dealer"], search_input: ["input"] },
    interactions: { wait_after_search: 2 },
  });

  it("returns a new frozen config and leaves the input untouched", () => {
    const refined = overlayConfig(base, { selectors: { dealer_cards: ["div.result"] } });

    expect(refined).not.toBe(base);
    expect(refined.selectors?.dealer_cards).toEqual(["div.result"]);
    expect(refined.selectors?.search_input).toEqual(["input"]);
    expect(base.selectors?.dealer_cards).toEqual(["li.dealer"]);
    expect(Object.isFrozen(refined.selectors)).toBe(true);
  });

  it("keeps the input when the merge would not validate", () => {
    const refined = overlayConfig(base, { confidence: 3 });
    expect(refined).toBe(base);
  });
});
