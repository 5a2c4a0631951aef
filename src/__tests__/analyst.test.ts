import { describe, it, expect, vi } from "vitest";
import {
  AnalysisState,
  StructureAnalyst,
  advanceAnalysis,
  canonicalUrl,
  hasLocatorContentSignals,
  mineLinkCandidates,
} from "../lib/llm/analyst";
import type { TextGenerator } from "../lib/llm/types";
import { err, ok } from "../lib/result";
import { pipelineError } from "../lib/errors";

function scriptedGenerator(replies: (string | null)[]) {
  const queue = [...replies];
  return vi.fn<TextGenerator>(async () => queue.shift() ?? null);
}

const LOCATOR_CONTENT =
  "Title: Find a Dealer\n# Find a dealer near you\nEnter your ZIP code to see dealers in your area. " +
  "[input: Enter ZIP code] Results show name, address and phone for each dealer.";

const HOME_CONTENT =
  "Welcome to Example Motors. We build reliable cars and trucks for every family and every road. " +
  "[Find a Dealer](/find-a-dealer) [Careers](/careers)";

describe("advanceAnalysis", () => {
  const parseError = pipelineError("parse", "bad");

  it("moves from a reply to a parse attempt", () => {
    expect(advanceAnalysis({ stage: "requested", attempt: 1 }, { type: "reply", reply: "{}" })).toEqual({
      stage: "parse_attempt",
      attempt: 1,
      reply: "{}",
    });
  });

  it("fails without retry when there is no reply", () => {
    const next = advanceAnalysis({ stage: "requested", attempt: 1 }, { type: "reply", reply: null });
    expect(next.stage).toBe("failed");
    if (next.stage === "failed") expect(next.error.kind).toBe("network");
  });

  it("retries once after a parse failure, then fails", () => {
    const first: AnalysisState = { stage: "parse_attempt", attempt: 1, reply: "x" };
    expect(advanceAnalysis(first, { type: "parsed", result: err(parseError) })).toEqual({
      stage: "requested",
      attempt: 2,
    });

    const second: AnalysisState = { stage: "parse_attempt", attempt: 2, reply: "x" };
    expect(advanceAnalysis(second, { type: "parsed", result: err(parseError) })).toEqual({
      stage: "failed",
      error: parseError,
    });
  });

  it("resolves a parsed reply with defaults filled in", () => {
    const next = advanceAnalysis(
      { stage: "parse_attempt", attempt: 1, reply: "{}" },
      { type: "parsed", result: ok({ confidence: 0.6 }) }
    );
    expect(next.stage).toBe("resolved");
    if (next.stage === "resolved") {
      expect(next.result.confidence).toBe(0.6);
      expect(next.result.selectors.dealer_cards).toEqual([]);
    }
  });

  it("keeps terminal states and rejects out-of-order events", () => {
    const failed: AnalysisState = { stage: "failed", error: parseError };
    expect(advanceAnalysis(failed, { type: "reply", reply: "{}" })).toBe(failed);

    const next = advanceAnalysis({ stage: "requested", attempt: 1 }, { type: "parsed", result: ok({}) });
    expect(next.stage).toBe("failed");
  });
});

describe("StructureAnalyst.analyze", () => {
  it("returns a normalised analysis from one good reply", async () => {
    const generate = scriptedGenerator(['{"selectors": {"dealer_cards": ["li.dealer"]}, "confidence": 0.8}']);
    const result = await new StructureAnalyst({ generate }).analyze(LOCATOR_CONTENT, "https://example.com/dealers");

    expect(generate).toHaveBeenCalledTimes(1);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.selectors.dealer_cards).toEqual(["li.dealer"]);
      expect(result.value.selectors.search_input).toEqual([]);
      expect(result.value.dataFields.phone.fallback_patterns).toEqual(["a[href^='tel:']", "[class*='phone']"]);
      expect(result.value.interactions.wait_after_search).toBe(4);
      expect(result.value.confidence).toBe(0.8);
    }
  });

  it("retries with the concise prompt after an unparsable reply", async () => {
    const generate = scriptedGenerator(["I am not sure.", '{"selectors": {"dealer_cards": "div.card"}}']);
    const result = await new StructureAnalyst({ generate }).analyze(LOCATOR_CONTENT, "https://example.com/dealers");

    expect(generate).toHaveBeenCalledTimes(2);
    expect(generate.mock.calls[0][0]).not.toContain("at most 3 items");
    expect(generate.mock.calls[1][0]).toContain("at most 3 items");
    expect(result.ok && result.value.selectors.dealer_cards).toEqual(["div.card"]);
  });

  it("gives up after the second unparsable reply", async () => {
    const generate = scriptedGenerator(["nope", "still nope"]);
    const result = await new StructureAnalyst({ generate }).analyze(LOCATOR_CONTENT, "https://example.com/dealers");

    expect(generate).toHaveBeenCalledTimes(2);
    expect(!result.ok && result.error.kind).toBe("parse");
  });

  it("reports an unreachable or throwing service as a network error", async () => {
    const silent = scriptedGenerator([null]);
    const throwing = vi.fn<TextGenerator>(async () => {
      throw new Error("connection refused");
    });

    for (const generate of [silent, throwing]) {
      const result = await new StructureAnalyst({ generate }).analyze(LOCATOR_CONTENT, "https://example.com/");
      expect(!result.ok && result.error.kind).toBe("network");
      expect(generate).toHaveBeenCalledTimes(1);
    }
  });

  it("refuses without a model or with too little content", async () => {
    const disabled = await new StructureAnalyst({ generate: null }).analyze(LOCATOR_CONTENT, "https://example.com/");
    expect(!disabled.ok && disabled.error.kind).toBe("disabled");

    const generate = scriptedGenerator(["{}"]);
    const short = await new StructureAnalyst({ generate }).analyze("Dealers", "https://example.com/");
    expect(!short.ok && short.error.kind).toBe("validation");
    expect(generate).not.toHaveBeenCalled();
  });
});

describe("StructureAnalyst.findLocatorUrl", () => {
  it("accepts a model claim backed by the path and content", async () => {
    const generate = scriptedGenerator(['{"is_locator": true, "confidence": 0.85}']);
    const verdict = await new StructureAnalyst({ generate }).findLocatorUrl(
      LOCATOR_CONTENT,
      "https://example.com/dealers"
    );
    expect(verdict).toEqual({
      isLocator: true,
      locatorUrl: "https://example.com/dealers",
      candidates: [],
      confidence: 0.85,
      method: "current_page",
    });
  });

  it("downgrades an unsupported claim and rejects a hallucinated choice", async () => {
    const generate = scriptedGenerator([
      '{"is_locator": true, "confidence": 0.9}',
      '{"locator_url": "https://evil.example.net/dealers"}',
    ]);
    const verdict = await new StructureAnalyst({ generate }).findLocatorUrl(HOME_CONTENT, "https://example.com/");

    expect(verdict.isLocator).toBe(false);
    expect(verdict.method).toBe("heuristic");
    expect(verdict.locatorUrl).toBe("https://example.com/find-a-dealer");
    expect(verdict.confidence).toBe(0.9);
    expect(verdict.candidates.map((c) => c.url)).toEqual(["https://example.com/find-a-dealer"]);
  });

  it("accepts a model choice that matches a candidate", async () => {
    const generate = scriptedGenerator([
      '{"is_locator": false}',
      '{"locator_url": "https://www.example.com/Find-A-Dealer/", "confidence": 0.8}',
    ]);
    const verdict = await new StructureAnalyst({ generate }).findLocatorUrl(HOME_CONTENT, "https://example.com/");

    expect(verdict.method).toBe("model_choice");
    expect(verdict.locatorUrl).toBe("https://example.com/find-a-dealer");
    expect(verdict.confidence).toBe(0.8);
  });

  it("needs both signals when there is no model", async () => {
    const analyst = new StructureAnalyst({ generate: null });

    const onPage = await analyst.findLocatorUrl(LOCATOR_CONTENT, "https://example.com/dealers");
    expect(onPage.method).toBe("current_page");
    expect(onPage.confidence).toBe(0.9);

    const nothing = await analyst.findLocatorUrl("No links at all on this page.", "https://example.com/");
    expect(nothing).toEqual({ isLocator: false, locatorUrl: null, candidates: [], confidence: 0, method: "none" });
  });

  it("ignores keyword links to other sites", async () => {
    const content =
      "Welcome to Example Motors. [Find us on Instagram](https://www.instagram.com/examplemotors) " +
      "[Dealer reviews](https://reviews.example.net/dealers)";
    const verdict = await new StructureAnalyst({ generate: null }).findLocatorUrl(content, "https://www.example.com/");
    expect(verdict).toEqual({ isLocator: false, locatorUrl: null, candidates: [], confidence: 0, method: "none" });
  });
});

describe("analyst helpers", () => {
  it("detects locator content signals", () => {
    expect(hasLocatorContentSignals("Find a dealer by ZIP code")).toBe(true);
    expect(hasLocatorContentSignals("Find a dealer near you")).toBe(false);
  });

  it("canonicalises URLs for comparison", () => {
    expect(canonicalUrl("https://www.Example.com/Dealers/?zip=1")).toBe("example.com/dealers?zip=1");
  });

  it("mines markdown and bare links with locator keywords", () => {
    const content =
      "[Locate a store](/stores) and https://example.com/dealer-locator plus [Offers](/offers) " +
      "[Our dealers](/dealer-financing) [Find us on Instagram](https://www.instagram.com/examplemotors)";
    const candidates = mineLinkCandidates(content, "https://example.com/");
    expect(candidates.map((c) => [c.url, c.score])).toEqual([
      ["https://example.com/dealer-locator", 18],
      ["https://example.com/stores", 11],
    ]);
  });
});
