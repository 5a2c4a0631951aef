import { describe, it, expect } from "vitest";
import { deepFreeze } from "../lib/configs/merge";
import type { MergedConfig } from "../lib/configs/schema";
import { interactionMs, isSearchStep } from "../lib/scraping/driver";

describe("search driver helpers", () => {
  it("recognises known search steps", () => {
    expect(isSearchStep("click_apply")).toBe(true);
    expect(isSearchStep("double_click")).toBe(false);
  });

  it("converts interaction seconds to milliseconds", () => {
    const config: MergedConfig = deepFreeze({
      interactions: { wait_after_search: 2.5, click_delay: -1, pagination_type: "scroll" },
    });
    expect(interactionMs(config, "wait_after_search", 100)).toBe(2500);
    expect(interactionMs(config, "click_delay", 300)).toBe(300);
    expect(interactionMs(config, "pagination_type", 400)).toBe(400);
    expect(interactionMs(config, "scroll_delay", 500)).toBe(500);
  });
});
