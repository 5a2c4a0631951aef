import { describe, it, expect } from "vitest";
import { buildExcerpt } from "../lib/llm/excerpt";
import { buildAnalysisPrompt } from "../lib/llm/prompts";

const SMALL = { budget: 30, head: 10, window: 2 };
const TRUNCATED = "\n\n[... content truncated ...]";

describe("buildExcerpt", () => {
  it("returns content that fits unchanged", () => {
    expect(buildExcerpt("short page", SMALL)).toBe("short page");
  });

  it("keeps the head and a window around a keyword hit", () => {
    const content = "a".repeat(10) + "b".repeat(20) + "xxzipxx" + "c".repeat(20);
    expect(buildExcerpt(content, SMALL, ["zip"])).toBe("a".repeat(10) + "\n[...]\n" + "xxzipxx" + TRUNCATED);
  });

  it("merges overlapping windows and joins a window that starts at the head", () => {
    const content = "a".repeat(10) + "zipbbzip" + "c".repeat(40);
    expect(buildExcerpt(content, SMALL, ["zip"])).toBe("a".repeat(10) + "zipbbzipcc" + TRUNCATED);
  });

  it("stops at the budget", () => {
    const content = "a".repeat(10) + ("zip" + "d".repeat(10)).repeat(10);
    const excerpt = buildExcerpt(content, SMALL, ["zip"]);
    expect(excerpt.length - TRUNCATED.length).toBeLessThanOrEqual(30 + 3 * "\n[...]\n".length);
    expect(excerpt.endsWith(TRUNCATED)).toBe(true);
  });
});

describe("buildAnalysisPrompt", () => {
  it("asks for short lists in the concise variant only", () => {
    const content = "Find a dealer near you. Enter your zip code.";
    expect(buildAnalysisPrompt(content, "https://example.com/dealers", "concise")).toContain("at most 3 items");
    expect(buildAnalysisPrompt(content, "https://example.com/dealers", "full")).not.toContain("at most 3 items");
  });
});
