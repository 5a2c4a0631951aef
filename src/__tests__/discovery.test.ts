import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { DiscoveryCache } from "../lib/discovery/cache";
import { LocatorDiscovery, PageFetcher } from "../lib/discovery/discover";
import { StructureAnalyst } from "../lib/llm/analyst";

const NOW = new Date("2026-03-01T00:00:00.000Z");

const HOME_WITH_LINK = `<html><head><title>Example Motors</title></head><body>
  <h1>Welcome to Example Motors</h1>
  <a href="/find-a-dealer">Find a Dealer</a>
  <a href="/careers">Careers</a>
</body></html>`;

// Locator link only in a collapsed menu, so the rendered content has no candidate.
const HOME_WITH_HIDDEN_LINK = `<html><body>
  <nav style="display:none"><a href="/dealers/">Our network</a></nav>
  <p>Welcome to Example Motors.</p>
</body></html>`;

let dir: string;
let cache: DiscoveryCache;

function discovery(fetchPage: PageFetcher) {
  return new LocatorDiscovery({ fetchPage, cache, analyst: new StructureAnalyst({ generate: null }) });
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "locator-discover-"));
  cache = new DiscoveryCache({ dir, ttlDays: 30, now: () => NOW });
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("LocatorDiscovery.discover", () => {
  it("uses the analyst's pick from the home page and caches it", async () => {
    const fetchPage = vi.fn<PageFetcher>(async () => HOME_WITH_LINK);
    const result = await discovery(fetchPage).discover("example.com");

    expect(fetchPage).toHaveBeenCalledWith("https://example.com");
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.siteKey).toBe("example.com");
    expect(result.value.locatorUrl).toBe("https://example.com/find-a-dealer");
    expect(result.value.method).toBe("heuristic");
    expect(result.value.confidence).toBe(0.9);
    expect(cache.load("example.com")?.locatorUrl).toBe("https://example.com/find-a-dealer");
  });

  it("answers from the cache without fetching", async () => {
    cache.save({
      siteKey: "example.com",
      locatorUrl: "https://example.com/stores",
      confidence: 0.7,
      method: "model_choice",
      candidates: [],
    });
    const fetchPage = vi.fn<PageFetcher>(async () => HOME_WITH_LINK);

    const result = await discovery(fetchPage).discover("https://www.example.com/");

    expect(fetchPage).not.toHaveBeenCalled();
    expect(result.ok && result.value.locatorUrl).toBe("https://example.com/stores");
  });

  it("falls back to scored home page links when the content has no candidate", async () => {
    const result = await discovery(async () => HOME_WITH_HIDDEN_LINK).discover("example.com");

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.method).toBe("homepage_links");
    expect(result.value.locatorUrl).toBe("https://example.com/dealers/");
    // 18 / 20
    expect(result.value.confidence).toBe(0.9);
  });

  it("probes common locator paths when the home page cannot be fetched", async () => {
    const fetchPage = vi.fn<PageFetcher>(async () => {
      throw new Error("HTTP 503");
    });
    const result = await discovery(fetchPage).discover("example.com");

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.method).toBe("fallback");
    expect(result.value.locatorUrl).toBe("https://example.com/dealerships/");
    expect(result.value.confidence).toBe(0.9);
    expect(result.value.candidates).toHaveLength(13);
  });

  it("reports no candidates when the home page has no locator links", async () => {
    const result = await discovery(async () => "<html><body><p>Coming soon.</p></body></html>").discover(
      "example.com"
    );

    expect(!result.ok && result.error.kind).toBe("no_candidates");
    expect(cache.load("example.com")).toBeNull();
  });

  it("rejects an empty site", async () => {
    const result = await discovery(async () => "").discover("");
    expect(!result.ok && result.error.kind).toBe("validation");
  });
});
