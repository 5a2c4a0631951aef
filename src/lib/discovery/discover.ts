import { ConfidenceTuning, config } from "../config";
import { PipelineError, describeError, pipelineError } from "../errors";
import type { StructureAnalyst } from "../llm/analyst";
import { Result, err, ok } from "../result";
import { extractDomain, siteUrl } from "../site-key";
import { DiscoveryCache, DiscoveryMethod, DiscoveryRecord } from "./cache";
import { extractLinks, htmlToContent } from "./content";
import { Candidate, filterCandidates, generateFallbackCandidates, heuristicConfidence } from "./scorer";

export type PageFetcher = (url: string) => Promise<string>;

export interface LocatorDiscoveryOptions {
  fetchPage: PageFetcher;
  cache: DiscoveryCache;
  analyst: StructureAnalyst;
  tuning?: ConfidenceTuning;
}

/**
 * Finds the locator page of a site: cached result first, then the analyst's
 * verdict on the home page, then the best-scoring home page link, then common
 * locator paths when the home page cannot be fetched.
 */
export class LocatorDiscovery {
  private readonly fetchPage: PageFetcher;
  private readonly cache: DiscoveryCache;
  private readonly analyst: StructureAnalyst;
  private readonly tuning: ConfidenceTuning;

  constructor(options: LocatorDiscoveryOptions) {
    this.fetchPage = options.fetchPage;
    this.cache = options.cache;
    this.analyst = options.analyst;
    this.tuning = options.tuning ?? config.confidence;
  }

  async discover(site: string): Promise<Result<DiscoveryRecord, PipelineError>> {
    const url = siteUrl(site);
    const siteKey = extractDomain(url);
    if (!siteKey) return err(pipelineError("validation", `Not a site: "${site}"`));

    const cached = this.cache.load(siteKey);
    if (cached) return ok(cached);

    let html: string | null = null;
    try {
      html = await this.fetchPage(url);
    } catch (error) {
      console.warn(`[discovery] Could not fetch ${url} (${describeError(error)}); probing common locator paths`);
    }

    const record = html === null ? this.fromFallbackPaths(siteKey, url) : await this.fromHomePage(siteKey, url, html);
    if (!record) {
      return err(pipelineError("no_candidates", `No locator page candidates found for ${siteKey}`));
    }

    console.log(
      `[discovery] ${siteKey}: locator ${record.locatorUrl} (confidence ${record.confidence.toFixed(2)}, ${record.method})`
    );
    try {
      this.cache.save(record);
    } catch (error) {
      console.error(`[discovery] Failed to cache locator for ${siteKey}:`, error);
    }
    return ok(record);
  }

  private async fromHomePage(siteKey: string, url: string, html: string): Promise<DiscoveryRecord | null> {
    const verdict = await this.analyst.findLocatorUrl(htmlToContent(html, url), url);
    if (verdict.locatorUrl && verdict.method !== "none") {
      return {
        siteKey,
        locatorUrl: verdict.locatorUrl,
        confidence: verdict.confidence,
        method: verdict.method,
        candidates: verdict.candidates,
      };
    }

    const candidates = filterCandidates(extractLinks(html, url), url);
    console.log(`[discovery] ${siteKey}: ${candidates.length} candidate links on the home page`);
    return this.topCandidate(siteKey, candidates, "homepage_links");
  }

  private fromFallbackPaths(siteKey: string, url: string): DiscoveryRecord | null {
    const candidates = generateFallbackCandidates(url)
      .filter((c) => c.score > 0)
      .sort((a, b) => b.score - a.score);
    return this.topCandidate(siteKey, candidates, "fallback");
  }

  private topCandidate(siteKey: string, candidates: Candidate[], method: DiscoveryMethod): DiscoveryRecord | null {
    const top = candidates[0];
    if (!top) return null;
    return {
      siteKey,
      locatorUrl: top.url,
      confidence: heuristicConfidence(top.score, this.tuning.candidateScoreDivisor, this.tuning.candidateCap),
      method,
      candidates,
    };
  }
}
