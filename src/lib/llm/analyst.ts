import { ConfidenceTuning, config } from "../config";
import {
  LOCATOR_KEYWORDS,
  hasNegativeKeyword,
  heuristicConfidence,
  pathHasLocatorKeyword,
  scoreUrl,
} from "../discovery/scorer";
import type { Candidate } from "../discovery/scorer";
import { PipelineError, pipelineError } from "../errors";
import { Result, err, ok } from "../result";
import { registrableDomain } from "../site-key";
import type { JsonObject } from "../storage/json-files";
import { normalizeAnalysis } from "./defaults";
import { parseJsonReply } from "./json-repair";
import { buildAnalysisPrompt, buildCandidateChoicePrompt, buildLocatorCheckPrompt } from "./prompts";
import type { AnalysisResult, LocatorVerdict, TextGenerator } from "./types";

export const MIN_CONTENT_LENGTH = 100;
const MAX_CHOICE_CANDIDATES = 15;

export type AnalysisAttempt = 1 | 2;

export type AnalysisState =
  | { stage: "requested"; attempt: AnalysisAttempt }
  | { stage: "parse_attempt"; attempt: AnalysisAttempt; reply: string }
  | { stage: "resolved"; result: AnalysisResult }
  | { stage: "failed"; error: PipelineError };

export type AnalysisEvent =
  | { type: "reply"; reply: string | null }
  | { type: "parsed"; result: Result<JsonObject, PipelineError> };

/**
 * Transition function of the analysis retry policy:
 *
 *   requested(1) -> parse_attempt(1) -> resolved
 *                                    -> requested(2) -> parse_attempt(2) -> resolved | failed
 *   requested(n) -> failed            (no reply: the service is unreachable, no retry)
 *
 * Attempt 2 uses the concise prompt.
 */
export function advanceAnalysis(state: AnalysisState, event: AnalysisEvent): AnalysisState {
  switch (state.stage) {
    case "requested":
      if (event.type !== "reply") break;
      if (event.reply === null) {
        return { stage: "failed", error: pipelineError("network", "Text generation service returned no reply") };
      }
      return { stage: "parse_attempt", attempt: state.attempt, reply: event.reply };

    case "parse_attempt":
      if (event.type !== "parsed") break;
      if (event.result.ok) return { stage: "resolved", result: normalizeAnalysis(event.result.value) };
      if (state.attempt === 1) return { stage: "requested", attempt: 2 };
      return { stage: "failed", error: event.result.error };

    case "resolved":
    case "failed":
      return state;
  }
  return {
    stage: "failed",
    error: pipelineError("parse", `Unexpected ${event.type} event in stage ${state.stage}`),
  };
}

const ZIP_SIGNALS = ["zip", "postal", "enter your location", "find near"];
const LOCATOR_SIGNALS = ["dealer", "find a", "locate", "locator", "near you"];

/** The content mentions both a postal-code concept and a locator concept. */
export function hasLocatorContentSignals(content: string): boolean {
  const lower = content.toLowerCase();
  return ZIP_SIGNALS.some((s) => lower.includes(s)) && LOCATOR_SIGNALS.some((s) => lower.includes(s));
}

const MARKDOWN_LINK_RE = /\[([^\]]*)\]\(\s*<?([^)\s>]+)>?(?:\s+"[^"]*")?\s*\)/g;
const BARE_URL_RE = /https?:\/\/[^\s<>"'()[\]]+/g;

function hasLocatorKeyword(text: string): boolean {
  const lower = text.toLowerCase();
  return LOCATOR_KEYWORDS.some((keyword) => lower.includes(keyword));
}

function resolveUrl(raw: string, base: string): URL | null {
  try {
    const url = new URL(raw, base);
    return url.protocol === "http:" || url.protocol === "https:" ? url : null;
  } catch {
    return null;
  }
}

/** Comparable form of a URL: host without `www.`, lowercased path without trailing slash, query kept. */
export function canonicalUrl(raw: string): string {
  try {
    const url = new URL(raw);
    const host = url.hostname.replace(/^www\./, "");
    const path = url.pathname.toLowerCase().replace(/\/+$/, "");
    return `${host}${path}${url.search}`;
  } catch {
    return raw.trim().toLowerCase().replace(/\/+$/, "");
  }
}

/**
 * Link candidates mined from page content: markdown `[text](url)` pairs and
 * bare URLs whose text or URL mentions a locator keyword, minus URLs with a
 * negative keyword or outside the page's registrable domain. A keyword in the
 * link text adds 3 to the URL score.
 */
export function mineLinkCandidates(content: string, pageUrl: string): Candidate[] {
  const pageHost = resolveUrl(pageUrl, pageUrl)?.hostname;
  const siteDomain = pageHost ? registrableDomain(pageHost) : null;

  const links: { text: string; href: string }[] = [];
  for (const match of content.matchAll(MARKDOWN_LINK_RE)) {
    links.push({ text: match[1] ?? "", href: match[2] ?? "" });
  }
  const withoutMarkdown = content.replace(MARKDOWN_LINK_RE, " ");
  for (const match of withoutMarkdown.matchAll(BARE_URL_RE)) {
    links.push({ text: "", href: match[0] });
  }

  const seen = new Set<string>();
  const candidates: Candidate[] = [];
  for (const { text, href } of links) {
    const url = resolveUrl(href, pageUrl);
    if (!url) continue;
    if (siteDomain !== null && registrableDomain(url.hostname) !== siteDomain) continue;
    const key = `${url.origin}${url.pathname}`;
    if (seen.has(key)) continue;

    const textHit = hasLocatorKeyword(text);
    if (!textHit && !pathHasLocatorKeyword(url.href)) continue;
    if (hasNegativeKeyword(url.href)) continue;
    seen.add(key);

    const scored = scoreUrl(url.href);
    const score = scored.score + (textHit ? 3 : 0);
    if (score <= 0) continue;
    const reason = textHit ? `${scored.reason}; link text: ${text.trim()}` : scored.reason;
    candidates.push({ url: url.href, score, reason });
  }

  return candidates.sort((a, b) => b.score - a.score);
}

function numberIn(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? Math.min(1, Math.max(0, value)) : fallback;
}

export interface StructureAnalystOptions {
  /** `null` disables every model call; heuristics still run. */
  generate: TextGenerator | null;
  tuning?: ConfidenceTuning;
}

/**
 * Turns page content into an extraction config (via the text generator) and
 * decides whether a page is a locator page. Every model reply is treated as
 * untrusted: it is repaired, parsed, defaulted and cross-checked.
 */
export class StructureAnalyst {
  private readonly generate: TextGenerator | null;
  private readonly tuning: ConfidenceTuning;

  constructor(options: StructureAnalystOptions) {
    this.generate = options.generate;
    this.tuning = options.tuning ?? config.confidence;
  }

  get modelEnabled(): boolean {
    return this.generate !== null;
  }

  async analyze(pageContent: string, url: string): Promise<Result<AnalysisResult, PipelineError>> {
    if (!this.generate) return err(pipelineError("disabled", "Model analysis is disabled"));
    if (pageContent.trim().length < MIN_CONTENT_LENGTH) {
      console.warn(`[analyst] Content for ${url} too short for analysis (${pageContent.trim().length} chars)`);
      return err(pipelineError("validation", "Content too short for analysis"));
    }

    let state: AnalysisState = { stage: "requested", attempt: 1 };
    for (;;) {
      switch (state.stage) {
        case "requested": {
          const variant = state.attempt === 1 ? "full" : "concise";
          if (state.attempt > 1) console.log(`[analyst] Retrying ${url} with the concise prompt`);
          const reply = await this.callModel(buildAnalysisPrompt(pageContent, url, variant));
          state = advanceAnalysis(state, { type: "reply", reply });
          break;
        }
        case "parse_attempt":
          state = advanceAnalysis(state, { type: "parsed", result: parseJsonReply(state.reply) });
          break;
        case "resolved":
          console.log(`[analyst] Analysis of ${url} resolved (confidence ${state.result.confidence.toFixed(2)})`);
          return ok(state.result);
        case "failed":
          console.warn(`[analyst] Analysis of ${url} failed (${state.error.kind}): ${state.error.message}`);
          return err(state.error);
      }
    }
  }

  async findLocatorUrl(pageContent: string, url: string): Promise<LocatorVerdict> {
    const pathSignal = pathHasLocatorKeyword(url);
    const contentSignal = hasLocatorContentSignals(pageContent);

    let claim: { isLocator: boolean; confidence: number } | null = null;
    if (this.generate && pageContent.trim().length >= MIN_CONTENT_LENGTH) {
      const reply = await this.callModel(buildLocatorCheckPrompt(pageContent, url));
      const parsed = reply === null ? null : parseJsonReply(reply);
      if (parsed?.ok && typeof parsed.value.is_locator === "boolean") {
        claim = {
          isLocator: parsed.value.is_locator,
          confidence: numberIn(parsed.value.confidence, this.tuning.candidateCap),
        };
      }
    }

    let isLocator: boolean;
    if (claim) {
      isLocator = claim.isLocator && (pathSignal || contentSignal);
      if (claim.isLocator && !isLocator) {
        console.log(`[analyst] Model called ${url} a locator page without path or content support; ignoring`);
      }
    } else {
      isLocator = pathSignal && contentSignal;
    }

    if (isLocator) {
      return {
        isLocator: true,
        locatorUrl: url,
        candidates: [],
        confidence: claim ? claim.confidence : this.tuning.candidateCap,
        method: "current_page",
      };
    }

    const candidates = mineLinkCandidates(pageContent, url);
    if (candidates.length === 0) {
      return { isLocator: false, locatorUrl: null, candidates, confidence: 0, method: "none" };
    }

    const chosen = await this.chooseCandidate(candidates, url);
    if (chosen) {
      return { isLocator: false, locatorUrl: chosen.url, candidates, confidence: chosen.confidence, method: "model_choice" };
    }

    const top = candidates[0];
    return {
      isLocator: false,
      locatorUrl: top.url,
      candidates,
      confidence: heuristicConfidence(top.score, this.tuning.candidateScoreDivisor, this.tuning.candidateCap),
      method: "heuristic",
    };
  }

  /** Ask the model to pick one candidate; its answer counts only if it is one of them. */
  private async chooseCandidate(
    candidates: Candidate[],
    baseUrl: string
  ): Promise<{ url: string; confidence: number } | null> {
    if (!this.generate) return null;
    const shortlist = candidates.slice(0, MAX_CHOICE_CANDIDATES);
    const reply = await this.callModel(buildCandidateChoicePrompt(shortlist, baseUrl));
    if (reply === null) return null;

    const parsed = parseJsonReply(reply);
    if (!parsed.ok || typeof parsed.value.locator_url !== "string") return null;

    const wanted = canonicalUrl(parsed.value.locator_url);
    const match = shortlist.find((c) => canonicalUrl(c.url) === wanted);
    if (!match) {
      console.warn(`[analyst] Model chose ${parsed.value.locator_url}, which is not a candidate; using heuristics`);
      return null;
    }
    return { url: match.url, confidence: numberIn(parsed.value.confidence, 0.7) };
  }

  private async callModel(prompt: string): Promise<string | null> {
    if (!this.generate) return null;
    try {
      return await this.generate(prompt);
    } catch (error) {
      console.error(`[analyst] Text generation failed:`, error);
      return null;
    }
  }
}
