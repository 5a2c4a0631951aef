import keywords from "../data/locator-keywords.json";
import { registrableDomain } from "../site-key";

export interface Candidate {
  url: string;
  score: number;
  reason: string;
}

export const LOCATOR_KEYWORDS: readonly string[] = keywords.locator;
export const NEGATIVE_KEYWORDS: readonly string[] = keywords.negative;

const HIGH_VALUE_PATTERNS: readonly RegExp[] = [
  /\/dealer[s]?(?:\/|$)/,
  /\/find-a-dealer/,
  /\/find-dealer/,
  /\/dealer-locator/,
  /\/locate-dealer/,
  /\/dealership[s]?(?:\/|$)/,
  /\/location[s]?(?:\/|$)/,
  /\/store-locator/,
  /\/find-a-store/,
  /\/retailer[s]?(?:\/|$)/,
];

const SKIPPED_SCHEMES = ["javascript:", "mailto:", "tel:"];

function pathOf(url: string): string {
  try {
    return new URL(url, "https://relative.invalid").pathname.toLowerCase();
  } catch {
    return url.toLowerCase().split(/[?#]/)[0] ?? "";
  }
}

/**
 * Score how likely a URL is to be a locator page, from its path alone.
 * Never touches the network.
 */
export function scoreUrl(url: string): { score: number; reason: string } {
  const path = pathOf(url);
  let score = 0;
  const reasons: string[] = [];

  for (const pattern of HIGH_VALUE_PATTERNS) {
    if (pattern.test(path)) {
      score += 10;
      reasons.push(`matches pattern: ${pattern.source}`);
    }
  }

  for (const keyword of LOCATOR_KEYWORDS) {
    if (path.includes(keyword)) {
      score += 3;
      reasons.push(`contains keyword: ${keyword}`);
    }
  }

  for (const keyword of NEGATIVE_KEYWORDS) {
    if (path.includes(keyword)) {
      score -= 5;
      reasons.push(`negative keyword: ${keyword}`);
    }
  }

  const depth = path.split("/").filter(Boolean).length;
  if (depth <= 2) {
    score += 2;
    reasons.push(`shallow path depth: ${depth}`);
  } else if (depth > 4) {
    score -= 2;
    reasons.push(`deep path: ${depth}`);
  }

  if (url.includes("#")) {
    score -= 3;
    reasons.push("contains hash fragment");
  }
  if (url.includes("?")) {
    score -= 1;
    reasons.push("contains query params");
  }

  return { score, reason: reasons.length > 0 ? reasons.join("; ") : "no specific indicators" };
}

export function hasNegativeKeyword(url: string): boolean {
  const path = pathOf(url);
  return NEGATIVE_KEYWORDS.some((keyword) => path.includes(keyword));
}

export function pathHasLocatorKeyword(url: string): boolean {
  const path = pathOf(url);
  return LOCATOR_KEYWORDS.some((keyword) => path.includes(keyword));
}

/**
 * Resolve, restrict to the base URL's registrable domain, de-duplicate by
 * path (query and fragment ignored), score, keep positive scores and sort
 * descending. Ties keep their discovery order.
 */
export function filterCandidates(urls: string[], baseUrl: string): Candidate[] {
  let base: URL;
  try {
    base = new URL(baseUrl);
  } catch {
    return [];
  }
  const baseDomain = registrableDomain(base.hostname);
  const seen = new Set<string>();
  const candidates: Candidate[] = [];

  for (const raw of urls) {
    const trimmed = raw.trim();
    if (!trimmed) continue;
    const lower = trimmed.toLowerCase();
    if (SKIPPED_SCHEMES.some((scheme) => lower.startsWith(scheme))) continue;

    let resolved: URL;
    try {
      resolved = new URL(trimmed, base);
    } catch {
      continue;
    }
    if (resolved.protocol !== "http:" && resolved.protocol !== "https:") continue;
    if (registrableDomain(resolved.hostname) !== baseDomain) continue;

    const dedupKey = `${resolved.origin}${resolved.pathname}`;
    if (seen.has(dedupKey)) continue;
    seen.add(dedupKey);

    const { score, reason } = scoreUrl(resolved.href);
    if (score > 0) candidates.push({ url: resolved.href, score, reason });
  }

  return candidates.sort((a, b) => b.score - a.score);
}

/** Common locator paths to probe when the home page yields nothing. */
export function generateFallbackCandidates(baseUrl: string): Candidate[] {
  let origin: string;
  try {
    origin = new URL(baseUrl).origin;
  } catch {
    return [];
  }
  return keywords.fallbackPaths.map((path) => {
    const url = `${origin}${path}`;
    return { url, ...scoreUrl(url) };
  });
}

/** Confidence of a purely heuristic pick, `min(cap, score / divisor)`. */
export function heuristicConfidence(topScore: number, divisor: number, cap: number): number {
  return Math.max(0, Math.min(cap, topScore / divisor));
}
