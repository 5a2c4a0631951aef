import { join } from "path";
import { z } from "zod";
import { config } from "../config";
import { SiteKey, normalizeSiteKey, siteKeyFileName } from "../site-key";
import { readJsonObject, writeJsonAtomic } from "../storage/json-files";
import type { Candidate } from "./scorer";

export type DiscoveryMethod = "homepage_links" | "current_page" | "model_choice" | "heuristic" | "fallback";

export interface DiscoveryRecord {
  siteKey: SiteKey;
  locatorUrl: string;
  confidence: number;
  method: DiscoveryMethod;
  candidates: Candidate[];
}

const DAY_MS = 24 * 60 * 60 * 1000;
const MAX_CACHED_CANDIDATES = 5;

const cacheFileSchema = z.object({
  domain: z.string(),
  locator_url: z.string().url(),
  confidence: z.number().min(0).max(1),
  method: z.enum(["homepage_links", "current_page", "model_choice", "heuristic", "fallback"]),
  all_candidates: z
    .array(z.object({ url: z.string(), score: z.number(), reason: z.string() }))
    .default([]),
  cached_at: z.string().datetime({ offset: true }),
});

export interface DiscoveryCacheOptions {
  dir?: string;
  ttlDays?: number;
  now?: () => Date;
}

/**
 * One JSON file per SiteKey holding the last discovery result and its
 * `cached_at` time. Entries older than the TTL read as misses.
 */
export class DiscoveryCache {
  readonly dir: string;
  readonly ttlDays: number;
  private readonly now: () => Date;

  constructor(options: DiscoveryCacheOptions = {}) {
    this.dir = options.dir ?? config.discoveryCacheDir;
    this.ttlDays = options.ttlDays ?? config.discoveryCacheTtlDays;
    this.now = options.now ?? (() => new Date());
  }

  pathFor(siteKey: SiteKey): string {
    return join(this.dir, `${siteKeyFileName(normalizeSiteKey(siteKey))}.json`);
  }

  load(siteKey: SiteKey): DiscoveryRecord | null {
    const key = normalizeSiteKey(siteKey);
    const read = readJsonObject(this.pathFor(key));
    if (!read.ok) {
      console.warn(`[discovery] ${read.error.message}; ignoring cache entry`);
      return null;
    }
    if (!read.value) return null;

    const parsed = cacheFileSchema.safeParse(read.value);
    if (!parsed.success) {
      console.warn(`[discovery] Malformed cache entry for ${key}; ignoring it`);
      return null;
    }

    const ageMs = this.now().getTime() - new Date(parsed.data.cached_at).getTime();
    if (ageMs >= this.ttlDays * DAY_MS) {
      console.log(`[discovery] Cache entry for ${key} expired (${Math.floor(ageMs / DAY_MS)} days old)`);
      return null;
    }

    console.log(`[discovery] Using cached locator for ${key} (${Math.floor(ageMs / DAY_MS)} days old)`);
    return {
      siteKey: key,
      locatorUrl: parsed.data.locator_url,
      confidence: parsed.data.confidence,
      method: parsed.data.method,
      candidates: parsed.data.all_candidates,
    };
  }

  save(record: DiscoveryRecord): void {
    const key = normalizeSiteKey(record.siteKey);
    writeJsonAtomic(this.pathFor(key), {
      domain: key,
      locator_url: record.locatorUrl,
      confidence: record.confidence,
      method: record.method,
      all_candidates: record.candidates.slice(0, MAX_CACHED_CANDIDATES),
      cached_at: this.now().toISOString(),
    });
    console.log(`[discovery] Cached locator for ${key}: ${record.locatorUrl}`);
  }
}
