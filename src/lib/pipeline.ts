import { config } from "./config";
import { generateConfigFromAnalysis } from "./configs/generate";
import type { MergedConfig } from "./configs/schema";
import { ConfigStore } from "./configs/store";
import { DiscoveryCache } from "./discovery/cache";
import { htmlToContent, isNotFoundContent } from "./discovery/content";
import { LocatorDiscovery, PageFetcher } from "./discovery/discover";
import { NoTargetsError, describeError } from "./errors";
import { loadDocument } from "./extraction/dom";
import { ListingRecord, RecordCollector, extractRecords } from "./extraction/record";
import { StructureAnalyst } from "./llm/analyst";
import { createTextGenerator } from "./llm/client";
import type { TextGenerator } from "./llm/types";
import { PlaywrightSearchDriver } from "./scraping/browser";
import type { SearchDriver } from "./scraping/driver";
import { delay, fetchPage } from "./scraping/utils";
import { SiteKey, extractDomain, siteUrl } from "./site-key";
import { PostSearchValidator, Resolution, ResolutionState } from "./validation/validator";

export interface PipelineSettings {
  searchTimeoutMs: number;
  maxConsecutiveFailures: number;
  failureCooldownMs: number;
  debug: boolean;
}

/**
 * Everything a session needs, passed explicitly. Tests build one from fakes;
 * `createPipelineContext` wires the real collaborators.
 */
export interface PipelineContext {
  store: ConfigStore;
  discovery: LocatorDiscovery;
  analyst: StructureAnalyst;
  validator: PostSearchValidator;
  driver: SearchDriver;
  fetchPage: PageFetcher;
  sleep: (ms: number) => Promise<void>;
  now: () => Date;
  settings: PipelineSettings;
  /** Resolved config per site; post-search validation runs once per domain. */
  resolved: Map<SiteKey, Resolution>;
}

export interface PipelineContextOptions {
  aiEnabled?: boolean;
  generate?: TextGenerator | null;
  driver?: SearchDriver;
  fetchPage?: PageFetcher;
  store?: ConfigStore;
  discoveryCache?: DiscoveryCache;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  settings?: Partial<PipelineSettings>;
}

export function createPipelineContext(options: PipelineContextOptions = {}): PipelineContext {
  const aiEnabled = options.aiEnabled ?? config.llmAnalysisEnabled;
  const generate = aiEnabled
    ? options.generate === undefined
      ? createTextGenerator()
      : options.generate
    : null;
  const pageFetcher = options.fetchPage ?? ((url: string) => fetchPage(url));
  const analyst = new StructureAnalyst({ generate });

  return {
    store: options.store ?? new ConfigStore(),
    discovery: new LocatorDiscovery({
      fetchPage: pageFetcher,
      cache: options.discoveryCache ?? new DiscoveryCache(),
      analyst,
    }),
    analyst,
    validator: new PostSearchValidator({ generate }),
    driver: options.driver ?? new PlaywrightSearchDriver(),
    fetchPage: pageFetcher,
    sleep: options.sleep ?? delay,
    now: options.now ?? (() => new Date()),
    settings: {
      searchTimeoutMs: config.searchTimeoutMs,
      maxConsecutiveFailures: config.maxConsecutiveFailures,
      failureCooldownMs: config.failureCooldownMs,
      debug: config.debug,
      ...options.settings,
    },
    resolved: new Map(),
  };
}

export type ConfigSource = "generated_cached" | "generated" | "fallback";

export interface SessionReport {
  siteKey: SiteKey;
  locatorUrl: string | null;
  configSource: ConfigSource | null;
  resolution: ResolutionState | null;
  confidence: number | null;
  searches: { attempted: number; failed: number; cooldowns: number };
  records: ListingRecord[];
  errors: string[];
  /** Set when the session could not run at all. */
  fatal?: string;
}

export class SearchTimeoutError extends Error {
  constructor(ms: number) {
    super(`Search timed out after ${ms}ms`);
    this.name = "SearchTimeoutError";
  }
}

export async function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new SearchTimeoutError(ms)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Config for a freshly discovered locator page: the analyst's generated
 * layer when it succeeds (cached for later runs), otherwise the base and
 * manual layers alone.
 */
async function configureSite(
  ctx: PipelineContext,
  siteKey: SiteKey,
  locatorUrl: string,
  errors: string[]
): Promise<{ config: MergedConfig; source: ConfigSource }> {
  const fallback = () => ({ config: ctx.store.getConfig(siteKey), source: "fallback" as const });

  if (!ctx.analyst.modelEnabled) {
    console.log(`[pipeline] ${siteKey}: model analysis disabled; using base/manual config`);
    return fallback();
  }

  let html: string;
  try {
    html = await ctx.fetchPage(locatorUrl);
  } catch (error) {
    errors.push(`fetch ${locatorUrl}: ${describeError(error)}`);
    console.warn(`[pipeline] ${siteKey}: could not fetch ${locatorUrl}; using base/manual config`);
    return fallback();
  }

  const content = htmlToContent(html, locatorUrl);
  if (isNotFoundContent(content)) {
    errors.push(`locator page ${locatorUrl} is a not-found page`);
    console.warn(`[pipeline] ${siteKey}: ${locatorUrl} looks like a 404 page; using base/manual config`);
    return fallback();
  }

  const analysis = await ctx.analyst.analyze(content, locatorUrl);
  if (!analysis.ok) {
    errors.push(`analysis (${analysis.error.kind}): ${analysis.error.message}`);
    console.warn(`[pipeline] ${siteKey}: analysis failed (${analysis.error.kind}); using base/manual config`);
    return fallback();
  }

  const layer = generateConfigFromAnalysis(analysis.value, siteKey, locatorUrl, ctx.now());
  const cached = ctx.store.cacheGeneratedConfig(layer, siteKey);
  if (!cached.ok) {
    errors.push(`cache config (${cached.error.kind}): ${cached.error.message}`);
    console.warn(`[pipeline] ${siteKey}: generated config not persisted: ${cached.error.message}`);
  }
  return { config: ctx.store.getConfig(siteKey), source: "generated" };
}

/**
 * One site end to end: discover the locator page (or reuse a cached
 * generated config), run every search term, validate the first result page
 * once per domain, and collect de-duplicated records. Never throws; problems
 * end up in the report.
 */
export async function runSiteSession(
  ctx: PipelineContext,
  site: string,
  terms: readonly string[]
): Promise<SessionReport> {
  const siteKey = extractDomain(site);
  const report: SessionReport = {
    siteKey,
    locatorUrl: null,
    configSource: null,
    resolution: null,
    confidence: null,
    searches: { attempted: 0, failed: 0, cooldowns: 0 },
    records: [],
    errors: [],
  };
  if (!siteKey) {
    report.fatal = `Not a site: "${site}"`;
    return report;
  }

  let siteConfig: MergedConfig;
  if (ctx.store.hasGeneratedConfig(siteKey)) {
    report.configSource = "generated_cached";
    report.locatorUrl = ctx.store.getConfig(siteKey).base_url ?? null;
    console.log(`[pipeline] ${siteKey}: using cached generated config`);
  }

  if (!report.locatorUrl) {
    const discovered = await ctx.discovery.discover(siteUrl(site));
    if (!discovered.ok) {
      report.fatal = discovered.error.message;
      console.error(`[pipeline] ${siteKey}: ${discovered.error.message}`);
      return report;
    }
    report.locatorUrl = discovered.value.locatorUrl;
  }
  const locatorUrl = report.locatorUrl;

  if (report.configSource === null) {
    const configured = await configureSite(ctx, siteKey, locatorUrl, report.errors);
    siteConfig = configured.config;
    report.configSource = configured.source;
  } else {
    siteConfig = ctx.store.getConfig(siteKey);
  }

  const collector = new RecordCollector();
  const { maxConsecutiveFailures, failureCooldownMs, searchTimeoutMs, debug } = ctx.settings;
  let consecutiveFailures = 0;

  for (const term of terms) {
    report.searches.attempted++;
    const resolved = ctx.resolved.get(siteKey);
    const searchConfig = resolved?.config ?? siteConfig;

    let html: string;
    try {
      html = await withTimeout(
        ctx.driver.search({ url: locatorUrl, term, config: searchConfig, timeoutMs: searchTimeoutMs }),
        searchTimeoutMs
      );
    } catch (error) {
      report.searches.failed++;
      report.errors.push(`search "${term}": ${describeError(error)}`);
      console.error(`[pipeline] ${siteKey}: search "${term}" failed:`, describeError(error));

      consecutiveFailures++;
      if (consecutiveFailures >= maxConsecutiveFailures) {
        console.warn(
          `[pipeline] ${siteKey}: ${consecutiveFailures} consecutive failures, pausing ${failureCooldownMs}ms`
        );
        report.searches.cooldowns++;
        await ctx.sleep(failureCooldownMs);
        consecutiveFailures = 0;
      }
      continue;
    }
    consecutiveFailures = 0;

    let resolution = resolved;
    if (!resolution) {
      resolution = await ctx.validator.resolve(html, locatorUrl, siteConfig);
      ctx.resolved.set(siteKey, resolution);
      console.log(
        `[pipeline] ${siteKey}: config ${resolution.state} (confidence ${resolution.confidence.toFixed(2)})`
      );
    }

    extractRecords(
      loadDocument(html),
      {
        config: resolution.config,
        searchKey: term,
        sourceUrl: locatorUrl,
        scrapedAt: ctx.now().toISOString(),
        debug,
      },
      collector
    );
  }

  const resolution = ctx.resolved.get(siteKey);
  report.resolution = resolution?.state ?? null;
  report.confidence = resolution?.confidence ?? null;
  report.records = collector.records();
  console.log(
    `[pipeline] ${siteKey}: ${report.records.length} records from ${report.searches.attempted} searches` +
      ` (${report.searches.failed} failed)`
  );
  return report;
}

/** Sessions run one after another; one site's failure does not stop the rest. */
export async function runSessions(
  ctx: PipelineContext,
  sites: readonly string[],
  terms: readonly string[]
): Promise<SessionReport[]> {
  if (sites.length === 0) throw new NoTargetsError();

  const reports: SessionReport[] = [];
  for (const site of sites) {
    reports.push(await runSiteSession(ctx, site, terms));
  }
  return reports;
}
