export type LlmProvider = "anthropic" | "ollama";

function parseProvider(raw: string | undefined): LlmProvider {
  return raw === "ollama" ? "ollama" : "anthropic";
}

export const config = {
  anthropicApiKey: process.env.ANTHROPIC_API_KEY || "",
  llmProvider: parseProvider(process.env.LLM_PROVIDER),
  llmModel: process.env.LLM_MODEL || "claude-haiku-4-5-20251001",
  llmEndpoint: process.env.LLM_ENDPOINT || "http://localhost:11434/api/generate",
  llmTimeoutMs: parseInt(process.env.LLM_TIMEOUT_MS || "120000", 10),
  llmAnalysisEnabled: process.env.LLM_ANALYSIS_ENABLED !== "false",

  configDir: process.env.CONFIG_DIR || "configs",
  generatedConfigDir: process.env.GENERATED_CONFIG_DIR || "configs/generated",
  discoveryCacheDir: process.env.DISCOVERY_CACHE_DIR || "data/discovery-cache",
  discoveryCacheTtlDays: parseInt(process.env.DISCOVERY_CACHE_TTL_DAYS || "30", 10),

  searchTimeoutMs: parseInt(process.env.SEARCH_TIMEOUT_MS || "120000", 10),
  maxConsecutiveFailures: parseInt(process.env.MAX_CONSECUTIVE_FAILURES || "5", 10),
  failureCooldownMs: parseInt(process.env.FAILURE_COOLDOWN_MS || "30000", 10),
  scrapeDelayMs: parseInt(process.env.SCRAPE_DELAY_MS || "2000", 10),
  debug: process.env.SCRAPER_DEBUG === "true",

  // Heuristic constants with no derivation behind them; kept tunable.
  confidence: {
    candidateScoreDivisor: 20,
    candidateCap: 0.9,
    selectorsMatched: 0.9,
    heuristicBase: 0.4,
    heuristicSampleSize: 5,
    heuristicCap: 0.9,
    refinementThreshold: 0.7,
    unresolved: 0.1,
  },

  userAgents: [
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15",
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  ],
  getRandomUserAgent(): string {
    return this.userAgents[Math.floor(Math.random() * this.userAgents.length)];
  },
};

export type ConfidenceTuning = typeof config.confidence;
