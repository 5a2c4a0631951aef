import { config } from "../config";
import { ProxyAgent, fetch as undiciFetch } from "undici";

export async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function getProxyDispatcher(): ProxyAgent | undefined {
  const proxyUrl =
    process.env.HTTPS_PROXY ||
    process.env.https_proxy ||
    process.env.HTTP_PROXY ||
    process.env.http_proxy;
  if (!proxyUrl) return undefined;
  return new ProxyAgent(proxyUrl);
}

export interface FetchPageOptions {
  retries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  /** Pause before each network request. */
  politeDelayMs?: number;
}

/**
 * GET a page's HTML. Rate limiting (429/503) and timeouts back off
 * exponentially and retry; other HTTP errors throw at once.
 */
export async function fetchPage(url: string, options: FetchPageOptions = {}): Promise<string> {
  const {
    retries = 3,
    retryDelayMs = 2000,
    timeoutMs = 15000,
    politeDelayMs = config.scrapeDelayMs,
  } = options;

  const dispatcher = getProxyDispatcher();

  for (let attempt = 0; attempt <= retries; attempt++) {
    if (politeDelayMs > 0) await delay(politeDelayMs);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const fetchOptions: Parameters<typeof undiciFetch>[1] = {
        headers: {
          "User-Agent": config.getRandomUserAgent(),
          Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
          "Accept-Language": "en-US,en;q=0.9",
        },
        signal: controller.signal,
        dispatcher,
      };

      const response = await undiciFetch(url, fetchOptions);

      if (response.status === 429 || response.status === 503) {
        if (attempt < retries) {
          const backoff = retryDelayMs * Math.pow(2, attempt);
          console.warn(`[fetch] ${response.status} for ${url}, retrying in ${backoff}ms`);
          await delay(backoff);
          continue;
        }
        throw new Error(`Rate limited (${response.status}) after ${retries} retries: ${url}`);
      }

      if (response.status === 403) {
        throw new Error(`Access denied (403) for ${url}`);
      }

      if (!response.ok) {
        throw new Error(`HTTP ${response.status} for ${url}`);
      }

      return await response.text();
    } catch (error: unknown) {
      if (attempt < retries && error instanceof Error && error.name === "AbortError") {
        const backoff = retryDelayMs * Math.pow(2, attempt);
        console.warn(`[fetch] Timed out fetching ${url}, retrying in ${backoff}ms`);
        await delay(backoff);
        continue;
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }

  throw new Error(`Failed to fetch ${url} after ${retries} retries`);
}
