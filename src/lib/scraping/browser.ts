import { chromium, Browser, BrowserContext, Locator, Page } from "playwright-core";
import { config } from "../config";
import type { MergedConfig } from "../configs/schema";
import { describeError } from "../errors";
import { extractDomain } from "../site-key";
import { SearchDriver, SearchRequest, interactionMs, isSearchStep } from "./driver";
import { delay } from "./utils";

let browser: Browser | null = null;
const contexts = new Map<string, BrowserContext>();

const LAUNCH_ARGS = [
  "--disable-blink-features=AutomationControlled",
  "--no-sandbox",
  "--disable-setuid-sandbox",
];

const MAX_SCROLLS = 10;

async function getBrowser(): Promise<Browser> {
  if (!browser || !browser.isConnected()) {
    browser = await chromium.launch({
      headless: true,
      args: LAUNCH_ARGS,
      executablePath: process.env.CHROMIUM_PATH || undefined,
    });
  }
  return browser;
}

async function getContext(domain: string): Promise<BrowserContext> {
  let ctx = contexts.get(domain);
  if (ctx) return ctx;

  const b = await getBrowser();
  ctx = await b.newContext({
    userAgent: config.getRandomUserAgent(),
    viewport: { width: 1280, height: 720 },
  });
  contexts.set(domain, ctx);
  return ctx;
}

/** First selector in the list with a visible match on the page. */
async function firstVisible(page: Page, selectors: readonly string[] | undefined): Promise<Locator | null> {
  for (const selector of selectors ?? []) {
    const locator = page.locator(selector).first();
    try {
      if (await locator.isVisible()) return locator;
    } catch (error) {
      console.warn(`[browser] Selector error (${selector}): ${describeError(error)}`);
    }
  }
  return null;
}

async function acceptCookies(page: Page, cfg: MergedConfig): Promise<void> {
  const button = await firstVisible(page, cfg.selectors?.cookie_accept);
  if (!button) return;
  try {
    await button.click({ timeout: 5000 });
    await delay(interactionMs(cfg, "click_delay", 300));
  } catch (error) {
    console.warn(`[browser] Cookie banner click failed: ${describeError(error)}`);
  }
}

async function runSearchSequence(page: Page, cfg: MergedConfig, term: string): Promise<void> {
  const input = await firstVisible(page, cfg.selectors?.search_input);
  if (!input) throw new Error("No visible search input");

  const clickDelay = interactionMs(cfg, "click_delay", 300);
  const sequence = cfg.interactions?.search_sequence ?? ["fill_input", "press_enter"];

  for (const step of sequence) {
    if (!isSearchStep(step)) {
      console.warn(`[browser] Ignoring unknown search step "${step}"`);
      continue;
    }
    switch (step) {
      case "fill_input":
        await input.fill("");
        await input.fill(term);
        break;
      case "press_enter":
        await input.press("Enter");
        break;
      case "click_search": {
        const button = await firstVisible(page, cfg.selectors?.search_button);
        if (button) await button.click();
        else await input.press("Enter");
        break;
      }
      case "click_apply": {
        const button = await firstVisible(page, cfg.selectors?.apply_button);
        if (button) await button.click();
        break;
      }
      case "wait":
        break;
    }
    await delay(clickDelay);
  }
}

async function loadAllResults(page: Page, cfg: MergedConfig): Promise<void> {
  const pagination = cfg.interactions?.pagination_type ?? "none";

  if (pagination === "view_more") {
    const maxClicks = cfg.interactions?.max_view_more_clicks ?? 20;
    const pause = interactionMs(cfg, "view_more_delay", 2000);
    for (let clicks = 0; clicks < maxClicks; clicks++) {
      const button = await firstVisible(page, cfg.selectors?.view_more_button);
      if (!button) break;
      try {
        await button.click({ timeout: 5000 });
      } catch (error) {
        console.warn(`[browser] View-more click ${clicks + 1} failed: ${describeError(error)}`);
        break;
      }
      await delay(pause);
    }
    return;
  }

  if (pagination === "scroll") {
    const pause = interactionMs(cfg, "scroll_delay", 500);
    const container = await firstVisible(page, cfg.selectors?.scroll_container);
    for (let i = 0; i < MAX_SCROLLS; i++) {
      if (container) await container.hover();
      await page.mouse.wheel(0, 2000);
      await delay(pause);
    }
  }
}

/** Chromium-backed driver; one browser context per site. */
export class PlaywrightSearchDriver implements SearchDriver {
  async search(request: SearchRequest): Promise<string> {
    const { url, term, config: cfg, timeoutMs } = request;
    const ctx = await getContext(extractDomain(url));
    const page = await ctx.newPage();
    page.setDefaultTimeout(timeoutMs);

    try {
      // Block images, fonts, media for speed
      await page.route("**/*", (route) => {
        const type = route.request().resourceType();
        if (["image", "font", "media"].includes(type)) {
          return route.abort();
        }
        return route.continue();
      });

      await page.goto(url, { waitUntil: "domcontentloaded", timeout: timeoutMs });
      await delay(interactionMs(cfg, "wait_after_page_load", 3000));

      await acceptCookies(page, cfg);
      await runSearchSequence(page, cfg, term);
      await delay(interactionMs(cfg, "wait_after_search", 2000));
      await loadAllResults(page, cfg);

      const html = await page.content();
      console.log(`[browser] ${url} "${term}": ${html.length} bytes`);
      return html;
    } finally {
      await page.close().catch((error: unknown) => {
        console.warn(`[browser] Failed to close page: ${describeError(error)}`);
      });
    }
  }

  async close(): Promise<void> {
    await closeBrowser();
  }
}

export async function closeBrowser(): Promise<void> {
  for (const [domain, ctx] of contexts) {
    await ctx.close().catch((error: unknown) => {
      console.warn(`[browser] Failed to close context for ${domain}: ${describeError(error)}`);
    });
    contexts.delete(domain);
  }
  if (browser) {
    await browser.close().catch((error: unknown) => {
      console.warn(`[browser] Failed to close browser: ${describeError(error)}`);
    });
    browser = null;
  }
}
