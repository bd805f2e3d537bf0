import { chromium, type Browser, type BrowserContext } from "playwright";
import { PageFetchError } from "./errors.js";
import { normalizePolicy } from "./options.js";
import type { CrawlPolicy } from "./types.js";

export interface FetchedPage {
  /** URL the browser ended up on, after redirects. */
  url: string;
  html: string;
}

export interface Fetcher {
  fetchPage(url: string): Promise<FetchedPage>;
  close(): Promise<void>;
}

const USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";

const SKIPPED_RESOURCE_TYPES = new Set(["image", "media", "font"]);

class PlaywrightFetcher implements Fetcher {
  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly navigationTimeoutMs: number
  ) {}

  async fetchPage(url: string): Promise<FetchedPage> {
    const page = await this.context.newPage();
    try {
      const response = await page.goto(url, {
        waitUntil: "load",
        timeout: this.navigationTimeoutMs,
      });

      const statusCode = response?.status();
      if (statusCode !== undefined && (statusCode < 200 || statusCode >= 300)) {
        throw new PageFetchError(url, `HTTP ${statusCode} for ${url}`, statusCode);
      }

      return { url: page.url(), html: await page.content() };
    } finally {
      await page.close();
    }
  }

  async close(): Promise<void> {
    await this.context.close();
    await this.browser.close();
  }
}

/**
 * Launch a headless Chromium for one job. The caller owns the returned
 * fetcher and must close it.
 */
export async function launchPlaywrightFetcher(
  policy?: CrawlPolicy
): Promise<Fetcher> {
  const { navigationTimeoutMs } = normalizePolicy(policy);
  const browser = await chromium.launch({ headless: true });

  try {
    const context = await browser.newContext({
      userAgent: USER_AGENT,
      locale: "en-US",
      viewport: { width: 1365, height: 768 },
      extraHTTPHeaders: {
        "Accept-Language": "en-US,en;q=0.9",
        Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      },
    });

    // Reduce bandwidth by skipping assets that never carry text.
    await context.route("**/*", (route) => {
      if (SKIPPED_RESOURCE_TYPES.has(route.request().resourceType())) {
        return route.abort();
      }
      return route.continue();
    });

    return new PlaywrightFetcher(browser, context, navigationTimeoutMs);
  } catch (error) {
    await browser.close();
    throw error;
  }
}
