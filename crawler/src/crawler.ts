import { normalizeLink, selectLinksToFollow } from "./lib/crawl.js";
import { errorMessage, PageFetchError } from "./lib/errors.js";
import { extractImportantText, extractLinks } from "./lib/extract.js";
import type { FetchedPage, Fetcher } from "./lib/fetcher.js";
import type { Logger } from "./lib/logger.js";
import { normalizePolicy } from "./lib/options.js";
import type { CrawlPolicy, PageResult } from "./lib/types.js";

export interface CrawlSiteArgs {
  startUrls: readonly string[];
  allowedDomains: readonly string[];
  fetcher: Fetcher;
  logger: Logger;
  policy?: CrawlPolicy;
  /** Called once per extracted page, in completion order. */
  onPage: (page: PageResult) => void;
}

export interface CrawlSummary {
  pagesCrawled: number;
  pagesFailed: number;
}

interface FrontierEntry {
  url: string;
  depth: number;
}

/**
 * Breadth-first crawl over an explicit frontier of `(url, depth)` entries.
 *
 * Pages are fetched with at most `maxConcurrentPages` in flight. A page that
 * fails to load is logged and skipped; it never fails the crawl.
 */
export async function crawlSite({
  startUrls,
  allowedDomains,
  fetcher,
  logger,
  policy,
  onPage,
}: CrawlSiteArgs): Promise<CrawlSummary> {
  const { maxDepth, maxConcurrentPages } = normalizePolicy(policy);

  const frontier: FrontierEntry[] = [];
  const seen = new Set<string>();
  const summary: CrawlSummary = { pagesCrawled: 0, pagesFailed: 0 };

  function enqueue(candidates: Iterable<string>, depth: number): void {
    if (depth > maxDepth) return;
    for (const url of selectLinksToFollow({ candidates, allowedDomains, seen })) {
      seen.add(url);
      frontier.push({ url, depth });
    }
  }

  async function visit({ url, depth }: FrontierEntry): Promise<void> {
    logger.info({ url, depth }, "Parsing page");

    let page: FetchedPage;
    try {
      page = await fetcher.fetchPage(url);
    } catch (error) {
      summary.pagesFailed++;
      logger.warn(
        {
          url,
          statusCode: error instanceof PageFetchError ? error.statusCode : undefined,
          error: errorMessage(error),
        },
        "Failed to fetch page"
      );
      return;
    }

    // Redirect targets count as visited too.
    seen.add(normalizeLink(page.url) ?? page.url);

    onPage({ url: page.url, text: extractImportantText(page.html) });
    summary.pagesCrawled++;

    if (depth < maxDepth) {
      enqueue(extractLinks(page.html, page.url), depth + 1);
    }
  }

  enqueue(startUrls, 0);

  await new Promise<void>((resolve) => {
    let active = 0;

    const pump = (): void => {
      while (active < maxConcurrentPages) {
        const entry = frontier.shift();
        if (!entry) break;

        active++;
        void visit(entry)
          .catch((error: unknown) => {
            summary.pagesFailed++;
            logger.error(
              { url: entry.url, error: errorMessage(error) },
              "Failed to process page"
            );
          })
          .finally(() => {
            active--;
            pump();
          });
      }

      if (active === 0 && frontier.length === 0) resolve();
    };

    pump();
  });

  logger.info(summary, "Crawl finished");
  return summary;
}
