import { crawlSite } from "../crawler.js";
import { errorMessage } from "../lib/errors.js";
import type { Fetcher } from "../lib/fetcher.js";
import type { Logger } from "../lib/logger.js";
import type { CrawlJob, CrawlPolicy, PageResult } from "../lib/types.js";

export interface JobRunnerDeps {
  createFetcher: (policy?: CrawlPolicy) => Promise<Fetcher>;
  logger: Logger;
  policy?: CrawlPolicy;
}

/**
 * Run one crawl job to completion inside the current process.
 *
 * Never throws: a crawl that fails as a whole is logged and yields no results,
 * so the worker process stays alive for the next job.
 */
export async function runJob(
  job: CrawlJob,
  { createFetcher, logger, policy }: JobRunnerDeps
): Promise<PageResult[]> {
  const results: PageResult[] = [];
  let fetcher: Fetcher | undefined;

  try {
    fetcher = await createFetcher(policy);
    await crawlSite({
      startUrls: job.startUrls,
      allowedDomains: job.allowedDomains,
      fetcher,
      logger,
      policy,
      onPage: (page) => {
        results.push(page);
      },
    });
    return results;
  } catch (error) {
    logger.error({ error: errorMessage(error) }, "Error during crawl");
    return [];
  } finally {
    if (fetcher) {
      await fetcher.close().catch((error: unknown) => {
        logger.warn({ error: errorMessage(error) }, "Failed to close fetcher");
      });
    }
  }
}
