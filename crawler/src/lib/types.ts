/**
 * One request's unit of work: where to start and which hosts are in scope.
 */
export interface CrawlJob {
  readonly startUrls: readonly string[];
  /**
   * Hosts the crawl may visit. A host matches when it equals an entry or is a
   * subdomain of one. An empty list puts every host in scope.
   */
  readonly allowedDomains: readonly string[];
}

export interface PageResult {
  /** Final URL of the page, after redirects. */
  url: string;
  /** Boilerplate-stripped text of the page. */
  text: string;
}

export type CrawlStatus = "finished" | "error";

export interface CrawlOutcome {
  status: CrawlStatus;
  /** Pages in the order they finished processing. */
  results: PageResult[];
  message?: string;
}

export type RefreshStatus = "refreshed_and_restarted" | "error";

export interface RefreshOutcome {
  status: RefreshStatus;
  message: string;
}

export interface CrawlPolicy {
  /**
   * Deepest link level to fetch. Start URLs are depth 0, links found on them
   * depth 1, and so on.
   */
  maxDepth?: number;
  /**
   * Per-page navigation timeout in ms.
   */
  navigationTimeoutMs?: number;
  /**
   * Max number of pages fetched at the same time within one job.
   */
  maxConcurrentPages?: number;
}

export interface PoolStatus {
  live: boolean;
  size: number;
  busy: number;
  queued: number;
  pendingJobs: number;
}
