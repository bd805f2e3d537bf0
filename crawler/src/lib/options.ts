import type { CrawlPolicy } from "./types.js";

export const DEFAULT_CRAWL_POLICY: Required<CrawlPolicy> = {
  maxDepth: 2,
  navigationTimeoutMs: 30_000,
  maxConcurrentPages: 16,
};

export function normalizePolicy(policy?: CrawlPolicy): Required<CrawlPolicy> {
  const maxDepth = policy?.maxDepth ?? DEFAULT_CRAWL_POLICY.maxDepth;
  const navigationTimeoutMs =
    policy?.navigationTimeoutMs ?? DEFAULT_CRAWL_POLICY.navigationTimeoutMs;
  const maxConcurrentPages =
    policy?.maxConcurrentPages ?? DEFAULT_CRAWL_POLICY.maxConcurrentPages;

  return {
    maxDepth: Math.max(0, Math.floor(maxDepth)),
    navigationTimeoutMs: Math.max(1, navigationTimeoutMs),
    maxConcurrentPages: Math.max(1, Math.floor(maxConcurrentPages)),
  };
}
