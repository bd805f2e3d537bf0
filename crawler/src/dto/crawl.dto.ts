import { z } from "zod";
import type {
  CrawlJob,
  CrawlOutcome,
  CrawlStatus,
  RefreshOutcome,
  RefreshStatus,
} from "../lib/types.js";

export const crawlRequestSchema = z.object({
  start_urls: z
    .array(z.string().trim().url())
    .min(1, "start_urls must contain at least one URL"),
  allowed_domains: z.array(z.string().trim().min(1)).default([]),
});

export type CrawlRequestDto = z.infer<typeof crawlRequestSchema>;

export interface CrawlResultDto {
  url: string;
  /** Extracted plain text. The field name is kept for client compatibility. */
  html: string;
}

export interface CrawlResponseDto {
  status: CrawlStatus;
  results: CrawlResultDto[];
  message?: string;
}

export interface RefreshResourcesResponseDto {
  status: RefreshStatus;
  message: string;
}

export function toCrawlJob(dto: CrawlRequestDto): CrawlJob {
  return {
    startUrls: [...new Set(dto.start_urls)],
    allowedDomains: [...new Set(dto.allowed_domains)],
  };
}

export function toCrawlResponseDto(outcome: CrawlOutcome): CrawlResponseDto {
  return {
    status: outcome.status,
    results: outcome.results.map((page) => ({ url: page.url, html: page.text })),
    ...(outcome.message !== undefined ? { message: outcome.message } : {}),
  };
}

export function toRefreshResourcesResponseDto(
  outcome: RefreshOutcome
): RefreshResourcesResponseDto {
  return {
    status: outcome.status,
    message: outcome.message,
  };
}
