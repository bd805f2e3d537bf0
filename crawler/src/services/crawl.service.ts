import type { WorkerPoolManager } from "../pool/manager.js";
import type {
  CrawlRequestDto,
  CrawlResponseDto,
  RefreshResourcesResponseDto,
} from "../dto/crawl.dto.js";
import {
  toCrawlJob,
  toCrawlResponseDto,
  toRefreshResourcesResponseDto,
} from "../dto/crawl.dto.js";

export interface CrawlService {
  crawl(dto: CrawlRequestDto): Promise<CrawlResponseDto>;
  refreshResources(): Promise<RefreshResourcesResponseDto>;
}

export function createCrawlService(manager: WorkerPoolManager): CrawlService {
  return {
    async crawl(dto) {
      const outcome = await manager.submit(toCrawlJob(dto));
      return toCrawlResponseDto(outcome);
    },

    async refreshResources() {
      const outcome = await manager.refresh();
      return toRefreshResourcesResponseDto(outcome);
    },
  };
}
