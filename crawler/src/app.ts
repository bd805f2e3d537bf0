import express, { type Request, type Response, type NextFunction } from "express";
import { pinoHttp } from "pino-http";
import { crawlRequestSchema } from "./dto/crawl.dto.js";
import { ApiError } from "./lib/errors.js";
import type { Logger } from "./lib/logger.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import type { WorkerPoolManager } from "./pool/manager.js";
import { createCrawlService } from "./services/crawl.service.js";

export interface AppDependencies {
  manager: WorkerPoolManager;
  logger: Logger;
}

export function createApp({ manager, logger }: AppDependencies) {
  const crawlService = createCrawlService(manager);
  const app = express();

  app.use(
    pinoHttp({
      logger,
      autoLogging: {
        ignore: (req) => req.url === "/health",
      },
    })
  );
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", pool: manager.status() });
  });

  app.post("/crawl", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = crawlRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      const message = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
        .join("; ");
      res.status(400).json({ status: "error", results: [], message });
      return;
    }

    try {
      // Suspends on the worker's reply only; other requests keep being served.
      res.json(await crawlService.crawl(parsed.data));
    } catch (error) {
      next(error);
    }
  });

  app.post(
    "/refresh_resources",
    async (_req: Request, res: Response, next: NextFunction) => {
      try {
        res.json(await crawlService.refreshResources());
      } catch (error) {
        next(error);
      }
    }
  );

  app.use((req: Request, _res: Response, next: NextFunction) => {
    next(new ApiError(404, "NOT_FOUND", `No route for ${req.method} ${req.path}`));
  });

  app.use(createErrorHandler(logger));

  return app;
}
