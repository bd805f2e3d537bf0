import "dotenv/config";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { errorMessage } from "./lib/errors.js";
import { createLogger } from "./lib/logger.js";
import { createForkWorkerFactory } from "./pool/child-worker.js";
import { WorkerPoolManager } from "./pool/manager.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  const manager = new WorkerPoolManager({
    size: config.pool.size,
    createWorker: createForkWorkerFactory({ logLevel: config.logLevel }),
    logger,
    readyTimeoutMs: config.pool.readyTimeoutMs,
    killTimeoutMs: config.pool.killTimeoutMs,
    maxJobsPerWorker: config.pool.maxJobsPerWorker,
  });

  // Start the workers before taking traffic. If this fails, the first job
  // retries.
  try {
    await manager.ensureInitialized();
  } catch (error) {
    logger.error(
      { error: errorMessage(error) },
      "Worker pool failed to start; it will be retried on the first job"
    );
  }

  const app = createApp({ manager, logger });
  const server = app.listen(config.port, config.host, () => {
    logger.info(`Crawler listening on ${config.host}:${config.port}`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info({ signal }, "Shutting down...");
    server.close();
    try {
      await manager.shutdown();
      process.exit(0);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, "Error during shutdown");
      process.exit(1);
    }
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      void shutdown(signal);
    });
  }
}

main().catch((error) => {
  console.error("Crawler error:", error);
  process.exit(1);
});
