import { errorMessage } from "../lib/errors.js";
import { launchPlaywrightFetcher } from "../lib/fetcher.js";
import { createLogger } from "../lib/logger.js";
import type { CrawlJob } from "../lib/types.js";
import { parentMessageSchema, type ChildMessage } from "../pool/protocol.js";
import { runJob } from "./job-runner.js";

// Entry point of a pooled worker process. Started by the manager with an IPC
// channel; runs one job at a time.

const logger = createLogger(process.env.LOG_LEVEL ?? "info").child({
  worker: process.env.CRAWLER_WORKER_SLOT ?? "?",
  pid: process.pid,
});

function send(message: ChildMessage): void {
  if (!process.connected) {
    logger.warn({ type: message.type }, "IPC channel closed, dropping message");
    return;
  }
  process.send?.(message);
}

async function handleRun(jobId: string, job: CrawlJob): Promise<void> {
  logger.info({ jobId, startUrls: job.startUrls }, "Job started");
  try {
    const results = await runJob(job, {
      createFetcher: launchPlaywrightFetcher,
      logger: logger.child({ jobId }),
    });
    send({ type: "done", jobId, results });
    logger.info({ jobId, pages: results.length }, "Job finished");
  } catch (error) {
    send({ type: "failed", jobId, error: errorMessage(error) });
  }
}

if (!process.send) {
  logger.fatal("Worker must be started with an IPC channel");
  process.exit(1);
}

process.on("message", (raw: unknown) => {
  const parsed = parentMessageSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn({ issues: parsed.error.issues }, "Ignoring malformed message");
    return;
  }

  const message = parsed.data;
  switch (message.type) {
    case "run":
      handleRun(message.jobId, message.job).catch((error: unknown) => {
        logger.error({ jobId: message.jobId, error: errorMessage(error) }, "Job handler crashed");
      });
      break;
    case "stop":
      logger.info("Stop requested, exiting");
      process.exit(0);
  }
});

// The manager went away; nothing left to serve.
process.on("disconnect", () => {
  process.exit(0);
});

send({ type: "ready" });
