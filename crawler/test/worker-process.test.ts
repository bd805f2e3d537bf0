import { afterEach, describe, expect, it } from "vitest";
import { createLogger } from "../src/lib/logger.js";
import type { CrawlJob } from "../src/lib/types.js";
import { createForkWorkerFactory } from "../src/pool/child-worker.js";
import { WorkerPoolManager } from "../src/pool/manager.js";
import type { WorkerHandle } from "../src/pool/process-pool.js";

// These run the real worker entry in child processes, loaded through tsx. The
// start URL is outside the allow-list, so no page is ever navigated to.

const logger = createLogger("silent");
const forkWorker = createForkWorkerFactory({
  logLevel: "silent",
  execArgv: ["--import", "tsx"],
});
const JOB: CrawlJob = {
  startUrls: ["http://outside.test/"],
  allowedDomains: ["example.test"],
};

function exitOf(
  worker: WorkerHandle
): Promise<{ code: number | null; signal: NodeJS.Signals | null }> {
  return new Promise((resolve) => {
    worker.onExit((code, signal) => resolve({ code, signal }));
  });
}

function firstMessageOf(worker: WorkerHandle): Promise<unknown> {
  return new Promise((resolve) => {
    worker.onMessage(resolve);
  });
}

describe("forked worker process", () => {
  it("reports ready and exits cleanly when asked to stop", async () => {
    const worker = forkWorker(0);
    const exited = exitOf(worker);

    expect(await firstMessageOf(worker)).toEqual({ type: "ready" });
    worker.send({ type: "stop" });

    expect(await exited).toEqual({ code: 0, signal: null });
    expect(() => worker.send({ type: "stop" })).toThrow(/IPC channel to worker .* is closed/);
  }, 30_000);

  it("reports the signal it was killed with", async () => {
    const worker = forkWorker(0);
    const exited = exitOf(worker);
    await firstMessageOf(worker);

    worker.kill("SIGTERM");

    expect(await exited).toEqual({ code: null, signal: "SIGTERM" });
  }, 30_000);
});

describe("WorkerPoolManager with forked workers", () => {
  let manager: WorkerPoolManager | null = null;

  afterEach(async () => {
    await manager?.shutdown();
    manager = null;
  });

  it("runs jobs, refreshes, and runs jobs again", async () => {
    manager = new WorkerPoolManager({
      size: 1,
      createWorker: forkWorker,
      logger,
      readyTimeoutMs: 20_000,
      killTimeoutMs: 2_000,
    });

    expect(await manager.submit(JOB)).toEqual({ status: "finished", results: [] });
    expect(await manager.refresh()).toEqual({
      status: "refreshed_and_restarted",
      message:
        "Worker pools have been terminated and new pools are ready for immediate use.",
    });
    expect(await manager.submit(JOB)).toEqual({ status: "finished", results: [] });
  }, 60_000);
});
