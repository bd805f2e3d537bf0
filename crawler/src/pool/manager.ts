import { randomUUID } from "node:crypto";
import {
  errorMessage,
  InitializationError,
  PoolRefreshedError,
  PoolShutdownError,
} from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import type {
  CrawlJob,
  CrawlOutcome,
  PoolStatus,
  RefreshOutcome,
} from "../lib/types.js";
import { JobCoordinator } from "./coordinator.js";
import { ProcessPool, type WorkerFactory } from "./process-pool.js";

export interface WorkerPoolManagerOptions {
  /** Number of worker processes, usually one per logical core. */
  size: number;
  createWorker: WorkerFactory;
  logger: Logger;
  readyTimeoutMs?: number;
  killTimeoutMs?: number;
  maxJobsPerWorker?: number;
  createJobId?: () => string;
}

const SAMPLE_URL_COUNT = 3;

/**
 * Owns the worker processes and the coordinator that hands results back from
 * them. Both exist together or not at all; every operation that needs them
 * initializes them lazily, so a failed startup or refresh heals on next use.
 */
export class WorkerPoolManager {
  private pool: ProcessPool | null = null;
  private coordinator: JobCoordinator | null = null;
  private initializing: Promise<void> | null = null;
  private stopped = false;
  private readonly logger: Logger;
  private readonly createJobId: () => string;

  constructor(private readonly options: WorkerPoolManagerOptions) {
    this.logger = options.logger;
    this.createJobId = options.createJobId ?? randomUUID;
  }

  get isLive(): boolean {
    return this.pool !== null && this.coordinator !== null && this.pool.hasLiveWorkers;
  }

  status(): PoolStatus {
    return {
      live: this.isLive,
      size: this.options.size,
      busy: this.pool?.busyCount ?? 0,
      queued: this.pool?.queuedCount ?? 0,
      pendingJobs: this.coordinator?.pendingCount ?? 0,
    };
  }

  /**
   * No-op when the pool is live. Otherwise builds the pool and coordinator,
   * publishing them only once every worker is ready. Concurrent callers share
   * one attempt.
   */
  async ensureInitialized(): Promise<void> {
    if (this.stopped) throw new PoolShutdownError();
    if (this.isLive) return;

    if (!this.initializing) {
      if (this.pool) {
        this.logger.warn("Worker pool has no live workers left, rebuilding it");
        this.retire(new InitializationError("No worker processes are available"));
      }
      this.initializing = this.initialize().finally(() => {
        this.initializing = null;
      });
    }
    return this.initializing;
  }

  async submit(job: CrawlJob): Promise<CrawlOutcome> {
    if (job.startUrls.length === 0) {
      return {
        status: "error",
        message: "At least one start URL is required.",
        results: [],
      };
    }

    if (!this.isLive) {
      this.logger.warn("Resources not initialized, attempting to reinitialize...");
      try {
        await this.ensureInitialized();
      } catch (error) {
        return {
          status: "error",
          message: `Server resources are not initialized: ${errorMessage(error)}`,
          results: [],
        };
      }
    }

    const { pool, coordinator } = this;
    if (!pool || !coordinator) {
      return {
        status: "error",
        message:
          "Server resources are not initialized. Please ensure the server started correctly.",
        results: [],
      };
    }

    const jobId = this.createJobId();
    try {
      const pending = coordinator.open(jobId);
      pool.enqueue(jobId, job);
      const results = await pending;

      this.logger.info(
        { jobId, count: results.length },
        `Crawl completed. Found ${results.length} result(s).`
      );
      if (results.length > 0) {
        const sample = results.slice(0, SAMPLE_URL_COUNT).map((page) => page.url);
        this.logger.info({ jobId, sample }, `Sample URLs scraped: ${sample.join(", ")}`);
      }

      return { status: "finished", results };
    } catch (error) {
      this.logger.error(
        { jobId, error: errorMessage(error) },
        "Crawl execution failed"
      );
      return {
        status: "error",
        message: `Crawl execution failed: ${errorMessage(error)}`,
        results: [],
      };
    }
  }

  /**
   * Tear the pool down without waiting for running jobs (their callers get an
   * error right away) and build a fresh one.
   */
  async refresh(): Promise<RefreshOutcome> {
    if (this.stopped) {
      return { status: "error", message: "Worker pool is shut down" };
    }

    if (this.initializing) {
      await Promise.allSettled([this.initializing]);
    }

    this.logger.info("Shutting down existing worker pools...");
    this.retire(new PoolRefreshedError());

    try {
      await this.ensureInitialized();
      this.logger.info("Resources successfully refreshed and restarted.");
      return {
        status: "refreshed_and_restarted",
        message:
          "Worker pools have been terminated and new pools are ready for immediate use.",
      };
    } catch (error) {
      this.logger.error(
        { error: errorMessage(error) },
        "Failed to re-initialize resources"
      );
      return {
        status: "error",
        message: `Failed to re-initialize resources: ${errorMessage(error)}`,
      };
    }
  }

  /** Stop all workers and wait for them to exit. Safe to call twice. */
  async shutdown(): Promise<void> {
    this.stopped = true;
    if (this.initializing) {
      await Promise.allSettled([this.initializing]);
    }

    this.logger.info("Shutting down worker pool...");
    await this.teardown(new PoolShutdownError());
  }

  private async initialize(): Promise<void> {
    this.logger.info(
      { size: this.options.size },
      `Initializing worker pool with ${this.options.size} workers...`
    );

    const coordinator = new JobCoordinator();
    let pool: ProcessPool;
    try {
      pool = new ProcessPool({
        size: this.options.size,
        createWorker: this.options.createWorker,
        sink: coordinator,
        logger: this.logger,
        readyTimeoutMs: this.options.readyTimeoutMs,
        killTimeoutMs: this.options.killTimeoutMs,
        maxJobsPerWorker: this.options.maxJobsPerWorker,
      });
      await pool.start();
    } catch (error) {
      this.logger.error(
        { error: errorMessage(error) },
        "Critical error during resource initialization"
      );
      throw error instanceof InitializationError
        ? error
        : new InitializationError(errorMessage(error), { cause: error });
    }

    if (this.stopped) {
      coordinator.close(new PoolShutdownError());
      await pool.destroy(new PoolShutdownError());
      throw new PoolShutdownError();
    }

    this.pool = pool;
    this.coordinator = coordinator;
    this.logger.info("Resources initialized successfully.");
  }

  /** Tear down the current pool without waiting for its processes to exit. */
  private retire(reason: Error): void {
    void this.teardown(reason).then(
      () => this.logger.info("Previous worker processes exited"),
      (error: unknown) =>
        this.logger.error(
          { error: errorMessage(error) },
          "Error while stopping previous worker processes"
        )
    );
  }

  private teardown(reason: Error): Promise<void> {
    const { pool, coordinator } = this;
    this.pool = null;
    this.coordinator = null;

    try {
      coordinator?.close(reason);
    } catch (error) {
      this.logger.error(
        { error: errorMessage(error) },
        "Error during coordinator shutdown"
      );
    }

    return pool ? pool.destroy(reason) : Promise.resolve();
  }
}
