import {
  errorMessage,
  InitializationError,
  JobExecutionError,
  PoolShutdownError,
  WorkerExitedError,
} from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import type { CrawlJob } from "../lib/types.js";
import type { ResultSink } from "./coordinator.js";
import { childMessageSchema, type ParentMessage } from "./protocol.js";

/** The manager's side of one worker process. */
export interface WorkerHandle {
  readonly pid: number | undefined;
  send(message: ParentMessage): void;
  onMessage(listener: (message: unknown) => void): void;
  /** Called exactly once, when the process is gone. */
  onExit(
    listener: (code: number | null, signal: NodeJS.Signals | null) => void
  ): void;
  kill(signal?: NodeJS.Signals): void;
}

export type WorkerFactory = (slot: number) => WorkerHandle;

export interface ProcessPoolOptions {
  size: number;
  createWorker: WorkerFactory;
  sink: ResultSink;
  logger: Logger;
  /** How long a new worker may take to report ready. */
  readyTimeoutMs?: number;
  /** Grace period between SIGTERM and SIGKILL when tearing down. */
  killTimeoutMs?: number;
  /** Replace a worker after this many jobs. 0 keeps workers forever. */
  maxJobsPerWorker?: number;
}

type SlotState = "starting" | "idle" | "busy" | "stopping" | "exited";

interface QueuedJob {
  jobId: string;
  job: CrawlJob;
}

interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
  reject: (error: Error) => void;
}

interface Slot {
  readonly id: number;
  readonly worker: WorkerHandle;
  state: SlotState;
  becameReady: boolean;
  current: QueuedJob | null;
  jobsRun: number;
  readyTimer: NodeJS.Timeout | null;
  readonly ready: Deferred;
  readonly exited: Deferred;
}

function defer(): Deferred {
  let resolve: () => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<void>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

function describeExit(code: number | null, signal: NodeJS.Signals | null): string {
  return signal ? `signal ${signal}` : `code ${code ?? "unknown"}`;
}

/**
 * Fixed number of worker processes, each running one job at a time. Jobs that
 * arrive while every worker is busy wait in FIFO order.
 */
export class ProcessPool {
  private readonly slots: Slot[] = [];
  private readonly queue: QueuedJob[] = [];
  private readonly readyTimeoutMs: number;
  private readonly killTimeoutMs: number;
  private readonly maxJobsPerWorker: number;
  private closed = false;

  constructor(private readonly options: ProcessPoolOptions) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new InitializationError(`Invalid worker pool size: ${options.size}`);
    }
    this.readyTimeoutMs = options.readyTimeoutMs ?? 30_000;
    this.killTimeoutMs = options.killTimeoutMs ?? 5_000;
    this.maxJobsPerWorker = options.maxJobsPerWorker ?? 0;
  }

  get size(): number {
    return this.options.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get busyCount(): number {
    return this.slots.filter((slot) => slot.state === "busy").length;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  /** False once every slot has exited and none could be replaced. */
  get hasLiveWorkers(): boolean {
    return this.slots.some((slot) => slot.state !== "exited");
  }

  /**
   * Spawn every worker and wait until all of them reported ready. On failure
   * the workers already spawned are torn down before the error is thrown.
   */
  async start(): Promise<void> {
    try {
      for (let id = 0; id < this.options.size; id++) {
        this.spawn(id);
      }
      await Promise.all(this.slots.map((slot) => slot.ready.promise));
    } catch (error) {
      const failure =
        error instanceof InitializationError
          ? error
          : new InitializationError(
              `Failed to start worker processes: ${errorMessage(error)}`,
              { cause: error }
            );
      await this.destroy(failure);
      throw failure;
    }

    this.options.logger.info(
      { size: this.options.size, pids: this.slots.map((slot) => slot.worker.pid) },
      "Worker processes ready"
    );
  }

  enqueue(jobId: string, job: CrawlJob): void {
    if (this.closed) {
      this.options.sink.fail(jobId, new PoolShutdownError());
      return;
    }
    if (!this.hasLiveWorkers) {
      this.options.sink.fail(
        jobId,
        new InitializationError("No worker processes are available")
      );
      return;
    }
    this.queue.push({ jobId, job });
    this.dispatch();
  }

  /**
   * Stop every worker without waiting for running jobs. Queued and running
   * jobs fail with `reason`. Resolves once all processes are gone.
   */
  async destroy(reason: Error): Promise<void> {
    if (!this.closed) {
      this.closed = true;

      for (const queued of this.queue.splice(0)) {
        this.options.sink.fail(queued.jobId, reason);
      }

      for (const slot of this.slots) {
        if (slot.state === "exited") continue;
        if (slot.readyTimer) {
          clearTimeout(slot.readyTimer);
          slot.readyTimer = null;
        }
        if (slot.current) {
          this.options.sink.fail(slot.current.jobId, reason);
          slot.current = null;
        }
        slot.state = "stopping";
        this.kill(slot, "SIGTERM");
      }
    }

    const pending = this.slots.filter((slot) => slot.state !== "exited");
    if (pending.length === 0) return;

    const escalation = setTimeout(() => {
      for (const slot of pending) {
        if (slot.state !== "exited") this.kill(slot, "SIGKILL");
      }
    }, this.killTimeoutMs);

    try {
      await Promise.all(pending.map((slot) => slot.exited.promise));
    } finally {
      clearTimeout(escalation);
    }
  }

  private spawn(id: number): Slot {
    const worker = this.options.createWorker(id);
    const slot: Slot = {
      id,
      worker,
      state: "starting",
      becameReady: false,
      current: null,
      jobsRun: 0,
      readyTimer: null,
      ready: defer(),
      exited: defer(),
    };

    slot.readyTimer = setTimeout(() => {
      slot.readyTimer = null;
      if (slot.state !== "starting" || this.closed) return;
      slot.state = "stopping";
      slot.ready.reject(
        new InitializationError(
          `Worker ${id} did not become ready within ${this.readyTimeoutMs}ms`
        )
      );
      this.kill(slot, "SIGKILL");
    }, this.readyTimeoutMs);

    worker.onMessage((message) => this.handleMessage(slot, message));
    worker.onExit((code, signal) => this.handleExit(slot, code, signal));

    this.slots[id] = slot;
    return slot;
  }

  private replace(id: number): void {
    let replacement: Slot;
    try {
      replacement = this.spawn(id);
    } catch (error) {
      this.options.logger.error(
        { slot: id, error: errorMessage(error) },
        "Failed to spawn replacement worker"
      );
      this.failQueueIfNoWorkers();
      return;
    }

    replacement.ready.promise.then(
      () => {
        this.options.logger.info(
          { slot: id, pid: replacement.worker.pid },
          "Replacement worker ready"
        );
      },
      (error: unknown) => {
        this.options.logger.error(
          { slot: id, error: errorMessage(error) },
          "Replacement worker failed to start"
        );
      }
    );
  }

  private dispatch(): void {
    if (this.closed) return;

    for (const slot of this.slots) {
      if (this.queue.length === 0) return;
      if (slot.state !== "idle") continue;

      const next = this.queue.shift();
      if (!next) return;

      slot.state = "busy";
      slot.current = next;
      try {
        slot.worker.send({
          type: "run",
          jobId: next.jobId,
          job: {
            startUrls: [...next.job.startUrls],
            allowedDomains: [...next.job.allowedDomains],
          },
        });
      } catch (error) {
        slot.current = null;
        slot.state = "stopping";
        this.options.sink.fail(
          next.jobId,
          new JobExecutionError(
            `Could not hand job to worker ${slot.id}: ${errorMessage(error)}`
          )
        );
        this.kill(slot, "SIGKILL");
      }
    }
  }

  private handleMessage(slot: Slot, raw: unknown): void {
    const parsed = childMessageSchema.safeParse(raw);
    if (!parsed.success) {
      this.options.logger.warn(
        { slot: slot.id, issues: parsed.error.issues },
        "Ignoring malformed worker message"
      );
      return;
    }

    const message = parsed.data;
    if (message.type === "ready") {
      if (slot.state !== "starting") return;
      if (slot.readyTimer) {
        clearTimeout(slot.readyTimer);
        slot.readyTimer = null;
      }
      slot.state = "idle";
      slot.becameReady = true;
      slot.ready.resolve();
      this.dispatch();
      return;
    }

    const current = slot.current;
    if (!current || current.jobId !== message.jobId) {
      this.options.logger.warn(
        { slot: slot.id, jobId: message.jobId },
        "Worker reported on a job it is not running"
      );
      return;
    }

    slot.current = null;
    slot.jobsRun++;
    if (message.type === "done") {
      this.options.sink.complete(current.jobId, message.results);
    } else {
      this.options.sink.fail(current.jobId, new JobExecutionError(message.error));
    }

    this.afterJob(slot);
  }

  private afterJob(slot: Slot): void {
    if (slot.state !== "busy") return;

    if (this.maxJobsPerWorker > 0 && slot.jobsRun >= this.maxJobsPerWorker) {
      this.options.logger.info(
        { slot: slot.id, jobsRun: slot.jobsRun },
        "Recycling worker after job limit"
      );
      slot.state = "stopping";
      try {
        slot.worker.send({ type: "stop" });
      } catch {
        this.kill(slot, "SIGKILL");
      }
      return;
    }

    slot.state = "idle";
    this.dispatch();
  }

  private handleExit(
    slot: Slot,
    code: number | null,
    signal: NodeJS.Signals | null
  ): void {
    if (slot.state === "exited") return;

    const previous = slot.state;
    slot.state = "exited";
    if (slot.readyTimer) {
      clearTimeout(slot.readyTimer);
      slot.readyTimer = null;
    }

    if (previous === "starting" && !this.closed) {
      slot.ready.reject(
        new InitializationError(
          `Worker ${slot.id} exited during startup with ${describeExit(code, signal)}`
        )
      );
    }

    if (slot.current) {
      this.options.sink.fail(
        slot.current.jobId,
        new WorkerExitedError(slot.id, code, signal)
      );
      slot.current = null;
    }

    slot.exited.resolve();

    if (this.closed || this.slots[slot.id] !== slot) return;

    if (!slot.becameReady) {
      this.options.logger.error(
        { slot: slot.id, exit: describeExit(code, signal) },
        "Worker never became ready; leaving its slot empty"
      );
      this.failQueueIfNoWorkers();
      return;
    }

    if (previous !== "stopping") {
      this.options.logger.warn(
        { slot: slot.id, exit: describeExit(code, signal) },
        "Worker exited unexpectedly, replacing it"
      );
    }
    this.replace(slot.id);
  }

  private failQueueIfNoWorkers(): void {
    if (this.hasLiveWorkers) return;

    for (const queued of this.queue.splice(0)) {
      this.options.sink.fail(
        queued.jobId,
        new InitializationError("No worker processes are available")
      );
    }
  }

  private kill(slot: Slot, signal: NodeJS.Signals): void {
    try {
      slot.worker.kill(signal);
    } catch (error) {
      this.options.logger.warn(
        { slot: slot.id, signal, error: errorMessage(error) },
        "Failed to signal worker"
      );
    }
  }
}
