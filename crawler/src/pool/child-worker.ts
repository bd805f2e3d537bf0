import { fork, type ChildProcess } from "node:child_process";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { ParentMessage } from "./protocol.js";
import type { WorkerFactory, WorkerHandle } from "./process-pool.js";

type ExitListener = (code: number | null, signal: NodeJS.Signals | null) => void;

/**
 * Path of the worker entry next to this module. Running from sources resolves
 * the `.ts` file (the child inherits the parent's loader flags), running from
 * the build resolves the compiled `.js`.
 */
export function resolveWorkerEntry(moduleUrl: string = import.meta.url): string {
  const extension = path.extname(fileURLToPath(moduleUrl));
  return fileURLToPath(new URL(`../runner/worker-entry${extension}`, moduleUrl));
}

class ChildWorker implements WorkerHandle {
  private readonly exitListeners: ExitListener[] = [];
  private exited = false;

  constructor(private readonly child: ChildProcess) {
    child.once("exit", (code, signal) => this.emitExit(code, signal));
    child.on("error", () => {
      // Spawn failures surface here without an exit event.
      if (child.pid === undefined) this.emitExit(null, null);
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  send(message: ParentMessage): void {
    if (!this.child.connected) {
      throw new Error(`IPC channel to worker ${this.child.pid ?? "?"} is closed`);
    }
    this.child.send(message, (error) => {
      if (error) this.kill("SIGKILL");
    });
  }

  onMessage(listener: (message: unknown) => void): void {
    this.child.on("message", (message: unknown) => listener(message));
  }

  onExit(listener: ExitListener): void {
    this.exitListeners.push(listener);
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): void {
    if (this.exited || this.child.exitCode !== null || this.child.signalCode !== null) {
      return;
    }
    this.child.kill(signal);
  }

  private emitExit(code: number | null, signal: NodeJS.Signals | null): void {
    if (this.exited) return;
    this.exited = true;
    for (const listener of this.exitListeners) listener(code, signal);
  }
}

export interface ForkWorkerOptions {
  entry?: string;
  logLevel?: string;
  /** Node flags for the child. Defaults to the parent's own. */
  execArgv?: string[];
}

/**
 * Factory that starts every worker as a fresh Node process. Nothing but the
 * environment is inherited from the parent.
 */
export function createForkWorkerFactory(options: ForkWorkerOptions = {}): WorkerFactory {
  const entry = options.entry ?? resolveWorkerEntry();

  return (slot) => {
    const child = fork(entry, [], {
      env: {
        ...process.env,
        CRAWLER_WORKER_SLOT: String(slot),
        ...(options.logLevel ? { LOG_LEVEL: options.logLevel } : {}),
      },
      execArgv: options.execArgv ?? process.execArgv,
      serialization: "json",
      stdio: ["ignore", "inherit", "inherit", "ipc"],
    });
    return new ChildWorker(child);
  };
}
