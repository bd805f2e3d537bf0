import type { PageResult } from "../lib/types.js";

/** Where the process pool delivers what its workers report. */
export interface ResultSink {
  complete(jobId: string, results: readonly PageResult[]): void;
  fail(jobId: string, error: Error): void;
}

interface OpenSlot {
  resolve: (results: PageResult[]) => void;
  reject: (error: Error) => void;
}

/**
 * Hands each job's results from the worker that ran it to the caller that
 * submitted it. Every job gets its own slot; slots are never shared.
 */
export class JobCoordinator implements ResultSink {
  private readonly slots = new Map<string, OpenSlot>();
  private closedWith: Error | null = null;

  get isOpen(): boolean {
    return this.closedWith === null;
  }

  get pendingCount(): number {
    return this.slots.size;
  }

  open(jobId: string): Promise<PageResult[]> {
    if (this.closedWith) {
      return Promise.reject(this.closedWith);
    }
    if (this.slots.has(jobId)) {
      return Promise.reject(new Error(`Job ${jobId} already has an open result slot`));
    }

    return new Promise<PageResult[]>((resolve, reject) => {
      this.slots.set(jobId, { resolve, reject });
    });
  }

  /** Returns false when the slot is gone, i.e. the result was discarded. */
  complete(jobId: string, results: readonly PageResult[]): boolean {
    const slot = this.take(jobId);
    if (!slot) return false;
    slot.resolve(results.map((page) => ({ url: page.url, text: page.text })));
    return true;
  }

  fail(jobId: string, error: Error): boolean {
    const slot = this.take(jobId);
    if (!slot) return false;
    slot.reject(error);
    return true;
  }

  /** Rejects every open slot with `reason` and refuses new ones. */
  close(reason: Error): void {
    if (this.closedWith) return;
    this.closedWith = reason;

    const open = [...this.slots.values()];
    this.slots.clear();
    for (const slot of open) slot.reject(reason);
  }

  private take(jobId: string): OpenSlot | undefined {
    const slot = this.slots.get(jobId);
    this.slots.delete(jobId);
    return slot;
  }
}
