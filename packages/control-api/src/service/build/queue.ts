import type { BuildJobSink } from "./types.js";

export class DequeueCancelledError extends Error {
  constructor(reason?: unknown) {
    super("Dequeue cancelled", { cause: reason });
    this.name = "DequeueCancelledError";
  }
}

interface Waiter {
  resolve: (deploymentId: string) => void;
  signal?: AbortSignal;
  onAbort: () => void;
}

/**
 * In-memory FIFO of deployment ids waiting to be built. Items enqueued while
 * workers are blocked in `dequeue` are handed to the longest-waiting worker.
 * Nothing survives a restart.
 */
export class BuildQueue implements BuildJobSink {
  private readonly items: string[] = [];
  private readonly waiters: Waiter[] = [];

  enqueue(deploymentId: string) {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.signal?.removeEventListener("abort", waiter.onAbort);
      waiter.resolve(deploymentId);
      return;
    }
    this.items.push(deploymentId);
  }

  dequeue(signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) {
      return Promise.reject(new DequeueCancelledError(signal.reason));
    }

    const next = this.items.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }

    return new Promise<string>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        signal,
        onAbort: () => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          reject(new DequeueCancelledError(signal?.reason));
        },
      };
      signal?.addEventListener("abort", waiter.onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  size() {
    return this.items.length;
  }

  /** Number of callers blocked in `dequeue`. */
  waiting() {
    return this.waiters.length;
  }
}
