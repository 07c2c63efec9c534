import { CancelledError } from '../types/errors.ts';

export type ReleaseFunction = () => void;

interface QueuedRequest {
  resolve: (release: ReleaseFunction) => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
}

/**
 * Counting semaphore bounding in-flight children of a parallel or foreach step.
 * Waiters are admitted first in, first out; an aborted waiter leaves the queue with a
 * CancelledError.
 */
export class Semaphore {
  private active = 0;
  private peak = 0;
  private readonly queue: QueuedRequest[] = [];

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`semaphore limit must be a positive integer, got ${limit}`);
    }
  }

  /** Highest number of holders seen at once */
  get peakActive(): number {
    return this.peak;
  }

  get inFlight(): number {
    return this.active;
  }

  async acquire(signal?: AbortSignal): Promise<ReleaseFunction> {
    if (signal?.aborted) {
      throw new CancelledError();
    }

    if (this.active < this.limit && this.queue.length === 0) {
      this.admit();
      return this.createReleaseFn();
    }

    return new Promise<ReleaseFunction>((resolve, reject) => {
      const request: QueuedRequest = { resolve, reject, signal };

      if (signal) {
        const onAbort = () => {
          const index = this.queue.indexOf(request);
          if (index !== -1) {
            this.queue.splice(index, 1);
            reject(new CancelledError());
          }
        };
        signal.addEventListener('abort', onAbort, { once: true });
        request.resolve = (release) => {
          signal.removeEventListener('abort', onAbort);
          resolve(release);
        };
      }

      this.queue.push(request);
    });
  }

  /**
   * Run `task` while holding one slot.
   */
  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await task();
    } finally {
      release();
    }
  }

  private admit(): void {
    this.active++;
    this.peak = Math.max(this.peak, this.active);
  }

  private createReleaseFn(): ReleaseFunction {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release(): void {
    this.active--;

    while (this.active < this.limit && this.queue.length > 0) {
      const request = this.queue.shift();
      if (!request) break;

      // Skip if signal already aborted
      if (request.signal?.aborted) continue;

      this.admit();
      request.resolve(this.createReleaseFn());
    }
  }
}
