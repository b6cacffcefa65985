/**
 * Connection Limiter
 *
 * Counting semaphore bounding simultaneous network connections.
 * One instance is created per run and injected into every fetch task.
 */

import { DownloadCancelledError, ValidationError } from '../../errors/index.js';

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
  signal?: AbortSignal | undefined;
  onAbort?: (() => void) | undefined;
}

export class ConnectionLimiter {
  private active = 0;
  private readonly waiters: Waiter[] = [];

  constructor(public readonly capacity: number) {
    if (!Number.isSafeInteger(capacity) || capacity < 1) {
      throw new ValidationError(`Connection limit must be a positive integer, got: ${capacity}`);
    }
  }

  /**
   * Wait for a free slot. FIFO; an aborted waiter leaves the queue.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new DownloadCancelledError('Cancelled while waiting for a connection slot'));
    }

    if (this.active < this.capacity) {
      this.active++;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };

      if (signal) {
        waiter.onAbort = () => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          reject(new DownloadCancelledError('Cancelled while waiting for a connection slot'));
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }

      this.waiters.push(waiter);
    });
  }

  /**
   * Hand the slot to the next waiter, or free it
   */
  release(): void {
    const next = this.waiters.shift();
    if (next) {
      if (next.signal && next.onAbort) {
        next.signal.removeEventListener('abort', next.onAbort);
      }
      next.resolve();
      return;
    }

    if (this.active > 0) {
      this.active--;
    }
  }

  /**
   * Run `fn` while holding one slot
   */
  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
