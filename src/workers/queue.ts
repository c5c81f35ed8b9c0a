/**
 * Work Queue
 *
 * Bounded FIFO that is filled, closed, then drained by the pool workers.
 *
 * @module workers/queue
 */

import { cancelledFromSignal } from '../fetcher/errors.js';

interface Waiter<T> {
  resolve: (item: T | undefined) => void;
  reject: (error: Error) => void;
}

/**
 * WorkQueue hands each pushed item to exactly one taker.
 *
 * take() resolves with the next item, waits while the queue is empty but
 * still open, and resolves with undefined once it is empty and closed.
 *
 * @example
 * ```typescript
 * const queue = new WorkQueue<string>(paths.length);
 * paths.forEach((p) => queue.push(p));
 * queue.close();
 *
 * for (let p = await queue.take(signal); p !== undefined; p = await queue.take(signal)) {
 *   // ...
 * }
 * ```
 */
export class WorkQueue<T> {
  private readonly capacity: number;
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;

  /**
   * @param capacity - Maximum buffered items
   * @throws RangeError if capacity is negative or not an integer
   */
  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError('Queue capacity must be a non-negative integer');
    }
    this.capacity = capacity;
  }

  /**
   * Add an item. Goes straight to a waiting taker when there is one.
   *
   * @throws Error if the queue is closed or full
   */
  push(item: T): void {
    if (this.closed) {
      throw new Error('push on closed queue');
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
      return;
    }
    if (this.items.length >= this.capacity) {
      throw new Error(`queue is full (capacity ${this.capacity})`);
    }
    this.items.push(item);
  }

  /**
   * Mark the queue as complete. Waiting takers resolve with undefined.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve(undefined);
    }
  }

  /**
   * Take the next item, or undefined once drained and closed.
   *
   * @throws CancelledError if the signal fires first
   */
  async take(signal?: AbortSignal): Promise<T | undefined> {
    if (signal?.aborted) {
      throw cancelledFromSignal(signal);
    }
    if (this.items.length > 0) {
      return this.items.shift();
    }
    if (this.closed) {
      return undefined;
    }

    return new Promise<T | undefined>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        if (signal) {
          reject(cancelledFromSignal(signal));
        }
      };
      const waiter: Waiter<T> = {
        resolve: (item) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(item);
        },
        reject,
      };
      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Items currently buffered. */
  get size(): number {
    return this.items.length;
  }

  /** Whether close() has been called. */
  isClosed(): boolean {
    return this.closed;
  }
}
