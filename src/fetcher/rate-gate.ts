/**
 * Rate Gate
 *
 * Shared admission control for outbound requests: a token bucket with a
 * fixed refill interval and a small burst, followed by a random jitter
 * sleep so requests do not leave on a perfectly periodic beat.
 *
 * One gate is shared by every worker of a run. Throughput is bounded by the
 * bucket rate no matter how many workers are waiting on it; the worker
 * count only decides how many requests are in flight inside a burst.
 *
 * @module fetcher/rate-gate
 */

import { cancelledFromSignal } from './errors.js';
import { sleep } from './sleep.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for creating a RateGate.
 */
export interface RateGateOptions {
  /** Milliseconds between two tokens (default: 1000) */
  intervalMs?: number;
  /** Bucket capacity (default: 3) */
  burst?: number;
  /** Lower bound of the jitter sleep, inclusive (default: 50) */
  jitterMinMs?: number;
  /** Upper bound of the jitter sleep, exclusive (default: 200) */
  jitterMaxMs?: number;
  /** Uniform random source in [0, 1) (default: Math.random) */
  random?: () => number;
  /** Monotonic clock in milliseconds (default: performance.now) */
  now?: () => number;
}

/**
 * Snapshot of the gate state.
 */
export interface RateGateStats {
  /** Tokens currently in the bucket (negative while callers are queued) */
  tokens: number;
  /** Callers waiting for a token */
  waiting: number;
  /** Tokens handed out so far */
  granted: number;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_RATE_GATE_OPTIONS = {
  intervalMs: 1000,
  burst: 3,
  jitterMinMs: 50,
  jitterMaxMs: 200,
} as const;

// ============================================================================
// RateGate Class
// ============================================================================

/**
 * Token bucket plus jitter.
 *
 * Each acquire() reserves a token up front; when the bucket is empty the
 * reservation drives the bucket negative and the caller sleeps until its
 * token has been produced. Reservations are therefore served in call order.
 *
 * @example
 * ```typescript
 * const gate = new RateGate({ intervalMs: 1000, burst: 3 });
 *
 * await gate.acquire(signal);
 * const response = await fetch(url, { signal });
 * ```
 */
export class RateGate {
  private readonly intervalMs: number;
  private readonly burst: number;
  private readonly jitterMinMs: number;
  private readonly jitterMaxMs: number;
  private readonly random: () => number;
  private readonly now: () => number;

  private tokens: number;
  private lastRefill: number;
  private waiting = 0;
  private granted = 0;
  private nextTicket = 0;
  /** Tickets of reservations still sleeping, oldest first */
  private readonly queued: number[] = [];

  /**
   * @throws RangeError on a non-positive interval, a burst below 1, or an
   * inverted jitter window
   */
  constructor(options: RateGateOptions = {}) {
    const {
      intervalMs = DEFAULT_RATE_GATE_OPTIONS.intervalMs,
      burst = DEFAULT_RATE_GATE_OPTIONS.burst,
      jitterMinMs = DEFAULT_RATE_GATE_OPTIONS.jitterMinMs,
      jitterMaxMs = DEFAULT_RATE_GATE_OPTIONS.jitterMaxMs,
      random = Math.random,
      now = () => performance.now(),
    } = options;

    if (!(intervalMs > 0)) {
      throw new RangeError('Rate gate interval must be positive');
    }
    if (!Number.isInteger(burst) || burst < 1) {
      throw new RangeError('Rate gate burst must be an integer of at least 1');
    }
    if (jitterMinMs < 0 || jitterMaxMs < jitterMinMs) {
      throw new RangeError('Rate gate jitter window must satisfy 0 <= min <= max');
    }

    this.intervalMs = intervalMs;
    this.burst = burst;
    this.jitterMinMs = jitterMinMs;
    this.jitterMaxMs = jitterMaxMs;
    this.random = random;
    this.now = now;

    this.tokens = burst;
    this.lastRefill = now();
  }

  /**
   * Wait for admission: first a token, then the jitter sleep.
   *
   * @param signal - Cancels either stage; a token reserved but not yet
   * granted goes back to the bucket only when no later reservation is
   * queued behind it
   * @throws CancelledError if the signal fires before admission completes
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw cancelledFromSignal(signal);
    }

    const waitMs = this.reserve();
    if (waitMs > 0) {
      const ticket = this.nextTicket++;
      this.queued.push(ticket);
      this.waiting++;
      try {
        await sleep(waitMs, signal);
      } catch (error) {
        this.unreserve(ticket);
        throw error;
      } finally {
        this.dequeue(ticket);
        this.waiting--;
      }
    }
    this.granted++;

    const jitterMs = this.nextJitter();
    if (jitterMs > 0) {
      await sleep(jitterMs, signal);
    }
  }

  /**
   * Current gate state, for diagnostics.
   */
  getStats(): RateGateStats {
    this.refill();
    return { tokens: this.tokens, waiting: this.waiting, granted: this.granted };
  }

  // ==========================================================================
  // Token accounting (synchronous, never spans an await)
  // ==========================================================================

  private refill(): void {
    const now = this.now();
    const elapsed = Math.max(0, now - this.lastRefill);
    this.tokens = Math.min(this.burst, this.tokens + elapsed / this.intervalMs);
    this.lastRefill = now;
  }

  /** Takes one token and returns how long the caller must wait for it. */
  private reserve(): number {
    this.refill();
    this.tokens -= 1;
    return this.tokens >= 0 ? 0 : Math.ceil(-this.tokens * this.intervalMs);
  }

  /** Refunds only the newest queued reservation; older slots are already claimed by later waiters. */
  private unreserve(ticket: number): void {
    if (this.queued[this.queued.length - 1] !== ticket) {
      return;
    }
    this.refill();
    this.tokens = Math.min(this.burst, this.tokens + 1);
  }

  private dequeue(ticket: number): void {
    const index = this.queued.indexOf(ticket);
    if (index !== -1) {
      this.queued.splice(index, 1);
    }
  }

  private nextJitter(): number {
    const span = this.jitterMaxMs - this.jitterMinMs;
    return this.jitterMinMs + Math.floor(this.random() * span);
  }
}
