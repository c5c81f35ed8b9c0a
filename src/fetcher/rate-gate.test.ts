/**
 * Rate Gate Tests
 *
 * Timing tests run on real timers with short intervals.
 */

import { describe, it, expect, jest } from '@jest/globals';
import { RateGate } from './rate-gate.js';
import { CancelledError } from './errors.js';

/** Slack for timer scheduling in elapsed-time assertions */
const TOLERANCE_MS = 15;

describe('RateGate', () => {
  describe('constructor', () => {
    it('should reject a non-positive interval', () => {
      expect(() => new RateGate({ intervalMs: 0 })).toThrow(RangeError);
    });

    it('should reject a burst below 1', () => {
      expect(() => new RateGate({ burst: 0 })).toThrow('burst must be an integer of at least 1');
    });

    it('should reject an inverted jitter window', () => {
      expect(() => new RateGate({ jitterMinMs: 100, jitterMaxMs: 50 })).toThrow(RangeError);
    });

    it('should read the monotonic clock by default', async () => {
      const clock = jest.spyOn(performance, 'now').mockReturnValue(0);
      try {
        const gate = new RateGate({ intervalMs: 10_000, burst: 1, jitterMinMs: 0, jitterMaxMs: 0 });
        await gate.acquire();
        expect(gate.getStats().tokens).toBe(0);

        clock.mockReturnValue(5_000);
        expect(gate.getStats().tokens).toBe(0.5);
      } finally {
        clock.mockRestore();
      }
    });

    it('should start with a full bucket', () => {
      const gate = new RateGate({ burst: 3 });
      expect(gate.getStats()).toEqual({ tokens: 3, waiting: 0, granted: 0 });
    });
  });

  describe('token bucket', () => {
    it('should admit a burst without waiting', async () => {
      const gate = new RateGate({ intervalMs: 10_000, burst: 3, jitterMinMs: 0, jitterMaxMs: 0 });
      const start = Date.now();

      await Promise.all([gate.acquire(), gate.acquire(), gate.acquire()]);

      expect(Date.now() - start).toBeLessThan(1000);
      expect(gate.getStats().granted).toBe(3);
    });

    it('should pace acquisitions beyond the burst at the refill rate', async () => {
      const intervalMs = 50;
      const burst = 2;
      const count = 5;
      const gate = new RateGate({ intervalMs, burst, jitterMinMs: 0, jitterMaxMs: 0 });
      const start = Date.now();

      for (let i = 0; i < count; i++) {
        await gate.acquire();
      }

      expect(Date.now() - start).toBeGreaterThanOrEqual((count - burst) * intervalMs - TOLERANCE_MS);
    });

    it('should pace concurrent callers the same way', async () => {
      const intervalMs = 40;
      const gate = new RateGate({ intervalMs, burst: 1, jitterMinMs: 0, jitterMaxMs: 0 });
      const start = Date.now();

      await Promise.all(Array.from({ length: 4 }, () => gate.acquire()));

      expect(Date.now() - start).toBeGreaterThanOrEqual(3 * intervalMs - TOLERANCE_MS);
    });

    it('should report queued callers while they wait', async () => {
      const gate = new RateGate({ intervalMs: 60, burst: 1, jitterMinMs: 0, jitterMaxMs: 0 });
      await gate.acquire();

      const pending = gate.acquire();
      expect(gate.getStats().waiting).toBe(1);

      await pending;
      expect(gate.getStats().waiting).toBe(0);
      expect(gate.getStats().granted).toBe(2);
    });
  });

  describe('jitter', () => {
    it('should sleep at least the lower bound after the token', async () => {
      const gate = new RateGate({ burst: 1, jitterMinMs: 40, jitterMaxMs: 140, random: () => 0 });
      const start = Date.now();

      await gate.acquire();

      expect(Date.now() - start).toBeGreaterThanOrEqual(40 - TOLERANCE_MS);
    });

    it('should stay below the upper bound', async () => {
      const gate = new RateGate({ burst: 1, jitterMinMs: 0, jitterMaxMs: 60, random: () => 0.5 });
      const start = Date.now();

      await gate.acquire();

      const elapsed = Date.now() - start;
      expect(elapsed).toBeGreaterThanOrEqual(30 - TOLERANCE_MS);
      expect(elapsed).toBeLessThan(1000);
    });
  });

  describe('cancellation', () => {
    it('should reject immediately on an aborted signal without taking a token', async () => {
      const gate = new RateGate({ burst: 1, jitterMinMs: 0, jitterMaxMs: 0 });
      const controller = new AbortController();
      controller.abort();

      await expect(gate.acquire(controller.signal)).rejects.toBeInstanceOf(CancelledError);
      expect(gate.getStats().tokens).toBe(1);
      expect(gate.getStats().granted).toBe(0);
    });

    it('should reject a caller waiting for a token promptly', async () => {
      const gate = new RateGate({ intervalMs: 10_000, burst: 1, jitterMinMs: 0, jitterMaxMs: 0 });
      await gate.acquire();

      const controller = new AbortController();
      const start = Date.now();
      setTimeout(() => controller.abort(new Error('shutdown')), 20);

      await expect(gate.acquire(controller.signal)).rejects.toThrow('cancelled: shutdown');
      expect(Date.now() - start).toBeLessThan(1000);
      expect(gate.getStats().waiting).toBe(0);
      expect(gate.getStats().granted).toBe(1);
    });

    it('should return the reserved token on cancellation', async () => {
      let now = 0;
      const gate = new RateGate({
        intervalMs: 10_000,
        burst: 1,
        jitterMinMs: 0,
        jitterMaxMs: 0,
        now: () => now,
      });
      await gate.acquire();
      expect(gate.getStats().tokens).toBe(0);

      const controller = new AbortController();
      const pending = gate.acquire(controller.signal);
      expect(gate.getStats().tokens).toBe(-1);

      controller.abort();
      await expect(pending).rejects.toBeInstanceOf(CancelledError);
      expect(gate.getStats().tokens).toBe(0);
      now += 10_000;
      expect(gate.getStats().tokens).toBe(1);
    });

    it('should not refund a cancelled token that later waiters are queued behind', async () => {
      const gate = new RateGate({
        intervalMs: 10_000,
        burst: 1,
        jitterMinMs: 0,
        jitterMaxMs: 0,
        now: () => 0,
      });
      await gate.acquire();

      const first = new AbortController();
      const second = new AbortController();
      const pendingFirst = gate.acquire(first.signal);
      const pendingSecond = gate.acquire(second.signal);
      expect(gate.getStats().tokens).toBe(-2);

      first.abort();
      await expect(pendingFirst).rejects.toBeInstanceOf(CancelledError);
      expect(gate.getStats().tokens).toBe(-2);

      second.abort();
      await expect(pendingSecond).rejects.toBeInstanceOf(CancelledError);
      expect(gate.getStats().tokens).toBe(-1);
      expect(gate.getStats().waiting).toBe(0);
    });

    it('should keep a new caller behind waiters queued before it', async () => {
      const intervalMs = 100;
      const gate = new RateGate({ intervalMs, burst: 1, jitterMinMs: 0, jitterMaxMs: 0 });
      await gate.acquire();

      const grants: Record<string, number> = {};
      const track = async (name: string, signal?: AbortSignal): Promise<void> => {
        await gate.acquire(signal);
        grants[name] = Date.now();
      };

      const aborted = new AbortController();
      const first = track('first', aborted.signal);
      const second = track('second');
      aborted.abort();
      await expect(first).rejects.toBeInstanceOf(CancelledError);

      const third = track('third');
      await Promise.all([second, third]);

      expect((grants['third'] ?? 0) - (grants['second'] ?? 0)).toBeGreaterThanOrEqual(
        intervalMs - TOLERANCE_MS
      );
    });

    it('should cancel the jitter sleep', async () => {
      const gate = new RateGate({ burst: 1, jitterMinMs: 10_000, jitterMaxMs: 10_000 });
      const controller = new AbortController();
      const start = Date.now();
      setTimeout(() => controller.abort(), 20);

      await expect(gate.acquire(controller.signal)).rejects.toBeInstanceOf(CancelledError);
      expect(Date.now() - start).toBeLessThan(1000);
      expect(gate.getStats().granted).toBe(1);
    });
  });
});
