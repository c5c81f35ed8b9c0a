import { setTimeout as delay } from 'node:timers/promises';
import { cancelledFromSignal } from './errors.js';

/**
 * Cancellable sleep. Rejects with CancelledError when the signal fires
 * before the delay elapses.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    throw cancelledFromSignal(signal);
  }
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw cancelledFromSignal(signal);
    }
    throw error;
  }
}
