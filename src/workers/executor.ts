/**
 * Worker Pool Executor
 *
 * Runs the importer fetches for a batch of packages across a fixed number
 * of workers. All workers drain one closed queue, pass every request
 * through one shared rate gate, and share one group signal: the first
 * error aborts that signal, which unblocks every sibling wherever it is
 * waiting (queue, token, jitter, network), and the batch rejects with that
 * error. Results are all-or-nothing.
 *
 * @module workers/executor
 */

import { ImporterClient } from '../fetcher/client.js';
import { cancelledFromSignal } from '../fetcher/errors.js';
import { RateGate } from '../fetcher/rate-gate.js';
import { WorkQueue } from './queue.js';
import { ResultCollector } from './results.js';
import type { CountFetcher, Gate, Logger, ProgressEvent } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Default number of concurrent workers */
export const DEFAULT_WORKERS = 5;

// ============================================================================
// Types
// ============================================================================

/**
 * Options for fetchImporterCounts.
 */
export interface FetchImporterCountsOptions {
  /** Number of concurrent workers, at least 1 (default: 5) */
  workers?: number;

  /** Caller cancellation; aborting it fails the batch like a worker error */
  signal?: AbortSignal;

  /** Shared admission control (default: a RateGate with default settings) */
  gate?: Gate;

  /** Fetch unit (default: ImporterClient with default settings) */
  fetchCount?: CountFetcher;

  /** Optional logger for pool diagnostics */
  logger?: Logger;

  /** Called after each recorded result */
  onProgress?: (event: ProgressEvent) => void;
}

// ============================================================================
// Batch Execution
// ============================================================================

/**
 * Fetch importer counts for every package, fail-fast.
 *
 * Duplicate paths are fetched once. Exactly `workers` workers are started,
 * even when there are fewer packages; idle ones exit as soon as the queue
 * is drained.
 *
 * @param paths - Package paths to fetch
 * @param options - Concurrency, cancellation and collaborators
 * @returns One entry per unique input path
 * @throws The first error raised by any worker (or a CancelledError when
 * the caller's signal fired first); partial results are discarded
 * @throws RangeError if `workers` is not an integer of at least 1
 *
 * @example
 * ```typescript
 * const counts = await fetchImporterCounts(['io', 'net/http'], { workers: 5 });
 * counts.get('io'); // 1533321
 * ```
 */
export async function fetchImporterCounts(
  paths: readonly string[],
  options: FetchImporterCountsOptions = {}
): Promise<Map<string, number>> {
  const { workers = DEFAULT_WORKERS, signal, logger, onProgress } = options;

  if (!Number.isInteger(workers) || workers < 1) {
    throw new RangeError('Worker count must be an integer of at least 1');
  }

  const gate = options.gate ?? new RateGate();
  const fetchCount = options.fetchCount ?? defaultCountFetcher();

  const unique = [...new Set(paths)];
  const queue = new WorkQueue<string>(unique.length);
  for (const path of unique) {
    queue.push(path);
  }
  queue.close();

  const collector = new ResultCollector();
  const group = new AbortController();
  let failure: { error: unknown } | undefined;

  const fail = (error: unknown): void => {
    if (failure) {
      return;
    }
    failure = { error };
    group.abort(error);
  };

  const onParentAbort = (): void => {
    if (signal) {
      fail(cancelledFromSignal(signal));
    }
  };
  if (signal?.aborted) {
    onParentAbort();
  } else {
    signal?.addEventListener('abort', onParentAbort, { once: true });
  }

  logger?.debug(`[workers] Fetching ${unique.length} packages with ${workers} workers`);

  const runWorker = async (workerId: number): Promise<void> => {
    try {
      for (;;) {
        const path = await queue.take(group.signal);
        if (path === undefined) {
          return;
        }

        await gate.acquire(group.signal);
        const count = await fetchCount(path, group.signal);

        collector.record(path, count);
        logger?.debug(`[worker ${workerId}] ${path}: ${count}`);
        onProgress?.({ completed: collector.size, total: unique.length, path, count });
      }
    } catch (error) {
      if (!failure) {
        logger?.debug(`[worker ${workerId}] failed: ${describe(error)}`);
      }
      fail(error);
    }
  };

  try {
    await Promise.all(Array.from({ length: workers }, (_, i) => runWorker(i + 1)));
  } finally {
    signal?.removeEventListener('abort', onParentAbort);
  }

  if (failure) {
    throw failure.error;
  }
  return collector.snapshot();
}

// ============================================================================
// Helpers
// ============================================================================

function defaultCountFetcher(): CountFetcher {
  const client = new ImporterClient();
  return (path, signal) => client.fetchCount(path, signal);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
