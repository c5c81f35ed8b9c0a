/**
 * Worker Pool
 *
 * Fail-fast concurrent fetching of importer counts.
 *
 * @module workers
 */

export {
  fetchImporterCounts,
  DEFAULT_WORKERS,
  type FetchImporterCountsOptions,
} from './executor.js';
export { WorkQueue } from './queue.js';
export { ResultCollector, toPackageImporters } from './results.js';
export type { CountFetcher, Gate, Logger, PackageImporter, ProgressEvent } from './types.js';
