/**
 * pkg-importers
 *
 * Fetches the "Known importers" count of Go packages from pkg.go.dev with a
 * bounded worker pool behind a shared token-bucket rate gate.
 *
 * @example
 * ```typescript
 * import { fetchImporterCounts, ImporterClient, RateGate } from 'pkg-importers';
 *
 * const client = new ImporterClient();
 * const counts = await fetchImporterCounts(['io', 'net/http'], {
 *   workers: 5,
 *   gate: new RateGate({ intervalMs: 1000, burst: 3 }),
 *   fetchCount: (path, signal) => client.fetchCount(path, signal),
 * });
 * ```
 *
 * @module pkg-importers
 */

export * from './extractor/index.js';
export * from './fetcher/index.js';
export * from './workers/index.js';
export * from './packages/index.js';
export * from './output/index.js';
export { loadConfig, getConfig, resetConfig, ConfigError, type Config } from './config/index.js';
