/**
 * Worker Pool Types
 *
 * Interfaces shared by the worker pool, the fetch layer and the CLI.
 *
 * @module workers/types
 */

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for the worker pool.
 * Allows the pool to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden unless verbose) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Work and Results
// ============================================================================

/**
 * Fetches the importer count for one package under the run's group signal.
 * ImporterClient.fetchCount is the production implementation.
 */
export type CountFetcher = (packagePath: string, signal: AbortSignal) => Promise<number>;

/**
 * Admission control consulted before every fetch. RateGate implements it.
 */
export interface Gate {
  acquire(signal?: AbortSignal): Promise<void>;
}

/**
 * A package path with its known importer count.
 */
export interface PackageImporter {
  /** Package path, e.g. `net/http` */
  path: string;
  /** Known importers (0 when the page shows no counter) */
  count: number;
}

/**
 * Emitted after every recorded result.
 */
export interface ProgressEvent {
  /** Results recorded so far */
  completed: number;
  /** Unique packages in the run */
  total: number;
  /** Package that just completed */
  path: string;
  /** Its importer count */
  count: number;
}
