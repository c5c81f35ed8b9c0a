/**
 * Fetch Errors
 *
 * Error types raised by the rate gate, the count extractor and the fetch
 * unit. Every failure of a single fetch is surfaced as a FetchUnitError
 * carrying the package path, so the batch reports which item broke it.
 *
 * @module fetcher/errors
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Classification of a fetch unit failure.
 *
 * - cancelled: the caller's (group) signal fired
 * - timeout: the per-request deadline elapsed
 * - network: transport-level failure reaching the host
 * - decode: the response body could not be read
 * - parse: a matched count could not be parsed as an integer
 */
export type FetchErrorKind = 'cancelled' | 'timeout' | 'network' | 'decode' | 'parse';

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Raised when a wait (rate gate, jitter sleep, queue take) is cancelled.
 */
export class CancelledError extends Error {
  constructor(
    message: string = 'operation cancelled',
    public readonly reason?: unknown
  ) {
    super(message);
    this.name = 'CancelledError';
  }
}

/**
 * Raised by the count extractor when the digit run after the marker does
 * not form a safe non-negative integer.
 */
export class CountParseError extends Error {
  constructor(public readonly raw: string) {
    super(`parse count: invalid integer "${raw}"`);
    this.name = 'CountParseError';
  }
}

/**
 * A failed fetch for one package path.
 */
export class FetchUnitError extends Error {
  constructor(
    public readonly packagePath: string,
    public readonly kind: FetchErrorKind,
    cause: unknown
  ) {
    super(`fetch ${packagePath}: ${describeCause(cause)}`, { cause });
    this.name = 'FetchUnitError';
  }
}

// ============================================================================
// Helpers
// ============================================================================

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}

/**
 * Builds the CancelledError for an aborted signal, keeping an Error reason
 * as the message source.
 */
export function cancelledFromSignal(signal: AbortSignal): CancelledError {
  const reason: unknown = signal.reason;
  if (reason instanceof CancelledError) {
    return reason;
  }
  const message = reason instanceof Error ? `cancelled: ${reason.message}` : 'operation cancelled';
  return new CancelledError(message, reason);
}

/**
 * Type guard for FetchUnitError.
 */
export function isFetchUnitError(error: unknown): error is FetchUnitError {
  return error instanceof FetchUnitError;
}

/**
 * Type guard for CancelledError.
 */
export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}
