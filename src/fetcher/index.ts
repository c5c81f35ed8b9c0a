/**
 * Fetcher exports: rate gate, fetch unit and their errors.
 *
 * @module fetcher
 */

export {
  CancelledError,
  CountParseError,
  FetchUnitError,
  cancelledFromSignal,
  isCancelledError,
  isFetchUnitError,
  type FetchErrorKind,
} from './errors.js';
export {
  RateGate,
  DEFAULT_RATE_GATE_OPTIONS,
  type RateGateOptions,
  type RateGateStats,
} from './rate-gate.js';
export {
  ImporterClient,
  buildImporterUrl,
  fetchImporterCount,
  readBodyPrefix,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  type FetchCountOptions,
  type HttpClient,
  type ImporterClientOptions,
} from './client.js';
export { sleep } from './sleep.js';
