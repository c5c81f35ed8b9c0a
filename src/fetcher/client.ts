/**
 * Importer Page Client
 *
 * The fetch unit: one bounded-time GET of a package's importedby page,
 * reading at most a fixed prefix of the body and handing it to the count
 * extractor. No retries; every failure is wrapped with the package path.
 *
 * @module fetcher/client
 */

import { extractImporterCount, MAX_BODY_BYTES } from '../extractor/index.js';
import { cancelledFromSignal, FetchUnitError, type FetchErrorKind } from './errors.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Fetch-shaped HTTP function. The global fetch satisfies it; tests pass a
 * stub returning in-process Response objects.
 */
export type HttpClient = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Options for a single importer count fetch.
 */
export interface FetchCountOptions {
  /** Parent cancellation signal (the run's group signal) */
  signal?: AbortSignal;
  /** HTTP function (default: global fetch) */
  http?: HttpClient;
  /** Site root (default: https://pkg.go.dev) */
  baseUrl?: string;
  /** Per-request deadline in milliseconds (default: 15000) */
  timeoutMs?: number;
  /** Body bytes to read before giving up on the rest (default: 100 KiB) */
  maxBodyBytes?: number;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_BASE_URL = 'https://pkg.go.dev';

export const DEFAULT_TIMEOUT_MS = 15_000;

// ============================================================================
// URL Construction
// ============================================================================

/**
 * Address of the importedby tab for a package.
 *
 * @example
 * ```typescript
 * buildImporterUrl('io'); // 'https://pkg.go.dev/io?tab=importedby'
 * ```
 */
export function buildImporterUrl(packagePath: string, baseUrl: string = DEFAULT_BASE_URL): string {
  return `${baseUrl.replace(/\/+$/, '')}/${packagePath}?tab=importedby`;
}

// ============================================================================
// Fetch Unit
// ============================================================================

/**
 * Fetch the known importer count for one package.
 *
 * The request is aborted when either the parent signal fires or the
 * per-request timeout elapses. The status code is not checked: whatever
 * body comes back goes to the extractor, which yields 0 when the counter
 * is absent.
 *
 * @param packagePath - Package path, e.g. `golang.org/x/tools/go/analysis`
 * @param options - Signal, HTTP function and limits
 * @returns Importer count
 * @throws FetchUnitError wrapping the cause, classified by kind
 */
export async function fetchImporterCount(
  packagePath: string,
  options: FetchCountOptions = {}
): Promise<number> {
  const {
    signal,
    http = fetch,
    baseUrl = DEFAULT_BASE_URL,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    maxBodyBytes = MAX_BODY_BYTES,
  } = options;

  if (signal?.aborted) {
    throw new FetchUnitError(packagePath, 'cancelled', cancelledFromSignal(signal));
  }

  const url = buildImporterUrl(packagePath, baseUrl);
  const controller = new AbortController();
  let timedOut = false;

  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort(new Error(`request timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  const onParentAbort = (): void => controller.abort(signal?.reason);
  signal?.addEventListener('abort', onParentAbort, { once: true });

  // Cancellation and timeout win over whatever error the transport raised
  const wrap = (error: unknown, kind: FetchErrorKind): FetchUnitError => {
    if (signal?.aborted) {
      return new FetchUnitError(packagePath, 'cancelled', cancelledFromSignal(signal));
    }
    if (timedOut) {
      return new FetchUnitError(
        packagePath,
        'timeout',
        new Error(`request timed out after ${timeoutMs}ms`)
      );
    }
    return new FetchUnitError(packagePath, kind, error);
  };

  try {
    let response: Response;
    try {
      response = await http(url, {
        method: 'GET',
        headers: { Accept: 'text/html' },
        signal: controller.signal,
      });
    } catch (error) {
      throw wrap(error, 'network');
    }

    let body: Uint8Array;
    try {
      body = await readBodyPrefix(response, maxBodyBytes);
    } catch (error) {
      throw wrap(error, 'decode');
    }

    try {
      return extractImporterCount(body);
    } catch (error) {
      throw new FetchUnitError(packagePath, 'parse', error);
    }
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', onParentAbort);
  }
}

/**
 * Read at most `maxBytes` from the front of a response body and cancel the
 * rest of the stream.
 */
export async function readBodyPrefix(response: Response, maxBytes: number): Promise<Uint8Array> {
  const stream = response.body;
  if (!stream) {
    return new Uint8Array(0);
  }

  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;

  while (total < maxBytes) {
    const { done, value } = await reader.read();
    if (done) {
      return Buffer.concat(chunks, total);
    }
    if (!(value instanceof Uint8Array)) {
      throw new TypeError('response body yielded a non-byte chunk');
    }
    const remaining = maxBytes - total;
    const chunk = value.byteLength > remaining ? value.subarray(0, remaining) : value;
    chunks.push(chunk);
    total += chunk.byteLength;
  }

  await reader.cancel();
  return Buffer.concat(chunks, total);
}

// ============================================================================
// Client Class
// ============================================================================

/**
 * Options for ImporterClient. Same knobs as a single fetch, minus the signal,
 * which is supplied per call.
 */
export type ImporterClientOptions = Omit<FetchCountOptions, 'signal'>;

/**
 * ImporterClient binds the HTTP function and limits once and is shared by
 * every worker of a run.
 *
 * @example
 * ```typescript
 * const client = new ImporterClient({ timeoutMs: 15000 });
 * const count = await client.fetchCount('io', signal);
 * console.log(`Calls made: ${client.getCallCount()}`);
 * ```
 */
export class ImporterClient {
  private readonly options: ImporterClientOptions;
  private callCount = 0;

  constructor(options: ImporterClientOptions = {}) {
    this.options = options;
  }

  /**
   * Fetch one package's importer count under the given signal.
   */
  async fetchCount(packagePath: string, signal?: AbortSignal): Promise<number> {
    this.callCount++;
    return fetchImporterCount(packagePath, { ...this.options, signal });
  }

  /**
   * Number of fetches issued through this client.
   */
  getCallCount(): number {
    return this.callCount;
  }
}
