/**
 * Importer Count Extractor
 *
 * Pulls the "Known importers" figure out of the head of a pkg.go.dev
 * importedby page. Pure and stateless; workers call it concurrently.
 *
 * @module extractor/count
 */

import { CountParseError } from '../fetcher/errors.js';

/** Only the front of the page is read; the counter appears early in the HTML. */
export const MAX_BODY_BYTES = 100 * 1024;

/**
 * Marker followed by the digit run, e.g. `Known importers:</strong> 1,533,321`.
 */
const IMPORTER_PATTERN = /Known importers:\s*<\/strong>\s*([\d,]+)/;

const decoder = new TextDecoder('utf-8');

/**
 * Extract the importer count from a (truncated) page body.
 *
 * Returns 0 when the marker is missing. A page with no known importers and
 * a page whose layout changed are indistinguishable here; both read as 0.
 *
 * @param body - Page body, raw bytes or already-decoded text
 * @returns Non-negative importer count
 * @throws CountParseError if the matched digits are not a safe integer
 *
 * @example
 * ```typescript
 * extractImporterCount('<strong>Known importers:</strong> 6,136'); // 6136
 * ```
 */
export function extractImporterCount(body: Uint8Array | string): number {
  const text = typeof body === 'string' ? body : decoder.decode(body);
  const match = IMPORTER_PATTERN.exec(text);
  const raw = match?.[1];
  if (raw === undefined) {
    return 0;
  }

  const digits = raw.replace(/,/g, '');
  const count = Number(digits);
  if (digits.length === 0 || !Number.isSafeInteger(count)) {
    throw new CountParseError(raw);
  }
  return count;
}
