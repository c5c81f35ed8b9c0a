/**
 * Count Extractor Tests
 */

import { describe, it, expect } from '@jest/globals';
import { extractImporterCount, MAX_BODY_BYTES } from './count.js';
import { CountParseError } from '../fetcher/errors.js';

/**
 * Minimal importedby page around a counter.
 */
function importedByPage(counter: string): string {
  return [
    '<!DOCTYPE html><html><body>',
    '<div class="ImportedBy">',
    `  <strong>Known importers:</strong>\n    ${counter}`,
    '</div></body></html>',
  ].join('\n');
}

describe('extractImporterCount', () => {
  it('should parse a large count with separators', () => {
    expect(extractImporterCount(importedByPage('1,533,321'))).toBe(1533321);
  });

  it('should parse a small count', () => {
    expect(extractImporterCount(importedByPage('6,136'))).toBe(6136);
  });

  it('should parse a count without separators', () => {
    expect(extractImporterCount('<strong>Known importers:</strong>42')).toBe(42);
  });

  it('should accept raw bytes', () => {
    const bytes = new TextEncoder().encode(importedByPage('6,136'));
    expect(extractImporterCount(bytes)).toBe(6136);
  });

  it('should return 0 when the marker is absent', () => {
    expect(extractImporterCount('<html><body>Not found</body></html>')).toBe(0);
  });

  it('should return 0 for an empty body', () => {
    expect(extractImporterCount(new Uint8Array(0))).toBe(0);
  });

  it('should use the first marker on the page', () => {
    const body = `${importedByPage('10')}${importedByPage('20')}`;
    expect(extractImporterCount(body)).toBe(10);
  });

  it('should reject a separator-only digit run', () => {
    expect(() => extractImporterCount(importedByPage(',,,'))).toThrow(CountParseError);
  });

  it('should reject a count beyond the safe integer range', () => {
    expect(() => extractImporterCount(importedByPage('99,999,999,999,999,999,999'))).toThrow(
      'parse count: invalid integer "99,999,999,999,999,999,999"'
    );
  });

  it('should cap bodies at 100 KiB', () => {
    expect(MAX_BODY_BYTES).toBe(102400);
  });
});
