/**
 * Result Formatters
 *
 * Sorting and rendering of importer counts for the terminal.
 *
 * @module output/format
 */

import type { PackageImporter } from '../workers/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Sort order: by path, or by count descending (ties by path).
 */
export type SortOrder = 'name' | 'count';

/**
 * Output format for the result list.
 */
export type OutputFormat = 'table' | 'json';

export const SORT_ORDERS: readonly SortOrder[] = ['name', 'count'];

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json'];

/** Minimum width of the path column */
const MIN_PATH_WIDTH = 20;

// ============================================================================
// Sorting
// ============================================================================

function comparePaths(a: PackageImporter, b: PackageImporter): number {
  if (a.path < b.path) return -1;
  if (a.path > b.path) return 1;
  return 0;
}

/**
 * Sort importers without mutating the input.
 */
export function sortImporters(importers: readonly PackageImporter[], order: SortOrder): PackageImporter[] {
  const sorted = [...importers];
  if (order === 'count') {
    return sorted.sort((a, b) => b.count - a.count || comparePaths(a, b));
  }
  return sorted.sort(comparePaths);
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Format a count with comma thousands separators.
 *
 * @example
 * ```typescript
 * formatCount(1533321); // '1,533,321'
 * ```
 */
export function formatCount(count: number): string {
  return String(count).replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

/**
 * Render an aligned table, one `path count` line per importer.
 *
 * The path column is as wide as the longest path, never narrower than 20.
 */
export function formatImporterTable(importers: readonly PackageImporter[]): string[] {
  const width = importers.reduce((max, { path }) => Math.max(max, path.length), MIN_PATH_WIDTH);
  return importers.map(({ path, count }) => `${path.padEnd(width)} ${formatCount(count)}`);
}

/**
 * Render importers as a pretty-printed JSON array.
 */
export function formatImporterJson(importers: readonly PackageImporter[]): string {
  return JSON.stringify(
    importers.map(({ path, count }) => ({ path, count })),
    null,
    2
  );
}

export function isSortOrder(value: string): value is SortOrder {
  return SORT_ORDERS.some((order) => order === value);
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}
