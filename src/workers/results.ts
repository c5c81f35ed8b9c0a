/**
 * Result Collector
 *
 * The run-owned keyed collection of importer counts.
 *
 * @module workers/results
 */

import type { PackageImporter } from './types.js';

/**
 * ResultCollector records one count per package, exactly once.
 *
 * Writes are synchronous, so a record() can never interleave with another
 * worker's record() on the event loop; no write spans an await.
 */
export class ResultCollector {
  private readonly results = new Map<string, number>();

  /**
   * Record a result entry.
   *
   * @throws Error if the package already has a result
   */
  record(packagePath: string, count: number): void {
    if (this.results.has(packagePath)) {
      throw new Error(`duplicate result for ${packagePath}`);
    }
    this.results.set(packagePath, count);
  }

  /** Number of recorded entries. */
  get size(): number {
    return this.results.size;
  }

  /**
   * Copy of the collected entries.
   */
  snapshot(): Map<string, number> {
    return new Map(this.results);
  }
}

/**
 * Convert a result collection into importer records, in input order.
 * Paths without a result are skipped; repeated paths appear once.
 */
export function toPackageImporters(
  paths: readonly string[],
  results: ReadonlyMap<string, number>
): PackageImporter[] {
  const importers: PackageImporter[] = [];
  for (const path of new Set(paths)) {
    const count = results.get(path);
    if (count !== undefined) {
      importers.push({ path, count });
    }
  }
  return importers;
}
