/**
 * Package Resolver
 *
 * Turns CLI input into the list of package paths to fetch: positional
 * arguments, a comma-separated --pkgs value, or the `std` keyword, which
 * expands to every public standard library package.
 *
 * @module packages/resolve
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { cancelledFromSignal } from '../fetcher/errors.js';

const execFileAsync = promisify(execFile);

// ============================================================================
// Types
// ============================================================================

/**
 * Raw package input as parsed from the command line.
 */
export interface PackageInput {
  /** Value of --pkgs (comma-separated list or `std`) */
  pkgs?: string;
  /** Positional package arguments */
  args?: string[];
}

/**
 * Options for listing standard library packages.
 */
export interface ListStdOptions {
  /** Aborts the listing (the `go` child process is killed) */
  signal?: AbortSignal;
  /** Go executable (default: `go` on PATH) */
  goBinary?: string;
}

/**
 * Lists the concrete paths behind the `std` keyword.
 */
export type PackageLister = (options?: ListStdOptions) => Promise<string[]>;

/**
 * Collaborators for resolvePackages.
 */
export interface ResolveDependencies {
  /** Standard library lister (default: listGoStdPackages) */
  listStd?: PackageLister;
  /** Handed to the lister */
  signal?: AbortSignal;
}

// ============================================================================
// Constants
// ============================================================================

/** Keyword expanding to all standard library packages */
export const STD_KEYWORD = 'std';

// ============================================================================
// Resolution
// ============================================================================

/**
 * Resolve package paths from exactly one of `pkgs` or `args`.
 *
 * Positional arguments win when both are given; the CLI rejects that
 * combination before calling this. Entries are trimmed, empty entries are
 * dropped, and duplicates collapse to their first occurrence.
 *
 * @param input - --pkgs value and positional arguments
 * @param deps - Package lister for `std`
 * @returns Unique package paths in input order
 *
 * @example
 * ```typescript
 * await resolvePackages({ pkgs: 'fmt, io,fmt' }); // ['fmt', 'io']
 * await resolvePackages({ args: ['std'] });       // every public std package
 * ```
 */
export async function resolvePackages(
  input: PackageInput,
  deps: ResolveDependencies = {}
): Promise<string[]> {
  const { listStd = listGoStdPackages, signal } = deps;
  const args = input.args ?? [];

  if (args.length > 0) {
    if (args.length === 1 && args[0]?.trim() === STD_KEYWORD) {
      return unique(await listStd({ signal }));
    }
    return unique(args.map((arg) => arg.trim()));
  }

  const trimmed = (input.pkgs ?? '').trim();
  if (trimmed === STD_KEYWORD) {
    return unique(await listStd({ signal }));
  }
  return unique(trimmed.split(',').map((pkg) => pkg.trim()));
}

function unique(paths: string[]): string[] {
  return [...new Set(paths.filter((path) => path.length > 0))];
}

// ============================================================================
// Standard Library Discovery
// ============================================================================

/**
 * Whether any path segment is `internal` or `vendor`.
 */
export function isInternalOrVendorPackage(path: string): boolean {
  return path.split('/').some((segment) => segment === 'internal' || segment === 'vendor');
}

/**
 * List public standard library packages via `go list std`.
 *
 * @throws CancelledError if the signal fires before the listing completes
 * @throws Error if the Go toolchain is missing or the listing fails
 */
export async function listGoStdPackages(options: ListStdOptions = {}): Promise<string[]> {
  const { signal, goBinary = 'go' } = options;
  if (signal?.aborted) {
    throw cancelledFromSignal(signal);
  }

  let stdout: string;
  try {
    ({ stdout } = await execFileAsync(goBinary, ['list', STD_KEYWORD], {
      maxBuffer: 16 * 1024 * 1024,
      signal,
    }));
  } catch (error) {
    if (signal?.aborted) {
      throw cancelledFromSignal(signal);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`load std packages: ${message}`, { cause: error });
  }
  return parseStdListing(stdout);
}

/**
 * Parse `go list` output: one path per line, internal and vendor packages removed.
 */
export function parseStdListing(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !isInternalOrVendorPackage(line));
}
