/**
 * Fetch Command
 *
 * The program's single action: resolve the requested packages, fetch their
 * importer counts through the rate-gated worker pool, and print them sorted
 * as a table or JSON. Progress goes to stderr, results to stdout.
 *
 * @module cli/commands/fetch
 */

import { InvalidArgumentError, Option, type Command } from 'commander';
import { getConfig, type Config } from '../../config/index.js';
import {
  CancelledError,
  ImporterClient,
  RateGate,
  isCancelledError,
  isFetchUnitError,
  type HttpClient,
} from '../../fetcher/index.js';
import {
  OUTPUT_FORMATS,
  SORT_ORDERS,
  formatImporterJson,
  formatImporterTable,
  isOutputFormat,
  isSortOrder,
  sortImporters,
  type OutputFormat,
  type SortOrder,
} from '../../output/index.js';
import { resolvePackages, type PackageInput, type PackageLister } from '../../packages/index.js';
import { fetchImporterCounts, toPackageImporters, type PackageImporter } from '../../workers/index.js';
import { BaseCommand, EXIT_CODES, UsageError, getBaseCommand, type ExitCode } from '../base-command.js';
import { createSpinner, type ProgressSpinner } from '../formatters/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options parsed by commander for the fetch action.
 */
export interface FetchCommandOptions {
  /** Comma-separated package list, or `std` */
  pkgs?: string;
  /** Concurrent workers (default: config.workers) */
  workers?: number;
  /** Result ordering (default: name) */
  sort?: string;
  /** Output format (default: table) */
  format?: string;
}

/**
 * Collaborators the fetch action would otherwise build itself.
 */
export interface FetchCommandDependencies {
  /** HTTP function handed to the ImporterClient (default: global fetch) */
  http?: HttpClient;
  /** Lister behind the `std` keyword (default: `go list std`) */
  listStd?: PackageLister;
  /** Configuration (default: getConfig()) */
  config?: Config;
  /** Cancels the run; the registered action supplies one tied to SIGINT */
  signal?: AbortSignal;
}

/**
 * A validated fetch request.
 */
export interface FetchRequest {
  input: PackageInput;
  sort: SortOrder;
  format: OutputFormat;
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Parse a --workers value.
 *
 * @throws InvalidArgumentError unless the value is an integer of at least 1
 */
export function parseWorkerCount(value: string): number {
  const workers = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(workers) || workers < 1) {
    throw new InvalidArgumentError('Must be an integer of at least 1.');
  }
  return workers;
}

/**
 * Check the combination of inputs commander cannot check on its own.
 *
 * @throws UsageError on conflicting, missing or invalid input
 */
export function validateFetchRequest(packages: string[], options: FetchCommandOptions): FetchRequest {
  const hasPkgs = options.pkgs !== undefined;
  const hasArgs = packages.length > 0;

  if (hasPkgs && hasArgs) {
    throw new UsageError('--pkgs and positional arguments cannot be used together');
  }
  if (!hasPkgs && !hasArgs) {
    throw new UsageError('no packages specified; use --help for help');
  }

  const sort = options.sort ?? 'name';
  if (!isSortOrder(sort)) {
    throw new UsageError(`invalid sort order "${sort}" (expected ${SORT_ORDERS.join(' or ')})`);
  }

  const format = options.format ?? 'table';
  if (!isOutputFormat(format)) {
    throw new UsageError(`invalid output format "${format}" (expected ${OUTPUT_FORMATS.join(' or ')})`);
  }

  if (options.workers !== undefined && (!Number.isInteger(options.workers) || options.workers < 1)) {
    throw new UsageError('--workers must be an integer of at least 1');
  }

  return {
    input: hasArgs ? { args: packages } : { pkgs: options.pkgs },
    sort,
    format,
  };
}

// ============================================================================
// Execution
// ============================================================================

/**
 * Run a fetch and print its results.
 *
 * @param packages - Positional package arguments
 * @param options - Parsed command options
 * @param base - Output helper
 * @param deps - Injected collaborators
 * @returns The printed importers, in printed order
 * @throws UsageError on invalid input; any fetch error otherwise
 */
export async function runFetchCommand(
  packages: string[],
  options: FetchCommandOptions,
  base: BaseCommand,
  deps: FetchCommandDependencies = {}
): Promise<PackageImporter[]> {
  const request = validateFetchRequest(packages, options);
  const config = deps.config ?? getConfig();
  const workers = options.workers ?? config.workers;

  const paths = await resolvePackages(request.input, {
    listStd: deps.listStd,
    signal: deps.signal,
  });
  if (paths.length === 0) {
    throw new UsageError('no packages specified; use --help for help');
  }
  base.debug(`Resolved ${paths.length} packages`);

  const gate = new RateGate(config.rateGate);
  const client = new ImporterClient({
    http: deps.http,
    baseUrl: config.baseUrl,
    timeoutMs: config.fetch.timeoutMs,
    maxBodyBytes: config.fetch.maxBodyBytes,
  });

  // No spinner in quiet, verbose or JSON mode
  const spinner: ProgressSpinner | undefined =
    base.isQuiet() || base.isVerbose() || request.format === 'json'
      ? undefined
      : createSpinner(`Fetching importers 0/${paths.length}`).start();

  let results: Map<string, number>;
  try {
    results = await fetchImporterCounts(paths, {
      workers,
      signal: deps.signal,
      gate,
      fetchCount: (path, signal) => client.fetchCount(path, signal),
      logger: base.logger(),
      onProgress: ({ completed, total }) => {
        spinner?.update(`Fetching importers ${completed}/${total}`);
      },
    });
  } catch (error) {
    spinner?.fail('Fetch failed');
    throw error;
  }

  spinner?.succeed(`Fetched ${paths.length} packages`);
  base.debug(`Issued ${client.getCallCount()} requests`);

  const importers = sortImporters(toPackageImporters(paths, results), request.sort);
  if (request.format === 'json') {
    base.json(formatImporterJson(importers));
  } else {
    for (const line of formatImporterTable(importers)) {
      base.print(line);
    }
  }
  return importers;
}

/**
 * Exit code for an error that ended a run.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof UsageError) {
    return error.exitCode;
  }
  if (isCancelledError(error)) {
    return EXIT_CODES.CANCELLED;
  }
  return EXIT_CODES.ERROR;
}

// ============================================================================
// Registration
// ============================================================================

/**
 * Attach the fetch arguments, options and action to the program.
 *
 * @param program - Commander program instance
 * @param deps - Collaborators passed through to runFetchCommand
 */
export function registerFetchCommand(program: Command, deps: FetchCommandDependencies = {}): void {
  program
    .argument('[package...]', 'package paths, or "std" for the standard library')
    .option('--pkgs <list>', 'comma-separated package paths, or "std"')
    .option('-w, --workers <n>', 'number of concurrent workers (default: 5)', parseWorkerCount)
    .addOption(
      new Option('-s, --sort <order>', 'sort by package name or importer count')
        .choices(SORT_ORDERS)
        .default('name')
    )
    .addOption(
      new Option('-f, --format <format>', 'output format').choices(OUTPUT_FORMATS).default('table')
    )
    .action(async (packages: string[], options: FetchCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);

      const interrupt = new AbortController();
      const onSigint = (): void => {
        interrupt.abort(new CancelledError('interrupted'));
      };
      process.once('SIGINT', onSigint);

      try {
        await runFetchCommand(packages, options, base, { ...deps, signal: interrupt.signal });
      } catch (error) {
        const code = interrupt.signal.aborted ? EXIT_CODES.CANCELLED : exitCodeFor(error);
        if (code === EXIT_CODES.CANCELLED) {
          base.error('interrupted', code);
        }
        if (isFetchUnitError(error)) {
          base.debug(`${error.packagePath} failed (${error.kind})`);
        }
        if (code === EXIT_CODES.ERROR && error instanceof Error) {
          base.error(error.message, error);
        }
        base.error(error instanceof Error ? error.message : String(error), code);
      } finally {
        process.removeListener('SIGINT', onSigint);
      }
    });
}
