/**
 * Base Command
 *
 * Provides common functionality for the CLI:
 * - Global option handling (verbose, quiet, no-color)
 * - Consistent error handling and exit codes
 * - Output utilities; diagnostics go to stderr, results to stdout
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import type { Logger } from '../workers/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options.
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
}

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** Fetch, resolve or configuration failure */
  ERROR: 1,
  /** Invalid usage or arguments */
  USAGE_ERROR: 2,
  /** Interrupted by SIGINT */
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// Usage Errors
// ============================================================================

/**
 * Invalid command line input. The CLI exits with USAGE_ERROR.
 */
export class UsageError extends Error {
  readonly exitCode = EXIT_CODES.USAGE_ERROR;

  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * @example
 * ```typescript
 * const base = getBaseCommand(cmd);
 * base.debug('Resolved 3 packages');
 * base.print('io                   1,533,321');
 * ```
 */
export class BaseCommand {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Whether colored output is enabled */
  private readonly useColor: boolean;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stderr.isTTY === true;

    if (!this.useColor) {
      chalk.level = 0;
    }
  }

  // ==========================================================================
  // Diagnostics (stderr)
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.error(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.error(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   */
  warn(message: string, ...args: unknown[]): void {
    console.error(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Log an error message and exit.
   *
   * @param message - Error message
   * @param errorOrCode - Error object (exit 1, stack shown when verbose) or exit code
   */
  error(message: string, errorOrCode?: Error | ExitCode): never {
    console.error(chalk.red(`Error: ${message}`));

    if (errorOrCode instanceof Error) {
      if (this.options.verbose) {
        console.error(chalk.dim(errorOrCode.stack ?? errorOrCode.message));
      }
      process.exit(EXIT_CODES.ERROR);
    } else if (typeof errorOrCode === 'number') {
      process.exit(errorOrCode);
    } else {
      process.exit(EXIT_CODES.ERROR);
    }
  }

  // ==========================================================================
  // Results (stdout)
  // ==========================================================================

  /**
   * Print a result line. Never suppressed.
   */
  print(line: string): void {
    console.log(line);
  }

  /**
   * Print pre-serialized JSON.
   */
  json(text: string): void {
    console.log(text);
  }

  // ==========================================================================
  // Logger Adapter
  // ==========================================================================

  /**
   * Logger for library code. Unlike error(), its error level never exits.
   */
  logger(): Logger {
    return {
      debug: (message, ...args) => this.debug(message, ...args),
      info: (message, ...args) => this.info(message, ...args),
      warn: (message, ...args) => this.warn(message, ...args),
      error: (message, ...args) => {
        if (this.options.verbose) {
          console.error(chalk.red(message), ...args);
        }
      },
    };
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  isQuiet(): boolean {
    return this.options.quiet === true;
  }

  hasColor(): boolean {
    return this.useColor;
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a BaseCommand from global options.
 */
export function createBaseCommand(options: GlobalOptions): BaseCommand {
  return new BaseCommand(options);
}

/**
 * Get the base command stored on a commander Command by the preAction hook.
 *
 * @param cmd - Commander command instance
 * @returns The stored BaseCommand, or a default one when absent
 */
export function getBaseCommand(cmd: { opts(): Record<string, unknown> }): BaseCommand {
  const base = cmd.opts()['_baseCommand'];
  if (!(base instanceof BaseCommand)) {
    return new BaseCommand({});
  }
  return base;
}
