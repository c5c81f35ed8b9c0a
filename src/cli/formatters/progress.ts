/**
 * Progress Formatters
 *
 * Spinner for the fetch run, drawn on stderr so stdout stays clean for
 * results. Uses the ora library for terminal spinners.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

// ============================================================================
// Types
// ============================================================================

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
  /** Output stream (default: process.stderr) */
  stream?: NodeJS.WriteStream;
}

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 * Animates only when its stream is a TTY.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Fetching importers');
 * spinner.start();
 * spinner.update('Fetching importers 3/10');
 * spinner.succeed('Fetched 10 packages');
 * ```
 */
export class ProgressSpinner {
  private spinner: Ora;
  private readonly isTTY: boolean;
  private startTime: number = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    const stream = options.stream ?? process.stderr;
    this.isTTY = stream.isTTY === true;

    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: this.isTTY,
      stream,
    });
  }

  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  update(text: string): this {
    this.spinner.text = text;
    return this;
  }

  /**
   * Stop spinner with success state, appending the elapsed time.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  stop(): this {
    this.spinner.stop();
    return this;
  }

  isSpinning(): boolean {
    return this.spinner.isSpinning;
  }

  isInteractive(): boolean {
    return this.isTTY;
  }
}

// ============================================================================
// Formatting Utilities
// ============================================================================

/**
 * Format duration in human-readable form.
 *
 * @example
 * ```typescript
 * formatDuration(500);    // '500ms'
 * formatDuration(5500);   // '5.5s'
 * formatDuration(90000);  // '1m 30s'
 * ```
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Create a new progress spinner.
 */
export function createSpinner(text: string, options?: SpinnerOptions): ProgressSpinner {
  return new ProgressSpinner(text, options);
}
