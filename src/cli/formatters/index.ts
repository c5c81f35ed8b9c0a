/**
 * CLI Formatters
 *
 * @module cli/formatters
 */

export {
  ProgressSpinner,
  createSpinner,
  formatDuration,
  type SpinnerOptions,
} from './progress.js';
