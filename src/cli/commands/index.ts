/**
 * CLI Commands Registry
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerFetchCommand, type FetchCommandDependencies } from './fetch.js';

export {
  registerFetchCommand,
  runFetchCommand,
  validateFetchRequest,
  parseWorkerCount,
  exitCodeFor,
  type FetchCommandOptions,
  type FetchCommandDependencies,
  type FetchRequest,
} from './fetch.js';

/**
 * Register all CLI commands with the program.
 *
 * @param program - Commander program instance
 * @param deps - Collaborators for the fetch action
 */
export function registerCommands(program: Command, deps: FetchCommandDependencies = {}): void {
  registerFetchCommand(program, deps);
}
