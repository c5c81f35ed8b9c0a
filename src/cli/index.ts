#!/usr/bin/env node
/**
 * pkgimporters CLI
 *
 * Prints the known importer count of each Go package, as listed on
 * pkg.go.dev.
 *
 * Usage:
 *   pkgimporters io net/http
 *   pkgimporters --pkgs std --sort count
 *   pkgimporters -w 2 -f json golang.org/x/tools/go/analysis
 *
 * @module cli
 */

import { Command } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, EXIT_CODES, type GlobalOptions } from './base-command.js';
import { registerCommands, type FetchCommandDependencies } from './commands/index.js';

const EXAMPLES = `
Examples:
  $ pkgimporters fmt
      Fetch importers for the fmt package

  $ pkgimporters fmt bufio net/http golang.org/x/tools/go/analysis
      Fetch importers for multiple packages

  $ pkgimporters --pkgs fmt,bufio,net/http
      Fetch importers using comma-separated packages

  $ pkgimporters --pkgs std
      Fetch importers for all standard library packages

  $ pkgimporters --workers 20 --pkgs std
      Use 20 concurrent requests when fetching all standard library packages

  $ pkgimporters --pkgs std --sort count
      Fetch all standard library packages, sorted by importer count descending
`;

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the CLI program.
 *
 * @param deps - Collaborators for the fetch action (tests inject stubs)
 * @returns Configured commander Program instance
 */
export function createProgram(deps: FetchCommandDependencies = {}): Command {
  const program = new Command();

  program
    .name('pkgimporters')
    .description('Fetch known importer counts for Go packages from pkg.go.dev')
    .version(VERSION, '-V, --version', 'Display version number');

  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress the progress spinner')
    .option('--no-color', 'Disable colored output');

  program.hook('preAction', (thisCommand) => {
    const opts: GlobalOptions = thisCommand.opts();
    const baseCommand = new BaseCommand(opts);

    thisCommand.setOptionValue('_baseCommand', baseCommand);

    if (opts.verbose && opts.quiet) {
      baseCommand.error('Cannot use both --verbose and --quiet flags', EXIT_CODES.USAGE_ERROR);
    }
  });

  registerCommands(program, deps);

  program.addHelpText('after', EXAMPLES);

  program.exitOverride((err) => {
    if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
      process.exit(EXIT_CODES.SUCCESS);
    }
    process.exit(EXIT_CODES.USAGE_ERROR);
  });

  return program;
}

/**
 * Main CLI entry point.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error && error.message) {
      console.error(`Error: ${error.message}`);
    }
    process.exit(EXIT_CODES.ERROR);
  }
}

if (require.main === module) {
  void main();
}
