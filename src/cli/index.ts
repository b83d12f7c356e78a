#!/usr/bin/env node
/**
 * Comment Window CLI
 *
 * Main entry point for the comment-window tool.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   comment-window --help
 *   comment-window filter comments.json --start 2024-10-01 --end 2024-11-19 --region US
 *   comment-window parse "3 weeks ago" --reference 2024-11-19T12:00:00Z
 *   comment-window timezone JP
 *
 * @module cli
 */

import { Command } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, EXIT_CODES, type GlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 *
 * @returns Configured commander Program instance
 */
export function createProgram(): Command {
  const program = new Command();

  // Program metadata
  program
    .name('comment-window')
    .description('Resolve YouTube relative comment dates and filter comments by date range')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output');

  // Create base command helper with global options
  program.hook('preAction', (thisCommand) => {
    const opts: GlobalOptions = thisCommand.opts();
    const baseCommand = new BaseCommand(opts);

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    if (opts.verbose && opts.quiet) {
      baseCommand.fatal('Cannot use both --verbose and --quiet flags', EXIT_CODES.USAGE_ERROR);
    }
  });

  registerCommands(program);

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command.
 */
export async function main(argv: readonly string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    if (error instanceof Error && error.message) {
      console.error(`Error: ${error.message}`);
    }
    process.exit(1);
  }
}

// Run if executed directly
if (require.main === module) {
  void main();
}
