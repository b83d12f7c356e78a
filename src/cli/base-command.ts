/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color)
 * - Consistent error handling and exit codes
 * - Output utilities (log, warn, error)
 *
 * BaseCommand implements the library Logger interface, so commands pass
 * it straight into the filter and normalizer.
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import type { Logger } from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
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
  /** General error */
  ERROR: 1,
  /** Invalid usage or arguments (including invalid date ranges) */
  USAGE_ERROR: 2,
  /** Input file not found */
  NOT_FOUND: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * @example
 * ```typescript
 * const base = getBaseCommand(cmd.parent);
 * base.info(`Filtering ${file}`);
 * const result = filterCommentsByDateRange(comments, range, reference, { logger: base });
 * ```
 */
export class BaseCommand implements Logger {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Whether colored output is enabled */
  private readonly useColor: boolean;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;

    if (!this.useColor) {
      chalk.level = 0;
    }
  }

  // ==========================================================================
  // Logger Methods
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Log an error message (always visible). Does not exit.
   */
  error(message: string, ...args: unknown[]): void {
    console.error(chalk.red(`Error: ${message}`), ...args);
  }

  // ==========================================================================
  // Exit Methods
  // ==========================================================================

  /**
   * Log an error and exit.
   *
   * @param message - Error message
   * @param errorOrCode - Error object (stack shown when verbose) or exit code
   */
  fatal(message: string, errorOrCode?: Error | ExitCode): never {
    this.error(message);

    if (errorOrCode instanceof Error) {
      if (this.options.verbose) {
        console.error(chalk.dim(errorOrCode.stack ?? errorOrCode.message));
      }
      process.exit(EXIT_CODES.ERROR);
    }
    process.exit(errorOrCode ?? EXIT_CODES.ERROR);
  }

  /**
   * Exit with specific code.
   */
  exitWith(code: ExitCode): never {
    process.exit(code);
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log a failure message with red X.
   */
  fail(message: string): void {
    console.log(chalk.red(`${this.useColor ? '\u2718' : '[FAIL]'} ${message}`));
  }

  /**
   * Print a blank line (hidden in quiet mode).
   */
  blank(): void {
    if (!this.options.quiet) {
      console.log();
    }
  }

  /**
   * Print a horizontal divider line.
   */
  divider(char = '-', width = 40): void {
    if (!this.options.quiet) {
      console.log(chalk.dim(char.repeat(width)));
    }
  }

  /**
   * Print a section header.
   */
  section(title: string): void {
    if (!this.options.quiet) {
      console.log();
      console.log(chalk.bold(title));
      this.divider('=', title.length);
    }
  }

  /**
   * Print data as formatted JSON (visible even in quiet mode).
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /**
   * Print a key-value pair.
   */
  keyValue(key: string, value: string | number): void {
    if (!this.options.quiet) {
      console.log(`${chalk.dim(key + ':')} ${value}`);
    }
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
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Get the base command from a commander Command instance.
 * Used by subcommand handlers to access shared functionality.
 *
 * @param cmd - Commander command instance (usually the program)
 * @returns Stored BaseCommand, or a default one when none was set (for testing)
 */
export function getBaseCommand(cmd: { opts(): Record<string, unknown> } | null): BaseCommand {
  const base = cmd?.opts()['_baseCommand'];
  if (!(base instanceof BaseCommand)) {
    return new BaseCommand({});
  }
  return base;
}
