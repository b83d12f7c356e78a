/**
 * Progress Formatters
 *
 * Spinner for the file-reading and filtering steps of the CLI.
 * Uses the ora library for terminal spinners; non-TTY and quiet runs get a
 * silent spinner.
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
  /** Suppress the spinner entirely (quiet mode) */
  silent?: boolean;
}

// ============================================================================
// ProgressSpinner
// ============================================================================

/**
 * Wrapper around ora that appends elapsed time on success.
 *
 * @example
 * ```typescript
 * const spinner = createSpinner('Reading comments...').start();
 * spinner.succeed('Loaded 12 videos');
 * ```
 */
export class ProgressSpinner {
  private readonly spinner: Ora;
  private startTime = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    this.spinner = ora({
      text,
      color: 'cyan',
      isEnabled: process.stdout.isTTY === true && options.silent !== true,
      isSilent: options.silent === true,
      stream: process.stdout,
    });
  }

  /**
   * Start the spinner.
   */
  start(): this {
    this.startTime = Date.now();
    this.spinner.start();
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

  /**
   * Stop spinner with failure state.
   */
  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a millisecond duration for display.
 *
 * @example
 * formatDuration(250)   // '250ms'
 * formatDuration(1500)  // '1.5s'
 * formatDuration(75000) // '1m 15s'
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Create a spinner for a single operation.
 */
export function createSpinner(text: string, options?: SpinnerOptions): ProgressSpinner {
  return new ProgressSpinner(text, options);
}
