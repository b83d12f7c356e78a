/**
 * Shared Command Option Handling
 *
 * Option parsing and error-to-exit-code mapping used by every command.
 *
 * @module cli/commands/options
 */

import { ZodError } from 'zod';
import { isDateRangeValidationError } from '../../dates/errors.js';
import { isFileNotFoundError } from '../../storage/atomic.js';
import { EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';

// ============================================================================
// Errors
// ============================================================================

/**
 * Invalid command-line usage (bad option value, conflicting flags).
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Check if an error is a UsageError
 */
export function isUsageError(error: unknown): error is UsageError {
  return error instanceof UsageError;
}

// ============================================================================
// Option Parsing
// ============================================================================

/**
 * Resolve the --reference option to an instant.
 *
 * Without a value the current time is captured once, here, so every
 * comment in a run is measured against the same instant.
 *
 * @throws UsageError if the value is not a parseable timestamp
 */
export function parseReferenceInstant(value?: string): Date {
  if (value === undefined) {
    return new Date();
  }

  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new UsageError(
      `Invalid reference time '${value}'. Expected an ISO8601 timestamp (e.g., '2024-11-19T12:00:00Z')`
    );
  }
  return parsed;
}

/**
 * Render zod issues as "path: message" lines joined by "; ".
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// ============================================================================
// Error Mapping
// ============================================================================

/**
 * Map an error thrown by a command handler to an exit code.
 */
export function exitCodeForError(error: unknown): ExitCode {
  if (isUsageError(error) || isDateRangeValidationError(error) || error instanceof ZodError) {
    return EXIT_CODES.USAGE_ERROR;
  }
  if (isFileNotFoundError(error)) {
    return EXIT_CODES.NOT_FOUND;
  }
  return EXIT_CODES.ERROR;
}

/**
 * Report a command failure and exit with the matching code.
 */
export function failCommand(base: BaseCommand, error: unknown): never {
  if (error instanceof ZodError) {
    base.fatal(formatZodIssues(error), EXIT_CODES.USAGE_ERROR);
  }
  if (error instanceof Error) {
    if (base.isVerbose() && error.stack) {
      base.debug(error.stack);
    }
    base.fatal(error.message, exitCodeForError(error));
  }
  base.fatal(String(error), EXIT_CODES.ERROR);
}
