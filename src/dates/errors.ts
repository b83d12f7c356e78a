/**
 * Date Subsystem Errors
 *
 * Relative-time parse failures are plain values: the comment filter absorbs
 * them into its `unparseable` count. Date range failures are thrown, or
 * returned from the safe variant.
 *
 * @module dates/errors
 */

// ============================================================================
// Relative Time Parse Failure
// ============================================================================

/**
 * Why a relative-time string could not be resolved.
 */
export type RelativeTimeParseFailureReason = 'empty' | 'unrecognized' | 'outOfRange';

/**
 * Parse failure for a relative-time string. Returned, never thrown.
 */
export interface RelativeTimeParseError {
  reason: RelativeTimeParseFailureReason;
  /** The text as received (before trimming) */
  input: string;
  message: string;
}

/**
 * Build a RelativeTimeParseError with a message derived from the reason.
 */
export function createRelativeTimeParseError(
  reason: RelativeTimeParseFailureReason,
  input: string
): RelativeTimeParseError {
  let message: string;
  if (reason === 'empty') {
    message = 'Relative time text is empty';
  } else if (reason === 'outOfRange') {
    message = `Relative time text resolves outside the representable date range: '${input}'`;
  } else {
    message = `Could not parse relative time text: '${input}'`;
  }
  return { reason, input, message };
}

// ============================================================================
// Date Range Validation Error
// ============================================================================

/**
 * Type-safe validation failure reasons
 */
export type DateRangeValidationReason =
  | 'invalidStartDate'
  | 'invalidEndDate'
  | 'startAfterEnd'
  | 'unknownTimezone';

/**
 * Which request field a validation failure points at.
 */
export type DateRangeField = 'startDate' | 'endDate' | 'timezone';

/**
 * Date range validation error with the failing field and reason.
 */
export class DateRangeValidationError extends Error {
  constructor(
    message: string,
    public readonly reason: DateRangeValidationReason,
    public readonly field: DateRangeField
  ) {
    super(message);
    this.name = 'DateRangeValidationError';
  }
}

/**
 * Check if an error is a date range validation error
 */
export function isDateRangeValidationError(error: unknown): error is DateRangeValidationError {
  return error instanceof DateRangeValidationError;
}
