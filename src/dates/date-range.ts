/**
 * Date Range Validator
 *
 * Turns a pair of YYYY-MM-DD strings into an inclusive instant range in a
 * given timezone. The start is the first millisecond of the start day and
 * the end is the last millisecond (23:59:59.999) of the end day, so a
 * single-day range is never empty. On days whose midnight falls in a DST
 * gap or overlap, start is the first and end the last instant that carries
 * the calendar date locally.
 *
 * @module dates/date-range
 */

import { DateRangeValidationError } from './errors.js';
import {
  isValidTimeZone,
  localDateTimeToInstant,
  type CalendarDate,
} from './zoned-time.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Inclusive absolute range with the timezone it was interpreted in.
 * Invariant: start <= end.
 */
export interface DateRange {
  readonly start: Date;
  readonly end: Date;
  readonly timezone: string;
}

/**
 * Outcome of validating a date range. Mirrors zod's safeParse shape.
 */
export type DateRangeValidationResult =
  | { success: true; range: DateRange }
  | { success: false; error: DateRangeValidationError };

// ============================================================================
// Constants
// ============================================================================

const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

// ============================================================================
// Calendar Date Parsing
// ============================================================================

/**
 * Parse a strict YYYY-MM-DD string into a calendar date.
 *
 * Returns null for malformed text and for impossible dates such as
 * 2024-02-30 or 2023-02-29.
 */
export function parseCalendarDate(value: string): CalendarDate | null {
  const match = CALENDAR_DATE_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return null;
  }

  return { year, month, day };
}

function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) {
    return 29;
  }
  return DAYS_IN_MONTH[month - 1] ?? 0;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate a date range without throwing.
 *
 * @param startDate - Start date in YYYY-MM-DD form
 * @param endDate - End date in YYYY-MM-DD form
 * @param timezone - IANA timezone to interpret both dates in
 *
 * @example
 * ```typescript
 * const result = safeValidateDateRange('2024-10-01', '2024-11-19', 'America/New_York');
 * if (result.success) {
 *   result.range.start.toISOString(); // '2024-10-01T04:00:00.000Z'
 *   result.range.end.toISOString();   // '2024-11-20T04:59:59.999Z'
 * }
 * ```
 */
export function safeValidateDateRange(
  startDate: string,
  endDate: string,
  timezone: string
): DateRangeValidationResult {
  const start = parseCalendarDate(startDate);
  if (!start) {
    return {
      success: false,
      error: new DateRangeValidationError(
        `Invalid start date '${startDate}'. Expected YYYY-MM-DD (e.g., '2024-11-19')`,
        'invalidStartDate',
        'startDate'
      ),
    };
  }

  const end = parseCalendarDate(endDate);
  if (!end) {
    return {
      success: false,
      error: new DateRangeValidationError(
        `Invalid end date '${endDate}'. Expected YYYY-MM-DD (e.g., '2024-11-19')`,
        'invalidEndDate',
        'endDate'
      ),
    };
  }

  if (compareCalendarDates(start, end) > 0) {
    return {
      success: false,
      error: new DateRangeValidationError(
        `Invalid date range: start date (${startDate}) cannot be after end date (${endDate}). ` +
          'Please ensure the start date is earlier than or equal to the end date.',
        'startAfterEnd',
        'startDate'
      ),
    };
  }

  if (!isValidTimeZone(timezone)) {
    return {
      success: false,
      error: new DateRangeValidationError(
        `Unknown timezone '${timezone}'`,
        'unknownTimezone',
        'timezone'
      ),
    };
  }

  const range: DateRange = Object.freeze({
    start: localDateTimeToInstant(
      timezone,
      { ...start, hour: 0, minute: 0, second: 0, millisecond: 0 },
      'earlier'
    ),
    end: localDateTimeToInstant(
      timezone,
      { ...end, hour: 23, minute: 59, second: 59, millisecond: 999 },
      'later'
    ),
    timezone,
  });

  return { success: true, range };
}

/**
 * Validate a date range, throwing on invalid input.
 *
 * @throws DateRangeValidationError naming the failing date and reason
 */
export function validateDateRange(startDate: string, endDate: string, timezone: string): DateRange {
  const result = safeValidateDateRange(startDate, endDate, timezone);
  if (!result.success) {
    throw result.error;
  }
  return result.range;
}
