/**
 * Date Range Validator Tests
 *
 * Covers calendar date parsing, the inclusive start/end instants in a
 * timezone (including DST transition days) and each validation failure.
 *
 * @module dates/date-range.test
 */

import { describe, it, expect } from '@jest/globals';
import {
  parseCalendarDate,
  safeValidateDateRange,
  validateDateRange,
} from './date-range.js';
import { DateRangeValidationError, isDateRangeValidationError } from './errors.js';
import {
  formatCalendarDate,
  getTimeZoneOffsetMs,
  instantToCalendarDate,
  isValidTimeZone,
  localDateTimeToInstant,
} from './zoned-time.js';

// ============================================================================
// Calendar Dates
// ============================================================================

describe('parseCalendarDate', () => {
  it('should parse a strict YYYY-MM-DD string', () => {
    expect(parseCalendarDate('2024-11-19')).toEqual({ year: 2024, month: 11, day: 19 });
  });

  it('should accept Feb 29 only in leap years', () => {
    expect(parseCalendarDate('2024-02-29')).toEqual({ year: 2024, month: 2, day: 29 });
    expect(parseCalendarDate('2000-02-29')).not.toBeNull();
    expect(parseCalendarDate('2023-02-29')).toBeNull();
    expect(parseCalendarDate('1900-02-29')).toBeNull();
  });

  it('should reject impossible and malformed dates', () => {
    expect(parseCalendarDate('2024-02-30')).toBeNull();
    expect(parseCalendarDate('2024-13-01')).toBeNull();
    expect(parseCalendarDate('2024-00-10')).toBeNull();
    expect(parseCalendarDate('2024-04-31')).toBeNull();
    expect(parseCalendarDate('2024/10/01')).toBeNull();
    expect(parseCalendarDate('2024-1-1')).toBeNull();
    expect(parseCalendarDate(' 2024-01-01')).toBeNull();
    expect(parseCalendarDate('')).toBeNull();
  });
});

// ============================================================================
// Valid Ranges
// ============================================================================

describe('validateDateRange', () => {
  it('should span whole days in UTC', () => {
    const range = validateDateRange('2024-01-01', '2024-12-31', 'UTC');

    expect(range.start.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(range.end.toISOString()).toBe('2024-12-31T23:59:59.999Z');
    expect(range.timezone).toBe('UTC');
  });

  it('should interpret dates in the given timezone', () => {
    const range = validateDateRange('2024-10-01', '2024-11-19', 'America/New_York');

    // EDT (-4) at the start, EST (-5) at the end
    expect(range.start.toISOString()).toBe('2024-10-01T04:00:00.000Z');
    expect(range.end.toISOString()).toBe('2024-11-20T04:59:59.999Z');
  });

  it('should handle zones east of UTC', () => {
    const range = validateDateRange('2024-03-10', '2024-03-10', 'Asia/Tokyo');

    expect(range.start.toISOString()).toBe('2024-03-09T15:00:00.000Z');
    expect(range.end.toISOString()).toBe('2024-03-10T14:59:59.999Z');
  });

  it('should give a non-empty range for a single day', () => {
    const range = validateDateRange('2024-11-19', '2024-11-19', 'UTC');

    expect(range.end.getTime() - range.start.getTime()).toBe(24 * 60 * 60 * 1000 - 1);
  });

  it('should produce a 23-hour day on a spring-forward date', () => {
    const range = validateDateRange('2024-03-10', '2024-03-10', 'America/New_York');

    expect(range.start.toISOString()).toBe('2024-03-10T05:00:00.000Z');
    expect(range.end.toISOString()).toBe('2024-03-11T03:59:59.999Z');
    expect(range.end.getTime() - range.start.getTime()).toBe(23 * 60 * 60 * 1000 - 1);
  });

  it('should produce a 25-hour day on a fall-back date', () => {
    const range = validateDateRange('2024-11-03', '2024-11-03', 'America/New_York');

    expect(range.start.toISOString()).toBe('2024-11-03T04:00:00.000Z');
    expect(range.end.toISOString()).toBe('2024-11-04T04:59:59.999Z');
  });

  it('should start a day at the end of a midnight DST gap', () => {
    // Santiago skips 00:00-00:59 on 2024-09-08
    const range = validateDateRange('2024-09-08', '2024-09-08', 'America/Santiago');

    expect(range.start.toISOString()).toBe('2024-09-08T04:00:00.000Z');
    expect(range.end.toISOString()).toBe('2024-09-09T02:59:59.999Z');
    expect(instantToCalendarDate('America/Santiago', range.start)).toEqual({
      year: 2024,
      month: 9,
      day: 8,
    });
  });

  it('should start a day at the end of a midnight gap east of UTC', () => {
    const range = validateDateRange('2024-04-26', '2024-04-26', 'Africa/Cairo');

    expect(range.start.toISOString()).toBe('2024-04-25T22:00:00.000Z');
  });

  it('should end a day after its repeated last hour', () => {
    // Santiago runs 23:00-23:59 twice on 2024-04-06
    const range = validateDateRange('2024-04-06', '2024-04-06', 'America/Santiago');

    expect(range.start.toISOString()).toBe('2024-04-06T03:00:00.000Z');
    expect(range.end.toISOString()).toBe('2024-04-07T03:59:59.999Z');
    expect(range.end.getTime() - range.start.getTime()).toBe(25 * 60 * 60 * 1000 - 1);
  });

  it('should keep years below 100 as written', () => {
    const range = validateDateRange('0050-01-01', '0050-01-01', 'UTC');

    expect(range.start.toISOString()).toBe('0050-01-01T00:00:00.000Z');
    expect(range.end.toISOString()).toBe('0050-01-01T23:59:59.999Z');
  });

  it('should return a frozen range', () => {
    const range = validateDateRange('2024-10-01', '2024-11-19', 'UTC');

    expect(Object.isFrozen(range)).toBe(true);
  });

  it('should be deterministic', () => {
    const first = validateDateRange('2024-10-01', '2024-11-19', 'Europe/London');
    const second = validateDateRange('2024-10-01', '2024-11-19', 'Europe/London');

    expect(first.start.getTime()).toBe(second.start.getTime());
    expect(first.end.getTime()).toBe(second.end.getTime());
  });

  // ==========================================================================
  // Failures
  // ==========================================================================

  it('should throw DateRangeValidationError for an invalid start date', () => {
    expect(() => validateDateRange('2024/10/01', '2024-11-19', 'UTC')).toThrow(
      DateRangeValidationError
    );
    expect(() => validateDateRange('2024/10/01', '2024-11-19', 'UTC')).toThrow(
      "Invalid start date '2024/10/01'. Expected YYYY-MM-DD (e.g., '2024-11-19')"
    );
  });

  it('should throw when start is after end', () => {
    expect(() => validateDateRange('2024-11-19', '2024-10-01', 'UTC')).toThrow(
      'Invalid date range: start date (2024-11-19) cannot be after end date (2024-10-01). ' +
        'Please ensure the start date is earlier than or equal to the end date.'
    );
  });
});

describe('safeValidateDateRange', () => {
  it('should return the range on success', () => {
    const result = safeValidateDateRange('2024-10-01', '2024-11-19', 'UTC');

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.range.start.toISOString()).toBe('2024-10-01T00:00:00.000Z');
    }
  });

  it('should report an invalid end date', () => {
    const result = safeValidateDateRange('2024-10-01', '2024-13-01', 'UTC');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.reason).toBe('invalidEndDate');
      expect(result.error.field).toBe('endDate');
      expect(result.error.message).toBe(
        "Invalid end date '2024-13-01'. Expected YYYY-MM-DD (e.g., '2024-11-19')"
      );
    }
  });

  it('should report start after end against the start date', () => {
    const result = safeValidateDateRange('2024-11-20', '2024-11-19', 'UTC');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.reason).toBe('startAfterEnd');
      expect(result.error.field).toBe('startDate');
    }
  });

  it('should report an unknown timezone', () => {
    const result = safeValidateDateRange('2024-10-01', '2024-11-19', 'Mars/Olympus_Mons');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.reason).toBe('unknownTimezone');
      expect(result.error.field).toBe('timezone');
      expect(result.error.message).toBe("Unknown timezone 'Mars/Olympus_Mons'");
    }
  });

  it('should check dates before the timezone', () => {
    const result = safeValidateDateRange('not-a-date', '2024-11-19', 'Mars/Olympus_Mons');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.reason).toBe('invalidStartDate');
      expect(isDateRangeValidationError(result.error)).toBe(true);
      expect(result.error.name).toBe('DateRangeValidationError');
    }
  });
});

// ============================================================================
// Zoned Time Helpers
// ============================================================================

describe('zoned time helpers', () => {
  it('should recognize IANA zones', () => {
    expect(isValidTimeZone('UTC')).toBe(true);
    expect(isValidTimeZone('Europe/Berlin')).toBe(true);
    expect(isValidTimeZone('Not/A_Zone')).toBe(false);
    expect(isValidTimeZone('')).toBe(false);
  });

  it('should compute offsets including half-hour zones', () => {
    const instant = Date.UTC(2024, 0, 15, 12, 0, 0);

    expect(getTimeZoneOffsetMs('UTC', instant)).toBe(0);
    expect(getTimeZoneOffsetMs('Asia/Tokyo', instant)).toBe(9 * 60 * 60 * 1000);
    expect(getTimeZoneOffsetMs('America/New_York', instant)).toBe(-5 * 60 * 60 * 1000);
    expect(getTimeZoneOffsetMs('Asia/Kolkata', instant)).toBe(5.5 * 60 * 60 * 1000);
  });

  it('should read the calendar date of an instant in a zone', () => {
    const instant = new Date('2024-11-20T04:59:59.999Z');

    expect(instantToCalendarDate('America/New_York', instant)).toEqual({
      year: 2024,
      month: 11,
      day: 19,
    });
    expect(instantToCalendarDate('UTC', instant)).toEqual({ year: 2024, month: 11, day: 20 });
  });

  it('should pick the requested occurrence of a repeated wall-clock time', () => {
    // 01:30 happens twice in New York on 2024-11-03
    const local = { year: 2024, month: 11, day: 3, hour: 1, minute: 30, second: 0, millisecond: 0 };

    expect(localDateTimeToInstant('America/New_York', local, 'earlier').toISOString()).toBe(
      '2024-11-03T05:30:00.000Z'
    );
    expect(localDateTimeToInstant('America/New_York', local, 'later').toISOString()).toBe(
      '2024-11-03T06:30:00.000Z'
    );
  });

  it('should map a skipped wall-clock time to the edges of the gap', () => {
    // 02:30 never happens in New York on 2024-03-10
    const local = { year: 2024, month: 3, day: 10, hour: 2, minute: 30, second: 0, millisecond: 0 };

    expect(localDateTimeToInstant('America/New_York', local, 'earlier').toISOString()).toBe(
      '2024-03-10T07:00:00.000Z'
    );
    expect(localDateTimeToInstant('America/New_York', local, 'later').toISOString()).toBe(
      '2024-03-10T06:59:59.999Z'
    );
  });

  it('should format calendar dates with zero padding', () => {
    expect(formatCalendarDate({ year: 2024, month: 3, day: 5 })).toBe('2024-03-05');
  });
});
