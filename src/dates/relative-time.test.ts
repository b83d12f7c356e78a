/**
 * Relative Time Parser Tests
 *
 * Months resolve to 30 days and years to 365 days; the expected instants
 * below are computed with that approximation, not calendar arithmetic.
 *
 * @module dates/relative-time.test
 */

import { describe, it, expect } from '@jest/globals';
import { parseRelativeTime, parseRelativeTimeOrNull, UNIT_DURATION_MS } from './relative-time.js';

// ============================================================================
// Test Data
// ============================================================================

const REFERENCE = new Date('2024-11-19T12:00:00.000Z');

function resolve(text: string): string | null {
  const instant = parseRelativeTimeOrNull(text, REFERENCE);
  return instant ? instant.toISOString() : null;
}

// ============================================================================
// Recognized Phrases
// ============================================================================

describe('parseRelativeTime', () => {
  describe('now phrases', () => {
    it('should resolve "just now" to the reference instant', () => {
      const result = parseRelativeTime('just now', REFERENCE);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.instant.getTime()).toBe(REFERENCE.getTime());
        expect(result.quantity).toBe(0);
        expect(result.unit).toBeNull();
      }
    });

    it('should accept "now" and surrounding whitespace and case', () => {
      expect(resolve('now')).toBe('2024-11-19T12:00:00.000Z');
      expect(resolve('  Just Now  ')).toBe('2024-11-19T12:00:00.000Z');
    });

    it('should return a new Date rather than the reference object', () => {
      const result = parseRelativeTime('just now', REFERENCE);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.instant).not.toBe(REFERENCE);
      }
    });
  });

  describe('numeric quantities', () => {
    it('should subtract seconds, minutes and hours', () => {
      expect(resolve('30 seconds ago')).toBe('2024-11-19T11:59:30.000Z');
      expect(resolve('5 minutes ago')).toBe('2024-11-19T11:55:00.000Z');
      expect(resolve('2 hours ago')).toBe('2024-11-19T10:00:00.000Z');
    });

    it('should subtract days and weeks', () => {
      expect(resolve('1 day ago')).toBe('2024-11-18T12:00:00.000Z');
      expect(resolve('3 days ago')).toBe('2024-11-16T12:00:00.000Z');
      expect(resolve('2 weeks ago')).toBe('2024-11-05T12:00:00.000Z');
    });

    it('should treat a month as 30 days', () => {
      expect(resolve('1 month ago')).toBe('2024-10-20T12:00:00.000Z');
      expect(resolve('3 months ago')).toBe('2024-08-21T12:00:00.000Z');
    });

    it('should treat a year as 365 days, even across a leap day', () => {
      expect(resolve('1 year ago')).toBe('2023-11-20T12:00:00.000Z');
      expect(resolve('2 years ago')).toBe('2022-11-20T12:00:00.000Z');
    });

    it('should report the matched quantity and unit', () => {
      const result = parseRelativeTime('6 months ago', REFERENCE);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.quantity).toBe(6);
        expect(result.unit).toBe('month');
      }
    });
  });

  describe('indefinite article', () => {
    it('should read "a" and "an" as one', () => {
      expect(resolve('a minute ago')).toBe('2024-11-19T11:59:00.000Z');
      expect(resolve('an hour ago')).toBe('2024-11-19T11:00:00.000Z');
      expect(resolve('a day ago')).toBe('2024-11-18T12:00:00.000Z');
      expect(resolve('a week ago')).toBe('2024-11-12T12:00:00.000Z');
      expect(resolve('a month ago')).toBe('2024-10-20T12:00:00.000Z');
      expect(resolve('a year ago')).toBe('2023-11-20T12:00:00.000Z');
    });
  });

  describe('tolerance', () => {
    it('should be case-insensitive', () => {
      expect(resolve('2 DAYS AGO')).toBe('2024-11-17T12:00:00.000Z');
    });

    it('should accept singular and plural unit forms', () => {
      expect(resolve('1 days ago')).toBe('2024-11-18T12:00:00.000Z');
      expect(resolve('2 day ago')).toBe('2024-11-17T12:00:00.000Z');
    });

    it('should ignore noise around the phrase', () => {
      expect(resolve('3 days ago (edited)')).toBe('2024-11-16T12:00:00.000Z');
      expect(resolve('Streamed 2 weeks ago')).toBe('2024-11-05T12:00:00.000Z');
      expect(resolve('3 days agoo')).toBe('2024-11-16T12:00:00.000Z');
    });
  });

  // ==========================================================================
  // Failures
  // ==========================================================================

  describe('failures', () => {
    it('should fail on empty or blank text with reason "empty"', () => {
      for (const text of ['', '   ']) {
        const result = parseRelativeTime(text, REFERENCE);
        expect(result.success).toBe(false);
        if (!result.success) {
          expect(result.error.reason).toBe('empty');
          expect(result.error.message).toBe('Relative time text is empty');
        }
      }
    });

    it('should fail on unrecognized text with reason "unrecognized"', () => {
      const result = parseRelativeTime('banana', REFERENCE);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.reason).toBe('unrecognized');
        expect(result.error.input).toBe('banana');
        expect(result.error.message).toBe("Could not parse relative time text: 'banana'");
      }
    });

    it('should fail on text with no quantity or no unit', () => {
      expect(resolve('Edited')).toBeNull();
      expect(resolve('days ago')).toBeNull();
      expect(resolve('3 fortnights ago')).toBeNull();
      expect(resolve('2024-11-01')).toBeNull();
    });

    it('should fail with "outOfRange" when the instant is not representable', () => {
      const result = parseRelativeTime('999999999 years ago', REFERENCE);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.reason).toBe('outOfRange');
      }
    });
  });

  // ==========================================================================
  // Properties
  // ==========================================================================

  describe('properties', () => {
    it('should never resolve to an instant after the reference', () => {
      for (const text of ['just now', '1 second ago', '4 weeks ago', '10 years ago']) {
        const instant = parseRelativeTimeOrNull(text, REFERENCE);
        expect(instant).not.toBeNull();
        expect(instant?.getTime()).toBeLessThanOrEqual(REFERENCE.getTime());
      }
    });

    it('should resolve "2X units ago" earlier than "X units ago"', () => {
      for (const unit of ['second', 'minute', 'hour', 'day', 'week', 'month', 'year']) {
        const single = parseRelativeTimeOrNull(`3 ${unit}s ago`, REFERENCE);
        const double = parseRelativeTimeOrNull(`6 ${unit}s ago`, REFERENCE);
        expect(single).not.toBeNull();
        expect(double).not.toBeNull();
        expect(double?.getTime()).toBeLessThan(single?.getTime() ?? 0);
      }
    });

    it('should return identical instants for identical inputs', () => {
      expect(resolve('5 days ago')).toBe(resolve('5 days ago'));
    });

    it('should expose unit durations', () => {
      expect(UNIT_DURATION_MS.week).toBe(7 * 24 * 60 * 60 * 1000);
      expect(UNIT_DURATION_MS.month).toBe(30 * UNIT_DURATION_MS.day);
      expect(UNIT_DURATION_MS.year).toBe(365 * UNIT_DURATION_MS.day);
    });
  });
});
