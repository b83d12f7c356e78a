/**
 * Date Resolution
 *
 * Relative-time parsing, region timezone inference and calendar date range
 * validation. Every function is pure; the reference instant is always
 * passed in by the caller.
 *
 * Architecture:
 * - relative-time.ts: "3 days ago" → absolute instant
 * - timezones.ts: region code → IANA timezone (UTC fallback)
 * - date-range.ts: YYYY-MM-DD pair → inclusive instant range
 * - zoned-time.ts: Intl-based wall-clock ↔ instant conversion
 * - errors.ts: parse failure values and validation errors
 *
 * @module dates
 */

// ============================================================================
// Relative Time
// ============================================================================

export {
  parseRelativeTime,
  parseRelativeTimeOrNull,
  UNIT_DURATION_MS,
  type RelativeTimeUnit,
  type RelativeTimeParseResult,
} from './relative-time.js';

// ============================================================================
// Timezones
// ============================================================================

export {
  resolveRegionTimezone,
  isKnownRegion,
  listRegionTimezones,
  FALLBACK_TIMEZONE,
} from './timezones.js';

export {
  isValidTimeZone,
  getTimeZoneOffsetMs,
  localDateTimeToInstant,
  type Disambiguation,
  instantToCalendarDate,
  formatCalendarDate,
  type LocalDateTime,
  type CalendarDate,
} from './zoned-time.js';

// ============================================================================
// Date Range
// ============================================================================

export {
  safeValidateDateRange,
  validateDateRange,
  parseCalendarDate,
  type DateRange,
  type DateRangeValidationResult,
} from './date-range.js';

// ============================================================================
// Errors
// ============================================================================

export {
  DateRangeValidationError,
  isDateRangeValidationError,
  createRelativeTimeParseError,
  type DateRangeValidationReason,
  type DateRangeField,
  type RelativeTimeParseError,
  type RelativeTimeParseFailureReason,
} from './errors.js';
