/**
 * Zoned Time Helpers
 *
 * Converts wall-clock times in an IANA timezone to absolute instants (and
 * instants back to calendar dates) using the runtime's Intl time zone data.
 *
 * @module dates/zoned-time
 */

// ============================================================================
// Types
// ============================================================================

/**
 * A wall-clock date and time, without zone.
 */
export interface LocalDateTime {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

/**
 * A calendar date, without zone.
 */
export interface CalendarDate {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

// ============================================================================
// Formatter Cache
// ============================================================================

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const offsetFormatterCache = new Map<string, Intl.DateTimeFormat>();
const dateFormatterCache = new Map<string, Intl.DateTimeFormat>();

function getOffsetFormatter(timeZone: string): Intl.DateTimeFormat {
  const cached = offsetFormatterCache.get(timeZone);
  if (cached) {
    return cached;
  }

  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    timeZoneName: 'shortOffset',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  });
  offsetFormatterCache.set(timeZone, formatter);
  return formatter;
}

function getDateFormatter(timeZone: string): Intl.DateTimeFormat {
  const cached = dateFormatterCache.get(timeZone);
  if (cached) {
    return cached;
  }

  const formatter = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });
  dateFormatterCache.set(timeZone, formatter);
  return formatter;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Check whether the runtime knows an IANA timezone identifier.
 */
export function isValidTimeZone(timeZone: string): boolean {
  if (timeZone.trim().length === 0) {
    return false;
  }
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Offset of a timezone from UTC at a given instant, in milliseconds.
 * Positive east of Greenwich (Asia/Tokyo → +9h).
 */
export function getTimeZoneOffsetMs(timeZone: string, utcMs: number): number {
  const parts = getOffsetFormatter(timeZone).formatToParts(new Date(utcMs));
  const offsetPart = parts.find((part) => part.type === 'timeZoneName')?.value ?? 'GMT';
  return parseOffsetMs(offsetPart);
}

/**
 * Which instant to pick when a wall-clock time occurs twice (clocks set
 * back) or not at all (clocks set forward).
 *
 * - `earlier`: first occurrence; inside a gap, the instant the gap ends
 * - `later`: last occurrence; inside a gap, the millisecond before it starts
 */
export type Disambiguation = 'earlier' | 'later';

/**
 * Convert a wall-clock time in a timezone to an absolute instant.
 *
 * Candidates are built from the offsets in force a day either side of the
 * wall-clock time; a candidate counts when converting it back gives the
 * same wall-clock time.
 *
 * @example
 * ```typescript
 * // 2024-09-08 starts at 01:00 in Santiago; midnight is skipped
 * localDateTimeToInstant('America/Santiago', { year: 2024, month: 9, day: 8,
 *   hour: 0, minute: 0, second: 0, millisecond: 0 }, 'earlier');
 * // 2024-09-08T04:00:00.000Z
 * ```
 */
export function localDateTimeToInstant(
  timeZone: string,
  local: LocalDateTime,
  disambiguation: Disambiguation = 'earlier'
): Date {
  const wallClockMs = wallClockAsUtcMs(local);
  const offsetBefore = getTimeZoneOffsetMs(timeZone, wallClockMs - MS_PER_DAY);
  const offsetAfter = getTimeZoneOffsetMs(timeZone, wallClockMs + MS_PER_DAY);
  const offsets = new Set([
    offsetBefore,
    getTimeZoneOffsetMs(timeZone, wallClockMs),
    offsetAfter,
  ]);

  const matches = [...offsets]
    .map((offset) => wallClockMs - offset)
    .filter((candidate) => candidate + getTimeZoneOffsetMs(timeZone, candidate) === wallClockMs)
    .sort((a, b) => a - b);

  const first = matches[0];
  const last = matches[matches.length - 1];
  if (first !== undefined && last !== undefined) {
    return new Date(disambiguation === 'earlier' ? first : last);
  }

  // Gap: the wall-clock time was skipped
  const transition = findTransition(
    timeZone,
    wallClockMs - Math.max(offsetBefore, offsetAfter),
    wallClockMs - Math.min(offsetBefore, offsetAfter)
  );
  return new Date(disambiguation === 'earlier' ? transition : transition - 1);
}

/**
 * First instant in (low, high] whose offset differs from the offset at low.
 */
function findTransition(timeZone: string, low: number, high: number): number {
  const lowOffset = getTimeZoneOffsetMs(timeZone, low);
  let lo = low;
  let hi = high;

  while (hi - lo > 1) {
    const mid = Math.floor((lo + hi) / 2);
    if (getTimeZoneOffsetMs(timeZone, mid) === lowOffset) {
      lo = mid;
    } else {
      hi = mid;
    }
  }
  return hi;
}

/**
 * Epoch milliseconds of a wall-clock time read as UTC.
 * Date.UTC maps years 0-99 to 1900-1999; setUTCFullYear does not.
 */
function wallClockAsUtcMs(local: LocalDateTime): number {
  const date = new Date(0);
  date.setUTCFullYear(local.year, local.month - 1, local.day);
  date.setUTCHours(local.hour, local.minute, local.second, local.millisecond);
  return date.getTime();
}

/**
 * Calendar date of an instant as seen in a timezone.
 */
export function instantToCalendarDate(timeZone: string, instant: Date): CalendarDate {
  const parts = getDateFormatter(timeZone).formatToParts(instant);
  const byType = new Map<string, string>();
  for (const part of parts) {
    byType.set(part.type, part.value);
  }

  return {
    year: Number(byType.get('year') ?? '0'),
    month: Number(byType.get('month') ?? '0'),
    day: Number(byType.get('day') ?? '0'),
  };
}

/**
 * Format a calendar date as YYYY-MM-DD.
 */
export function formatCalendarDate(date: CalendarDate): string {
  const year = String(date.year).padStart(4, '0');
  const month = String(date.month).padStart(2, '0');
  const day = String(date.day).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Parse Intl shortOffset output such as "GMT", "GMT-5" or "GMT+5:30".
 */
function parseOffsetMs(offsetValue: string): number {
  const match = offsetValue
    .replace('UTC', 'GMT')
    .match(/^GMT([+-])(\d{1,2})(?::?(\d{2}))?(?::?(\d{2}))?$/);
  if (!match) {
    return 0;
  }

  const sign = match[1] === '-' ? -1 : 1;
  const hours = Number(match[2] ?? '0');
  const minutes = Number(match[3] ?? '0');
  const seconds = Number(match[4] ?? '0');
  return sign * ((hours * 60 + minutes) * 60 + seconds) * 1000;
}
