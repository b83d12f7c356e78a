/**
 * Relative Time Parser
 *
 * Converts YouTube's relative timestamps ("3 months ago", "an hour ago",
 * "just now") into absolute instants anchored to a caller-supplied reference.
 *
 * Months are 30 days and years 365 days.
 *
 * @module dates/relative-time
 */

import {
  createRelativeTimeParseError,
  type RelativeTimeParseError,
} from './errors.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Units recognized in relative-time text
 */
export type RelativeTimeUnit = 'second' | 'minute' | 'hour' | 'day' | 'week' | 'month' | 'year';

/**
 * Outcome of parsing a relative-time string. Mirrors zod's safeParse shape.
 */
export type RelativeTimeParseResult =
  | {
      success: true;
      /** Resolved absolute instant */
      instant: Date;
      /** Number of units elapsed (0 for "just now") */
      quantity: number;
      /** Matched unit, or null for "just now" */
      unit: RelativeTimeUnit | null;
    }
  | {
      success: false;
      error: RelativeTimeParseError;
    };

// ============================================================================
// Constants
// ============================================================================

const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;
const MS_PER_DAY = 24 * MS_PER_HOUR;

/**
 * Duration of one unit in milliseconds.
 */
export const UNIT_DURATION_MS: Readonly<Record<RelativeTimeUnit, number>> = {
  second: MS_PER_SECOND,
  minute: MS_PER_MINUTE,
  hour: MS_PER_HOUR,
  day: MS_PER_DAY,
  week: 7 * MS_PER_DAY,
  month: 30 * MS_PER_DAY,
  year: 365 * MS_PER_DAY,
};

/** Literal phrases meaning "at the reference instant" */
const NOW_PHRASES: ReadonlySet<string> = new Set(['just now', 'now']);

/**
 * `<quantity> <unit>[s] ago`, quantity being digits or the indefinite article.
 * Unanchored at both ends; whatever follows "ago" is ignored.
 */
const RELATIVE_TIME_PATTERN =
  /\b(\d+|an?)\s*(second|minute|hour|day|week|month|year)s?\s*ago/;

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse a relative-time string against a reference instant.
 *
 * Never throws; unrecognized text comes back as `{ success: false }`.
 *
 * @example
 * ```typescript
 * const ref = new Date('2024-11-19T12:00:00Z');
 * parseRelativeTime('1 day ago', ref);   // instant 2024-11-18T12:00:00Z
 * parseRelativeTime('a week ago', ref);  // instant 2024-11-12T12:00:00Z
 * parseRelativeTime('banana', ref);      // success: false, reason 'unrecognized'
 * ```
 */
export function parseRelativeTime(text: string, reference: Date): RelativeTimeParseResult {
  const normalized = text.trim().toLowerCase();

  if (normalized.length === 0) {
    return { success: false, error: createRelativeTimeParseError('empty', text) };
  }

  if (NOW_PHRASES.has(normalized)) {
    return { success: true, instant: new Date(reference.getTime()), quantity: 0, unit: null };
  }

  const match = RELATIVE_TIME_PATTERN.exec(normalized);
  if (!match) {
    return { success: false, error: createRelativeTimeParseError('unrecognized', text) };
  }

  const [, rawQuantity = '', rawUnit = ''] = match;
  const unit = toUnit(rawUnit);
  if (unit === null) {
    return { success: false, error: createRelativeTimeParseError('unrecognized', text) };
  }

  const quantity = /^\d+$/.test(rawQuantity) ? parseInt(rawQuantity, 10) : 1;
  const instantMs = reference.getTime() - quantity * UNIT_DURATION_MS[unit];
  const instant = new Date(instantMs);

  if (Number.isNaN(instant.getTime())) {
    return { success: false, error: createRelativeTimeParseError('outOfRange', text) };
  }

  return { success: true, instant, quantity, unit };
}

/**
 * Parse a relative-time string, returning null when it cannot be resolved.
 */
export function parseRelativeTimeOrNull(text: string, reference: Date): Date | null {
  const result = parseRelativeTime(text, reference);
  return result.success ? result.instant : null;
}

/**
 * Narrow a matched unit token to a RelativeTimeUnit.
 */
function toUnit(token: string): RelativeTimeUnit | null {
  switch (token) {
    case 'second':
    case 'minute':
    case 'hour':
    case 'day':
    case 'week':
    case 'month':
    case 'year':
      return token;
    default:
      return null;
  }
}
