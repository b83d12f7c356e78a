/**
 * Comment Date Filter
 *
 * Filters comments grouped by video against an inclusive date range by
 * resolving each comment's relative timestamp against a reference instant.
 *
 * Outcomes per comment:
 * - inside the range: kept
 * - outside the range: dropped, counted in `filteredOut`
 * - unparseable timestamp: dropped, counted in `unparseable`
 *
 * Videos are never removed; a video whose comments are all dropped keeps
 * an empty list.
 *
 * @module filter/comment-date-filter
 */

import type { DateRange } from '../dates/date-range.js';
import { parseRelativeTime } from '../dates/relative-time.js';
import type { CommentRecord, CommentsByVideo, Logger } from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Aggregate statistics for one filter call
 */
export interface FilterStatistics {
  /** Comments across all videos before filtering */
  totalBefore: number;
  /** Comments kept */
  totalAfter: number;
  /** Comments dropped for resolving outside the range */
  filteredOut: number;
  /** Comments dropped because their timestamp could not be parsed */
  unparseable: number;
  /** Videos with at least one kept comment */
  videosWithComments: number;
  /** Videos left with no comments */
  videosWithoutComments: number;
  /** Videos in the input */
  videosTotal: number;
  /** The applied range, as ISO-8601 instants */
  dateRange: {
    start: string;
    end: string;
    timezone: string;
  };
}

/**
 * Result of filtering with statistics
 */
export interface CommentFilterResult<T extends CommentRecord> {
  /** Kept comments per video; every input video is present */
  commentsByVideo: Record<string, T[]>;
  stats: FilterStatistics;
}

/**
 * Options for the comment filter
 */
export interface CommentFilterOptions {
  /** Optional logger for per-video and summary messages */
  logger?: Logger;
}

/**
 * Classification of a single comment against a range
 */
export type CommentDateOutcome = 'kept' | 'filteredOut' | 'unparseable';

// ============================================================================
// Range Checks
// ============================================================================

/**
 * Check if an instant falls within a range, both ends inclusive.
 */
export function isInstantInRange(instant: Date, range: DateRange): boolean {
  const time = instant.getTime();
  return time >= range.start.getTime() && time <= range.end.getTime();
}

/**
 * Classify one comment against a range.
 */
export function classifyComment(
  comment: CommentRecord,
  range: DateRange,
  reference: Date
): CommentDateOutcome {
  const parsed = parseRelativeTime(comment.relativeTimeText, reference);
  if (!parsed.success) {
    return 'unparseable';
  }
  return isInstantInRange(parsed.instant, range) ? 'kept' : 'filteredOut';
}

// ============================================================================
// Main Filter Function
// ============================================================================

/**
 * Filter comments by date range.
 *
 * The input is not mutated; kept comments are the same record objects in
 * their original order. Calling twice with the same inputs and reference
 * yields identical output.
 *
 * @param commentsByVideo - Comments grouped by video ID (object or Map)
 * @param range - Validated inclusive range
 * @param reference - Instant the relative timestamps are measured from
 * @param options - Optional logger
 *
 * @example
 * ```typescript
 * const range = validateDateRange('2024-10-01', '2024-11-19', 'UTC');
 * const { commentsByVideo, stats } = filterCommentsByDateRange(input, range, requestTime);
 * console.log(`${stats.totalBefore} → ${stats.totalAfter} comments`);
 * ```
 */
export function filterCommentsByDateRange<T extends CommentRecord>(
  commentsByVideo: CommentsByVideo<T>,
  range: DateRange,
  reference: Date,
  options: CommentFilterOptions = {}
): CommentFilterResult<T> {
  const { logger } = options;
  const entries = toEntries(commentsByVideo);

  logger?.info(
    `Starting date filter: ${range.start.toISOString()} to ${range.end.toISOString()} ` +
      `(timezone: ${range.timezone})`
  );

  const filtered: Record<string, T[]> = {};
  const stats: FilterStatistics = {
    totalBefore: 0,
    totalAfter: 0,
    filteredOut: 0,
    unparseable: 0,
    videosWithComments: 0,
    videosWithoutComments: 0,
    videosTotal: entries.length,
    dateRange: {
      start: range.start.toISOString(),
      end: range.end.toISOString(),
      timezone: range.timezone,
    },
  };

  for (const [videoId, comments] of entries) {
    stats.totalBefore += comments.length;
    const kept: T[] = [];

    for (const comment of comments) {
      const outcome = classifyComment(comment, range, reference);

      if (outcome === 'kept') {
        kept.push(comment);
      } else if (outcome === 'filteredOut') {
        stats.filteredOut++;
      } else {
        stats.unparseable++;
        logger?.debug(
          `Comment ${comment.commentId} has unparseable date: '${comment.relativeTimeText}'`
        );
      }
    }

    setOwnEntry(filtered, videoId, kept);
    stats.totalAfter += kept.length;

    if (kept.length > 0) {
      stats.videosWithComments++;
      logger?.debug(`Video ${videoId}: ${kept.length}/${comments.length} comments in date range`);
    } else {
      stats.videosWithoutComments++;
      logger?.debug(`Video ${videoId}: no comments in date range (had ${comments.length} total)`);
    }
  }

  logger?.info(
    `Date filter complete: ${stats.totalBefore} → ${stats.totalAfter} comments ` +
      `(${stats.filteredOut} filtered out, ${stats.unparseable} unparseable)`
  );

  if (stats.unparseable > 0) {
    logger?.warn(`${stats.unparseable} comments had unparseable dates and were excluded`);
  }

  return { commentsByVideo: filtered, stats };
}

/**
 * Snapshot input entries so the iteration matches the counted totals.
 */
function toEntries<T extends CommentRecord>(
  commentsByVideo: CommentsByVideo<T>
): Array<[string, readonly T[]]> {
  if (isReadonlyMap(commentsByVideo)) {
    return [...commentsByVideo.entries()];
  }
  return Object.entries(commentsByVideo);
}

/**
 * Assign as an own enumerable property, so IDs such as "__proto__" stay keys.
 */
export function setOwnEntry<V>(target: Record<string, V>, key: string, value: V): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

function isReadonlyMap<V>(
  value: Readonly<Record<string, V>> | ReadonlyMap<string, V>
): value is ReadonlyMap<string, V> {
  return value instanceof Map;
}
