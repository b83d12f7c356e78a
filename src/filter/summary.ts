/**
 * Filter Summary
 *
 * Plain-text rendering of FilterStatistics for logs and CLI output.
 *
 * @module filter/summary
 */

import { formatCalendarDate, instantToCalendarDate } from '../dates/zoned-time.js';
import type { FilterStatistics } from './comment-date-filter.js';

/**
 * Generate a human-readable summary of date filtering results.
 *
 * Range ends are shown as calendar dates in the range's own timezone.
 *
 * @example
 * ```text
 * Date Filter Summary:
 * - Date Range: 2024-10-01 to 2024-11-19 (America/New_York)
 * - Comments: 20 -> 15 (5 filtered out, 0 unparseable)
 * - Videos: 2 total (2 with comments, 0 without)
 * ```
 */
export function summarizeFilterStatistics(stats: FilterStatistics): string {
  const { timezone } = stats.dateRange;
  const start = formatCalendarDate(instantToCalendarDate(timezone, new Date(stats.dateRange.start)));
  const end = formatCalendarDate(instantToCalendarDate(timezone, new Date(stats.dateRange.end)));

  return [
    'Date Filter Summary:',
    `- Date Range: ${start} to ${end} (${timezone})`,
    `- Comments: ${stats.totalBefore} -> ${stats.totalAfter} ` +
      `(${stats.filteredOut} filtered out, ${stats.unparseable} unparseable)`,
    `- Videos: ${stats.videosTotal} total ` +
      `(${stats.videosWithComments} with comments, ${stats.videosWithoutComments} without)`,
  ].join('\n');
}
