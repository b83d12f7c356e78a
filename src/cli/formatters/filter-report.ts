/**
 * Filter Report Formatter
 *
 * Colored terminal rendering of a comment filter run.
 *
 * @module cli/formatters/filter-report
 */

import chalk from 'chalk';
import type { FilterStatistics } from '../../filter/comment-date-filter.js';
import type { NormalizationStats } from '../../comments/normalize.js';
import { formatCalendarDate, instantToCalendarDate } from '../../dates/zoned-time.js';

/**
 * Format filter statistics as report lines.
 *
 * @example
 * ```text
 * Date Range:  2024-10-01 to 2024-11-19 (America/New_York)
 * Comments:    20 -> 15
 *   Filtered:  5 out of range
 *   Unparseable: 0
 * Videos:      2 total (2 with comments, 0 without)
 * ```
 */
export function formatFilterReport(stats: FilterStatistics): string[] {
  const { timezone } = stats.dateRange;
  const start = formatCalendarDate(instantToCalendarDate(timezone, new Date(stats.dateRange.start)));
  const end = formatCalendarDate(instantToCalendarDate(timezone, new Date(stats.dateRange.end)));

  const unparseable =
    stats.unparseable > 0 ? chalk.yellow(String(stats.unparseable)) : String(stats.unparseable);

  return [
    `${chalk.dim('Date Range:')}  ${start} to ${end} ${chalk.dim(`(${timezone})`)}`,
    `${chalk.dim('Comments:')}    ${stats.totalBefore} -> ${chalk.bold(String(stats.totalAfter))}`,
    `  ${chalk.dim('Filtered:')}  ${stats.filteredOut} out of range`,
    `  ${chalk.dim('Unparseable:')} ${unparseable}`,
    `${chalk.dim('Videos:')}      ${stats.videosTotal} total ` +
      `(${stats.videosWithComments} with comments, ${stats.videosWithoutComments} without)`,
  ];
}

/**
 * Format normalization counts as a single line.
 *
 * @example
 * formatNormalizationLine({ total: 10, normalized: 8, invalid: 1, spam: 1 })
 * // 'Normalized 8/10 comments (1 invalid, 1 spam)'
 */
export function formatNormalizationLine(stats: NormalizationStats): string {
  return (
    `Normalized ${stats.normalized}/${stats.total} comments ` +
    `(${stats.invalid} invalid, ${stats.spam} spam)`
  );
}
