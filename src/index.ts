/**
 * Comment Window
 *
 * Resolves YouTube relative comment timestamps ("3 days ago") to absolute
 * instants and filters comment collections by an inclusive calendar date
 * range interpreted in a region's timezone.
 *
 * @example
 * ```typescript
 * import {
 *   resolveRegionTimezone,
 *   validateDateRange,
 *   filterCommentsByDateRange,
 * } from 'youtube-comment-window';
 *
 * const reference = new Date();
 * const timezone = resolveRegionTimezone('US');
 * const range = validateDateRange('2024-10-01', '2024-11-19', timezone);
 * const { commentsByVideo, stats } = filterCommentsByDateRange(input, range, reference);
 * ```
 *
 * @module youtube-comment-window
 */

export * from './dates/index.js';
export * from './filter/index.js';
export * from './comments/index.js';
export * from './schemas/index.js';
export type { Logger, CommentRecord, CommentsByVideo } from './types/index.js';
