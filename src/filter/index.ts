/**
 * Comment Filtering
 *
 * @module filter
 */

export {
  filterCommentsByDateRange,
  classifyComment,
  isInstantInRange,
  type FilterStatistics,
  type CommentFilterResult,
  type CommentFilterOptions,
  type CommentDateOutcome,
} from './comment-date-filter.js';

export { summarizeFilterStatistics } from './summary.js';
