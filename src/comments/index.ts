/**
 * Comment Normalization
 *
 * @module comments
 */

export {
  normalizeComments,
  normalizeCommentsByVideo,
  toNormalizedComment,
  type NormalizationStats,
  type NormalizationResult,
  type NormalizationByVideoResult,
  type NormalizeOptions,
} from './normalize.js';

export { isLikelySpam } from './spam.js';
