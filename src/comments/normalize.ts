/**
 * Comment Normalizer
 *
 * Turns raw comment payloads from the search API into NormalizedComment
 * records with a `relativeTimeText` the date filter can resolve.
 * Items that fail schema validation or look like spam are dropped and
 * counted; one bad item never stops the rest.
 *
 * @module comments/normalize
 */

import { RawCommentSchema, type NormalizedComment, type ParsedRawComment } from '../schemas/comment.js';
import type { Logger } from '../types/index.js';
import { setOwnEntry } from '../filter/comment-date-filter.js';
import { isLikelySpam } from './spam.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Counts from one normalization pass
 */
export interface NormalizationStats {
  /** Raw items received */
  total: number;
  /** Items normalized successfully */
  normalized: number;
  /** Items rejected by the schema */
  invalid: number;
  /** Items dropped as likely spam */
  spam: number;
}

/**
 * Result of normalizing one list of raw comments
 */
export interface NormalizationResult {
  comments: NormalizedComment[];
  stats: NormalizationStats;
}

/**
 * Result of normalizing comments grouped by video
 */
export interface NormalizationByVideoResult {
  commentsByVideo: Record<string, NormalizedComment[]>;
  stats: NormalizationStats;
}

/**
 * Options for comment normalization
 */
export interface NormalizeOptions {
  /** Drop likely spam (default: true) */
  dropSpam?: boolean;
  /** Optional logger for skipped items */
  logger?: Logger;
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * Map a validated raw comment to a NormalizedComment.
 */
export function toNormalizedComment(raw: ParsedRawComment): NormalizedComment {
  const likeCount = raw.stats.votes;
  const replyCount = raw.stats.replies;

  return {
    commentId: raw.commentId,
    text: raw.content,
    authorName: raw.author.title,
    authorChannelId: raw.author.channelId,
    authorBadges: raw.author.badges ?? [],
    likeCount,
    replyCount,
    engagementScore: likeCount + replyCount,
    relativeTimeText: raw.publishedTimeText,
    isChannelOwner: raw.author.isChannelOwner,
    hasCreatorHeart: raw.creatorHeart,
    isPinned: raw.pinned?.status ?? false,
    textLength: [...raw.content].length,
  };
}

/**
 * Normalize a list of raw comment payloads.
 *
 * @param rawComments - Untrusted items from the search API
 * @param options - Spam handling and logger
 */
export function normalizeComments(
  rawComments: readonly unknown[],
  options: NormalizeOptions = {}
): NormalizationResult {
  const { dropSpam = true, logger } = options;
  const comments: NormalizedComment[] = [];
  const stats: NormalizationStats = {
    total: rawComments.length,
    normalized: 0,
    invalid: 0,
    spam: 0,
  };

  rawComments.forEach((item, index) => {
    const parseResult = RawCommentSchema.safeParse(item);
    if (!parseResult.success) {
      stats.invalid++;
      logger?.warn(`Comment at index ${index} is invalid, skipping: ${parseResult.error.message}`);
      return;
    }

    const raw = parseResult.data;
    if (dropSpam && isLikelySpam(raw.content)) {
      stats.spam++;
      logger?.debug(`Skipping likely spam comment: ${raw.commentId}`);
      return;
    }

    comments.push(toNormalizedComment(raw));
    stats.normalized++;
  });

  logger?.debug(
    `Normalized ${stats.normalized}/${stats.total} comments ` +
      `(${stats.invalid} invalid, ${stats.spam} spam)`
  );

  return { comments, stats };
}

/**
 * Normalize raw comments grouped by video.
 * Every input video is kept, even when none of its comments survive.
 */
export function normalizeCommentsByVideo(
  rawByVideo: Readonly<Record<string, readonly unknown[]>>,
  options: NormalizeOptions = {}
): NormalizationByVideoResult {
  const commentsByVideo: Record<string, NormalizedComment[]> = {};
  const stats: NormalizationStats = { total: 0, normalized: 0, invalid: 0, spam: 0 };

  for (const [videoId, rawComments] of Object.entries(rawByVideo)) {
    const result = normalizeComments(rawComments, options);
    setOwnEntry(commentsByVideo, videoId, result.comments);
    stats.total += result.stats.total;
    stats.normalized += result.stats.normalized;
    stats.invalid += result.stats.invalid;
    stats.spam += result.stats.spam;
  }

  return { commentsByVideo, stats };
}
