/**
 * Comment Schemas
 *
 * Raw comment payloads as returned by the third-party search API, and the
 * normalized records the date filter consumes.
 *
 * @module schemas/comment
 */

import { z } from 'zod';

// ============================================
// Raw Comment Schema
// ============================================

/**
 * Comment author as returned by the search API.
 */
export const RawCommentAuthorSchema = z.object({
  channelId: z.string().default(''),
  title: z.string().default('Unknown User'),
  badges: z.array(z.string()).nullish(),
  isChannelOwner: z.boolean().default(false),
});

/**
 * Raw comment payload. Only `commentId` is strictly required; the rest
 * degrade to defaults so partially-populated items still normalize.
 */
export const RawCommentSchema = z.object({
  commentId: z.string().min(1, 'commentId is required'),
  content: z.string().default(''),
  publishedTimeText: z.string().default(''),
  author: RawCommentAuthorSchema.default({}),
  stats: z
    .object({
      votes: z.number().int().nonnegative().default(0),
      replies: z.number().int().nonnegative().default(0),
    })
    .default({}),
  creatorHeart: z.boolean().default(false),
  pinned: z
    .object({
      status: z.boolean().default(false),
      text: z.string().nullish(),
    })
    .nullish(),
});

export type RawComment = z.input<typeof RawCommentSchema>;
export type ParsedRawComment = z.output<typeof RawCommentSchema>;

// ============================================
// Normalized Comment Schema
// ============================================

/**
 * Minimal record accepted by the date filter.
 * Extra fields are preserved so callers' comment shapes pass through.
 */
export const CommentRecordSchema = z
  .object({
    commentId: z.string().min(1),
    relativeTimeText: z.string(),
  })
  .passthrough();

/**
 * Comments grouped by video ID, as accepted by the CLI filter command.
 */
export const CommentsByVideoSchema = z.record(z.string(), z.array(CommentRecordSchema));

/**
 * Raw comments grouped by video ID.
 */
export const RawCommentsByVideoSchema = z.record(z.string(), z.array(z.unknown()));

/**
 * Normalized comment produced from a raw payload.
 */
export const NormalizedCommentSchema = z.object({
  commentId: z.string().min(1),
  text: z.string(),
  authorName: z.string(),
  authorChannelId: z.string(),
  authorBadges: z.array(z.string()),
  likeCount: z.number().int().nonnegative(),
  replyCount: z.number().int().nonnegative(),
  /** likes + replies */
  engagementScore: z.number().int().nonnegative(),
  relativeTimeText: z.string(),
  isChannelOwner: z.boolean(),
  hasCreatorHeart: z.boolean(),
  isPinned: z.boolean(),
  textLength: z.number().int().nonnegative(),
});

export type NormalizedComment = z.infer<typeof NormalizedCommentSchema>;
