/**
 * Schema exports
 *
 * @module schemas
 */

export {
  RawCommentAuthorSchema,
  RawCommentSchema,
  CommentRecordSchema,
  CommentsByVideoSchema,
  RawCommentsByVideoSchema,
  NormalizedCommentSchema,
  type RawComment,
  type ParsedRawComment,
  type NormalizedComment,
} from './comment.js';

export {
  FilterRequestSchema,
  hasDateRange,
  type FilterRequest,
  type DatedFilterRequest,
} from './filter-request.js';
