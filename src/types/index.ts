/**
 * Shared Types
 *
 * Cross-cutting interfaces used by the date, filter and comment modules.
 *
 * @module types
 */

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for library components.
 * Allows components to log at various levels without depending on a specific logger.
 * The CLI's BaseCommand implements it.
 */
export interface Logger {
  /** Log debug-level message (typically hidden unless verbose) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Comment Record
// ============================================================================

/**
 * The minimum shape a comment must expose to be date-filtered.
 * Any other fields are carried through untouched.
 */
export interface CommentRecord {
  /** Opaque comment identifier */
  commentId: string;
  /** Free-form relative timestamp, e.g. "2 months ago" */
  relativeTimeText: string;
}

/**
 * Comments grouped by opaque video identifier.
 * Plain objects and Maps are both accepted as input.
 */
export type CommentsByVideo<T extends CommentRecord = CommentRecord> =
  | Readonly<Record<string, readonly T[]>>
  | ReadonlyMap<string, readonly T[]>;
