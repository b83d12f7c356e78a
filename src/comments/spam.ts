/**
 * Spam Heuristics
 *
 * Flags promotional or noise comments before they reach date filtering.
 *
 * @module comments/spam
 */

/**
 * Promotional phrases and link shorteners
 */
const SPAM_PATTERNS: readonly RegExp[] = [
  /check out my channel/i,
  /subscribe to my channel/i,
  /follow me on/i,
  /click here/i,
  /win free/i,
  /make money online/i,
  /work from home/i,
  /https?:\/\/bit\.ly\//,
  /https?:\/\/tinyurl\.com\//,
];

/** Uppercase share above which long text counts as shouting */
const MAX_UPPERCASE_RATIO = 0.7;
const UPPERCASE_MIN_LENGTH = 20;

/** Symbol/emoji share above which text counts as noise */
const MAX_SPECIAL_CHAR_RATIO = 0.5;
const SPECIAL_CHAR_MIN_LENGTH = 10;

/**
 * Check if comment text appears to be spam.
 *
 * @example
 * ```typescript
 * isLikelySpam('Check out my channel for more!'); // true
 * isLikelySpam('Great breakdown of the specs');   // false
 * ```
 */
export function isLikelySpam(text: string): boolean {
  if (!text) {
    return false;
  }

  if (SPAM_PATTERNS.some((pattern) => pattern.test(text))) {
    return true;
  }

  const chars = [...text];

  if (chars.length > UPPERCASE_MIN_LENGTH) {
    const uppercase = chars.filter((c) => c !== c.toLowerCase() && c === c.toUpperCase()).length;
    if (uppercase / chars.length > MAX_UPPERCASE_RATIO) {
      return true;
    }
  }

  if (chars.length > SPECIAL_CHAR_MIN_LENGTH) {
    const special = chars.filter((c) => !/[\p{L}\p{N}\s]/u.test(c)).length;
    if (special / chars.length > MAX_SPECIAL_CHAR_RATIO) {
      return true;
    }
  }

  return false;
}
