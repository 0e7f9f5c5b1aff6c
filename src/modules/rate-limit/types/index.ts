/**
 * Rate Limit Type Definitions
 */

export interface RateLimitCheckResult {
  allowed: boolean;
  /**
   * When the request is not allowed, milliseconds until the oldest
   * counted request leaves the window that rejected it
   */
  retryAfterMs?: number;
  limitedBy?: 'minute' | 'hour';
}
