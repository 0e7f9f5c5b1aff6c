/**
 * Rate Limit Module Exports
 */

export { RateLimiterService } from './services';
export { rateLimitConfig } from './config';
export type { RateLimiterConfig } from './config';
export type { RateLimitCheckResult } from './types';
