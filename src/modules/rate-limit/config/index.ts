export { rateLimitConfig } from './rate-limit.config';
export type { RateLimiterConfig } from './rate-limit.config';
