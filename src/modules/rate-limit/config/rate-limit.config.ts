/**
 * Rate Limit Configuration
 * Per-session admission budgets for user turns
 */

import { redisConfig } from '@/modules/store/config';

export const rateLimitConfig = {
  perMinute: parseInt(process.env.RATE_LIMIT_RPM || '15', 10),
  perHour: parseInt(process.env.RATE_LIMIT_RPH || '200', 10),

  minuteWindowMs: 60_000,
  hourWindowMs: 3_600_000,

  keyPrefix: `${redisConfig.prefix}rl:`,
} as const;

export interface RateLimiterConfig {
  minuteWindowMs: number;
  hourWindowMs: number;
  keyPrefix: string;
}
