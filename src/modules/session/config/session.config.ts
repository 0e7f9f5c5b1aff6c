/**
 * Session Store Configuration
 */

import { redisConfig } from '@/modules/store/config';

export const sessionConfig = {
  // Idle time before a session is swept
  idleTimeoutMs: parseInt(process.env.SESSION_TIMEOUT || '3600', 10) * 1000, // 1 hour
  cleanupIntervalMs: parseInt(process.env.SESSION_CLEANUP_INTERVAL || '300000', 10), // 5 min
  maxSessions: parseInt(process.env.MAX_SESSIONS || '200', 10),

  keyPrefix: `${redisConfig.prefix}session:`,
  ttlSeconds: redisConfig.sessionTtlSeconds,
} as const;

export interface SessionStoreConfig {
  idleTimeoutMs: number;
  cleanupIntervalMs: number;
  maxSessions: number;
  keyPrefix: string;
  ttlSeconds: number;
}
