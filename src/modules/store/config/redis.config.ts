/**
 * Redis Configuration
 * An empty REDIS_URL keeps all shared state in process memory
 */

export const redisConfig = {
  url: process.env.REDIS_URL || '',
  prefix: process.env.REDIS_PREFIX || 'voiceloop:',
  sessionTtlSeconds: parseInt(process.env.REDIS_SESSION_TTL || '7200', 10), // 2 hours
  connectTimeoutMs: parseInt(process.env.REDIS_CONNECT_TIMEOUT || '2000', 10),
} as const;

export type RedisConfig = {
  url: string;
  prefix: string;
  sessionTtlSeconds: number;
  connectTimeoutMs: number;
};
