/**
 * Backend Selection
 * Pings Redis once at start-up and picks the storage strategy for the process.
 * Nothing falls back per call: if the ping fails, memory is used until restart.
 */

import { Redis } from 'ioredis';
import { logger, errorMessage } from '@/shared/utils';
import type { RedisConfig } from '../config';
import type { KeyValueBackend } from '../types';
import { MemoryBackend } from './memory-backend.service';
import { RedisBackend } from './redis-backend.service';

/**
 * Redact credentials from a redis:// URL for logging
 */
export function redactRedisUrl(url: string): string {
  const at = url.lastIndexOf('@');
  if (at === -1) {
    return url;
  }
  const scheme = url.indexOf('://');
  return `${url.slice(0, scheme + 3)}***${url.slice(at)}`;
}

export async function selectBackend(config: RedisConfig): Promise<KeyValueBackend> {
  if (!config.url) {
    logger.info('REDIS_URL not configured, using in-memory store');
    return new MemoryBackend();
  }

  const client = new Redis(config.url, {
    lazyConnect: true,
    connectTimeout: config.connectTimeoutMs,
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
  });

  try {
    await client.connect();
    await client.ping();
    logger.info('Connected to Redis', { url: redactRedisUrl(config.url) });
    return new RedisBackend(client);
  } catch (error) {
    logger.warn('Redis unreachable, using in-memory store', {
      url: redactRedisUrl(config.url),
      error: errorMessage(error),
    });
    client.disconnect();
    return new MemoryBackend();
  }
}
