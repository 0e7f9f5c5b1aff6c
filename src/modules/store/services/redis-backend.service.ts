/**
 * Redis Backend
 * KeyValueBackend over an already-connected ioredis client
 */

import type { Redis } from 'ioredis';
import { logger, errorMessage } from '@/shared/utils';
import type { KeyValueBackend } from '../types';

const SCAN_BATCH_SIZE = 100;

export class RedisBackend implements KeyValueBackend {
  readonly kind = 'redis' as const;

  constructor(private readonly client: Redis) {}

  async get(key: string): Promise<string | undefined> {
    const value = await this.client.get(key);
    return value ?? undefined;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds && ttlSeconds > 0) {
      await this.client.set(key, value, 'EX', ttlSeconds);
      return;
    }
    await this.client.set(key, value);
  }

  async delete(key: string): Promise<void> {
    await this.client.del(key);
  }

  async keys(prefix: string): Promise<string[]> {
    const found: string[] = [];
    let cursor = '0';
    do {
      const [next, batch] = await this.client.scan(
        cursor,
        'MATCH',
        `${prefix}*`,
        'COUNT',
        SCAN_BATCH_SIZE
      );
      found.push(...batch);
      cursor = next;
    } while (cursor !== '0');
    return found;
  }

  async close(): Promise<void> {
    try {
      await this.client.quit();
      logger.info('Redis connection closed');
    } catch (error) {
      logger.warn('Redis quit failed, forcing disconnect', { error: errorMessage(error) });
      this.client.disconnect();
    }
  }
}
