/**
 * Sliding-window rate limiter with independent per-minute and per-hour budgets.
 *
 * Each session keeps the timestamps of its admitted requests from the last hour,
 * stored as a JSON array in the shared KeyValueBackend. A request is admitted only
 * when fewer than `perMinute` of them are younger than a minute and fewer than
 * `perHour` are younger than an hour; rejected requests are not recorded. Check
 * and record run under the session's lock, so two concurrent callers can never
 * both take the last slot.
 */

import { logger, KeyedMutex, parseJson } from '@/shared/utils';
import type { KeyValueBackend } from '@/modules/store';
import { rateLimitConfig } from '../config';
import type { RateLimiterConfig } from '../config';
import type { RateLimitCheckResult } from '../types';

function isTimestampList(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((t) => typeof t === 'number' && Number.isFinite(t));
}

export class RateLimiterService {
  private readonly mutex = new KeyedMutex();

  constructor(
    private readonly backend: KeyValueBackend,
    private readonly config: RateLimiterConfig = rateLimitConfig
  ) {}

  /**
   * Admit or reject a request from sessionId
   */
  async allow(
    sessionId: string,
    perMinuteBudget: number,
    perHourBudget: number,
    now = Date.now()
  ): Promise<boolean> {
    return (await this.check(sessionId, perMinuteBudget, perHourBudget, now)).allowed;
  }

  async check(
    sessionId: string,
    perMinuteBudget: number,
    perHourBudget: number,
    now = Date.now()
  ): Promise<RateLimitCheckResult> {
    return this.mutex.runExclusive(sessionId, async () => {
      const stored = await this.read(sessionId);
      const hourStart = now - this.config.hourWindowMs;
      const timestamps = stored.filter((t) => t > hourStart);

      const minuteStart = now - this.config.minuteWindowMs;
      const inMinute = timestamps.filter((t) => t > minuteStart);

      let result: RateLimitCheckResult;
      if (inMinute.length >= perMinuteBudget) {
        result = this.reject(sessionId, 'minute', inMinute, this.config.minuteWindowMs, now);
      } else if (timestamps.length >= perHourBudget) {
        result = this.reject(sessionId, 'hour', timestamps, this.config.hourWindowMs, now);
      } else {
        timestamps.push(now);
        result = { allowed: true };
      }

      if (timestamps.length === 0) {
        if (stored.length > 0) {
          await this.backend.delete(this.key(sessionId));
        }
      } else if (timestamps.length !== stored.length) {
        await this.backend.set(
          this.key(sessionId),
          JSON.stringify(timestamps),
          Math.ceil(this.config.hourWindowMs / 1000)
        );
      }
      return result;
    });
  }

  /**
   * Forget all history for a session (called on session deletion)
   */
  async clear(sessionId: string): Promise<void> {
    await this.mutex.runExclusive(sessionId, () => this.backend.delete(this.key(sessionId)));
  }

  async getTrackedSessionCount(): Promise<number> {
    return (await this.backend.keys(this.config.keyPrefix)).length;
  }

  async cleanup(): Promise<void> {
    for (const key of await this.backend.keys(this.config.keyPrefix)) {
      await this.backend.delete(key);
    }
  }

  private async read(sessionId: string): Promise<number[]> {
    const raw = await this.backend.get(this.key(sessionId));
    if (raw === undefined) {
      return [];
    }
    const parsed = parseJson(raw);
    if (isTimestampList(parsed)) {
      return parsed;
    }
    logger.warn('Resetting malformed rate limit window', { sessionId });
    await this.backend.delete(this.key(sessionId));
    return [];
  }

  private reject(
    sessionId: string,
    limitedBy: 'minute' | 'hour',
    counted: number[],
    windowMs: number,
    now: number
  ): RateLimitCheckResult {
    const oldest = counted[0];
    const retryAfterMs = oldest !== undefined ? Math.max(0, oldest + windowMs - now) : windowMs;

    logger.warn('Rate limit exceeded', { sessionId, limitedBy, retryAfterMs });

    return { allowed: false, retryAfterMs, limitedBy };
  }

  private key(sessionId: string): string {
    return `${this.config.keyPrefix}${sessionId}`;
  }
}
