/**
 * Synthesis Cache Service
 * Content-addressed LRU of synthesized audio keyed on (text, voice, mode).
 * Never keyed on session or time, so identical utterances are shared across sessions.
 *
 * Entries are JSON records in a KeyValueBackend and are validated on every read:
 * anything that does not decode back to the stored audio is dropped as a miss.
 * Puts are serialised, so eviction-then-insert never interleaves with another put.
 */

import { createHash } from 'node:crypto';
import { logger, KeyedMutex, parseJson } from '@/shared/utils';
import type { KeyValueBackend } from '@/modules/store';
import type { ConversationMode } from '@/modules/session/config';
import { synthesisCacheConfig } from '../config';
import type { SynthesisCacheConfig } from '../config';
import type { SynthesisCacheEntry, SynthesisCacheStats } from '../types';

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;
const PUT_LOCK = 'put';

/**
 * Trim and collapse internal whitespace
 */
export function normalizeText(text: string): string {
  return text.trim().replace(/\s+/g, ' ');
}

function isCacheEntry(value: unknown, key: string): value is SynthesisCacheEntry {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const audio: unknown = Reflect.get(value, 'audioBase64');
  const size: unknown = Reflect.get(value, 'size');
  return (
    Reflect.get(value, 'key') === key &&
    typeof audio === 'string' &&
    audio.length > 0 &&
    audio.length % 4 === 0 &&
    BASE64_PATTERN.test(audio) &&
    typeof size === 'number' &&
    Buffer.byteLength(audio, 'base64') === size &&
    typeof Reflect.get(value, 'lastUsedAt') === 'number'
  );
}

export class SynthesisCacheService {
  private hits = 0;
  private misses = 0;
  private readonly mutex = new KeyedMutex();

  // key -> last use by this process; Map order is not relied on
  private readonly recency = new Map<string, number>();

  constructor(
    private readonly backend: KeyValueBackend,
    private readonly config: SynthesisCacheConfig = synthesisCacheConfig,
    private readonly now: () => number = Date.now
  ) {
    if (config.maxSize < 1) {
      throw new Error(`Synthesis cache size must be at least 1, got ${config.maxSize}`);
    }
  }

  computeKey(text: string, voice: string, mode: ConversationMode): string {
    return createHash('sha256')
      .update(`${normalizeText(text)}\u0000${voice}\u0000${mode}`)
      .digest('hex');
  }

  async get(text: string, voice: string, mode: ConversationMode): Promise<Buffer | undefined> {
    const key = this.computeKey(text, voice, mode);
    const entry = await this.read(key);

    if (!entry) {
      this.misses++;
      logger.debug('Synthesis cache miss', { key: key.slice(0, 12) });
      return undefined;
    }

    this.recency.set(key, this.now());
    this.hits++;

    logger.debug('Synthesis cache hit', { key: key.slice(0, 12), bytes: entry.size });
    return Buffer.from(entry.audioBase64, 'base64');
  }

  async put(text: string, voice: string, mode: ConversationMode, audio: Buffer): Promise<void> {
    if (audio.length === 0) {
      logger.debug('Skipping cache put for empty audio');
      return;
    }

    const key = this.computeKey(text, voice, mode);
    await this.mutex.runExclusive(PUT_LOCK, async () => {
      await this.backend.delete(this.storageKey(key));
      this.recency.delete(key);
      await this.evictToFit();

      const entry: SynthesisCacheEntry = {
        key,
        audioBase64: audio.toString('base64'),
        lastUsedAt: this.now(),
        size: audio.length,
      };
      await this.backend.set(this.storageKey(key), JSON.stringify(entry), this.config.ttlSeconds);
      this.recency.set(key, entry.lastUsedAt);
    });
  }

  async has(text: string, voice: string, mode: ConversationMode): Promise<boolean> {
    return (await this.read(this.computeKey(text, voice, mode))) !== undefined;
  }

  async clear(): Promise<void> {
    await this.mutex.runExclusive(PUT_LOCK, async () => {
      for (const storageKey of await this.backend.keys(this.config.keyPrefix)) {
        await this.backend.delete(storageKey);
      }
      this.recency.clear();
      this.hits = 0;
      this.misses = 0;
    });
  }

  async getStats(): Promise<SynthesisCacheStats> {
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups > 0 ? Math.round((this.hits / lookups) * 1000) / 10 : 0,
      size: (await this.backend.keys(this.config.keyPrefix)).length,
      maxSize: this.config.maxSize,
      backend: this.backend.kind,
    };
  }

  /**
   * Validated read. Malformed entries are deleted and reported as absent.
   */
  private async read(key: string): Promise<SynthesisCacheEntry | undefined> {
    const raw = await this.backend.get(this.storageKey(key));
    if (raw === undefined) {
      this.recency.delete(key);
      return undefined;
    }

    const parsed = parseJson(raw);
    if (isCacheEntry(parsed, key)) {
      return parsed;
    }

    logger.warn('Dropping corrupt synthesis cache entry', { key: key.slice(0, 12) });
    await this.backend.delete(this.storageKey(key));
    this.recency.delete(key);
    return undefined;
  }

  /**
   * Evict least recently used entries until one more fits. Stored entries this
   * process has not seen are read first: corrupt ones are dropped, the rest join
   * the recency index at their stored lastUsedAt.
   */
  private async evictToFit(): Promise<void> {
    const stored = (await this.backend.keys(this.config.keyPrefix)).map((storageKey) =>
      storageKey.slice(this.config.keyPrefix.length)
    );
    const present = new Set(stored);
    for (const key of this.recency.keys()) {
      if (!present.has(key)) {
        this.recency.delete(key);
      }
    }

    let size = 0;
    for (const key of stored) {
      if (this.recency.has(key)) {
        size++;
        continue;
      }
      const entry = await this.read(key);
      if (entry) {
        this.recency.set(key, entry.lastUsedAt);
        size++;
      }
    }

    while (size >= this.config.maxSize) {
      const oldest = this.oldestKey();
      if (oldest === undefined) {
        return;
      }
      await this.backend.delete(this.storageKey(oldest));
      this.recency.delete(oldest);
      size--;
      logger.debug('Evicted synthesis cache entry', { key: oldest.slice(0, 12) });
    }
  }

  private oldestKey(): string | undefined {
    let oldestKey: string | undefined;
    let oldestAt = Infinity;
    for (const [key, usedAt] of this.recency) {
      if (usedAt < oldestAt) {
        oldestAt = usedAt;
        oldestKey = key;
      }
    }
    return oldestKey;
  }

  private storageKey(key: string): string {
    return `${this.config.keyPrefix}${key}`;
  }
}
