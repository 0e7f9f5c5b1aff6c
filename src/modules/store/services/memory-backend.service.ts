/**
 * In-Memory Backend
 * Map-backed KeyValueBackend with lazy per-key expiry
 */

import type { KeyValueBackend } from '../types';

interface MemoryEntry {
  value: string;
  expiresAt?: number;
}

export class MemoryBackend implements KeyValueBackend {
  readonly kind = 'memory' as const;
  private entries = new Map<string, MemoryEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | undefined> {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    this.entries.set(key, {
      value,
      expiresAt: ttlSeconds && ttlSeconds > 0 ? this.now() + ttlSeconds * 1000 : undefined,
    });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async keys(prefix: string): Promise<string[]> {
    const result: string[] = [];
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        continue;
      }
      if (key.startsWith(prefix)) {
        result.push(key);
      }
    }
    return result;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  private isExpired(entry: MemoryEntry): boolean {
    return entry.expiresAt !== undefined && entry.expiresAt <= this.now();
  }
}
