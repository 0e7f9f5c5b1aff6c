/**
 * SynthesisCacheService Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { SynthesisCacheService, normalizeText } from '@/modules/tts';
import type { SynthesisCacheConfig } from '@/modules/tts';
import { ConversationMode } from '@/modules/session';
import { MemoryBackend } from '@/modules/store';

const GENERAL = ConversationMode.GENERAL;

const config: SynthesisCacheConfig = {
  maxSize: 2,
  ttlSeconds: 3_600,
  keyPrefix: 'test:tts:',
};

describe('SynthesisCacheService', () => {
  let now: number;
  let backend: MemoryBackend;
  let cache: SynthesisCacheService;

  beforeEach(() => {
    now = 1;
    backend = new MemoryBackend();
    cache = new SynthesisCacheService(backend, config, () => now);
  });

  function storageKey(text: string, voice = 'v'): string {
    return `test:tts:${cache.computeKey(text, voice, GENERAL)}`;
  }

  it('should return undefined on a miss and the stored audio on a hit', async () => {
    expect(await cache.get('Hello there.', 'voice-a', GENERAL)).toBeUndefined();

    await cache.put('Hello there.', 'voice-a', GENERAL, Buffer.from('audio-1'));

    expect((await cache.get('Hello there.', 'voice-a', GENERAL))?.toString()).toBe('audio-1');
    expect(await cache.getStats()).toEqual({
      hits: 1,
      misses: 1,
      hitRate: 50,
      size: 1,
      maxSize: 2,
      backend: 'memory',
    });
  });

  it('should store entries as JSON records in the backend', async () => {
    now = 42;
    await cache.put('Hello there.', 'v', GENERAL, Buffer.from('audio-1'));

    const raw = await backend.get(storageKey('Hello there.'));
    expect(raw).toBeDefined();
    expect(JSON.parse(raw ?? '')).toEqual({
      key: cache.computeKey('Hello there.', 'v', GENERAL),
      audioBase64: Buffer.from('audio-1').toString('base64'),
      lastUsedAt: 42,
      size: 7,
    });
  });

  it('should key on normalized text', async () => {
    await cache.put('Hello   there.', 'voice-a', GENERAL, Buffer.from('audio-1'));

    expect(await cache.has('  Hello there. ', 'voice-a', GENERAL)).toBe(true);
    expect(cache.computeKey('Hello\nthere.', 'voice-a', GENERAL)).toBe(
      cache.computeKey('Hello there.', 'voice-a', GENERAL)
    );
  });

  it('should keep voices and modes apart', async () => {
    await cache.put('Hello there.', 'voice-a', GENERAL, Buffer.from('audio-1'));

    expect(await cache.has('Hello there.', 'voice-b', GENERAL)).toBe(false);
    expect(await cache.has('Hello there.', 'voice-a', ConversationMode.INTERVIEW)).toBe(false);
  });

  it('should evict the least recently used entry when full', async () => {
    await cache.put('one', 'v', GENERAL, Buffer.from('1'));
    now = 2;
    await cache.put('two', 'v', GENERAL, Buffer.from('2'));
    now = 3;
    await cache.get('one', 'v', GENERAL);
    now = 4;

    await cache.put('three', 'v', GENERAL, Buffer.from('3'));

    expect(await cache.has('one', 'v', GENERAL)).toBe(true);
    expect(await cache.has('two', 'v', GENERAL)).toBe(false);
    expect(await cache.has('three', 'v', GENERAL)).toBe(true);
    expect(await backend.keys('test:tts:')).toHaveLength(2);
  });

  it('should order entries written by another process by their stored lastUsedAt', async () => {
    const other = new SynthesisCacheService(backend, config, () => now);
    now = 5;
    await other.put('newer', 'v', GENERAL, Buffer.from('n'));
    now = 1;
    await other.put('older', 'v', GENERAL, Buffer.from('o'));
    now = 10;

    await cache.put('fresh', 'v', GENERAL, Buffer.from('f'));

    expect(await cache.has('older', 'v', GENERAL)).toBe(false);
    expect(await cache.has('newer', 'v', GENERAL)).toBe(true);
    expect(await cache.has('fresh', 'v', GENERAL)).toBe(true);
  });

  it('should replace an existing key without evicting another', async () => {
    await cache.put('one', 'v', GENERAL, Buffer.from('1'));
    await cache.put('two', 'v', GENERAL, Buffer.from('2'));

    await cache.put('one', 'v', GENERAL, Buffer.from('1b'));

    expect((await cache.get('one', 'v', GENERAL))?.toString()).toBe('1b');
    expect(await cache.has('two', 'v', GENERAL)).toBe(true);
  });

  it('should not store empty audio', async () => {
    await cache.put('one', 'v', GENERAL, Buffer.alloc(0));

    expect(await backend.keys('test:tts:')).toEqual([]);
  });

  it('should treat an entry with undecodable audio as a miss and drop it', async () => {
    const key = cache.computeKey('one', 'v', GENERAL);
    await backend.set(
      storageKey('one'),
      JSON.stringify({ key, audioBase64: 'not base64!', lastUsedAt: 1, size: 3 })
    );

    expect(await cache.get('one', 'v', GENERAL)).toBeUndefined();
    expect(await backend.get(storageKey('one'))).toBeUndefined();
    expect((await cache.getStats()).misses).toBe(1);
  });

  it('should drop entries that are not JSON', async () => {
    await backend.set(storageKey('one'), 'garbage');

    expect(await cache.has('one', 'v', GENERAL)).toBe(false);
    expect(await backend.get(storageKey('one'))).toBeUndefined();
  });

  it('should drop entries whose size does not match the audio', async () => {
    const key = cache.computeKey('one', 'v', GENERAL);
    await backend.set(
      storageKey('one'),
      JSON.stringify({ key, audioBase64: Buffer.from('1').toString('base64'), lastUsedAt: 1, size: 9 })
    );

    expect(await cache.get('one', 'v', GENERAL)).toBeUndefined();
  });

  it('should drop corrupt entries before evicting valid ones', async () => {
    await cache.put('one', 'v', GENERAL, Buffer.from('1'));
    await backend.set('test:tts:garbage', 'x');

    await cache.put('two', 'v', GENERAL, Buffer.from('2'));

    expect(await backend.get('test:tts:garbage')).toBeUndefined();
    expect(await cache.has('one', 'v', GENERAL)).toBe(true);
    expect(await cache.has('two', 'v', GENERAL)).toBe(true);
  });

  it('should round the hit rate to one decimal and reset on clear', async () => {
    await cache.put('one', 'v', GENERAL, Buffer.from('1'));
    await cache.get('one', 'v', GENERAL);
    await cache.get('two', 'v', GENERAL);
    await cache.get('three', 'v', GENERAL);

    expect((await cache.getStats()).hitRate).toBe(33.3);

    await cache.clear();
    expect(await cache.getStats()).toEqual({
      hits: 0,
      misses: 0,
      hitRate: 0,
      size: 0,
      maxSize: 2,
      backend: 'memory',
    });
  });

  it('should refuse a size below one', () => {
    expect(() => new SynthesisCacheService(backend, { ...config, maxSize: 0 })).toThrow('at least 1');
  });

  it('should normalize whitespace', () => {
    expect(normalizeText('  a \t b\n\nc ')).toBe('a b c');
  });
});
