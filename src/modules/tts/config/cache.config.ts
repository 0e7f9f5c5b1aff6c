/**
 * Synthesis Cache Configuration
 */

import { redisConfig } from '@/modules/store/config';

export type SynthesisCacheStore = 'memory' | 'redis';

function parseCacheStore(value: string | undefined): SynthesisCacheStore {
  return value === 'redis' ? 'redis' : 'memory';
}

export const synthesisCacheConfig = {
  maxSize: parseInt(process.env.TTS_CACHE_MAX_SIZE || '200', 10),
  ttlSeconds: parseInt(process.env.TTS_CACHE_TTL || '3600', 10), // 1 hour

  // 'redis' shares entries through the selected backend; 'memory' keeps them per process
  store: parseCacheStore(process.env.TTS_CACHE_BACKEND),
  keyPrefix: `${redisConfig.prefix}tts:`,
} as const;

export interface SynthesisCacheConfig {
  maxSize: number;
  ttlSeconds: number;
  keyPrefix: string;
}
