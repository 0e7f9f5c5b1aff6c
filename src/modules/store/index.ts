/**
 * Store Module Exports
 */

export { MemoryBackend, RedisBackend, selectBackend, redactRedisUrl } from './services';
export { redisConfig } from './config';
export type { RedisConfig } from './config';
export type { KeyValueBackend, BackendKind } from './types';
