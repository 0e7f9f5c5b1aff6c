export { MemoryBackend } from './memory-backend.service';
export { RedisBackend } from './redis-backend.service';
export { selectBackend, redactRedisUrl } from './backend-selector.service';
