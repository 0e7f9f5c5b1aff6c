export { redisConfig } from './redis.config';
export type { RedisConfig } from './redis.config';
