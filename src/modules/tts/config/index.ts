export { cartesiaConfig } from './cartesia.config';
export { ttsRetryConfig } from './retry.config';
export { synthesisCacheConfig } from './cache.config';
export type { SynthesisCacheConfig, SynthesisCacheStore } from './cache.config';
