/**
 * TTS Module Exports
 */

export { CartesiaSynthesizer, CachedSynthesizer, SynthesisCacheService, normalizeText } from './services';
export { cartesiaConfig, ttsRetryConfig, synthesisCacheConfig } from './config';
export type { SynthesisCacheConfig, SynthesisCacheStore } from './config';
export { classifySynthesisError, getRetryDelay, collectAudio } from './utils';
export { TTSErrorType } from './types';
export type {
  SpeechSynthesizer,
  SynthesisCacheEntry,
  SynthesisCacheStats,
  ClassifiedSynthesisError,
} from './types';
