export { SynthesisCacheService, normalizeText } from './synthesis-cache.service';
export { CachedSynthesizer } from './cached-synthesizer.service';
export { CartesiaSynthesizer } from './tts.service';
