/**
 * STT Module Public Exports
 */

export { DeepgramTranscriber } from './services';
export { DEEPGRAM_CONFIG } from './config';
export { isLikelyNoise } from './utils';
export type { Transcriber, TranscribeOptions } from './types';
