export { DEEPGRAM_CONFIG } from './deepgram.config';
