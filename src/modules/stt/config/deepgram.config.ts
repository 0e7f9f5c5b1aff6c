/**
 * Deepgram Configuration
 * Prerecorded transcription of one complete utterance per request
 */

export const DEEPGRAM_CONFIG = {
  apiKey: process.env.DEEPGRAM_API_KEY || '',

  // Model Selection
  model: 'nova-2' as const,
  defaultLanguage: 'en' as const,

  // Features
  smart_format: true,
  punctuate: true,
  diarize: false,
} as const;
