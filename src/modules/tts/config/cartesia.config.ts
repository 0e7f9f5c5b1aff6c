/**
 * Cartesia TTS Configuration
 * Only the API key comes from the environment
 */

export const cartesiaConfig = {
  apiKey: process.env.CARTESIA_API_KEY || '',

  model: 'sonic-2',

  // Audio format returned to clients
  container: 'wav' as const,
  encoding: 'pcm_s16le' as const,
  sampleRate: 24000,
  language: 'en' as const,

  // Maximum transcript length per request (Cartesia API limit)
  maxTextLength: 5000,
} as const;
