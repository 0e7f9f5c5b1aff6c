/**
 * TTS Retry Configuration
 * Kept short: a retried chunk delays every chunk behind it
 */

export const ttsRetryConfig = {
  maxRetries: parseInt(process.env.TTS_MAX_RETRIES || '1', 10),
  baseDelay: 250,
  maxDelay: 2000,
} as const;
