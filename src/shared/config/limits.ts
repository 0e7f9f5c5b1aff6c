/**
 * Input Limits
 * Bounds applied to user input before any upstream call
 */

export const inputLimitsConfig = {
  maxTextLength: parseInt(process.env.MAX_TEXT_LENGTH || '2000', 10),
  maxAudioBytes: parseInt(process.env.MAX_AUDIO_SIZE || String(3 * 1024 * 1024), 10), // 3 MiB
} as const;
