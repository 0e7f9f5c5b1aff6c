/**
 * Conversation Configuration
 * Turn timeout and history compression
 */

export const generationConfig = {
  // Overall bound on one turn; a stalled token stream or synthesis call fails the turn
  timeoutMs: parseInt(process.env.GENERATION_TIMEOUT_MS || '60000', 10),

  // Marker appended to a reply that was cut off by barge-in or stop
  interruptedMarker: '[interrupted]',

  // Prefix for a user message that interrupted the previous reply
  interruptedUserPrefix: '[INTERRUPTED] ',
} as const;

export const memoryConfig = {
  // Compress once more than this many messages are stored
  compressionThreshold: parseInt(process.env.MEMORY_COMPRESSION_THRESHOLD || '21', 10),

  // Messages kept verbatim after compression
  keepRecent: parseInt(process.env.MEMORY_KEEP_RECENT || '10', 10),

  // Per-message digest line and overall summary caps (characters)
  maxLineChars: 160,
  maxSummaryChars: 2000,
} as const;

export type MemoryConfig = typeof memoryConfig;
