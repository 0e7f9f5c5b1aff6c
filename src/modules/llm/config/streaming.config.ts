/**
 * Sentence Streaming Configuration
 *
 * Controls how model output is grouped into chunks for synthesis. The first
 * chunk is kept short for time-to-first-audio; later chunks carry several
 * sentences so prosody stays natural.
 */

export const streamingConfig = {
  /**
   * Sentences in the first chunk of a reply
   */
  firstChunkSentences: parseInt(process.env.STREAMING_FIRST_CHUNK_SENTENCES || '1', 10),

  /**
   * Sentences in every later chunk
   */
  subsequentChunkSentences: parseInt(process.env.STREAMING_SUBSEQUENT_CHUNK_SENTENCES || '2', 10),

  /**
   * Non-whitespace characters a sentence needs before its terminator counts.
   * Shorter fragments ("Hi.", "Ok!") are merged into the following sentence.
   */
  minSentenceChars: parseInt(process.env.STREAMING_MIN_SENTENCE_CHARS || '8', 10),

  /**
   * Log preview length for chunk text (characters)
   */
  logPreviewLength: 50,

  validate(): void {
    if (this.firstChunkSentences < 1 || this.subsequentChunkSentences < 1) {
      throw new Error('Chunk sentence counts must be at least 1');
    }
    if (this.minSentenceChars < 0) {
      throw new Error('STREAMING_MIN_SENTENCE_CHARS must not be negative');
    }
  },
} as const;

/**
 * Streaming configuration type for TypeScript consumers
 */
export type StreamingConfig = typeof streamingConfig;

export type ChunkerOptions = Pick<
  StreamingConfig,
  'firstChunkSentences' | 'subsequentChunkSentences' | 'minSentenceChars'
>;
