/**
 * STT Module Type Definitions
 */

export interface TranscribeOptions {
  /** BCP-47 language code, e.g. "en" or "fr" */
  language: string;
  mimeType?: string;
}

/**
 * Turns one complete audio recording into text
 */
export interface Transcriber {
  transcribe(audio: Buffer, options: TranscribeOptions): Promise<string>;
}
