/**
 * STT Service
 * Deepgram prerecorded transcription
 */

import { createClient } from '@deepgram/sdk';
import type { DeepgramClient } from '@deepgram/sdk';
import { logger } from '@/shared/utils';
import { DEEPGRAM_CONFIG } from '../config';
import type { TranscribeOptions, Transcriber } from '../types';

export class DeepgramTranscriber implements Transcriber {
  private client: DeepgramClient;

  constructor(apiKey: string = DEEPGRAM_CONFIG.apiKey) {
    this.client = createClient(apiKey);
  }

  async transcribe(audio: Buffer, options: TranscribeOptions): Promise<string> {
    if (audio.length === 0) {
      return '';
    }

    const startTime = Date.now();
    const { result, error } = await this.client.listen.prerecorded.transcribeFile(audio, {
      model: DEEPGRAM_CONFIG.model,
      language: options.language || DEEPGRAM_CONFIG.defaultLanguage,
      smart_format: DEEPGRAM_CONFIG.smart_format,
      punctuate: DEEPGRAM_CONFIG.punctuate,
      diarize: DEEPGRAM_CONFIG.diarize,
    });

    if (error) {
      logger.error('Deepgram transcription failed', error);
      throw error;
    }

    const transcript = result?.results?.channels?.[0]?.alternatives?.[0]?.transcript ?? '';

    logger.debug('Transcription complete', {
      bytes: audio.length,
      mimeType: options.mimeType,
      transcriptLength: transcript.length,
      durationMs: Date.now() - startTime,
    });

    return transcript.trim();
  }
}
