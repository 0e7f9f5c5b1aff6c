/**
 * TTS Service
 * Request/response synthesis against Cartesia's bytes endpoint
 */

import { CartesiaClient } from '@cartesia/cartesia-js';
import { logger } from '@/shared/utils';
import type { ConversationMode } from '@/modules/session/config';
import { cartesiaConfig, ttsRetryConfig } from '../config';
import type { SpeechSynthesizer } from '../types';
import { classifySynthesisError, collectAudio, getRetryDelay } from '../utils';

export class CartesiaSynthesizer implements SpeechSynthesizer {
  private client: CartesiaClient;

  constructor(apiKey: string = cartesiaConfig.apiKey) {
    this.client = new CartesiaClient({ apiKey });
  }

  async synthesize(text: string, voice: string, mode: ConversationMode): Promise<Buffer> {
    let transcript = text.trim();
    if (!transcript) {
      throw new Error('Cannot synthesize empty text');
    }

    if (transcript.length > cartesiaConfig.maxTextLength) {
      logger.warn('Text truncated to max length', {
        originalLength: transcript.length,
        maxLength: cartesiaConfig.maxTextLength,
      });
      transcript = transcript.substring(0, cartesiaConfig.maxTextLength);
    }

    for (let attempt = 0; ; attempt++) {
      const startTime = Date.now();
      try {
        const audio = await this.request(transcript, voice);
        logger.debug('Synthesis complete', {
          mode,
          textLength: transcript.length,
          bytes: audio.length,
          durationMs: Date.now() - startTime,
        });
        return audio;
      } catch (error) {
        const classified = classifySynthesisError(error);
        if (!classified.retryable || attempt >= ttsRetryConfig.maxRetries) {
          logger.error('Synthesis failed', {
            errorType: classified.type,
            statusCode: classified.statusCode,
            message: classified.message,
            attempts: attempt + 1,
          });
          throw error;
        }

        const delay = getRetryDelay(attempt, ttsRetryConfig.baseDelay, ttsRetryConfig.maxDelay);
        logger.warn('Synthesis failed, retrying', {
          errorType: classified.type,
          attempt: attempt + 1,
          delayMs: delay,
        });
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
  }

  private async request(transcript: string, voice: string): Promise<Buffer> {
    const response: unknown = await this.client.tts.bytes({
      modelId: cartesiaConfig.model,
      transcript,
      voice: { mode: 'id', id: voice },
      language: cartesiaConfig.language,
      outputFormat: {
        container: cartesiaConfig.container,
        encoding: cartesiaConfig.encoding,
        sampleRate: cartesiaConfig.sampleRate,
      },
    });

    const audio = await collectAudio(response);
    if (audio.length === 0) {
      throw new Error('Empty audio response');
    }
    return audio;
  }
}
