/**
 * Get-or-synthesize-then-put over any SpeechSynthesizer
 */

import type { ConversationMode } from '@/modules/session/config';
import type { SpeechSynthesizer } from '../types';
import type { SynthesisCacheService } from './synthesis-cache.service';

export class CachedSynthesizer implements SpeechSynthesizer {
  constructor(
    private readonly inner: SpeechSynthesizer,
    private readonly cache: SynthesisCacheService
  ) {}

  async synthesize(text: string, voice: string, mode: ConversationMode): Promise<Buffer> {
    const cached = await this.cache.get(text, voice, mode);
    if (cached) {
      return cached;
    }

    const audio = await this.inner.synthesize(text, voice, mode);
    await this.cache.put(text, voice, mode, audio);
    return audio;
  }
}
