/**
 * DeepgramTranscriber Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const transcribeFile = vi.hoisted(() => vi.fn());

vi.mock('@deepgram/sdk', () => ({
  createClient: () => ({ listen: { prerecorded: { transcribeFile } } }),
}));

import { DeepgramTranscriber, DEEPGRAM_CONFIG } from '@/modules/stt';

describe('DeepgramTranscriber', () => {
  beforeEach(() => {
    transcribeFile.mockReset();
  });

  it('should return the trimmed first alternative', async () => {
    transcribeFile.mockResolvedValue({
      result: { results: { channels: [{ alternatives: [{ transcript: ' Hello there. ' }] }] } },
      error: null,
    });
    const transcriber = new DeepgramTranscriber('test-key');

    const text = await transcriber.transcribe(Buffer.from([1, 2, 3]), { language: 'fr' });

    expect(text).toBe('Hello there.');
    expect(transcribeFile).toHaveBeenCalledWith(Buffer.from([1, 2, 3]), {
      model: DEEPGRAM_CONFIG.model,
      language: 'fr',
      smart_format: DEEPGRAM_CONFIG.smart_format,
      punctuate: DEEPGRAM_CONFIG.punctuate,
      diarize: DEEPGRAM_CONFIG.diarize,
    });
  });

  it('should return an empty string when there is no alternative', async () => {
    transcribeFile.mockResolvedValue({ result: { results: { channels: [] } }, error: null });
    const transcriber = new DeepgramTranscriber('test-key');

    expect(await transcriber.transcribe(Buffer.from([1]), { language: 'en' })).toBe('');
  });

  it('should throw the provider error', async () => {
    transcribeFile.mockResolvedValue({ result: null, error: new Error('bad audio') });
    const transcriber = new DeepgramTranscriber('test-key');

    await expect(transcriber.transcribe(Buffer.from([1]), { language: 'en' })).rejects.toThrow(
      'bad audio'
    );
  });

  it('should skip the request for empty audio', async () => {
    const transcriber = new DeepgramTranscriber('test-key');

    expect(await transcriber.transcribe(Buffer.alloc(0), { language: 'en' })).toBe('');
    expect(transcribeFile).not.toHaveBeenCalled();
  });
});
