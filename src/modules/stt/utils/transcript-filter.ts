/**
 * Transcript noise filter
 * Recognisers emit stock phrases ("thank you", "music") when fed silence or background noise
 */

import noisePhrases from '../config/noise-phrases.json';

const NOISE_PHRASES: ReadonlySet<string> = new Set(noisePhrases);

export function isLikelyNoise(transcript: string): boolean {
  const normalized = transcript.trim().toLowerCase().replace(/[.!,]+$/, '');
  return normalized === '' || NOISE_PHRASES.has(normalized);
}
