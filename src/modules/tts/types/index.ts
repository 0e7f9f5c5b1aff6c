/**
 * TTS Module Type Definitions
 */

import type { ConversationMode } from '@/modules/session/config';
import type { BackendKind } from '@/modules/store';

/**
 * Opaque request/response speech synthesis: one text in, one complete audio payload out
 */
export interface SpeechSynthesizer {
  synthesize(text: string, voice: string, mode: ConversationMode): Promise<Buffer>;
}

/**
 * Stored cache record, serialised as JSON. `lastUsedAt` is the write time; recency
 * after that is tracked by the process serving the hits.
 */
export interface SynthesisCacheEntry {
  key: string;
  audioBase64: string;
  lastUsedAt: number;
  size: number;
}

export interface SynthesisCacheStats {
  hits: number;
  misses: number;
  /** Percentage, one decimal place */
  hitRate: number;
  size: number;
  maxSize: number;
  backend: BackendKind;
}

export enum TTSErrorType {
  CONNECTION = 'connection',
  TIMEOUT = 'timeout',
  RATE_LIMIT = 'rate_limit',
  AUTH = 'auth',
  FATAL = 'fatal',
  TRANSIENT = 'transient',
}

export interface ClassifiedSynthesisError {
  type: TTSErrorType;
  message: string;
  statusCode?: number;
  retryable: boolean;
}
