/**
 * Conversation Module Type Definitions
 */

import type { ConversationErrorType } from '@/shared/errors';
import type { ConversationMode } from '@/modules/session';
import type { SynthesisCacheStats } from '@/modules/tts';

/**
 * Status categories a sink can receive: every error category, plus
 * "no_speech" for audio that transcribed to nothing usable
 */
export type StatusCategory = ConversationErrorType | 'no_speech';

/**
 * Receives the events of a turn, in order: textChunk/audioChunk pairs with the
 * same index, then complete. Status notices may arrive instead of any of these.
 */
export interface OutputSink {
  textChunk(text: string, index: number): void;
  audioChunk(audio: Buffer, index: number): void;
  complete(fullText: string, chunkCount: number): void;
  status(message: string, category: StatusCategory): void;
}

export interface TurnRequest {
  sessionId: string;
  text: string;
  /** The user cut off the previous reply to send this */
  interrupted?: boolean;
}

export enum TurnState {
  /** No turn running for the session */
  IDLE = 'idle',
  ADMITTED = 'admitted',
  STREAMING = 'streaming',
  COMPLETED = 'completed',
  CANCELLED = 'cancelled',
  FAILED = 'failed',
  /** Never admitted: invalid input or admission rejected */
  REJECTED = 'rejected',
}

export interface TurnOutcome {
  turnId: string;
  state: TurnState;
  /** Text emitted to the sink so far (whole reply when completed) */
  text: string;
  chunkCount: number;
  errorType?: ConversationErrorType;
}

export interface StartSessionOptions {
  voice?: string;
  language?: string;
}

export interface SessionSummary {
  sessionId: string;
  mode: ConversationMode;
  voice: string;
  language: string;
}

export interface ConversationStats {
  sessions: number;
  generating: number;
  activeTurns: number;
  backend: string;
  rateLimitedSessions: number;
  cache: SynthesisCacheStats;
}
