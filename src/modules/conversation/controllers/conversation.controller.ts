/**
 * Conversation Controller
 * Public API for conversations: session lifecycle and text/audio turns
 */

import { logger, generateId, toError } from '@/shared/utils';
import {
  ConversationErrorType,
  NOT_HEARD_MESSAGE,
  STATUS_MESSAGES,
  isConversationError,
} from '@/shared/errors';
import { inputLimitsConfig } from '@/shared/config';
import { DEFAULT_MODE } from '@/modules/session';
import type { ConversationMode, ConversationSession, SessionStoreService } from '@/modules/session';
import type { RateLimiterService } from '@/modules/rate-limit';
import type { SynthesisCacheService } from '@/modules/tts';
import { isLikelyNoise } from '@/modules/stt';
import type { Transcriber } from '@/modules/stt';
import type { GenerationOrchestrator } from '../services';
import { TurnState } from '../types';
import type {
  ConversationStats,
  OutputSink,
  SessionSummary,
  StartSessionOptions,
  TurnOutcome,
} from '../types';

export interface ConversationControllerDependencies {
  sessions: SessionStoreService;
  rateLimiter: RateLimiterService;
  orchestrator: GenerationOrchestrator;
  transcriber: Transcriber;
  cache: SynthesisCacheService;
}

export interface TurnOptions {
  interrupted?: boolean;
}

function summarize(session: ConversationSession): SessionSummary {
  return {
    sessionId: session.sessionId,
    mode: session.mode,
    voice: session.voice,
    language: session.language,
  };
}

function rejected(category: ConversationErrorType): TurnOutcome {
  return {
    turnId: generateId(),
    state: TurnState.REJECTED,
    text: '',
    chunkCount: 0,
    errorType: category,
  };
}

export class ConversationController {
  constructor(
    private readonly deps: ConversationControllerDependencies,
    private readonly maxAudioBytes: number = inputLimitsConfig.maxAudioBytes
  ) {}

  /**
   * Start (or restart) a session in the given mode. Any earlier history is discarded.
   */
  async startSession(
    sessionId: string,
    mode: ConversationMode = DEFAULT_MODE,
    options: StartSessionOptions = {}
  ): Promise<SessionSummary> {
    await this.stopAndWait(sessionId, 'session restarted');
    await this.deps.sessions.delete(sessionId);

    const session = await this.deps.sessions.getOrCreate(sessionId, { mode, ...options });
    logger.info('Conversation started', { sessionId, mode: session.mode, language: session.language });
    return summarize(session);
  }

  async handleText(
    sessionId: string,
    text: string,
    sink: OutputSink,
    options: TurnOptions = {}
  ): Promise<TurnOutcome> {
    logger.debug('Text turn received', { sessionId, length: text.length });
    return this.deps.orchestrator.runTurn(
      { sessionId, text, interrupted: options.interrupted },
      sink
    );
  }

  /**
   * Transcribe a recorded utterance and run it as a text turn
   */
  async handleAudio(
    sessionId: string,
    audio: Buffer,
    mimeType: string | undefined,
    sink: OutputSink,
    options: TurnOptions = {}
  ): Promise<TurnOutcome> {
    if (audio.length === 0 || audio.length > this.maxAudioBytes) {
      logger.warn('Rejected audio turn with invalid size', {
        sessionId,
        bytes: audio.length,
        maxBytes: this.maxAudioBytes,
      });
      sink.status(
        STATUS_MESSAGES[ConversationErrorType.INVALID_INPUT],
        ConversationErrorType.INVALID_INPUT
      );
      return rejected(ConversationErrorType.INVALID_INPUT);
    }

    let transcript: string;
    try {
      const session = await this.deps.sessions.getOrCreate(sessionId);
      transcript = await this.deps.transcriber.transcribe(audio, {
        language: session.language,
        mimeType,
      });
    } catch (error) {
      const type = isConversationError(error)
        ? error.type
        : ConversationErrorType.UPSTREAM_FAILURE;
      logger.error('Audio turn failed before generation', {
        sessionId,
        error: toError(error),
      });
      sink.status(STATUS_MESSAGES[type], type);
      return rejected(type);
    }

    if (isLikelyNoise(transcript)) {
      logger.info('Discarding empty or noise transcript', { sessionId, transcript });
      sink.status(NOT_HEARD_MESSAGE, 'no_speech');
      return rejected(ConversationErrorType.INVALID_INPUT);
    }

    return this.handleText(sessionId, transcript, sink, options);
  }

  /**
   * Stop the reply currently being generated
   * @returns false if nothing was running
   */
  stop(sessionId: string): boolean {
    return this.deps.orchestrator.cancel(sessionId, 'stopped');
  }

  /**
   * Clear history, keeping mode, voice and language
   */
  async reset(sessionId: string): Promise<SessionSummary> {
    await this.stopAndWait(sessionId, 'session reset');
    const existing = await this.deps.sessions.get(sessionId);
    await this.deps.sessions.delete(sessionId);

    const session = await this.deps.sessions.getOrCreate(
      sessionId,
      existing
        ? { mode: existing.mode, voice: existing.voice, language: existing.language }
        : {}
    );
    logger.info('Conversation reset', { sessionId });
    return summarize(session);
  }

  async endSession(sessionId: string): Promise<void> {
    try {
      await this.stopAndWait(sessionId, 'session ended');
      await this.deps.sessions.delete(sessionId);
    } finally {
      await this.deps.rateLimiter.clear(sessionId);
    }
    logger.info('Conversation ended', { sessionId });
  }

  async getStats(): Promise<ConversationStats> {
    const sessions = await this.deps.sessions.getStats();
    return {
      sessions: sessions.total,
      generating: sessions.generating,
      activeTurns: this.deps.orchestrator.getActiveTurnCount(),
      backend: sessions.backend,
      rateLimitedSessions: await this.deps.rateLimiter.getTrackedSessionCount(),
      cache: await this.deps.cache.getStats(),
    };
  }

  async shutdown(): Promise<void> {
    logger.info('Conversation controller shutdown initiated');
    this.deps.sessions.stopCleanupTimer();
    await this.deps.orchestrator.shutdown();
    logger.info('Conversation controller shutdown complete');
  }

  private async stopAndWait(sessionId: string, reason: string): Promise<void> {
    this.deps.orchestrator.cancel(sessionId, reason);
    await this.deps.orchestrator.waitForIdle(sessionId);
  }
}
