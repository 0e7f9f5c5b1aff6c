/**
 * Generation Orchestrator
 *
 * Runs one turn: admission, token streaming, sentence chunking, synthesis and
 * delivery to the sink. Turn states: idle -> admitted -> streaming -> completed,
 * cancelled or failed; turns refused up front end as rejected.
 *
 * Every chunk goes through the same sequence: emit text, check the token,
 * synthesize (through the cache), check again, emit audio. Chunks are delivered
 * strictly in order. A new turn for a session cancels the running one, waits
 * for it to stop, then starts.
 */

import { logger, generateId, errorMessage, toError } from '@/shared/utils';
import {
  ConversationErrorType,
  STATUS_MESSAGES,
  isConversationError,
} from '@/shared/errors';
import { inputLimitsConfig } from '@/shared/config';
import type { ConversationSession, SessionStoreService } from '@/modules/session';
import type { RateLimiterService, RateLimitCheckResult } from '@/modules/rate-limit';
import { rateLimitConfig } from '@/modules/rate-limit';
import { SentenceChunker, streamingConfig } from '@/modules/llm';
import type { ChunkerOptions, TokenStreamSource } from '@/modules/llm';
import type { SpeechSynthesizer } from '@/modules/tts';
import { generationConfig } from '../config';
import { TurnState } from '../types';
import type { OutputSink, TurnOutcome, TurnRequest } from '../types';
import { untilAborted, yieldToEventLoop } from '../utils';
import { CancellationRegistry } from './cancellation-registry.service';
import type { CancellationToken } from './cancellation-registry.service';
import { HistoryCompressor } from './history-compressor.service';

export interface OrchestratorDependencies {
  sessions: SessionStoreService;
  rateLimiter: RateLimiterService;
  synthesizer: SpeechSynthesizer;
  tokenSource: TokenStreamSource;
  registry?: CancellationRegistry;
  compressor?: HistoryCompressor;
}

export interface OrchestratorOptions {
  timeoutMs: number;
  perMinuteBudget: number;
  perHourBudget: number;
  maxTextLength: number;
  chunker: ChunkerOptions;
}

const DEFAULT_OPTIONS: OrchestratorOptions = {
  timeoutMs: generationConfig.timeoutMs,
  perMinuteBudget: rateLimitConfig.perMinute,
  perHourBudget: rateLimitConfig.perHour,
  maxTextLength: inputLimitsConfig.maxTextLength,
  chunker: streamingConfig,
};

export class GenerationOrchestrator {
  private readonly sessions: SessionStoreService;
  private readonly rateLimiter: RateLimiterService;
  private readonly synthesizer: SpeechSynthesizer;
  private readonly tokenSource: TokenStreamSource;
  private readonly registry: CancellationRegistry;
  private readonly compressor: HistoryCompressor;
  private readonly options: OrchestratorOptions;

  // Settles when the session's latest turn has fully stopped; never rejects
  private inFlight = new Map<string, Promise<TurnOutcome>>();
  private current = new Map<string, TurnOutcome>();

  constructor(deps: OrchestratorDependencies, options: Partial<OrchestratorOptions> = {}) {
    this.sessions = deps.sessions;
    this.rateLimiter = deps.rateLimiter;
    this.synthesizer = deps.synthesizer;
    this.tokenSource = deps.tokenSource;
    this.registry = deps.registry ?? new CancellationRegistry();
    this.compressor = deps.compressor ?? new HistoryCompressor();
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async runTurn(request: TurnRequest, sink: OutputSink): Promise<TurnOutcome> {
    const turnId = generateId();
    const { sessionId } = request;
    const text = request.text.trim();

    if (!text || text.length > this.options.maxTextLength) {
      logger.warn('Rejected turn with invalid text', {
        sessionId,
        length: text.length,
        maxLength: this.options.maxTextLength,
      });
      return this.reject(turnId, sink, ConversationErrorType.INVALID_INPUT);
    }

    let admission: RateLimitCheckResult;
    try {
      admission = await this.rateLimiter.check(
        sessionId,
        this.options.perMinuteBudget,
        this.options.perHourBudget
      );
    } catch (error) {
      logger.error('Admission check failed', { sessionId, turnId, error: toError(error) });
      sink.status(
        STATUS_MESSAGES[ConversationErrorType.UPSTREAM_FAILURE],
        ConversationErrorType.UPSTREAM_FAILURE
      );
      return {
        turnId,
        state: TurnState.FAILED,
        text: '',
        chunkCount: 0,
        errorType: ConversationErrorType.UPSTREAM_FAILURE,
      };
    }
    if (!admission.allowed) {
      return this.reject(turnId, sink, ConversationErrorType.ADMISSION_REJECTED);
    }

    // Admission checks settle in arrival order under the limiter's session lock and
    // registration follows without a gap, so rapid turns supersede each other in order
    if (this.registry.get(sessionId)) {
      this.registry.cancel(sessionId, 'barge-in');
    }
    const token = this.registry.register(sessionId, turnId);
    const previous = this.inFlight.get(sessionId);

    let statusSent = false;
    const tracked: OutputSink = {
      textChunk: (chunk, index) => sink.textChunk(chunk, index),
      audioChunk: (audio, index) => sink.audioChunk(audio, index),
      complete: (fullText, chunkCount) => sink.complete(fullText, chunkCount),
      status: (message, category) => {
        statusSent = true;
        sink.status(message, category);
      },
    };

    const outcome: TurnOutcome = { turnId, state: TurnState.ADMITTED, text: '', chunkCount: 0 };
    this.current.set(sessionId, outcome);

    const run = this.execute(token, { ...request, text }, tracked, previous, outcome).catch(
      (error: unknown): TurnOutcome => {
        logger.error('Turn crashed', { sessionId, turnId, error: toError(error) });
        this.registry.release(token);
        if (!statusSent) {
          tracked.status(
            STATUS_MESSAGES[ConversationErrorType.UPSTREAM_FAILURE],
            ConversationErrorType.UPSTREAM_FAILURE
          );
        }
        outcome.state = TurnState.FAILED;
        outcome.errorType = ConversationErrorType.UPSTREAM_FAILURE;
        return outcome;
      }
    );
    this.inFlight.set(sessionId, run);

    try {
      return await run;
    } finally {
      if (this.inFlight.get(sessionId) === run) {
        this.inFlight.delete(sessionId);
      }
      if (this.current.get(sessionId) === outcome) {
        this.current.delete(sessionId);
      }
    }
  }

  /**
   * Cancel the session's running turn, if any
   */
  cancel(sessionId: string, reason = 'stopped'): boolean {
    return this.registry.cancel(sessionId, reason);
  }

  /**
   * Resolve once the session's current turn, if any, has fully stopped
   */
  async waitForIdle(sessionId: string): Promise<void> {
    await this.inFlight.get(sessionId);
  }

  /**
   * State of the session's latest turn while it runs, idle otherwise
   */
  getTurnState(sessionId: string): TurnState {
    return this.current.get(sessionId)?.state ?? TurnState.IDLE;
  }

  isGenerating(sessionId: string): boolean {
    return this.inFlight.has(sessionId);
  }

  getActiveTurnCount(): number {
    return this.inFlight.size;
  }

  /**
   * Cancel every running turn and wait for them to stop
   */
  async shutdown(): Promise<void> {
    const running = [...this.inFlight.values()];
    this.registry.cancelAll('shutdown');
    await Promise.all(running);
    logger.info('Generation orchestrator stopped', { cancelledTurns: running.length });
  }

  private async execute(
    token: CancellationToken,
    request: TurnRequest,
    sink: OutputSink,
    previous: Promise<TurnOutcome> | undefined,
    outcome: TurnOutcome
  ): Promise<TurnOutcome> {
    const { sessionId } = request;

    if (previous) {
      // Let the interrupted turn observe cancellation and persist its partial reply first
      await yieldToEventLoop();
      await previous;
    }

    let session: ConversationSession | undefined;
    try {
      await this.sessions.getOrCreate(sessionId);
      const content = request.interrupted
        ? `${generationConfig.interruptedUserPrefix}${request.text}`
        : request.text;
      session = await this.sessions.update(sessionId, (record) => {
        record.messages.push({ role: 'user', content, timestamp: Date.now() });
        record.isGenerating = true;
      });
    } catch (error) {
      this.registry.release(token);
      if (isConversationError(error)) {
        sink.status(STATUS_MESSAGES[error.type], error.type);
        outcome.state = TurnState.REJECTED;
        outcome.errorType = error.type;
        return outcome;
      }
      throw error;
    }

    if (!session) {
      this.registry.release(token);
      outcome.state = TurnState.CANCELLED;
      outcome.errorType = ConversationErrorType.CANCELLED;
      return outcome;
    }

    const upstream = new AbortController();
    const forwardCancel = (): void => upstream.abort(token.signal.reason);
    if (token.cancelled) {
      forwardCancel();
    } else {
      token.signal.addEventListener('abort', forwardCancel, { once: true });
    }

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      upstream.abort(new Error(`Generation exceeded ${this.options.timeoutMs}ms`));
    }, this.options.timeoutMs);

    const startTime = Date.now();
    logger.info('Turn started', { sessionId, turnId: token.turnId, mode: session.mode });

    try {
      outcome.state = TurnState.STREAMING;
      await this.stream(token, session, sink, upstream.signal, outcome);

      token.throwIfCancelled();
      const fullText = outcome.text.trim();
      sink.complete(fullText, outcome.chunkCount);
      outcome.state = TurnState.COMPLETED;

      await this.sessions.update(sessionId, (record) => {
        record.messages.push({ role: 'assistant', content: fullText, timestamp: Date.now() });
        record.exchangeCount++;
        record.isGenerating = false;
        this.compressor.compress(record);
      });

      logger.info('Turn completed', {
        sessionId,
        turnId: token.turnId,
        chunkCount: outcome.chunkCount,
        durationMs: Date.now() - startTime,
      });
    } catch (error) {
      if (token.cancelled) {
        outcome.state = TurnState.CANCELLED;
        outcome.errorType = ConversationErrorType.CANCELLED;
        await this.persistPartial(sessionId, outcome.text.trim());
        logger.info('Turn cancelled', {
          sessionId,
          turnId: token.turnId,
          chunksDelivered: outcome.chunkCount,
        });
      } else {
        outcome.state = TurnState.FAILED;
        outcome.errorType = ConversationErrorType.UPSTREAM_FAILURE;
        logger.error(timedOut ? 'Turn timed out' : 'Turn failed', {
          sessionId,
          turnId: token.turnId,
          chunksDelivered: outcome.chunkCount,
          error: toError(error),
        });
        sink.status(
          STATUS_MESSAGES[ConversationErrorType.UPSTREAM_FAILURE],
          ConversationErrorType.UPSTREAM_FAILURE
        );
        await this.sessions.update(sessionId, (record) => {
          record.isGenerating = false;
        });
      }
    } finally {
      clearTimeout(timer);
      token.signal.removeEventListener('abort', forwardCancel);
      this.registry.release(token);
    }

    return outcome;
  }

  private async stream(
    token: CancellationToken,
    session: ConversationSession,
    sink: OutputSink,
    signal: AbortSignal,
    outcome: TurnOutcome
  ): Promise<void> {
    const chunker = new SentenceChunker(this.options.chunker);
    const prompt = this.compressor.buildPrompt(session);
    const iterator = this.tokenSource
      .stream(prompt, { maxTokens: session.maxTokens, signal })
      [Symbol.asyncIterator]();

    try {
      for (;;) {
        const step = await untilAborted(iterator.next(), signal);
        if (step.done) {
          break;
        }
        for (const chunk of chunker.feed(step.value)) {
          await this.deliver(chunk, token, session, sink, signal, outcome);
        }
      }

      const tail = chunker.flush();
      if (tail) {
        await this.deliver(tail, token, session, sink, signal, outcome);
      }
    } finally {
      if (iterator.return) {
        void iterator.return().catch((error: unknown) => {
          logger.debug('Token stream close failed', {
            sessionId: session.sessionId,
            error: errorMessage(error),
          });
        });
      }
    }

    if (!outcome.text.trim()) {
      throw new Error('Model returned an empty response');
    }
  }

  private async deliver(
    chunk: string,
    token: CancellationToken,
    session: ConversationSession,
    sink: OutputSink,
    signal: AbortSignal,
    outcome: TurnOutcome
  ): Promise<void> {
    outcome.text += chunk;
    const spoken = chunk.trim();
    if (!spoken) {
      return;
    }

    const index = outcome.chunkCount;
    sink.textChunk(chunk, index);
    token.throwIfCancelled();

    const audio = await untilAborted(
      this.synthesizer.synthesize(spoken, session.voice, session.mode),
      signal
    );
    token.throwIfCancelled();

    sink.audioChunk(audio, index);
    outcome.chunkCount++;

    logger.debug('Chunk delivered', {
      sessionId: session.sessionId,
      index,
      textLength: spoken.length,
      audioBytes: audio.length,
    });
  }

  private async persistPartial(sessionId: string, partial: string): Promise<void> {
    await this.sessions.update(sessionId, (record) => {
      if (partial) {
        record.messages.push({
          role: 'assistant',
          content: `${partial} ${generationConfig.interruptedMarker}`,
          timestamp: Date.now(),
        });
      }
      record.isGenerating = false;
    });
  }

  private reject(turnId: string, sink: OutputSink, type: ConversationErrorType): TurnOutcome {
    sink.status(STATUS_MESSAGES[type], type);
    return { turnId, state: TurnState.REJECTED, text: '', chunkCount: 0, errorType: type };
  }
}
