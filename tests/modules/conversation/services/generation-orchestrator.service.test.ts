/**
 * GenerationOrchestrator Tests
 * Real session store, rate limiter and cache over fake model and synthesis upstreams
 */

import { describe, it, expect, vi } from 'vitest';
import { GenerationOrchestrator, TurnState } from '@/modules/conversation';
import type { OrchestratorOptions } from '@/modules/conversation';
import { MemoryBackend } from '@/modules/store';
import { SessionStoreService, ConversationMode, MODE_PROFILES } from '@/modules/session';
import { RateLimiterService } from '@/modules/rate-limit';
import { CachedSynthesizer, SynthesisCacheService } from '@/modules/tts';
import { ConversationErrorType, STATUS_MESSAGES } from '@/shared/errors';
import {
  FakeSynthesizer,
  RecordingSink,
  ScriptedTokenSource,
  fakeAudio,
} from '../../../utils/fakes';
import type { ScriptedReply } from '../../../utils/fakes';

const GENERAL = ConversationMode.GENERAL;

/**
 * Memory backend whose writes fail from the given write onward
 */
class FailingWritesBackend extends MemoryBackend {
  private writes = 0;

  constructor(private readonly failFromWrite: number) {
    super();
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    this.writes++;
    if (this.writes >= this.failFromWrite) {
      throw new Error('store unavailable');
    }
    await super.set(key, value, ttlSeconds);
  }
}
const VOICE = MODE_PROFILES[GENERAL].voice;

function setup(
  replies: ScriptedReply[],
  options: Partial<OrchestratorOptions> = {},
  maxSessions = 10,
  backend: MemoryBackend = new MemoryBackend()
) {
  const sessions = new SessionStoreService(backend, {
    idleTimeoutMs: 60_000,
    cleanupIntervalMs: 60_000,
    maxSessions,
    keyPrefix: 'test:session:',
    ttlSeconds: 3_600,
  });
  const rateLimiter = new RateLimiterService(new MemoryBackend());
  const inner = new FakeSynthesizer();
  const cache = new SynthesisCacheService(new MemoryBackend(), {
    maxSize: 50,
    ttlSeconds: 3_600,
    keyPrefix: 'test:tts:',
  });
  const tokenSource = new ScriptedTokenSource(replies);
  const orchestrator = new GenerationOrchestrator(
    {
      sessions,
      rateLimiter,
      synthesizer: new CachedSynthesizer(inner, cache),
      tokenSource,
    },
    {
      timeoutMs: 5_000,
      perMinuteBudget: 100,
      perHourBudget: 1_000,
      maxTextLength: 200,
      chunker: { firstChunkSentences: 1, subsequentChunkSentences: 2, minSentenceChars: 8 },
      ...options,
    }
  );
  return { sessions, rateLimiter, inner, cache, tokenSource, orchestrator };
}

async function storedMessages(sessions: SessionStoreService, sessionId: string) {
  const session = await sessions.get(sessionId);
  return session?.messages.map(({ role, content }) => ({ role, content }));
}

describe('GenerationOrchestrator', () => {
  describe('completed turns', () => {
    it('should stream text and audio chunk pairs in order, then complete', async () => {
      const h = setup([
        { tokens: ['Hello there, friend. ', 'How are you today? ', 'I am doing well. ', 'Thanks'] },
      ]);
      const sink = new RecordingSink();

      const outcome = await h.orchestrator.runTurn({ sessionId: 's1', text: '  Hi  ' }, sink);

      expect(outcome).toMatchObject({ state: TurnState.COMPLETED, chunkCount: 3 });
      expect(sink.types()).toEqual(['text', 'audio', 'text', 'audio', 'text', 'audio', 'complete']);
      expect(sink.ofType('text').map((e) => [e.index, e.text])).toEqual([
        [0, 'Hello there, friend. '],
        [1, 'How are you today? I am doing well. '],
        [2, 'Thanks'],
      ]);
      expect(sink.ofType('audio').map((e) => e.index)).toEqual([0, 1, 2]);
      expect(
        sink.ofType('audio')[1].audio.equals(fakeAudio('How are you today? I am doing well.', VOICE, GENERAL))
      ).toBe(true);
      expect(sink.ofType('complete')).toEqual([
        {
          type: 'complete',
          fullText: 'Hello there, friend. How are you today? I am doing well. Thanks',
          chunkCount: 3,
        },
      ]);
    });

    it('should record the exchange in the session', async () => {
      const h = setup([{ tokens: ['It is sunny and warm today. '] }]);

      await h.orchestrator.runTurn({ sessionId: 's1', text: 'Weather?' }, new RecordingSink());

      const session = await h.sessions.get('s1');
      expect(session?.messages.map(({ role, content }) => ({ role, content }))).toEqual([
        { role: 'user', content: 'Weather?' },
        { role: 'assistant', content: 'It is sunny and warm today.' },
      ]);
      expect(session?.exchangeCount).toBe(1);
      expect(session?.isGenerating).toBe(false);
      expect(h.orchestrator.isGenerating('s1')).toBe(false);
    });

    it('should send the system prompt, history and mode token budget', async () => {
      const h = setup([{ tokens: ['Sure, go ahead then. '] }]);

      await h.orchestrator.runTurn(
        { sessionId: 's1', text: 'Go on please', interrupted: true },
        new RecordingSink()
      );

      const [call] = h.tokenSource.calls;
      expect(call.maxTokens).toBe(MODE_PROFILES[GENERAL].maxTokens);
      expect(call.messages[0].role).toBe('system');
      expect(call.messages[1]).toEqual({ role: 'user', content: '[INTERRUPTED] Go on please' });
    });

    it('should serve repeated sentences from the cache across sessions', async () => {
      const h = setup([{ tokens: ['Hello there, friend. '] }]);
      const first = new RecordingSink();
      const second = new RecordingSink();

      await h.orchestrator.runTurn({ sessionId: 's1', text: 'Hi' }, first);
      await h.orchestrator.runTurn({ sessionId: 's2', text: 'Hi' }, second);

      expect(h.inner.calls).toHaveLength(1);
      expect(await h.cache.getStats()).toMatchObject({ hits: 1, misses: 1 });
      expect(second.ofType('audio')[0].audio.equals(first.ofType('audio')[0].audio)).toBe(true);
    });
  });

  describe('rejected turns', () => {
    it('should reject empty and oversized text before any upstream call', async () => {
      const h = setup([{ tokens: ['Unused reply here. '] }]);
      const sink = new RecordingSink();

      const empty = await h.orchestrator.runTurn({ sessionId: 's1', text: '   ' }, sink);
      const long = await h.orchestrator.runTurn({ sessionId: 's1', text: 'x'.repeat(201) }, sink);

      expect(empty).toMatchObject({
        state: TurnState.REJECTED,
        errorType: ConversationErrorType.INVALID_INPUT,
      });
      expect(long.state).toBe(TurnState.REJECTED);
      expect(sink.ofType('status')).toEqual([
        {
          type: 'status',
          message: STATUS_MESSAGES[ConversationErrorType.INVALID_INPUT],
          category: ConversationErrorType.INVALID_INPUT,
        },
        {
          type: 'status',
          message: STATUS_MESSAGES[ConversationErrorType.INVALID_INPUT],
          category: ConversationErrorType.INVALID_INPUT,
        },
      ]);
      expect(h.tokenSource.calls).toHaveLength(0);
      expect(await h.sessions.get('s1')).toBeUndefined();
    });

    it('should reject turns past the per-minute budget', async () => {
      const h = setup([{ tokens: ['Hello there, friend. '] }], { perMinuteBudget: 2 });
      const sink = new RecordingSink();

      const states: TurnState[] = [];
      for (let i = 0; i < 3; i++) {
        states.push((await h.orchestrator.runTurn({ sessionId: 's1', text: `Hi ${i}` }, sink)).state);
      }

      expect(states).toEqual([TurnState.COMPLETED, TurnState.COMPLETED, TurnState.REJECTED]);
      expect(sink.ofType('status')).toEqual([
        {
          type: 'status',
          message: STATUS_MESSAGES[ConversationErrorType.ADMISSION_REJECTED],
          category: ConversationErrorType.ADMISSION_REJECTED,
        },
      ]);
      expect(h.tokenSource.calls).toHaveLength(2);
    });

    it('should reject a new session past the session cap', async () => {
      const h = setup([{ tokens: ['Hello there, friend. '] }], {}, 1);
      await h.orchestrator.runTurn({ sessionId: 's1', text: 'Hi' }, new RecordingSink());
      const sink = new RecordingSink();

      const outcome = await h.orchestrator.runTurn({ sessionId: 's2', text: 'Hi' }, sink);

      expect(outcome).toMatchObject({
        state: TurnState.REJECTED,
        errorType: ConversationErrorType.ADMISSION_REJECTED,
      });
      expect(sink.types()).toEqual(['status']);
    });
  });

  describe('cancellation', () => {
    it('should stop the running turn when a new one arrives', async () => {
      const h = setup([
        { tokens: ['I am a voice assistant. '], stall: true },
        { tokens: ['It is sunny and warm today. ', 'Enjoy it outside.'] },
      ]);
      const sinkA = new RecordingSink();
      const sinkB = new RecordingSink();

      const turnA = h.orchestrator.runTurn({ sessionId: 's1', text: 'Tell me about yourself.' }, sinkA);
      await vi.waitFor(() => expect(sinkA.ofType('audio')).toHaveLength(1));

      const outcomeB = await h.orchestrator.runTurn(
        { sessionId: 's1', text: "What's the weather?" },
        sinkB
      );
      const outcomeA = await turnA;

      expect(outcomeA).toMatchObject({
        state: TurnState.CANCELLED,
        errorType: ConversationErrorType.CANCELLED,
        chunkCount: 1,
      });
      expect(sinkA.types()).toEqual(['text', 'audio']);
      expect(outcomeB.state).toBe(TurnState.COMPLETED);
      expect(sinkB.ofType('complete')).toEqual([
        { type: 'complete', fullText: 'It is sunny and warm today. Enjoy it outside.', chunkCount: 2 },
      ]);
      expect(await storedMessages(h.sessions, 's1')).toEqual([
        { role: 'user', content: 'Tell me about yourself.' },
        { role: 'assistant', content: 'I am a voice assistant. [interrupted]' },
        { role: 'user', content: "What's the weather?" },
        { role: 'assistant', content: 'It is sunny and warm today. Enjoy it outside.' },
      ]);
      expect(h.tokenSource.calls[1].messages.slice(1)).toEqual([
        { role: 'user', content: 'Tell me about yourself.' },
        { role: 'assistant', content: 'I am a voice assistant. [interrupted]' },
        { role: 'user', content: "What's the weather?" },
      ]);
    });

    it('should drop audio for a chunk cancelled during synthesis but still cache it', async () => {
      const h = setup([{ tokens: ['It is sunny and warm today. ', 'Enjoy it.'] }]);
      h.inner.hold = true;
      const sink = new RecordingSink();

      const turn = h.orchestrator.runTurn({ sessionId: 's1', text: 'Weather?' }, sink);
      await vi.waitFor(() => expect(h.inner.pendingCount()).toBe(1));

      expect(h.orchestrator.cancel('s1')).toBe(true);
      const outcome = await turn;

      expect(outcome.state).toBe(TurnState.CANCELLED);
      expect(sink.types()).toEqual(['text']);

      h.inner.release();
      await vi.waitFor(async () =>
        expect(await h.cache.has('It is sunny and warm today.', VOICE, GENERAL)).toBe(true)
      );
      expect(sink.types()).toEqual(['text']);
      expect(await storedMessages(h.sessions, 's1')).toEqual([
        { role: 'user', content: 'Weather?' },
        { role: 'assistant', content: 'It is sunny and warm today. [interrupted]' },
      ]);
      expect((await h.sessions.get('s1'))?.isGenerating).toBe(false);
    });

    it('should let only the last of several rapid turns complete', async () => {
      const h = setup([{ tokens: ['Hello there, friend. '] }]);
      const sinks = [new RecordingSink(), new RecordingSink(), new RecordingSink()];

      const outcomes = await Promise.all(
        ['one', 'two', 'three'].map((text, i) =>
          h.orchestrator.runTurn({ sessionId: 's1', text }, sinks[i])
        )
      );

      expect(outcomes.map((o) => o.state)).toEqual([
        TurnState.CANCELLED,
        TurnState.CANCELLED,
        TurnState.COMPLETED,
      ]);
      expect(sinks[0].events).toEqual([]);
      expect(sinks[1].events).toEqual([]);
      expect(await storedMessages(h.sessions, 's1')).toEqual([
        { role: 'user', content: 'one' },
        { role: 'user', content: 'two' },
        { role: 'user', content: 'three' },
        { role: 'assistant', content: 'Hello there, friend.' },
      ]);
    });

    it('should expose the live turn state and return to idle', async () => {
      const h = setup([{ tokens: ['Thinking about it '], stall: true }]);
      expect(h.orchestrator.getTurnState('s1')).toBe(TurnState.IDLE);

      const turn = h.orchestrator.runTurn({ sessionId: 's1', text: 'Hi' }, new RecordingSink());
      await vi.waitFor(() => expect(h.orchestrator.getTurnState('s1')).toBe(TurnState.STREAMING));

      h.orchestrator.cancel('s1');
      expect((await turn).state).toBe(TurnState.CANCELLED);
      expect(h.orchestrator.getTurnState('s1')).toBe(TurnState.IDLE);
    });

    it('should report when there is nothing to cancel', () => {
      const h = setup([{ tokens: [] }]);

      expect(h.orchestrator.cancel('s1')).toBe(false);
    });

    it('should cancel running turns on shutdown', async () => {
      const h = setup([{ tokens: ['Thinking about it '], stall: true }]);

      const turn = h.orchestrator.runTurn({ sessionId: 's1', text: 'Hi' }, new RecordingSink());
      await vi.waitFor(() => expect(h.tokenSource.calls).toHaveLength(1));
      await h.orchestrator.shutdown();

      expect((await turn).state).toBe(TurnState.CANCELLED);
      expect(h.orchestrator.getActiveTurnCount()).toBe(0);
    });
  });

  describe('failures', () => {
    const upstreamStatus = {
      type: 'status',
      message: STATUS_MESSAGES[ConversationErrorType.UPSTREAM_FAILURE],
      category: ConversationErrorType.UPSTREAM_FAILURE,
    };

    it('should report a stream failure and leave the session usable', async () => {
      const h = setup([
        { tokens: ['It is sunny and warm today. ', 'More'], failAfter: 1 },
        { tokens: ['Back again, all good. '] },
      ]);
      const sink = new RecordingSink();

      const failed = await h.orchestrator.runTurn({ sessionId: 's1', text: 'Weather?' }, sink);

      expect(failed).toMatchObject({
        state: TurnState.FAILED,
        errorType: ConversationErrorType.UPSTREAM_FAILURE,
        chunkCount: 1,
      });
      expect(sink.types()).toEqual(['text', 'audio', 'status']);
      expect(sink.ofType('status')).toEqual([upstreamStatus]);
      expect((await h.sessions.get('s1'))?.isGenerating).toBe(false);

      const retry = new RecordingSink();
      const next = await h.orchestrator.runTurn({ sessionId: 's1', text: 'Again?' }, retry);

      expect(next.state).toBe(TurnState.COMPLETED);
      expect(retry.ofType('complete')[0].fullText).toBe('Back again, all good.');
    });

    it('should fail a synthesis error without completing', async () => {
      const h = setup([{ tokens: ['It is sunny and warm today. '] }]);
      h.inner.failOn = 'sunny';
      const sink = new RecordingSink();

      const outcome = await h.orchestrator.runTurn({ sessionId: 's1', text: 'Weather?' }, sink);

      expect(outcome.state).toBe(TurnState.FAILED);
      expect(sink.types()).toEqual(['text', 'status']);
    });

    it('should fail an empty model reply', async () => {
      const h = setup([{ tokens: [] }]);
      const sink = new RecordingSink();

      const outcome = await h.orchestrator.runTurn({ sessionId: 's1', text: 'Hi' }, sink);

      expect(outcome.state).toBe(TurnState.FAILED);
      expect(sink.events).toEqual([upstreamStatus]);
    });

    it('should report a session store failure before streaming', async () => {
      const h = setup([{ tokens: ['Unused reply here. '] }], {}, 10, new FailingWritesBackend(1));
      const sink = new RecordingSink();

      const outcome = await h.orchestrator.runTurn({ sessionId: 's1', text: 'Hi there' }, sink);

      expect(outcome).toMatchObject({
        state: TurnState.FAILED,
        errorType: ConversationErrorType.UPSTREAM_FAILURE,
      });
      expect(sink.events).toEqual([upstreamStatus]);
      expect(h.tokenSource.calls).toHaveLength(0);
      expect(h.orchestrator.getActiveTurnCount()).toBe(0);
    });

    it('should report a failed admission check', async () => {
      const h = setup([{ tokens: ['Unused reply here. '] }]);
      vi.spyOn(h.rateLimiter, 'check').mockRejectedValue(new Error('store unavailable'));
      const sink = new RecordingSink();

      const outcome = await h.orchestrator.runTurn({ sessionId: 's1', text: 'Hi there' }, sink);

      expect(outcome.state).toBe(TurnState.FAILED);
      expect(sink.events).toEqual([upstreamStatus]);
      expect(h.tokenSource.calls).toHaveLength(0);
    });

    it('should send a single status when saving a failed turn also fails', async () => {
      // writes: session created, user message, then the failed-turn update
      const h = setup(
        [{ tokens: ['It is sunny and warm today. ', 'More'], failAfter: 1 }],
        {},
        10,
        new FailingWritesBackend(3)
      );
      const sink = new RecordingSink();

      const outcome = await h.orchestrator.runTurn({ sessionId: 's1', text: 'Weather?' }, sink);

      expect(outcome.state).toBe(TurnState.FAILED);
      expect(sink.types()).toEqual(['text', 'audio', 'status']);
      expect(sink.ofType('status')).toEqual([upstreamStatus]);
    });

    it('should fail a turn that exceeds the timeout', async () => {
      const h = setup([{ tokens: ['Thinking about it '], stall: true }], { timeoutMs: 50 });
      const sink = new RecordingSink();

      const outcome = await h.orchestrator.runTurn({ sessionId: 's1', text: 'Hi' }, sink);

      expect(outcome).toMatchObject({
        state: TurnState.FAILED,
        errorType: ConversationErrorType.UPSTREAM_FAILURE,
      });
      expect(sink.events).toEqual([upstreamStatus]);
      expect((await h.sessions.get('s1'))?.isGenerating).toBe(false);
    });
  });
});
