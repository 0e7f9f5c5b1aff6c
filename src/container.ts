/**
 * Service Container
 * Builds the shared stores and services once at start-up and injects them
 * into the orchestrator and controller
 */

import { logger } from '@/shared/utils';
import { MemoryBackend, selectBackend, redisConfig } from '@/modules/store';
import type { KeyValueBackend } from '@/modules/store';
import { SessionStoreService } from '@/modules/session';
import { RateLimiterService } from '@/modules/rate-limit';
import {
  CachedSynthesizer,
  CartesiaSynthesizer,
  SynthesisCacheService,
  synthesisCacheConfig,
} from '@/modules/tts';
import type { SpeechSynthesizer } from '@/modules/tts';
import { OpenAITokenSource } from '@/modules/llm';
import type { TokenStreamSource } from '@/modules/llm';
import { DeepgramTranscriber } from '@/modules/stt';
import type { Transcriber } from '@/modules/stt';
import {
  CancellationRegistry,
  ConversationController,
  GenerationOrchestrator,
  HistoryCompressor,
} from '@/modules/conversation';
import type { OrchestratorOptions } from '@/modules/conversation';

export interface Container {
  backend: KeyValueBackend;
  sessions: SessionStoreService;
  rateLimiter: RateLimiterService;
  cache: SynthesisCacheService;
  orchestrator: GenerationOrchestrator;
  controller: ConversationController;
  /** Stop timers, cancel generations, close the backend */
  close(): Promise<void>;
}

/**
 * Replace upstream adapters or the backend (tests, local tooling)
 */
export interface ContainerOverrides {
  backend?: KeyValueBackend;
  tokenSource?: TokenStreamSource;
  synthesizer?: SpeechSynthesizer;
  transcriber?: Transcriber;
  cache?: SynthesisCacheService;
  orchestratorOptions?: Partial<OrchestratorOptions>;
  startTimers?: boolean;
}

export async function createContainer(overrides: ContainerOverrides = {}): Promise<Container> {
  const backend = overrides.backend ?? (await selectBackend(redisConfig));
  const sessions = new SessionStoreService(backend);
  const rateLimiter = new RateLimiterService(backend);
  sessions.onExpired((sessionId) => rateLimiter.clear(sessionId));

  const cacheBackend = synthesisCacheConfig.store === 'redis' ? backend : new MemoryBackend();
  const cache = overrides.cache ?? new SynthesisCacheService(cacheBackend);

  const synthesizer = new CachedSynthesizer(
    overrides.synthesizer ?? new CartesiaSynthesizer(),
    cache
  );

  const orchestrator = new GenerationOrchestrator(
    {
      sessions,
      rateLimiter,
      synthesizer,
      tokenSource: overrides.tokenSource ?? new OpenAITokenSource(),
      registry: new CancellationRegistry(),
      compressor: new HistoryCompressor(),
    },
    overrides.orchestratorOptions
  );

  const controller = new ConversationController({
    sessions,
    rateLimiter,
    orchestrator,
    transcriber: overrides.transcriber ?? new DeepgramTranscriber(),
    cache,
  });

  if (overrides.startTimers ?? true) {
    sessions.startCleanupTimer();
  }

  logger.info('Services initialized', {
    backend: backend.kind,
    cacheBackend: cacheBackend.kind,
  });

  return {
    backend,
    sessions,
    rateLimiter,
    cache,
    orchestrator,
    controller,
    async close(): Promise<void> {
      await controller.shutdown();
      if (cacheBackend !== backend) {
        await cacheBackend.close();
      }
      await backend.close();
    },
  };
}
