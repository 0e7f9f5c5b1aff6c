/**
 * Conversation Module Public Exports
 */

export { ConversationController } from './controllers';
export type { ConversationControllerDependencies, TurnOptions } from './controllers';
export {
  GenerationOrchestrator,
  CancellationRegistry,
  CancellationToken,
  HistoryCompressor,
} from './services';
export type { OrchestratorDependencies, OrchestratorOptions } from './services';
export { generationConfig, memoryConfig } from './config';
export { TurnState } from './types';
export type {
  OutputSink,
  StatusCategory,
  TurnRequest,
  TurnOutcome,
  StartSessionOptions,
  SessionSummary,
  ConversationStats,
} from './types';
export { yieldToEventLoop, untilAborted } from './utils';
