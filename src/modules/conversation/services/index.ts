export { CancellationRegistry, CancellationToken } from './cancellation-registry.service';
export { HistoryCompressor } from './history-compressor.service';
export { GenerationOrchestrator } from './generation-orchestrator.service';
export type {
  OrchestratorDependencies,
  OrchestratorOptions,
} from './generation-orchestrator.service';
