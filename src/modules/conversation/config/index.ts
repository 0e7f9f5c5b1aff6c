export { generationConfig, memoryConfig } from './conversation.config';
export type { MemoryConfig } from './conversation.config';
