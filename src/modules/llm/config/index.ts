export { openaiConfig } from './openai.config';
export { streamingConfig } from './streaming.config';
export type { StreamingConfig, ChunkerOptions } from './streaming.config';
