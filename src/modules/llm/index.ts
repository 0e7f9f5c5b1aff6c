/**
 * LLM Module Public Exports
 */

export { SentenceChunker, OpenAITokenSource } from './services';
export { openaiConfig, streamingConfig } from './config';
export type { StreamingConfig, ChunkerOptions } from './config';
export { classifyLLMError, LLMErrorType } from './utils';
export type { ClassifiedLLMError } from './utils';
export type { PromptMessage, PromptRole, TokenStreamOptions, TokenStreamSource } from './types';
