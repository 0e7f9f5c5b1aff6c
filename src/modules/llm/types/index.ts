/**
 * LLM Module Type Definitions
 */

export type PromptRole = 'system' | 'user' | 'assistant';

/**
 * Message as sent to the model
 */
export interface PromptMessage {
  role: PromptRole;
  content: string;
}

export interface TokenStreamOptions {
  maxTokens: number;
  /** Aborting stops the upstream request */
  signal?: AbortSignal;
}

/**
 * Incremental model output. Iteration ends at end-of-stream and throws on upstream error.
 */
export interface TokenStreamSource {
  stream(messages: readonly PromptMessage[], options: TokenStreamOptions): AsyncIterable<string>;
}
