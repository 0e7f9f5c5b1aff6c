/**
 * LLM Service
 * Streams chat completion tokens from OpenAI as they arrive
 */

import OpenAI from 'openai';
import { logger } from '@/shared/utils';
import { openaiConfig } from '../config';
import type { PromptMessage, TokenStreamOptions, TokenStreamSource } from '../types';
import { classifyLLMError } from '../utils';

function toChatParam(message: PromptMessage): OpenAI.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export class OpenAITokenSource implements TokenStreamSource {
  private openai: OpenAI;

  constructor(client?: OpenAI) {
    if (!client) {
      openaiConfig.validate();
    }

    this.openai =
      client ??
      new OpenAI({
        apiKey: openaiConfig.apiKey,
        organization: openaiConfig.organization,
        timeout: openaiConfig.timeout,
        maxRetries: openaiConfig.maxRetries,
      });

    logger.info('LLM service initialized', {
      model: openaiConfig.model,
      temperature: openaiConfig.temperature,
    });
  }

  async *stream(
    messages: readonly PromptMessage[],
    options: TokenStreamOptions
  ): AsyncIterable<string> {
    const startTime = Date.now();
    let tokenCount = 0;

    logger.debug('Calling OpenAI API with streaming', {
      messageCount: messages.length,
      model: openaiConfig.model,
      maxTokens: options.maxTokens,
    });

    try {
      const stream = await this.openai.chat.completions.create(
        {
          model: openaiConfig.model,
          messages: messages.map(toChatParam),
          temperature: openaiConfig.temperature,
          top_p: openaiConfig.topP,
          max_tokens: options.maxTokens,
          stream: true,
        },
        { signal: options.signal }
      );

      for await (const chunk of stream) {
        const content = chunk.choices[0]?.delta?.content;
        if (content) {
          tokenCount++;
          yield content;
        }
      }
    } catch (error) {
      const classified = classifyLLMError(error);
      if (!options.signal?.aborted) {
        logger.error('OpenAI streaming failed', {
          type: classified.type,
          status: classified.status,
          retryable: classified.isRetryable,
          message: error instanceof Error ? error.message : String(error),
        });
      }
      throw error;
    }

    logger.debug('OpenAI streaming complete', {
      tokenCount,
      durationMs: Date.now() - startTime,
    });
  }
}
