/**
 * Synthesis Error Classifier
 * Classifies errors from the TTS provider for retry decisions and logging
 */

import { TTSErrorType } from '../types';
import type { ClassifiedSynthesisError } from '../types';

function readStatusCode(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  for (const field of ['statusCode', 'status', 'code']) {
    if (field in error) {
      const value: unknown = Reflect.get(error, field);
      if (typeof value === 'number') {
        return value;
      }
    }
  }
  return undefined;
}

export function classifySynthesisError(error: unknown): ClassifiedSynthesisError {
  const message = error instanceof Error ? error.message : String(error ?? 'Unknown error');
  const statusCode = readStatusCode(error);

  if (statusCode !== undefined) {
    if (statusCode === 401 || statusCode === 403) {
      return { type: TTSErrorType.AUTH, message: 'Authentication failed', statusCode, retryable: false };
    }
    if (statusCode === 429) {
      return { type: TTSErrorType.RATE_LIMIT, message: 'Rate limit exceeded', statusCode, retryable: true };
    }
    if (statusCode >= 400 && statusCode < 500) {
      return { type: TTSErrorType.FATAL, message: `Client error: ${message}`, statusCode, retryable: false };
    }
    if (statusCode >= 500 && statusCode < 600) {
      return { type: TTSErrorType.TRANSIENT, message: `Server error: ${message}`, statusCode, retryable: true };
    }
  }

  const lowerMessage = message.toLowerCase();

  if (lowerMessage.includes('timeout') || lowerMessage.includes('timed out')) {
    return { type: TTSErrorType.TIMEOUT, message: 'Request timeout', retryable: true };
  }

  if (
    lowerMessage.includes('econnrefused') ||
    lowerMessage.includes('econnreset') ||
    lowerMessage.includes('enotfound') ||
    lowerMessage.includes('network') ||
    lowerMessage.includes('connection')
  ) {
    return { type: TTSErrorType.CONNECTION, message: 'Connection error', retryable: true };
  }

  return { type: TTSErrorType.TRANSIENT, message, retryable: true };
}

/**
 * Exponential backoff delay for a zero-based attempt number
 */
export function getRetryDelay(attemptNumber: number, baseDelay = 250, maxDelay = 2000): number {
  return Math.min(baseDelay * Math.pow(2, attemptNumber), maxDelay);
}
