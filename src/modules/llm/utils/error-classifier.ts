/**
 * OpenAI Error Classifier
 * Classifies OpenAI API errors for logging and retry decisions
 */

export enum LLMErrorType {
  FATAL = 'FATAL',
  AUTH = 'AUTH',
  RATE_LIMIT = 'RATE_LIMIT',
  NETWORK = 'NETWORK',
  ABORTED = 'ABORTED',
  UNKNOWN = 'UNKNOWN',
}

export interface ClassifiedLLMError {
  type: LLMErrorType;
  message: string;
  isRetryable: boolean;
  status?: number;
}

function readStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    return typeof error.status === 'number' ? error.status : undefined;
  }
  return undefined;
}

/**
 * Classify LLM error for retry strategy
 */
export function classifyLLMError(error: unknown): ClassifiedLLMError {
  const raw = error instanceof Error ? error.message : String(error);
  const errorMessage = raw.toLowerCase();
  const status = readStatus(error);

  if (error instanceof Error && (error.name === 'AbortError' || errorMessage.includes('aborted'))) {
    return { type: LLMErrorType.ABORTED, message: 'Request aborted', isRetryable: false };
  }

  // Authentication errors
  if (
    status === 401 ||
    status === 403 ||
    errorMessage.includes('unauthorized') ||
    errorMessage.includes('invalid api key')
  ) {
    return {
      type: LLMErrorType.AUTH,
      message: 'Authentication failed with OpenAI',
      isRetryable: false,
      status,
    };
  }

  // Rate limit errors
  if (status === 429 || errorMessage.includes('rate limit') || errorMessage.includes('too many requests')) {
    return {
      type: LLMErrorType.RATE_LIMIT,
      message: 'OpenAI rate limit exceeded',
      isRetryable: true,
      status,
    };
  }

  // Network errors
  if (
    errorMessage.includes('econnrefused') ||
    errorMessage.includes('enotfound') ||
    errorMessage.includes('network') ||
    errorMessage.includes('timeout') ||
    errorMessage.includes('timed out')
  ) {
    return {
      type: LLMErrorType.NETWORK,
      message: 'Network error connecting to OpenAI',
      isRetryable: true,
      status,
    };
  }

  // Context length, invalid request
  if (
    status === 400 ||
    status === 404 ||
    errorMessage.includes('maximum context length') ||
    errorMessage.includes('model not found')
  ) {
    return {
      type: LLMErrorType.FATAL,
      message: 'Fatal OpenAI API error',
      isRetryable: false,
      status,
    };
  }

  return {
    type: LLMErrorType.UNKNOWN,
    message: 'Unknown OpenAI error',
    isRetryable: true,
    status,
  };
}
