/**
 * LLM Utilities
 */

export { classifyLLMError, LLMErrorType, type ClassifiedLLMError } from './error-classifier';
