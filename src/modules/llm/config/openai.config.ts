/**
 * OpenAI API Configuration
 * Model, temperature, timeout, and API settings.
 * Token budgets are per mode (see session mode profiles).
 */

export const openaiConfig = {
  // Model configuration
  model: process.env.LLM_MODEL || 'gpt-4o-mini',
  temperature: parseFloat(process.env.LLM_TEMPERATURE || '0.85'),
  topP: parseFloat(process.env.LLM_TOP_P || '1.0'),

  // API configuration
  apiKey: process.env.OPENAI_API_KEY || '',
  organization: process.env.OPENAI_ORGANIZATION || undefined,
  timeout: parseInt(process.env.LLM_REQUEST_TIMEOUT || '30000', 10), // 30s
  maxRetries: parseInt(process.env.LLM_MAX_RETRIES || '0', 10),

  /**
   * Validate configuration
   */
  validate(): void {
    if (!this.apiKey) {
      throw new Error('OPENAI_API_KEY is required in environment variables');
    }
    if (this.temperature < 0 || this.temperature > 2) {
      throw new Error('LLM_TEMPERATURE must be between 0 and 2');
    }
  },
} as const;
