/**
 * Shared Configuration
 * Centralized exports for all configuration
 */

import dotenv from 'dotenv';

dotenv.config();

/**
 * Environment variables
 */
export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',
  PORT: parseInt(process.env.PORT || '3001', 10),
  FRONTEND_URL: process.env.FRONTEND_URL || 'http://localhost:5173',

  // Upstream providers
  DEEPGRAM_API_KEY: process.env.DEEPGRAM_API_KEY,
  OPENAI_API_KEY: process.env.OPENAI_API_KEY,
  CARTESIA_API_KEY: process.env.CARTESIA_API_KEY,

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
} as const;

/**
 * Validate required environment variables
 */
export function validateEnv(source: Partial<Record<keyof typeof env, unknown>> = env): void {
  const required: (keyof typeof env)[] = ['PORT', 'FRONTEND_URL', 'OPENAI_API_KEY'];

  const missing = required.filter((key) => !source[key]);

  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
  }
}

export * from './socket';
export * from './limits';
