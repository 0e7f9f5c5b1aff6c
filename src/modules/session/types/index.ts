/**
 * Session Module Type Definitions
 */

import type { ConversationMode } from '../config/modes.config';

export type MessageRole = 'system' | 'user' | 'assistant';

export interface ConversationMessage {
  role: MessageRole;
  content: string;
  timestamp: number;
}

/**
 * One ongoing conversation. Stored as JSON under a string key.
 */
export interface ConversationSession {
  sessionId: string;
  mode: ConversationMode;
  voice: string;
  language: string;
  /** Resolved from the mode profile when the session is created */
  systemPrompt: string;
  maxTokens: number;
  /** Turn history, oldest first; the system prompt is not stored here */
  messages: ConversationMessage[];
  /** Compressed digest of turns dropped from `messages` */
  summary?: string;
  exchangeCount: number;
  isGenerating: boolean;
  createdAt: number;
  lastActivity: number;
}

export interface SessionInit {
  mode?: ConversationMode;
  voice?: string;
  language?: string;
}

export interface SessionStats {
  total: number;
  generating: number;
  backend: string;
}
