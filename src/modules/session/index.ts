/**
 * Session Module Exports
 */

export { SessionStoreService } from './services';
export {
  sessionConfig,
  ConversationMode,
  MODE_PROFILES,
  DEFAULT_MODE,
  isConversationMode,
  parseMode,
  resolveModeProfile,
  languageName,
} from './config';
export type { SessionStoreConfig, ModeProfile } from './config';
export type {
  ConversationSession,
  ConversationMessage,
  MessageRole,
  SessionInit,
  SessionStats,
} from './types';
