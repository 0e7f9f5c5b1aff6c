export { sessionConfig } from './session.config';
export type { SessionStoreConfig } from './session.config';
export {
  ConversationMode,
  MODE_PROFILES,
  DEFAULT_MODE,
  isConversationMode,
  parseMode,
  resolveModeProfile,
  languageName,
} from './modes.config';
export type { ModeProfile } from './modes.config';
