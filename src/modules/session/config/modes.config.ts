/**
 * Conversation Modes
 * One table maps each mode to its voice, instructions and token budget.
 * A session resolves its profile once, at creation.
 */

export enum ConversationMode {
  INTERVIEW = 'interview',
  LANGUAGE = 'language',
  GENERAL = 'general',
}

export interface ModeProfile {
  mode: ConversationMode;
  voice: string;
  maxTokens: number;
  /** Receives the display name of the session language */
  systemPrompt: (languageName: string) => string;
}

// Cartesia voice ids
const DEFAULT_VOICE = 'c961b81c-a935-4c17-bfb3-ba2239de8c2f';
const ALTERNATE_VOICE = '6ccbfb76-1fc6-48f7-b71d-91ac6298247b';

const spokenStyle =
  'Your replies are spoken aloud, so write plain sentences without markdown, lists or emoji.';

export const MODE_PROFILES: Record<ConversationMode, ModeProfile> = {
  [ConversationMode.INTERVIEW]: {
    mode: ConversationMode.INTERVIEW,
    voice: process.env.TTS_VOICE_INTERVIEW || DEFAULT_VOICE,
    maxTokens: parseInt(process.env.LLM_MAX_TOKENS_INTERVIEW || '300', 10),
    systemPrompt: () =>
      process.env.PROMPT_INTERVIEW ||
      `You are conducting a practice job interview, one question at a time. ${spokenStyle}`,
  },
  [ConversationMode.LANGUAGE]: {
    mode: ConversationMode.LANGUAGE,
    voice: process.env.TTS_VOICE_LANGUAGE || ALTERNATE_VOICE,
    maxTokens: parseInt(process.env.LLM_MAX_TOKENS_LANGUAGE || '200', 10),
    systemPrompt: (languageName) =>
      process.env.PROMPT_LANGUAGE ||
      `You are a conversation partner helping the user practise ${languageName}. Reply in ${languageName}. ${spokenStyle}`,
  },
  [ConversationMode.GENERAL]: {
    mode: ConversationMode.GENERAL,
    voice: process.env.TTS_VOICE_GENERAL || DEFAULT_VOICE,
    maxTokens: parseInt(process.env.LLM_MAX_TOKENS_GENERAL || '350', 10),
    systemPrompt: () =>
      process.env.PROMPT_GENERAL || `You are a friendly voice assistant. ${spokenStyle}`,
  },
};

export const DEFAULT_MODE = ConversationMode.GENERAL;

export function isConversationMode(value: unknown): value is ConversationMode {
  return Object.values(ConversationMode).some((mode) => mode === value);
}

/**
 * Parse a client-supplied mode, defaulting unknown values to general
 */
export function parseMode(value: unknown): ConversationMode {
  return isConversationMode(value) ? value : DEFAULT_MODE;
}

export function resolveModeProfile(mode: ConversationMode): ModeProfile {
  return MODE_PROFILES[mode];
}

/**
 * English display name of a language code ("fr" -> "French")
 */
export function languageName(code: string): string {
  try {
    return new Intl.DisplayNames(['en'], { type: 'language' }).of(code) ?? code;
  } catch {
    return code;
  }
}
