/**
 * Conversation Error Taxonomy
 * Every failure a turn can end in, with the single status line a user sees for it
 */

export enum ConversationErrorType {
  ADMISSION_REJECTED = 'admission_rejected',
  INVALID_INPUT = 'invalid_input',
  UPSTREAM_FAILURE = 'upstream_failure',
  CANCELLED = 'cancelled',
  CACHE_CORRUPTION = 'cache_corruption',
}

/**
 * User-facing status text per category. Upstream detail never goes here.
 */
export const STATUS_MESSAGES: Record<ConversationErrorType, string> = {
  [ConversationErrorType.ADMISSION_REJECTED]:
    "You're sending messages too quickly. Please wait a moment and try again.",
  [ConversationErrorType.INVALID_INPUT]: "I couldn't process that message. Please try again.",
  [ConversationErrorType.UPSTREAM_FAILURE]: 'Something went wrong generating a reply. Please try again.',
  [ConversationErrorType.CANCELLED]: 'Response stopped.',
  [ConversationErrorType.CACHE_CORRUPTION]: '',
};

export const NOT_HEARD_MESSAGE = 'Could not hear you clearly. Please try again.';

export class ConversationError extends Error {
  readonly type: ConversationErrorType;

  constructor(type: ConversationErrorType, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConversationError';
    this.type = type;
  }

  /** Status line safe to show to the end user */
  get userMessage(): string {
    return STATUS_MESSAGES[this.type];
  }
}

export function isConversationError(error: unknown): error is ConversationError {
  return error instanceof ConversationError;
}
