/**
 * Cancellation Registry
 * One live cancellation token per session. Registering a token for a session
 * cancels the one it replaces.
 */

import { logger } from '@/shared/utils';
import { ConversationError, ConversationErrorType } from '@/shared/errors';

export class CancellationToken {
  private readonly controller = new AbortController();

  constructor(
    readonly sessionId: string,
    readonly turnId: string
  ) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Idempotent; the first reason wins
   */
  cancel(reason: string): void {
    if (this.cancelled) {
      return;
    }
    this.controller.abort(new ConversationError(ConversationErrorType.CANCELLED, reason));
  }

  throwIfCancelled(): void {
    if (this.cancelled) {
      throw this.controller.signal.reason;
    }
  }
}

export class CancellationRegistry {
  private tokens = new Map<string, CancellationToken>();

  register(sessionId: string, turnId: string): CancellationToken {
    const previous = this.tokens.get(sessionId);
    if (previous && !previous.cancelled) {
      previous.cancel('superseded');
      logger.info('Previous generation superseded', {
        sessionId,
        previousTurnId: previous.turnId,
        turnId,
      });
    }

    const token = new CancellationToken(sessionId, turnId);
    this.tokens.set(sessionId, token);
    return token;
  }

  /**
   * @returns false when the session has no live token
   */
  cancel(sessionId: string, reason: string): boolean {
    const token = this.tokens.get(sessionId);
    if (!token || token.cancelled) {
      return false;
    }
    token.cancel(reason);
    logger.info('Generation cancelled', { sessionId, turnId: token.turnId, reason });
    return true;
  }

  get(sessionId: string): CancellationToken | undefined {
    return this.tokens.get(sessionId);
  }

  /**
   * Drop the token if it is still the session's current one
   */
  release(token: CancellationToken): void {
    if (this.tokens.get(token.sessionId) === token) {
      this.tokens.delete(token.sessionId);
    }
  }

  size(): number {
    return this.tokens.size;
  }

  cancelAll(reason = 'shutdown'): void {
    for (const token of this.tokens.values()) {
      token.cancel(reason);
    }
    this.tokens.clear();
  }
}
