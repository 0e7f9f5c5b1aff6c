/**
 * Session Store Service
 * Per-conversation state keyed by session id, persisted as JSON through a KeyValueBackend
 */

import { logger, toError, KeyedMutex, parseJson } from '@/shared/utils';
import { ConversationError, ConversationErrorType } from '@/shared/errors';
import type { KeyValueBackend } from '@/modules/store';
import {
  sessionConfig,
  DEFAULT_MODE,
  isConversationMode,
  languageName,
  resolveModeProfile,
} from '../config';
import type { SessionStoreConfig } from '../config';
import type { ConversationSession, SessionInit, SessionStats } from '../types';

function isConversationSession(value: unknown): value is ConversationSession {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const field = (name: keyof ConversationSession): unknown => Reflect.get(value, name);
  return (
    typeof field('sessionId') === 'string' &&
    isConversationMode(field('mode')) &&
    typeof field('voice') === 'string' &&
    typeof field('systemPrompt') === 'string' &&
    typeof field('maxTokens') === 'number' &&
    Array.isArray(field('messages')) &&
    typeof field('exchangeCount') === 'number' &&
    typeof field('lastActivity') === 'number'
  );
}

export type ExpiryListener = (sessionId: string) => Promise<void> | void;

export class SessionStoreService {
  private readonly mutex = new KeyedMutex();
  private readonly expiryListeners: ExpiryListener[] = [];
  private cleanupTimer?: ReturnType<typeof setInterval>;

  constructor(
    private readonly backend: KeyValueBackend,
    private readonly config: SessionStoreConfig = sessionConfig,
    private readonly now: () => number = Date.now
  ) {}

  get backendKind(): string {
    return this.backend.kind;
  }

  /**
   * Get session, or undefined when absent or unreadable
   */
  async get(sessionId: string): Promise<ConversationSession | undefined> {
    const raw = await this.backend.get(this.key(sessionId));
    if (raw === undefined) {
      return undefined;
    }

    const parsed = parseJson(raw);
    if (isConversationSession(parsed)) {
      return parsed;
    }
    logger.warn('Discarding malformed session record', { sessionId });
    return undefined;
  }

  /**
   * Upsert session and refresh its expiry
   */
  async put(sessionId: string, session: ConversationSession): Promise<void> {
    await this.mutex.runExclusive(sessionId, () => this.write(sessionId, session));
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.mutex.runExclusive(sessionId, async () => {
      const existed = (await this.backend.get(this.key(sessionId))) !== undefined;
      await this.backend.delete(this.key(sessionId));
      if (existed) {
        logger.info('Session deleted', { sessionId });
      }
      return existed;
    });
  }

  async count(): Promise<number> {
    return (await this.backend.keys(this.config.keyPrefix)).length;
  }

  async listIds(): Promise<string[]> {
    const keys = await this.backend.keys(this.config.keyPrefix);
    return keys.map((key) => key.slice(this.config.keyPrefix.length));
  }

  /**
   * Return the existing session or create one from the mode profile
   * @throws ConversationError(ADMISSION_REJECTED) when the session cap is reached
   */
  async getOrCreate(sessionId: string, init: SessionInit = {}): Promise<ConversationSession> {
    return this.mutex.runExclusive(sessionId, async () => {
      const existing = await this.get(sessionId);
      if (existing) {
        return existing;
      }

      if ((await this.count()) >= this.config.maxSessions) {
        logger.warn('Session limit reached, rejecting new session', {
          sessionId,
          maxSessions: this.config.maxSessions,
        });
        throw new ConversationError(
          ConversationErrorType.ADMISSION_REJECTED,
          `Session limit of ${this.config.maxSessions} reached`
        );
      }

      const session = this.createRecord(sessionId, init);
      await this.write(sessionId, session);
      logger.info('Session created', { sessionId, mode: session.mode });
      return session;
    });
  }

  /**
   * Read-modify-write under the session lock
   * @returns updated session, or undefined if the session does not exist
   */
  async update(
    sessionId: string,
    mutator: (session: ConversationSession) => void
  ): Promise<ConversationSession | undefined> {
    return this.mutex.runExclusive(sessionId, async () => {
      const session = await this.get(sessionId);
      if (!session) {
        logger.debug('Session not found for update', { sessionId });
        return undefined;
      }
      mutator(session);
      await this.write(sessionId, session);
      return session;
    });
  }

  /**
   * Delete sessions idle for longer than timeoutMs. Each record is re-read under
   * its lock, so a session touched while the sweep runs is kept.
   * @returns number of sessions removed
   */
  async sweepExpired(timeoutMs: number = this.config.idleTimeoutMs): Promise<number> {
    let removed = 0;

    for (const sessionId of await this.listIds()) {
      const expired = await this.mutex.runExclusive(sessionId, async () => {
        const session = await this.get(sessionId);
        if (session && this.now() - session.lastActivity <= timeoutMs) {
          return false;
        }
        await this.backend.delete(this.key(sessionId));
        return true;
      });
      if (!expired) {
        continue;
      }
      removed++;
      for (const listener of this.expiryListeners) {
        await listener(sessionId);
      }
    }

    if (removed > 0) {
      logger.info('Cleaned up expired sessions', { count: removed });
    }
    return removed;
  }

  /**
   * Run listener for every session removed by sweepExpired
   */
  onExpired(listener: ExpiryListener): void {
    this.expiryListeners.push(listener);
  }

  async getStats(): Promise<SessionStats> {
    let generating = 0;
    const ids = await this.listIds();
    for (const sessionId of ids) {
      const session = await this.get(sessionId);
      if (session?.isGenerating) {
        generating++;
      }
    }
    return { total: ids.length, generating, backend: this.backend.kind };
  }

  startCleanupTimer(): void {
    this.stopCleanupTimer();
    this.cleanupTimer = setInterval(() => {
      this.sweepExpired().catch((error: unknown) => {
        logger.error('Error during session cleanup', toError(error));
      });
    }, this.config.cleanupIntervalMs);

    logger.debug('Session cleanup interval started', {
      intervalMs: this.config.cleanupIntervalMs,
    });
  }

  stopCleanupTimer(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
      logger.debug('Session cleanup interval stopped');
    }
  }

  private createRecord(sessionId: string, init: SessionInit): ConversationSession {
    const now = this.now();
    const profile = resolveModeProfile(init.mode ?? DEFAULT_MODE);
    const language = init.language || 'en';

    return {
      sessionId,
      mode: profile.mode,
      voice: init.voice || profile.voice,
      language,
      systemPrompt: profile.systemPrompt(languageName(language)),
      maxTokens: profile.maxTokens,
      messages: [],
      exchangeCount: 0,
      isGenerating: false,
      createdAt: now,
      lastActivity: now,
    };
  }

  private async write(sessionId: string, session: ConversationSession): Promise<void> {
    session.lastActivity = this.now();
    await this.backend.set(this.key(sessionId), JSON.stringify(session), this.config.ttlSeconds);
  }

  private key(sessionId: string): string {
    return `${this.config.keyPrefix}${sessionId}`;
  }
}
