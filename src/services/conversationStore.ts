/**
 * In-memory conversation history keyed by session id.
 *
 * Work on one session is serialized through `runExclusive`; different
 * sessions proceed concurrently. Sessions are bounded in length and evicted
 * after a period of inactivity.
 */

import { logger } from '../config/logger';
import { ConversationMessage, Destination, Session } from '../types/chat.types';

export interface ConversationStoreConfig {
  maxMessages: number;
  idleTimeoutMs: number;
  cleanupIntervalMs: number;
}

export interface ConversationStats {
  totalSessions: number;
  totalMessages: number;
  activeLocks: number;
  oldestActivity: Date | null;
}

const DEFAULT_CONFIG: ConversationStoreConfig = {
  maxMessages: 40,
  idleTimeoutMs: 30 * 60 * 1000,
  cleanupIntervalMs: 5 * 60 * 1000
};

export class ConversationStore {
  private sessions: Map<string, Session> = new Map();
  private locks: Map<string, Promise<void>> = new Map();
  private cleanupTimer: NodeJS.Timeout | null = null;
  private readonly config: ConversationStoreConfig;

  constructor(config?: Partial<ConversationStoreConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.startCleanupTimer();
  }

  /**
   * Snapshot of the session's messages. Unknown sessions read as empty.
   */
  getHistory(sessionId: string): readonly ConversationMessage[] {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return [];
    }
    return Object.freeze(session.messages.map(message => ({ ...message })));
  }

  appendTurn(
    sessionId: string,
    userText: string,
    assistantText: string,
    destination?: Destination
  ): readonly ConversationMessage[] {
    const now = new Date();
    const session = this.sessions.get(sessionId) ?? {
      sessionId,
      messages: [],
      createdAt: now,
      lastActivity: now
    };

    session.messages.push(
      { role: 'user', content: userText, timestamp: now },
      { role: 'assistant', content: assistantText, timestamp: now, destination }
    );
    session.lastActivity = now;

    const overflow = session.messages.length - this.config.maxMessages;
    if (overflow > 0) {
      session.messages.splice(0, overflow);
    }

    this.sessions.set(sessionId, session);
    return this.getHistory(sessionId);
  }

  /**
   * Run `fn` once every earlier call for the same session has settled.
   * A failed call does not block the ones queued behind it.
   */
  runExclusive<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(sessionId) ?? Promise.resolve();
    const run = previous.then(fn);
    const tail = run.then(
      () => undefined,
      () => undefined
    );

    this.locks.set(sessionId, tail);
    void tail.then(() => {
      if (this.locks.get(sessionId) === tail) {
        this.locks.delete(sessionId);
      }
    });

    return run;
  }

  isLocked(sessionId: string): boolean {
    return this.locks.has(sessionId);
  }

  clearSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  cleanupInactiveSessions(now: number = Date.now()): number {
    const expired: string[] = [];

    for (const [sessionId, session] of this.sessions) {
      if (this.isLocked(sessionId)) {
        continue;
      }
      if (now - session.lastActivity.getTime() > this.config.idleTimeoutMs) {
        expired.push(sessionId);
      }
    }

    for (const sessionId of expired) {
      this.sessions.delete(sessionId);
    }

    if (expired.length > 0) {
      logger.info('Evicted inactive sessions', { count: expired.length });
    }

    return expired.length;
  }

  getStats(): ConversationStats {
    const sessions = Array.from(this.sessions.values());

    const oldestActivity = sessions.length > 0
      ? sessions.reduce((oldest, current) =>
          current.lastActivity < oldest.lastActivity ? current : oldest
        ).lastActivity
      : null;

    return {
      totalSessions: sessions.length,
      totalMessages: sessions.reduce((sum, session) => sum + session.messages.length, 0),
      activeLocks: this.locks.size,
      oldestActivity
    };
  }

  shutdown(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    this.sessions.clear();
  }

  private startCleanupTimer(): void {
    this.cleanupTimer = setInterval(() => {
      this.cleanupInactiveSessions();
    }, this.config.cleanupIntervalMs);
    this.cleanupTimer.unref();
  }
}
