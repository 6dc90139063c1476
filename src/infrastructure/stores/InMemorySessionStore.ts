import type { FastifyBaseLogger } from 'fastify';
import { Session, cloneCart } from '../../domain/models.js';
import { ISessionStore } from './ISessionStore.js';
import {
  SessionExpiredError,
  ResourceNotFoundError,
} from '../../domain/errors/index.js';

export interface InMemorySessionStoreOptions {
  ttlMinutes?: number;
  enableAutoCleanup?: boolean;
  logger?: Pick<FastifyBaseLogger, 'info'>;
}

// sessions live only as long as the process
export class InMemorySessionStore implements ISessionStore {
  private sessions: Map<string, Session> = new Map();
  private cleanupInterval: NodeJS.Timeout | null = null;
  private readonly ttlMinutes: number;
  private readonly logger?: Pick<FastifyBaseLogger, 'info'>;

  constructor(options: InMemorySessionStoreOptions = {}) {
    this.ttlMinutes = options.ttlMinutes ?? 30;
    this.logger = options.logger;

    if (options.enableAutoCleanup ?? true) {
      this.cleanupInterval = setInterval(() => {
        this.cleanupExpiredSessions();
      }, 60 * 1000);
    }
  }

  async createSession(session: Session): Promise<Session> {
    this.sessions.set(session.sessionId, this.copy(session));
    return this.copy(session);
  }

  async getSession(sessionId: string): Promise<Session | null> {
    const stored = this.sessions.get(sessionId);
    if (!stored) return null;

    // 410 rather than 404 so the client knows to start over
    if (this.isExpired(stored)) {
      this.sessions.delete(sessionId);
      throw new SessionExpiredError(sessionId);
    }

    return this.copy(stored);
  }

  async updateSession(session: Session): Promise<Session> {
    const stored = this.sessions.get(session.sessionId);
    if (!stored) throw new ResourceNotFoundError('Session', session.sessionId);

    if (this.isExpired(stored)) {
      this.sessions.delete(session.sessionId);
      throw new SessionExpiredError(session.sessionId);
    }

    // createdAt stays with the stored entry so updates never extend the TTL
    this.sessions.set(session.sessionId, { ...this.copy(session), createdAt: stored.createdAt });
    return this.copy(session);
  }

  async deleteSession(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }

  private copy(session: Session): Session {
    return { ...session, cart: cloneCart(session.cart) };
  }

  private isExpired(session: Session): boolean {
    const expirationTime = session.createdAt.getTime() + this.ttlMinutes * 60 * 1000;
    return Date.now() > expirationTime;
  }

  private cleanupExpiredSessions(): void {
    const expiredIds: string[] = [];

    // collect first to avoid modifying map during iteration
    for (const [sessionId, session] of this.sessions.entries()) {
      if (this.isExpired(session)) {
        expiredIds.push(sessionId);
      }
    }

    for (const sessionId of expiredIds) {
      this.sessions.delete(sessionId);
    }

    if (expiredIds.length > 0) {
      this.logger?.info(`Cleaned up ${expiredIds.length} expired session(s)`);
    }
  }

  // Utility methods for testing
  getSessionCount(): number {
    return this.sessions.size;
  }

  clearAllSessions(): void {
    this.sessions.clear();
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
  }
}
