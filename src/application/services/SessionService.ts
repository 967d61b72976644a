import { randomUUID } from 'crypto';
import { Conversation } from '../../core/entities/Conversation.js';
import { DEFAULT_MODEL, ModelId } from '../../core/entities/Model.js';
import { HumanizerSession, SessionSummary } from '../../core/entities/Session.js';
import { SessionNotFoundError } from '../../core/errors.js';

/**
 * Service for managing humanizer sessions.
 * Sessions live in memory only and never share state. Idle ones are
 * discarded once startCleanup() has been called.
 */
export class SessionService {
  private sessions: Map<string, HumanizerSession> = new Map();
  private sessionTimeout: number; // milliseconds
  private cleanupTimer: NodeJS.Timeout | null = null;

  constructor(private defaultModel: ModelId = DEFAULT_MODEL, sessionTimeoutMinutes = 60) {
    this.sessionTimeout = sessionTimeoutMinutes * 60 * 1000;
  }

  /**
   * Create a new empty session
   */
  createSession(model?: ModelId, sessionId: string = randomUUID()): HumanizerSession {
    const now = new Date();
    const session: HumanizerSession = {
      sessionId,
      conversation: new Conversation(),
      model: model ?? this.defaultModel,
      createdAt: now,
      lastAccessed: now,
      turnInFlight: false,
    };
    this.sessions.set(sessionId, session);
    return session;
  }

  /**
   * Get an existing session or throw SessionNotFoundError
   */
  getSession(sessionId: string): HumanizerSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    session.lastAccessed = new Date();
    return session;
  }

  /**
   * Return the named session, creating it when unknown.
   * A model given for an existing session becomes its current selection.
   */
  getOrCreateSession(sessionId?: string, model?: ModelId): HumanizerSession {
    if (sessionId && this.sessions.has(sessionId)) {
      const session = this.getSession(sessionId);
      if (model) {
        session.model = model;
      }
      return session;
    }
    return this.createSession(model, sessionId || randomUUID());
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /**
   * Change the model used for future turns; stored messages are untouched
   */
  selectModel(sessionId: string, model: ModelId): HumanizerSession {
    const session = this.getSession(sessionId);
    session.model = model;
    return session;
  }

  listSessions(): SessionSummary[] {
    return Array.from(this.sessions.values()).map((session) => ({
      sessionId: session.sessionId,
      model: session.model,
      messageCount: session.conversation.length,
      lastAccessed: session.lastAccessed.toISOString(),
    }));
  }

  getDefaultModel(): ModelId {
    return this.defaultModel;
  }

  removeSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  /**
   * Sweep stale sessions periodically. The timer does not keep the process alive.
   */
  startCleanup(intervalMs: number = 5 * 60 * 1000): void {
    if (this.cleanupTimer) return;
    this.cleanupTimer = setInterval(() => this.cleanupStaleSessions(), intervalMs);
    this.cleanupTimer.unref();
  }

  stopCleanup(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  /**
   * Remove sessions inactive for longer than the timeout.
   * Sessions with a turn in flight are kept.
   */
  cleanupStaleSessions(now: number = Date.now()): string[] {
    const staleSessionIds: string[] = [];

    for (const [sessionId, session] of this.sessions) {
      const inactiveMs = now - session.lastAccessed.getTime();
      if (inactiveMs > this.sessionTimeout && !session.turnInFlight) {
        staleSessionIds.push(sessionId);
      }
    }

    if (staleSessionIds.length > 0) {
      console.error(`[Sessions] Cleaning up ${staleSessionIds.length} stale sessions`);
      staleSessionIds.forEach((id) => this.removeSession(id));
    }
    return staleSessionIds;
  }
}
