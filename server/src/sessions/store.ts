import { randomUUID } from 'node:crypto';
import { NotAuthorizedError, SessionNotFoundError, ValidationError } from '../errors';
import { KeyedLock } from './locks';
import {
  DEFAULT_SESSION_STORE_LIMITS,
  type Message,
  type MessageRole,
  type SessionSnapshot,
  type SessionState,
  type SessionStoreLimits,
  type SessionStoreStats,
  type SessionSummary
} from './types';

export interface SessionStoreOptions {
  limits?: Partial<SessionStoreLimits>;
  now?: () => number;
  generateId?: () => string;
}

const clamp = (value: number, min: number, max: number): number => {
  return Math.min(max, Math.max(min, value));
};

const normalizeLimits = (limits?: Partial<SessionStoreLimits>): SessionStoreLimits => ({
  windowSize: clamp(limits?.windowSize ?? DEFAULT_SESSION_STORE_LIMITS.windowSize, 1, 100),
  sessionTimeoutSeconds: clamp(
    limits?.sessionTimeoutSeconds ?? DEFAULT_SESSION_STORE_LIMITS.sessionTimeoutSeconds,
    1,
    7 * 24 * 3600
  ),
  maxSessions: clamp(limits?.maxSessions ?? DEFAULT_SESSION_STORE_LIMITS.maxSessions, 1, 100_000)
});

const assertOwner = (owner: string): void => {
  if (!owner?.trim()) throw new ValidationError('owner is required.');
};

const toIso = (ms: number): string => new Date(ms).toISOString();

const snapshot = (state: SessionState): SessionSnapshot => {
  return Object.freeze({
    id: state.id,
    owner: state.owner,
    history: Object.freeze(state.history.slice()),
    createdAt: toIso(state.createdAtMs),
    lastActiveAt: toIso(state.lastActiveAtMs),
    messageCount: state.messageCount
  });
};

/**
 * Owns every live session. Callers only ever receive frozen snapshots.
 *
 * Expired sessions are unreachable the moment they pass the idle timeout,
 * whether or not a sweep has removed them yet.
 */
export class SessionStore {
  readonly limits: SessionStoreLimits;
  private readonly sessions = new Map<string, SessionState>();
  private readonly locks = new KeyedLock();
  private readonly now: () => number;
  private readonly generateId: () => string;

  constructor(options: SessionStoreOptions = {}) {
    this.limits = normalizeLimits(options.limits);
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? randomUUID;
  }

  private isExpired(state: SessionState, nowMs: number): boolean {
    return nowMs - state.lastActiveAtMs > this.limits.sessionTimeoutSeconds * 1000;
  }

  private findLive(sessionId: string, nowMs: number): SessionState | null {
    const existing = this.sessions.get(sessionId);
    if (!existing) return null;

    if (this.isExpired(existing, nowMs)) {
      this.sessions.delete(sessionId);
      return null;
    }

    return existing;
  }

  private evictLeastRecentlyActive(): void {
    let oldest: SessionState | null = null;
    for (const state of this.sessions.values()) {
      if (!oldest || state.lastActiveAtMs < oldest.lastActiveAtMs) {
        oldest = state;
      }
    }

    if (oldest) this.sessions.delete(oldest.id);
  }

  private allocateId(): string {
    let id = this.generateId();
    while (this.sessions.has(id)) {
      id = this.generateId();
    }
    return id;
  }

  create(owner: string): SessionSnapshot {
    assertOwner(owner);
    this.sweepExpired();
    if (this.sessions.size >= this.limits.maxSessions) {
      this.evictLeastRecentlyActive();
    }

    const nowMs = this.now();
    const state: SessionState = {
      id: this.allocateId(),
      owner,
      history: [],
      createdAtMs: nowMs,
      lastActiveAtMs: nowMs,
      messageCount: 0
    };
    this.sessions.set(state.id, state);
    return snapshot(state);
  }

  getOrCreate(sessionId: string | undefined, owner: string): SessionSnapshot {
    assertOwner(owner);
    const normalizedId = sessionId?.trim();
    if (!normalizedId) return this.create(owner);

    const nowMs = this.now();
    const existing = this.findLive(normalizedId, nowMs);
    if (!existing) return this.create(owner);

    if (existing.owner !== owner) {
      throw new NotAuthorizedError();
    }

    existing.lastActiveAtMs = nowMs;
    return snapshot(existing);
  }

  private pushMessages(sessionId: string, entries: Array<{ role: MessageRole; content: string }>): void {
    const nowMs = this.now();
    const existing = this.findLive(sessionId, nowMs);
    if (!existing) throw new SessionNotFoundError();

    for (const entry of entries) {
      const message: Message = Object.freeze({ role: entry.role, content: entry.content, timestamp: toIso(nowMs) });
      existing.history.push(message);
      existing.messageCount += 1;
    }

    const maxEntries = this.limits.windowSize * 2;
    if (existing.history.length > maxEntries) {
      existing.history.splice(0, existing.history.length - maxEntries);
    }

    existing.lastActiveAtMs = nowMs;
  }

  async append(sessionId: string, role: MessageRole, content: string): Promise<void> {
    await this.locks.run(sessionId, () => this.pushMessages(sessionId, [{ role, content }]));
  }

  /** Appends a query and its answer under one lock so concurrent turns never interleave. */
  async appendExchange(sessionId: string, query: string, answer: string): Promise<void> {
    await this.locks.run(sessionId, () =>
      this.pushMessages(sessionId, [
        { role: 'human', content: query },
        { role: 'assistant', content: answer }
      ])
    );
  }

  getHistory(sessionId: string, owner: string): readonly Message[] {
    return this.getSession(sessionId, owner).history;
  }

  getSession(sessionId: string, owner: string): SessionSnapshot {
    assertOwner(owner);
    const nowMs = this.now();
    const existing = this.findLive(sessionId, nowMs);
    if (!existing) throw new SessionNotFoundError();
    if (existing.owner !== owner) throw new NotAuthorizedError();

    existing.lastActiveAtMs = nowMs;
    return snapshot(existing);
  }

  async delete(sessionId: string, owner: string): Promise<void> {
    assertOwner(owner);
    await this.locks.run(sessionId, () => {
      const existing = this.findLive(sessionId, this.now());
      if (!existing) return;
      if (existing.owner !== owner) throw new NotAuthorizedError();
      this.sessions.delete(sessionId);
    });
  }

  sweepExpired(): number {
    const nowMs = this.now();
    let removed = 0;

    for (const [id, state] of this.sessions) {
      if (this.isExpired(state, nowMs)) {
        this.sessions.delete(id);
        removed += 1;
      }
    }

    return removed;
  }

  listSessions(owner: string): SessionSummary[] {
    assertOwner(owner);
    const nowMs = this.now();
    const owned: SessionState[] = [];

    for (const state of this.sessions.values()) {
      if (state.owner !== owner || this.isExpired(state, nowMs)) continue;
      owned.push(state);
    }

    return owned
      .sort((a, b) => b.lastActiveAtMs - a.lastActiveAtMs)
      .map((state) => ({
        sessionId: state.id,
        createdAt: toIso(state.createdAtMs),
        lastActiveAt: toIso(state.lastActiveAtMs),
        messageCount: state.messageCount
      }));
  }

  stats(): SessionStoreStats {
    const nowMs = this.now();
    let activeSessions = 0;
    let totalMessages = 0;

    for (const state of this.sessions.values()) {
      if (this.isExpired(state, nowMs)) continue;
      activeSessions += 1;
      totalMessages += state.messageCount;
    }

    return {
      activeSessions,
      maxSessions: this.limits.maxSessions,
      windowSize: this.limits.windowSize,
      sessionTimeoutSeconds: this.limits.sessionTimeoutSeconds,
      totalMessages
    };
  }

  lockStats(): { activeLocks: number } {
    return this.locks.stats();
  }
}
