export type MessageRole = 'human' | 'assistant';

export interface Message {
  readonly role: MessageRole;
  readonly content: string;
  readonly timestamp: string;
}

export interface SessionSnapshot {
  readonly id: string;
  readonly owner: string;
  readonly history: readonly Message[];
  readonly createdAt: string;
  readonly lastActiveAt: string;
  readonly messageCount: number;
}

export interface SessionSummary {
  sessionId: string;
  createdAt: string;
  lastActiveAt: string;
  messageCount: number;
}

export interface SessionStoreStats {
  activeSessions: number;
  maxSessions: number;
  windowSize: number;
  sessionTimeoutSeconds: number;
  totalMessages: number;
}

export interface SessionStoreLimits {
  windowSize: number;
  sessionTimeoutSeconds: number;
  maxSessions: number;
}

export const DEFAULT_SESSION_STORE_LIMITS: SessionStoreLimits = {
  windowSize: 10,
  sessionTimeoutSeconds: 7200,
  maxSessions: 1000
};

export interface SessionState {
  id: string;
  owner: string;
  history: Message[];
  createdAtMs: number;
  lastActiveAtMs: number;
  messageCount: number;
}
