import { parseBool, parseIntBounded } from '../aiConfig';
import type { Env } from '../types';
import { DEFAULT_SESSION_STORE_LIMITS, type SessionStoreLimits } from './types';

export interface SessionRuntimeConfig {
  limits: SessionStoreLimits;
  sweepIntervalMs: number;
  strictPersistence: boolean;
}

export const getSessionRuntimeConfig = (env: Env): SessionRuntimeConfig => {
  return {
    limits: {
      windowSize: parseIntBounded(env.WINDOW_SIZE, DEFAULT_SESSION_STORE_LIMITS.windowSize, 1, 100),
      sessionTimeoutSeconds: parseIntBounded(
        env.SESSION_TIMEOUT_SECONDS,
        DEFAULT_SESSION_STORE_LIMITS.sessionTimeoutSeconds,
        60,
        7 * 24 * 3600
      ),
      maxSessions: parseIntBounded(env.MAX_SESSIONS, DEFAULT_SESSION_STORE_LIMITS.maxSessions, 1, 100000)
    },
    sweepIntervalMs: parseIntBounded(env.SESSION_SWEEP_INTERVAL_MS, 300000, 0, 24 * 3600 * 1000),
    strictPersistence: parseBool(env.STRICT_PERSISTENCE, false)
  };
};
