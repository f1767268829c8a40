import { RateLimitError } from './errors';
import type { AuthContext } from './types';

export interface LimitResult {
  success: boolean;
  retryAfterSeconds: number;
}

export interface RateLimiter {
  limit: (options: { key: string }) => Promise<LimitResult>;
}

interface WindowCounter {
  windowStartMs: number;
  count: number;
}

/** Fixed-window counter per key, held in process memory. */
export class InMemoryRateLimiter implements RateLimiter {
  private readonly counters = new Map<string, WindowCounter>();

  constructor(
    private readonly maxPerWindow: number,
    private readonly windowMs = 60_000,
    private readonly now: () => number = Date.now
  ) {}

  async limit({ key }: { key: string }): Promise<LimitResult> {
    const nowMs = this.now();
    const current = this.counters.get(key);

    if (!current || nowMs - current.windowStartMs >= this.windowMs) {
      this.prune(nowMs);
      this.counters.set(key, { windowStartMs: nowMs, count: 1 });
      return { success: true, retryAfterSeconds: 0 };
    }

    if (current.count >= this.maxPerWindow) {
      const remainingMs = current.windowStartMs + this.windowMs - nowMs;
      return { success: false, retryAfterSeconds: Math.max(1, Math.ceil(remainingMs / 1000)) };
    }

    current.count += 1;
    return { success: true, retryAfterSeconds: 0 };
  }

  private prune(nowMs: number): void {
    for (const [key, counter] of this.counters) {
      if (nowMs - counter.windowStartMs >= this.windowMs) {
        this.counters.delete(key);
      }
    }
  }
}

const makeRateLimitKey = (auth: AuthContext): string => {
  const subject = auth.claims.sub || 'unknown';
  return `chat:${subject}`;
};

export const enforceChatRateLimit = async (auth: AuthContext, limiter: RateLimiter | undefined): Promise<void> => {
  if (!limiter) return;

  const result = await limiter.limit({ key: makeRateLimitKey(auth) });
  if (!result.success) {
    throw new RateLimitError('Rate limit exceeded. Slow down and retry.', result.retryAfterSeconds);
  }
};
