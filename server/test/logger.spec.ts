import { afterEach, describe, expect, it, vi } from 'vitest';
import { createRequestLogger, createServiceLogger, parseLogLevel } from '../src/logger';
import { buildEnv } from './helpers';

const readEntry = (calls: unknown[][], call = 0): Record<string, unknown> => {
  return JSON.parse(String(calls[call][0])) as Record<string, unknown>;
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe('logger sanitization', () => {
  it('keeps token count metrics while redacting sensitive values', () => {
    const logger = createRequestLogger(buildEnv({ LOG_LEVEL: 'info' }), {
      requestId: 'req-1',
      method: 'POST',
      path: '/v1/chat'
    });
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    logger.info('chat.respond.success', {
      prompt_tokens: 123,
      completion_tokens: 45,
      access_token: 'test-token',
      authorization: 'Bearer test-token',
      content: 'What does GDPR Article 5 require?'
    });

    expect(logSpy).toHaveBeenCalledTimes(1);
    const entry = readEntry(logSpy.mock.calls);
    expect(entry).toMatchObject({
      level: 'info',
      event: 'chat.respond.success',
      request_id: 'req-1',
      method: 'POST',
      path: '/v1/chat',
      prompt_tokens: 123,
      completion_tokens: 45,
      access_token: '[redacted]',
      authorization: '[redacted]',
      content: '[redacted]'
    });
  });

  it('truncates long strings', () => {
    const logger = createServiceLogger(buildEnv({ LOG_LEVEL: 'debug' }), 'sessions');
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    logger.debug('session.note', { reason: 'x'.repeat(310) });

    expect(readEntry(logSpy.mock.calls).reason).toBe(`${'x'.repeat(300)}...[truncated]`);
  });

  it('redacts user text and flattens errors', () => {
    const logger = createServiceLogger(buildEnv({ LOG_LEVEL: 'info' }), 'chat');
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    logger.warn('chat.failed', {
      query: 'What does GDPR Article 5 require?',
      answer_chars: 42,
      cause: new TypeError('fetch failed')
    });

    expect(readEntry(logSpy.mock.calls)).toMatchObject({
      query: '[redacted]',
      answer_chars: 42,
      cause: { name: 'TypeError', message: 'fetch failed' }
    });
  });

  it('drops events below the configured level and carries bound context', () => {
    const logger = createServiceLogger(buildEnv({ LOG_LEVEL: 'warn' }), 'sweeper');
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    logger.info('sessions.swept', { removed: 1 });
    logger.bind({ session_id: 'sess-1' }).warn('persist.failed', { reason: 'disk full' });

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(readEntry(logSpy.mock.calls)).toMatchObject({
      level: 'warn',
      event: 'persist.failed',
      component: 'sweeper',
      session_id: 'sess-1',
      reason: 'disk full'
    });
  });

  it('defaults unknown levels to info', () => {
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel(' DEBUG ')).toBe('debug');
  });
});
