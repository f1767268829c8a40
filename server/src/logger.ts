import type { Env } from './types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

// User text (queries, answers, snippets) and credentials never reach the log.
const SENSITIVE_KEY_PATTERN =
  /(prompt|content|messages|query|answer|snippet|authorization|token|secret|password|salt|api[_-]?key)/i;
const COUNT_SUFFIX_PATTERN = /_(tokens|chars)$/i;

const MAX_STRING_LENGTH = 300;
const MAX_ARRAY_ITEMS = 20;
const MAX_DEPTH = 4;

const truncate = (value: string): string => {
  return value.length <= MAX_STRING_LENGTH ? value : `${value.slice(0, MAX_STRING_LENGTH)}...[truncated]`;
};

const isRedacted = (key: string, raw: unknown): boolean => {
  if (typeof raw === 'number' && COUNT_SUFFIX_PATTERN.test(key.trim())) return false;
  return SENSITIVE_KEY_PATTERN.test(key);
};

const sanitize = (value: unknown, depth = 0): unknown => {
  if (depth > MAX_DEPTH) return '[truncated-depth]';

  if (typeof value === 'string') return truncate(value);

  if (typeof value === 'number' || typeof value === 'boolean' || value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'bigint') return value.toString();

  if (value instanceof Error) {
    return { name: value.name, message: truncate(value.message) };
  }

  if (Array.isArray(value)) {
    const items = value.slice(0, MAX_ARRAY_ITEMS).map((item) => sanitize(item, depth + 1));
    return value.length > MAX_ARRAY_ITEMS ? [...items, `[+${value.length - MAX_ARRAY_ITEMS} more]`] : items;
  }

  if (typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, raw] of Object.entries(value)) {
      result[key] = isRedacted(key, raw) ? '[redacted]' : sanitize(raw, depth + 1);
    }
    return result;
  }

  return '[unsupported-type]';
};

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

export const parseLogLevel = (raw: string | undefined): LogLevel => {
  const normalized = raw?.trim().toLowerCase();
  if (normalized === 'debug' || normalized === 'info' || normalized === 'warn' || normalized === 'error') {
    return normalized;
  }

  return 'info';
};

const shouldLog = (configuredLevel: LogLevel, eventLevel: LogLevel): boolean => {
  return LOG_LEVEL_ORDER[eventLevel] >= LOG_LEVEL_ORDER[configuredLevel];
};

export interface Logger {
  debug: (event: string, meta?: Record<string, unknown>) => void;
  info: (event: string, meta?: Record<string, unknown>) => void;
  warn: (event: string, meta?: Record<string, unknown>) => void;
  error: (event: string, meta?: Record<string, unknown>) => void;
  bind: (extra: Record<string, unknown>) => Logger;
}

const createLogger = (configuredLevel: LogLevel, context: Record<string, unknown>): Logger => {
  const emit = (level: LogLevel, event: string, meta: Record<string, unknown> = {}): void => {
    if (!shouldLog(configuredLevel, level)) return;

    const sanitizedMeta = sanitize(meta);
    const safeMeta = isRecord(sanitizedMeta) ? sanitizedMeta : {};

    const entry = {
      ts: new Date().toISOString(),
      level,
      event,
      ...context,
      ...safeMeta
    };

    console.log(JSON.stringify(entry));
  };

  return {
    debug: (event, meta) => emit('debug', event, meta),
    info: (event, meta) => emit('info', event, meta),
    warn: (event, meta) => emit('warn', event, meta),
    error: (event, meta) => emit('error', event, meta),
    bind: (extra) => createLogger(configuredLevel, { ...context, ...extra })
  };
};

export const createRequestLogger = (
  env: Env,
  context: {
    requestId: string;
    method: string;
    path: string;
  }
): Logger => {
  return createLogger(parseLogLevel(env.LOG_LEVEL), {
    request_id: context.requestId,
    method: context.method,
    path: context.path
  });
};

export const createServiceLogger = (env: Env, component: string): Logger => {
  return createLogger(parseLogLevel(env.LOG_LEVEL), { component });
};
