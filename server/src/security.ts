import { parseIntBounded } from './aiConfig';
import type { Env, ErrorResponse } from './types';

const SECURITY_HEADERS: Record<string, string> = {
  'Cache-Control': 'no-store',
  'X-Content-Type-Options': 'nosniff',
  'X-Frame-Options': 'DENY',
  'Referrer-Policy': 'no-referrer'
};

const parseList = (raw: string): string[] =>
  raw
    .split(',')
    .map((value) => value.trim().toLowerCase())
    .filter(Boolean);

export const MAX_SEARCH_RESULTS = 50;

export const getLimits = (env: Env) => ({
  maxQueryChars: parseIntBounded(env.MAX_QUERY_CHARS, 10000, 1, 100000),
  maxBodyBytes: parseIntBounded(env.MAX_BODY_BYTES, 1024 * 1024, 1024, 16 * 1024 * 1024),
  maxSearchResults: MAX_SEARCH_RESULTS,
  requestTimeoutMs: parseIntBounded(env.REQUEST_TIMEOUT_MS, 60000, 1000, 600000),
  chatRateLimitPerMinute: parseIntBounded(env.CHAT_RATE_LIMIT_PER_MINUTE, 30, 0, 10000)
});

const matchOrigin = (origin: string, env: Env): 'exact' | 'wildcard' | null => {
  const allowedOrigins = parseList(env.ALLOWED_ORIGINS || '');
  if (allowedOrigins.includes(origin.toLowerCase())) return 'exact';
  return allowedOrigins.includes('*') ? 'wildcard' : null;
};

export const isOriginAllowed = (origin: string | null, env: Env): boolean => {
  // Allow missing Origin for same-origin/non-browser callers.
  if (!origin) return true;

  return matchOrigin(origin, env) !== null;
};

/** Credentials are only allowed for origins listed explicitly, never through `*`. */
export const getCorsHeaders = (origin: string | null, env: Env): Record<string, string> => {
  const match = origin ? matchOrigin(origin, env) : null;
  if (!origin || !match) {
    return {
      'Vary': 'Origin'
    };
  }

  return {
    'Access-Control-Allow-Origin': origin,
    ...(match === 'exact' ? { 'Access-Control-Allow-Credentials': 'true' } : {}),
    'Access-Control-Allow-Headers': 'Content-Type, Authorization',
    'Access-Control-Allow-Methods': 'GET, POST, DELETE, OPTIONS',
    'Access-Control-Expose-Headers': 'X-Request-Id',
    'Vary': 'Origin'
  };
};

const mergeHeaders = (origin: string | null, env: Env, extra?: HeadersInit): Headers => {
  const headers = new Headers({
    ...SECURITY_HEADERS,
    ...getCorsHeaders(origin, env)
  });

  if (extra) {
    new Headers(extra).forEach((value, key) => headers.set(key, value));
  }

  return headers;
};

export const jsonResponse = (
  origin: string | null,
  env: Env,
  data: unknown,
  status = 200,
  extraHeaders?: HeadersInit
): Response => {
  return new Response(JSON.stringify(data), {
    status,
    headers: mergeHeaders(origin, env, {
      'Content-Type': 'application/json; charset=utf-8',
      ...(extraHeaders || {})
    })
  });
};

export const errorResponse = (
  origin: string | null,
  env: Env,
  status: number,
  type: string,
  message: string,
  requestId: string,
  retryAfterSeconds?: number
): Response => {
  const body: ErrorResponse = {
    error: {
      message,
      type,
      status_code: status,
      request_id: requestId,
      ...(retryAfterSeconds !== undefined ? { retry_after_seconds: retryAfterSeconds } : {})
    }
  };

  return jsonResponse(origin, env, body, status, {
    'X-Request-Id': requestId,
    ...(retryAfterSeconds !== undefined ? { 'Retry-After': String(retryAfterSeconds) } : {})
  });
};

const encoder = new TextEncoder();

export const encodeSseEvent = (data: unknown): Uint8Array => encoder.encode(`data: ${JSON.stringify(data)}\n\n`);

/**
 * Pulls from `events` only as fast as the client reads, and stops the
 * source when the client goes away.
 */
export const sseResponse = (
  origin: string | null,
  env: Env,
  events: AsyncGenerator<unknown>,
  extraHeaders?: HeadersInit
): Response => {
  const body = new ReadableStream<Uint8Array>({
    async pull(controller) {
      const next = await events.next();
      if (next.done) {
        controller.close();
        return;
      }
      controller.enqueue(encodeSseEvent(next.value));
    },
    async cancel() {
      await events.return(undefined);
    }
  });

  return new Response(body, {
    status: 200,
    headers: mergeHeaders(origin, env, {
      'Content-Type': 'text/event-stream; charset=utf-8',
      Connection: 'keep-alive',
      'X-Accel-Buffering': 'no',
      ...(extraHeaders || {})
    })
  });
};

export const handleOptions = (request: Request, env: Env, requestId: string): Response => {
  const origin = request.headers.get('Origin');

  if (!isOriginAllowed(origin, env)) {
    return errorResponse(origin, env, 403, 'not_authorized', 'Origin not allowed.', requestId);
  }

  return new Response(null, {
    status: 204,
    headers: mergeHeaders(origin, env, { 'X-Request-Id': requestId })
  });
};
