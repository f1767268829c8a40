import { authenticateRequest, issueAccessToken, verifyCredentials } from './access';
import { AuthError, RateLimitError, ServiceError, ValidationError, errorReason } from './errors';
import { createRequestLogger, type Logger } from './logger';
import { enforceChatRateLimit } from './rateLimit';
import {
  errorResponse,
  handleOptions,
  isOriginAllowed,
  jsonResponse,
  sseResponse
} from './security';
import type { AppServices } from './services';
import { createLogTracer } from './tracing';
import type {
  AuthContext,
  ChatHistoryResponse,
  ChatResponse,
  FilterHealthResponse,
  SafetyTestResponse,
  SearchResponse,
  SessionInfoResponse
} from './types';
import {
  validateChatPayload,
  validateLoginPayload,
  validateSafetyTestPayload,
  validateSearchPayload,
  validateSessionId
} from './validation';

export interface App {
  fetch: (request: Request) => Promise<Response>;
}

const HISTORY_PATH = /^\/v1\/chat\/history\/([^/]+)$/;
const SESSION_PATH = /^\/v1\/chat\/session\/([^/]+)$/;

const ensureAllowedOrigin = (origin: string | null, services: AppServices): void => {
  if (!isOriginAllowed(origin, services.env)) {
    throw new ServiceError('Origin not allowed.', 403, 'not_authorized');
  }
};

const readJson = async (request: Request): Promise<unknown> => {
  try {
    return await request.json();
  } catch {
    throw new ValidationError('Malformed JSON body.');
  }
};

const decodePathSegment = (raw: string): string => {
  try {
    return validateSessionId(decodeURIComponent(raw));
  } catch (error) {
    if (error instanceof ValidationError) throw error;
    throw new ValidationError('Invalid session id.');
  }
};

const subjectPrefix = (subject: string): string => subject.slice(0, 8);

export const createApp = (services: AppServices): App => {
  const { env, config, sessions, retrieval, generator, orchestrator } = services;

  const authenticate = (request: Request): Promise<AuthContext> => {
    return authenticateRequest(request, config.auth, services.now());
  };

  const handleChat = async (
    request: Request,
    url: URL,
    origin: string | null,
    requestId: string,
    logger: Logger,
    startedAt: number
  ): Promise<Response> => {
    const auth = await authenticate(request);
    await enforceChatRateLimit(auth, services.rateLimiter);

    const payload = validateChatPayload(await readJson(request), url.searchParams, {
      maxQueryChars: config.limits.maxQueryChars
    });
    const input = { query: payload.query, sessionId: payload.session_id, owner: auth.username };
    const turnLogger = logger.bind({ user: subjectPrefix(auth.username) });
    const options = { tracer: createLogTracer(turnLogger), logger: turnLogger, signal: request.signal };

    if (payload.stream) {
      const events = orchestrator.handleStream(input, options);
      logger.info('chat.stream.started', {
        session_provided: Boolean(payload.session_id),
        duration_ms: services.now() - startedAt
      });
      return sseResponse(origin, env, events, { 'X-Request-Id': requestId });
    }

    const response: ChatResponse = await orchestrator.handle(input, options);
    logger.info('chat.respond.success', {
      session_id: response.session_id,
      citations: response.citations.length,
      duration_ms: services.now() - startedAt
    });
    return jsonResponse(origin, env, response, 200, { 'X-Request-Id': requestId });
  };

  const route = async (
    request: Request,
    url: URL,
    origin: string | null,
    requestId: string,
    logger: Logger,
    startedAt: number
  ): Promise<Response | null> => {
    const { pathname } = url;
    const method = request.method;
    const ok = (data: unknown, status = 200) => jsonResponse(origin, env, data, status, { 'X-Request-Id': requestId });

    if (pathname === '/health' && method === 'GET') {
      return ok({ status: 'ok', timestamp: new Date(services.now()).toISOString() });
    }

    if (pathname === '/v1/auth/login' && method === 'POST') {
      const payload = validateLoginPayload(await readJson(request));
      const valid = await verifyCredentials(payload.username, payload.password, config.auth);
      if (!valid) {
        throw new AuthError('Incorrect username or password.');
      }

      const token = await issueAccessToken(payload.username, config.auth, services.now());
      logger.info('auth.login.success', { user: subjectPrefix(payload.username) });
      return ok(token);
    }

    if (pathname === '/v1/auth/me' && method === 'GET') {
      const auth = await authenticate(request);
      return ok({ username: auth.username, authenticated: true, request_id: requestId });
    }

    if (pathname === '/v1/chat' && method === 'POST') {
      return handleChat(request, url, origin, requestId, logger, startedAt);
    }

    if (pathname === '/v1/chat/session' && method === 'POST') {
      const auth = await authenticate(request);
      const session = sessions.create(auth.username);
      logger.info('chat.session.created', { session_id: session.id });
      return ok({ session_id: session.id, created_at: session.createdAt }, 201);
    }

    if (pathname === '/v1/chat/sessions' && method === 'GET') {
      const auth = await authenticate(request);
      const summaries: SessionInfoResponse[] = sessions.listSessions(auth.username).map((summary) => ({
        session_id: summary.sessionId,
        created_at: summary.createdAt,
        last_active_at: summary.lastActiveAt,
        message_count: summary.messageCount
      }));
      return ok(summaries);
    }

    const historyMatch = pathname.match(HISTORY_PATH);
    if (historyMatch && method === 'GET') {
      const auth = await authenticate(request);
      const sessionId = decodePathSegment(historyMatch[1]);
      const messages = sessions.getHistory(sessionId, auth.username);
      const response: ChatHistoryResponse = {
        session_id: sessionId,
        messages: messages.map((message) => ({
          role: message.role,
          content: message.content,
          timestamp: message.timestamp
        })),
        total_messages: messages.length
      };
      return ok(response);
    }

    const sessionMatch = pathname.match(SESSION_PATH);
    if (sessionMatch && method === 'DELETE') {
      const auth = await authenticate(request);
      const sessionId = decodePathSegment(sessionMatch[1]);
      await sessions.delete(sessionId, auth.username);
      logger.info('chat.session.deleted', { session_id: sessionId });
      return ok({ message: 'Session deleted successfully.', session_id: sessionId });
    }

    if (pathname === '/v1/search' && method === 'POST') {
      await authenticate(request);
      const payload = validateSearchPayload(await readJson(request), config.limits);
      const result = await retrieval.search(payload.query, payload.max_results, request.signal);
      const response: SearchResponse = {
        query: payload.query,
        total_results: result.documents.length,
        max_results: payload.max_results,
        documents: result.documents,
        citations: result.citations
      };
      logger.info('search.success', { total_results: response.total_results });
      return ok(response);
    }

    if (pathname === '/v1/kb/health' && method === 'GET') {
      const health = await retrieval.health();
      return ok({ ...health, timestamp: new Date(services.now()).toISOString() });
    }

    if (pathname === '/v1/safety/guardrails-health' && method === 'GET') {
      await authenticate(request);
      const health = await generator.filterHealth();
      const response: FilterHealthResponse = {
        status: health.status,
        filter_enabled: generator.filterEnabled,
        model: health.model ?? null,
        message: health.message ?? null,
        timestamp: new Date(services.now()).toISOString()
      };
      logger.info('safety.health', { status: response.status });
      return ok(response);
    }

    if (pathname === '/v1/safety/test-content' && method === 'POST') {
      const auth = await authenticate(request);
      const payload = validateSafetyTestPayload(await readJson(request), config.limits);
      const started = services.now();
      const result = await generator.screen(payload.content, {
        signal: request.signal,
        logger: logger.bind({ user: subjectPrefix(auth.username) })
      });
      const response: SafetyTestResponse = {
        original_content: payload.content,
        processed_content: result.text,
        blocked: result.blocked,
        categories: result.categories,
        filter_enabled: generator.filterEnabled,
        processing_time_ms: services.now() - started
      };
      logger.info('safety.test_content', { blocked: result.blocked, content_chars: payload.content.length });
      return ok(response);
    }

    if (pathname === '/v1/stats' && method === 'GET') {
      const auth = await authenticate(request);
      const stats = sessions.stats();
      const owned = sessions.listSessions(auth.username);
      return ok({
        active_sessions: stats.activeSessions,
        max_sessions: stats.maxSessions,
        window_size: stats.windowSize,
        session_timeout_seconds: stats.sessionTimeoutSeconds,
        total_messages: stats.totalMessages,
        user_sessions: owned.length,
        user_messages: owned.reduce((total, summary) => total + summary.messageCount, 0)
      });
    }

    return null;
  };

  return {
    async fetch(request: Request): Promise<Response> {
      const startedAt = services.now();
      const url = new URL(request.url);
      const origin = request.headers.get('Origin');
      const requestId = crypto.randomUUID();
      const logger = createRequestLogger(env, {
        requestId,
        method: request.method,
        path: url.pathname
      });

      logger.info('request.received', {
        origin_present: Boolean(origin),
        user_agent: request.headers.get('User-Agent') || 'unknown'
      });

      try {
        if (request.method === 'OPTIONS') {
          logger.debug('request.preflight');
          return handleOptions(request, env, requestId);
        }

        ensureAllowedOrigin(origin, services);

        const response = await route(request, url, origin, requestId, logger, startedAt);
        if (response) return response;

        logger.warn('request.not_found', {
          duration_ms: services.now() - startedAt
        });
        return errorResponse(origin, env, 404, 'not_found', 'Route not found.', requestId);
      } catch (error) {
        if (error instanceof ServiceError) {
          const log = error.status >= 500 ? logger.error : logger.warn;
          log('request.failed', {
            type: error.type,
            status: error.status,
            reason: error.message,
            ...(error.meta || {}),
            duration_ms: services.now() - startedAt
          });
          return errorResponse(
            origin,
            env,
            error.status,
            error.type,
            error.message,
            requestId,
            error instanceof RateLimitError ? error.retryAfterSeconds : undefined
          );
        }

        logger.error('request.internal_error', {
          status: 500,
          reason: errorReason(error),
          duration_ms: services.now() - startedAt
        });
        return errorResponse(origin, env, 500, 'internal_error', 'Internal server error.', requestId);
      }
    }
  };
};
