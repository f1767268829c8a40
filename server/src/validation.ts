import { ValidationError } from './errors';
import type { ChatRequest, LoginRequest, SafetyTestRequest, SearchRequest } from './types';

const isObject = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export const validateSessionId = (sessionId: unknown): string => {
  if (typeof sessionId !== 'string') {
    throw new ValidationError('Invalid session id.');
  }

  const trimmed = sessionId.trim();
  if (trimmed.length < 1 || trimmed.length > 256) {
    throw new ValidationError('Invalid session id length.');
  }

  if (!SESSION_ID_PATTERN.test(trimmed)) {
    throw new ValidationError('Invalid session id format.');
  }

  return trimmed;
};

const validateOptionalSessionId = (sessionId: unknown): string | undefined => {
  if (sessionId === undefined || sessionId === null || sessionId === '') {
    return undefined;
  }

  return validateSessionId(sessionId);
};

const validateStreamFlag = (value: unknown): boolean | undefined => {
  if (value === undefined || value === null || value === '') return undefined;
  if (typeof value === 'boolean') return value;
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  throw new ValidationError('stream must be a boolean.');
};

const validateQuery = (query: unknown, maxQueryChars: number): string => {
  if (typeof query !== 'string') {
    throw new ValidationError('query must be a string.');
  }

  const trimmed = query.trim();
  if (!trimmed) {
    throw new ValidationError('query must not be empty.');
  }

  if (trimmed.length > maxQueryChars) {
    throw new ValidationError(`query exceeds ${maxQueryChars} characters.`);
  }

  return trimmed;
};

/** Body fields win over the query-string `session_id` and `stream`. */
export const validateChatPayload = (
  body: unknown,
  searchParams: URLSearchParams,
  limits: { maxQueryChars: number }
): ChatRequest => {
  if (!isObject(body)) {
    throw new ValidationError('Malformed request body.');
  }

  const sessionId =
    validateOptionalSessionId(body.session_id) ?? validateOptionalSessionId(searchParams.get('session_id'));
  const stream = validateStreamFlag(body.stream) ?? validateStreamFlag(searchParams.get('stream')) ?? false;

  return {
    query: validateQuery(body.query, limits.maxQueryChars),
    ...(sessionId ? { session_id: sessionId } : {}),
    stream
  };
};

export const validateSearchPayload = (
  body: unknown,
  limits: { maxQueryChars: number; maxSearchResults: number }
): SearchRequest => {
  if (!isObject(body)) {
    throw new ValidationError('Malformed request body.');
  }

  const rawMax = body.max_results;
  let maxResults = 10;
  if (rawMax !== undefined && rawMax !== null) {
    if (typeof rawMax !== 'number' || !Number.isInteger(rawMax) || rawMax < 1 || rawMax > limits.maxSearchResults) {
      throw new ValidationError(`max_results must be an integer between 1 and ${limits.maxSearchResults}.`);
    }
    maxResults = rawMax;
  }

  return {
    query: validateQuery(body.query, limits.maxQueryChars),
    max_results: maxResults
  };
};

export const validateSafetyTestPayload = (body: unknown, limits: { maxQueryChars: number }): SafetyTestRequest => {
  if (!isObject(body)) {
    throw new ValidationError('Malformed request body.');
  }

  const { content } = body;
  if (typeof content !== 'string' || !content.trim()) {
    throw new ValidationError('content must be a non-empty string.');
  }

  if (content.length > limits.maxQueryChars) {
    throw new ValidationError(`content exceeds ${limits.maxQueryChars} characters.`);
  }

  return { content };
};

export const validateLoginPayload = (body: unknown): LoginRequest => {
  if (!isObject(body)) {
    throw new ValidationError('Malformed request body.');
  }

  const { username, password } = body;
  if (typeof username !== 'string' || !username.trim() || username.length > 128) {
    throw new ValidationError('username is required.');
  }

  if (typeof password !== 'string' || !password || password.length > 1024) {
    throw new ValidationError('password is required.');
  }

  return { username: username.trim(), password };
};
