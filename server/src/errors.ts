export type ErrorType =
  | 'validation_error'
  | 'invalid_parameter'
  | 'authentication_error'
  | 'not_authorized'
  | 'session_not_found'
  | 'rate_limited'
  | 'model_unavailable'
  | 'model_rejected'
  | 'knowledge_base_error'
  | 'template_unavailable'
  | 'filter_unavailable'
  | 'payload_too_large'
  | 'request_timeout'
  | 'persistence_error'
  | 'not_found'
  | 'internal_error';

export class ServiceError extends Error {
  status: number;
  type: ErrorType;
  meta?: Record<string, unknown>;

  constructor(message: string, status: number, type: ErrorType, meta?: Record<string, unknown>) {
    super(message);
    this.name = 'ServiceError';
    this.status = status;
    this.type = type;
    this.meta = meta;
  }
}

export class ValidationError extends ServiceError {
  constructor(message: string, status = 400, type: ErrorType = 'validation_error') {
    super(message, status, type);
    this.name = 'ValidationError';
  }
}

export class InvalidParameterError extends ValidationError {
  constructor(message: string) {
    super(message, 400, 'invalid_parameter');
    this.name = 'InvalidParameterError';
  }
}

export class AuthError extends ServiceError {
  constructor(message: string, meta?: Record<string, unknown>) {
    super(message, 401, 'authentication_error', meta);
    this.name = 'AuthError';
  }
}

export class NotAuthorizedError extends ServiceError {
  constructor(message = 'Access denied to this session.', meta?: Record<string, unknown>) {
    super(message, 403, 'not_authorized', meta);
    this.name = 'NotAuthorizedError';
  }
}

export class SessionNotFoundError extends ServiceError {
  constructor(message = 'Session not found.') {
    super(message, 404, 'session_not_found');
    this.name = 'SessionNotFoundError';
  }
}

export class RateLimitError extends ServiceError {
  retryAfterSeconds: number;

  constructor(message: string, retryAfterSeconds: number) {
    super(message, 429, 'rate_limited');
    this.name = 'RateLimitError';
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class ModelUnavailableError extends ServiceError {
  constructor(message: string, meta?: Record<string, unknown>) {
    super(message, 503, 'model_unavailable', meta);
    this.name = 'ModelUnavailableError';
  }
}

export class ModelRejectedError extends ServiceError {
  constructor(message: string, meta?: Record<string, unknown>) {
    super(message, 502, 'model_rejected', meta);
    this.name = 'ModelRejectedError';
  }
}

export class KnowledgeBaseError extends ServiceError {
  constructor(message: string, meta?: Record<string, unknown>) {
    super(message, 503, 'knowledge_base_error', meta);
    this.name = 'KnowledgeBaseError';
  }
}

export class TemplateUnavailableError extends ServiceError {
  constructor(message: string) {
    super(message, 500, 'template_unavailable');
    this.name = 'TemplateUnavailableError';
  }
}

export class FilterUnavailableError extends ServiceError {
  constructor(message = 'Safety filter is unavailable.', meta?: Record<string, unknown>) {
    super(message, 503, 'filter_unavailable', meta);
    this.name = 'FilterUnavailableError';
  }
}

export class PayloadTooLargeError extends ServiceError {
  constructor(maxBytes: number) {
    super(`Request body exceeds ${maxBytes} bytes.`, 413, 'payload_too_large');
    this.name = 'PayloadTooLargeError';
  }
}

export class RequestTimeoutError extends ServiceError {
  constructor(message = 'Request timed out.') {
    super(message, 504, 'request_timeout');
    this.name = 'RequestTimeoutError';
  }
}

export class PersistenceError extends ServiceError {
  constructor(message: string) {
    super(message, 500, 'persistence_error');
    this.name = 'PersistenceError';
  }
}

export const isRetryableModelError = (error: unknown): error is ModelUnavailableError => {
  return error instanceof ModelUnavailableError;
};

export const errorReason = (error: unknown): string => {
  return error instanceof Error ? error.message : 'unknown';
};
