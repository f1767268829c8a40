import type { Logger } from './logger';

export type TraceEventName =
  | 'session.resolved'
  | 'retrieval.skipped'
  | 'retrieval.performed'
  | 'prompt.assembled'
  | 'generation.started'
  | 'generation.retry'
  | 'generation.completed'
  | 'filter.applied'
  | 'persist.completed'
  | 'persist.failed'
  | 'request.failed';

export interface Tracer {
  emit: (event: TraceEventName, payload?: Record<string, unknown>) => void;
}

export const noopTracer: Tracer = {
  emit: () => {}
};

export const createLogTracer = (logger: Logger): Tracer => ({
  emit: (event, payload = {}) => logger.debug(event, payload)
});
