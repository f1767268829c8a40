import {
  ModelUnavailableError,
  PersistenceError,
  ServiceError,
  errorReason,
  isRetryableModelError
} from '../errors';
import type { ResponseGenerator } from '../generation/generator';
import type { Answer } from '../generation/types';
import type { Logger } from '../logger';
import type { Prompt, PromptAssembler } from '../prompts';
import type { RetrievalGate } from '../retrieval/gate';
import type { RetrievalResult } from '../retrieval/types';
import type { SessionStore } from '../sessions/store';
import type { SessionSnapshot } from '../sessions/types';
import { noopTracer, type Tracer } from '../tracing';
import type { ChatResponse, CitationPayload } from '../types';
import { RequestDeadline } from './deadline';
import { backoffDelayMs, retryModelCall, sleep, type RetryPolicy, type Sleep } from './retry';

export type OrchestratorState =
  | 'RESOLVING_SESSION'
  | 'RETRIEVING'
  | 'ASSEMBLING'
  | 'GENERATING'
  | 'FILTERING'
  | 'PERSISTING'
  | 'DONE'
  | 'FAILED';

export const UNAVAILABLE_MESSAGE = 'The assistant is temporarily unavailable. Please try again shortly.';

export interface ChatTurnInput {
  query: string;
  owner: string;
  sessionId?: string;
}

export interface TurnOptions {
  tracer?: Tracer;
  logger?: Logger;
  signal?: AbortSignal;
}

export type ChatStreamEvent =
  | { type: 'chunk'; content: string; session_id: string }
  | { type: 'complete'; content: string; citations: CitationPayload[]; session_id: string; timestamp: string }
  | { type: 'error'; content: string; error_type: string; session_id: string };

export interface OrchestratorOptions {
  sessions: SessionStore;
  retrieval: RetrievalGate;
  prompts: PromptAssembler;
  generator: ResponseGenerator;
  retrievalK: number;
  retry: RetryPolicy;
  requestTimeoutMs: number;
  strictPersistence?: boolean;
  now?: () => number;
  sleep?: Sleep;
}

interface Turn {
  input: ChatTurnInput;
  session: SessionSnapshot;
  deadline: RequestDeadline;
  tracer: Tracer;
  logger?: Logger;
  state: OrchestratorState;
}

interface PreparedTurn {
  retrieval: RetrievalResult;
  prompt: Prompt;
}

const publicMessage = (error: unknown): string => {
  return error instanceof ServiceError ? error.message : 'Internal server error.';
};

const errorType = (error: unknown): string => {
  return error instanceof ServiceError ? error.type : 'internal_error';
};

/**
 * Drives one chat turn through session resolution, optional retrieval,
 * prompt assembly, generation, filtering and persistence.
 */
export class Orchestrator {
  private readonly options: OrchestratorOptions;
  private readonly now: () => number;
  private readonly sleep: Sleep;

  constructor(options: OrchestratorOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
  }

  private begin(input: ChatTurnInput, options: TurnOptions): Turn {
    const tracer = options.tracer ?? noopTracer;
    let session: SessionSnapshot;
    try {
      session = this.options.sessions.getOrCreate(input.sessionId, input.owner);
    } catch (error) {
      tracer.emit('request.failed', {
        session_id: input.sessionId ?? null,
        state: 'RESOLVING_SESSION',
        error_type: errorType(error),
        reason: errorReason(error)
      });
      throw error;
    }
    tracer.emit('session.resolved', {
      session_id: session.id,
      created: session.id !== input.sessionId?.trim(),
      history_size: session.history.length
    });

    return {
      input,
      session,
      deadline: new RequestDeadline(this.options.requestTimeoutMs, options.signal),
      tracer,
      logger: options.logger,
      state: 'RESOLVING_SESSION'
    };
  }

  private async prepare(turn: Turn): Promise<PreparedTurn> {
    const { query } = turn.input;

    turn.state = 'RETRIEVING';
    const retrieval = await this.options.retrieval.maybeRetrieve(
      query,
      this.options.retrievalK,
      turn.deadline.signal,
      turn.logger
    );
    if (retrieval.skipped) {
      turn.tracer.emit('retrieval.skipped', { session_id: turn.session.id });
    } else {
      turn.tracer.emit('retrieval.performed', {
        session_id: turn.session.id,
        citations: retrieval.citations.length,
        degraded: retrieval.degraded
      });
    }

    turn.state = 'ASSEMBLING';
    const prompt = await this.options.prompts.build(query, turn.session.history, retrieval.context, turn.logger);
    turn.tracer.emit('prompt.assembled', {
      session_id: turn.session.id,
      template_name: prompt.templateName,
      template_source: prompt.templateSource,
      message_count: prompt.messages.length
    });

    return { retrieval, prompt };
  }

  private recordAnswer(turn: Turn, answer: Answer, attempts: number): void {
    turn.tracer.emit('generation.completed', {
      session_id: turn.session.id,
      attempts,
      finish_reason: answer.finishReason,
      answer_chars: answer.text.length
    });

    turn.state = 'FILTERING';
    turn.tracer.emit('filter.applied', {
      session_id: turn.session.id,
      blocked: answer.filtered,
      categories: answer.flaggedCategories
    });
  }

  private async persist(turn: Turn, answer: Answer): Promise<void> {
    if (turn.deadline.signal.aborted) throw turn.deadline.failure();

    turn.state = 'PERSISTING';
    try {
      await this.options.sessions.appendExchange(turn.session.id, turn.input.query, answer.text);
      turn.tracer.emit('persist.completed', { session_id: turn.session.id });
    } catch (error) {
      turn.tracer.emit('persist.failed', { session_id: turn.session.id, reason: errorReason(error) });
      turn.logger?.warn('persist.failed', { session_id: turn.session.id, reason: errorReason(error) });
      if (this.options.strictPersistence) {
        throw new PersistenceError('The conversation could not be saved.');
      }
    }
  }

  private fail(turn: Turn, error: unknown): unknown {
    const failure = turn.deadline.signal.aborted
      ? turn.deadline.failure()
      : isRetryableModelError(error)
        ? new ModelUnavailableError(UNAVAILABLE_MESSAGE, error.meta)
        : error;

    const failedIn = turn.state;
    turn.state = 'FAILED';
    turn.tracer.emit('request.failed', {
      session_id: turn.session.id,
      state: failedIn,
      error_type: errorType(failure),
      reason: errorReason(error)
    });
    return failure;
  }

  private complete(turn: Turn, answer: Answer, citations: CitationPayload[]): ChatResponse {
    turn.state = 'DONE';
    return {
      answer: answer.text,
      citations,
      session_id: turn.session.id,
      timestamp: new Date(this.now()).toISOString()
    };
  }

  /** Buffered turn. Rejects with a ServiceError subtype on failure. */
  async handle(input: ChatTurnInput, options: TurnOptions = {}): Promise<ChatResponse> {
    const turn = this.begin(input, options);

    try {
      return await turn.deadline.race(this.runBuffered(turn));
    } catch (error) {
      throw this.fail(turn, error);
    } finally {
      turn.deadline.clear();
    }
  }

  private async runBuffered(turn: Turn): Promise<ChatResponse> {
    const { retrieval, prompt } = await this.prepare(turn);

    turn.state = 'GENERATING';
    let attempts = 0;
    const answer = await retryModelCall(
      (attempt) => {
        attempts = attempt;
        turn.tracer.emit('generation.started', { session_id: turn.session.id, attempt, mode: 'buffered' });
        return this.options.generator.generate(prompt, {}, { signal: turn.deadline.signal, logger: turn.logger });
      },
      {
        ...this.options.retry,
        signal: turn.deadline.signal,
        sleep: this.sleep,
        onRetry: ({ attempt, delayMs, error }) =>
          turn.tracer.emit('generation.retry', {
            session_id: turn.session.id,
            attempt,
            delay_ms: delayMs,
            reason: errorReason(error)
          })
      }
    );

    this.recordAnswer(turn, answer, attempts);
    await this.persist(turn, answer);
    return this.complete(turn, answer, retrieval.citations);
  }

  /**
   * Streaming turn. The session is resolved eagerly, so an ownership
   * failure throws here instead of surfacing as a stream event.
   */
  handleStream(input: ChatTurnInput, options: TurnOptions = {}): AsyncGenerator<ChatStreamEvent> {
    const turn = this.begin(input, options);
    return this.runStream(turn);
  }

  private async *runStream(turn: Turn): AsyncGenerator<ChatStreamEvent> {
    const sessionId = turn.session.id;

    try {
      const { retrieval, prompt } = await turn.deadline.race(this.prepare(turn));

      turn.state = 'GENERATING';
      const { maxAttempts, baseDelayMs } = this.options.retry;
      let answer: Answer | null = null;
      let attempts = 0;

      for (let attempt = 1; ; attempt += 1) {
        attempts = attempt;
        let delivered = false;
        turn.tracer.emit('generation.started', { session_id: sessionId, attempt, mode: 'stream' });

        try {
          const events = this.options.generator.stream(prompt, {}, { signal: turn.deadline.signal, logger: turn.logger });
          for await (const event of events) {
            if (event.type === 'token') {
              delivered = true;
              yield { type: 'chunk', content: event.text, session_id: sessionId };
            } else {
              answer = event.answer;
            }
          }
        } catch (error) {
          // Tokens already reached the caller, so a retry would duplicate them.
          if (delivered || attempt >= maxAttempts || !isRetryableModelError(error) || turn.deadline.signal.aborted) {
            throw error;
          }

          const delayMs = backoffDelayMs(attempt, baseDelayMs);
          turn.tracer.emit('generation.retry', {
            session_id: sessionId,
            attempt,
            delay_ms: delayMs,
            reason: errorReason(error)
          });
          await this.sleep(delayMs, turn.deadline.signal);
          continue;
        }

        break;
      }

      if (!answer) {
        throw new ModelUnavailableError('Model stream ended without a final answer.');
      }

      this.recordAnswer(turn, answer, attempts);
      await this.persist(turn, answer);
      const result = this.complete(turn, answer, retrieval.citations);
      yield {
        type: 'complete',
        content: result.answer,
        citations: result.citations,
        session_id: sessionId,
        timestamp: result.timestamp
      };
    } catch (error) {
      const failure = this.fail(turn, error);
      turn.logger?.warn('chat.stream_failed', { session_id: sessionId, error_type: errorType(failure) });
      yield { type: 'error', content: publicMessage(failure), error_type: errorType(failure), session_id: sessionId };
    } finally {
      turn.deadline.clear();
    }
  }
}
