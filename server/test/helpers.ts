import { vi } from 'vitest';
import { issueAccessToken } from '../src/access';
import { ModelUnavailableError } from '../src/errors';
import type {
  ContentFilter,
  FilterVerdict,
  GenerationParams,
  ModelCallOptions,
  ModelClient,
  ModelCompletion,
  ModelDelta
} from '../src/generation/types';
import { createApp, type App } from '../src/index';
import type { Logger } from '../src/logger';
import type { PromptMessage } from '../src/prompts';
import type { TemplateProvider } from '../src/prompts/templates';
import type { KnowledgeIndex, ScoredDocument } from '../src/retrieval/types';
import { createServices, type AppServices, type ServiceOverrides } from '../src/services';
import type { TraceEventName, Tracer } from '../src/tracing';
import type { Env } from '../src/types';

export const TEST_ORIGIN = 'http://localhost:5173';
export const TEST_TEMPLATE = 'Test assistant.\nReference material:\n{{CONTEXT}}';

export const buildEnv = (overrides: Partial<Env> = {}): Env => ({
  OPENAI_MODEL: 'gpt-4o-mini',
  SECRET_KEY: 'test-secret',
  PASSWORD_SALT: 'test-salt',
  ADMIN_USERNAME: 'admin',
  ADMIN_PASSWORD: 'test-password',
  ALLOWED_ORIGINS: TEST_ORIGIN,
  LOG_LEVEL: 'error',
  ...overrides
});

type ModelStep =
  | { reply: string }
  | { chunks: string[]; failAfter?: Error }
  | { error: Error }
  | { hang: true };

const waitForAbort = (signal?: AbortSignal): Promise<never> => {
  return new Promise<never>((_resolve, reject) => {
    signal?.addEventListener(
      'abort',
      () => reject(new ModelUnavailableError('Model request was aborted.', { aborted: true })),
      { once: true }
    );
  });
};

const splitWords = (text: string): string[] => text.match(/\S+\s*/g) ?? [];

/** Plays back scripted steps in order; falls back to a fixed reply once they run out. */
export class FakeModelClient implements ModelClient {
  readonly calls: Array<{ mode: 'complete' | 'stream'; messages: PromptMessage[]; params: GenerationParams }> = [];
  released = 0;

  constructor(
    private readonly steps: ModelStep[] = [],
    private readonly fallback = 'Fake answer.'
  ) {}

  private next(): ModelStep {
    return this.steps.shift() ?? { reply: this.fallback };
  }

  async complete(messages: PromptMessage[], params: GenerationParams, options: ModelCallOptions = {}): Promise<ModelCompletion> {
    this.calls.push({ mode: 'complete', messages, params });
    const step = this.next();
    if ('error' in step) throw step.error;
    if ('hang' in step) return waitForAbort(options.signal);
    if ('chunks' in step) {
      if (step.failAfter) throw step.failAfter;
      return { text: step.chunks.join(''), finishReason: 'stop' };
    }
    return { text: step.reply, finishReason: 'stop' };
  }

  async *stream(messages: PromptMessage[], params: GenerationParams, options: ModelCallOptions = {}): AsyncGenerator<ModelDelta> {
    this.calls.push({ mode: 'stream', messages, params });
    const step = this.next();
    try {
      if ('error' in step) throw step.error;
      if ('hang' in step) await waitForAbort(options.signal);

      const chunks = 'chunks' in step ? step.chunks : 'reply' in step ? splitWords(step.reply) : [];
      for (const chunk of chunks) {
        yield { text: chunk, finishReason: null };
      }
      if ('failAfter' in step && step.failAfter) throw step.failAfter;
      yield { text: '', finishReason: 'stop' };
    } finally {
      this.released += 1;
    }
  }
}

export const createFakeIndex = (result: ScoredDocument[] | Error): KnowledgeIndex & { queries: string[] } => {
  const queries: string[] = [];
  return {
    queries,
    query: async (text, k) => {
      queries.push(text);
      if (result instanceof Error) throw result;
      return result.slice(0, k);
    },
    health: async () =>
      result instanceof Error ? { healthy: false, error: result.message } : { healthy: true, documents: result.length }
  };
};

export const staticTemplates = (text = TEST_TEMPLATE): TemplateProvider => ({
  fetch: async (name) => ({ name, text })
});

export const fixedFilter = (verdict: FilterVerdict | Error): ContentFilter => ({
  enabled: true,
  check: async () => {
    if (verdict instanceof Error) throw verdict;
    return verdict;
  },
  health: async () =>
    verdict instanceof Error
      ? { status: 'unhealthy', model: 'test-moderation', message: verdict.message }
      : { status: 'healthy', model: 'test-moderation' }
});

export const createRecordingTracer = (): { tracer: Tracer; events: Array<{ event: TraceEventName; payload: Record<string, unknown> }> } => {
  const events: Array<{ event: TraceEventName; payload: Record<string, unknown> }> = [];
  return {
    events,
    tracer: {
      emit: (event, payload = {}) => {
        events.push({ event, payload });
      }
    }
  };
};

export const createSpyLogger = () => {
  const warn = vi.fn();
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn,
    error: vi.fn(),
    bind: () => logger
  };
  return { logger, warn };
};

export const GDPR_DOCS: ScoredDocument[] = [
  {
    source: 'GDPR Article 5',
    text: 'Personal data shall be processed lawfully, fairly and in a transparent manner.',
    score: 1,
    metadata: { regulation: 'GDPR', article: '5' }
  },
  {
    source: 'GDPR Article 6',
    text: 'Processing is lawful only if at least one legal basis applies.',
    score: 0.5,
    metadata: { regulation: 'GDPR', article: '6' }
  }
];

export const createTestServices = (
  envOverrides: Partial<Env> = {},
  overrides: ServiceOverrides = {}
): AppServices => {
  return createServices(buildEnv(envOverrides), {
    model: new FakeModelClient(),
    index: createFakeIndex(GDPR_DOCS),
    templates: staticTemplates(),
    sleep: async () => {},
    ...overrides
  });
};

export const createTestApp = (
  envOverrides: Partial<Env> = {},
  overrides: ServiceOverrides = {}
): { app: App; services: AppServices } => {
  const services = createTestServices(envOverrides, overrides);
  return { app: createApp(services), services };
};

export const authHeader = async (services: AppServices, username = 'admin'): Promise<string> => {
  const token = await issueAccessToken(username, services.config.auth, services.now());
  return `Bearer ${token.access_token}`;
};

export const requestJson = async (response: Response): Promise<Record<string, unknown>> => {
  return (await response.json()) as Record<string, unknown>;
};

export const readSseEvents = async (response: Response): Promise<Array<Record<string, unknown>>> => {
  const text = await response.text();
  return text
    .split('\n\n')
    .filter((frame) => frame.startsWith('data: '))
    .map((frame) => JSON.parse(frame.slice('data: '.length)) as Record<string, unknown>);
};

export const makeRequest = (path: string, init: RequestInit = {}): Request => {
  const headers = new Headers(init.headers);
  if (!headers.has('Origin')) {
    headers.set('Origin', TEST_ORIGIN);
  }

  return new Request(`https://example.com${path}`, {
    ...init,
    headers
  });
};

export const jsonRequest = (path: string, body: unknown, authorization?: string, method = 'POST'): Request => {
  return makeRequest(path, {
    method,
    headers: {
      'Content-Type': 'application/json',
      ...(authorization ? { Authorization: authorization } : {})
    },
    body: JSON.stringify(body)
  });
};
