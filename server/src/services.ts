import { ResponseGenerator } from './generation/generator';
import {
  createOpenAIClient,
  OpenAIModelClient,
  OpenAIModerationFilter,
  passThroughFilter,
  unconfiguredModelClient
} from './generation/openai';
import type { ContentFilter, ModelClient } from './generation/types';
import { Orchestrator } from './orchestrator/orchestrator';
import type { Sleep } from './orchestrator/retry';
import { PromptAssembler } from './prompts';
import { FileTemplateProvider, type TemplateProvider } from './prompts/templates';
import { InMemoryRateLimiter, type RateLimiter } from './rateLimit';
import { RetrievalGate } from './retrieval/gate';
import { FileKnowledgeIndex } from './retrieval/localIndex';
import type { KnowledgeIndex } from './retrieval/types';
import { getRuntimeConfig, type RuntimeConfig } from './runtimeConfig';
import { SessionStore } from './sessions/store';
import type { Env } from './types';

export interface ServiceOverrides {
  model?: ModelClient;
  filter?: ContentFilter;
  index?: KnowledgeIndex;
  templates?: TemplateProvider;
  now?: () => number;
  sleep?: Sleep;
  generateId?: () => string;
}

export interface AppServices {
  env: Env;
  config: RuntimeConfig;
  sessions: SessionStore;
  retrieval: RetrievalGate;
  generator: ResponseGenerator;
  orchestrator: Orchestrator;
  rateLimiter?: RateLimiter;
  now: () => number;
}

const resolveModelAndFilter = (
  config: RuntimeConfig,
  overrides: ServiceOverrides
): { model: ModelClient; filter: ContentFilter } => {
  const needsClient = !overrides.model || (config.ai.moderation.enabled && !overrides.filter);
  const client = needsClient && config.ai.apiKey
    ? createOpenAIClient({ apiKey: config.ai.apiKey, timeoutMs: config.ai.chat.timeoutMs })
    : null;

  const model = overrides.model ?? (client ? new OpenAIModelClient(client, config.ai.chat.model) : unconfiguredModelClient);
  const filter =
    overrides.filter ??
    (config.ai.moderation.enabled && client ? new OpenAIModerationFilter(client, config.ai.moderation.model) : passThroughFilter);

  return { model, filter };
};

export const createServices = (env: Env, overrides: ServiceOverrides = {}): AppServices => {
  const config = getRuntimeConfig(env);
  const now = overrides.now ?? Date.now;

  const sessions = new SessionStore({
    limits: config.sessions.limits,
    now,
    generateId: overrides.generateId
  });

  const retrieval = new RetrievalGate({
    index: overrides.index ?? new FileKnowledgeIndex(config.retrieval.knowledgeBasePath),
    keywords: config.retrieval.keywords,
    maxContextChars: config.retrieval.maxContextChars
  });

  const prompts = new PromptAssembler({
    provider: overrides.templates ?? new FileTemplateProvider(config.prompts.templateDir),
    templateName: config.prompts.templateName,
    maxHistoryMessages: config.prompts.maxHistoryMessages
  });

  const { model, filter } = resolveModelAndFilter(config, overrides);
  const generator = new ResponseGenerator({
    model,
    filter,
    defaults: {
      temperature: config.ai.chat.temperature,
      maxTokens: config.ai.chat.maxTokens
    }
  });

  const orchestrator = new Orchestrator({
    sessions,
    retrieval,
    prompts,
    generator,
    retrievalK: config.retrieval.k,
    retry: config.ai.retry,
    requestTimeoutMs: config.limits.requestTimeoutMs,
    strictPersistence: config.sessions.strictPersistence,
    now,
    sleep: overrides.sleep
  });

  const rateLimiter =
    config.limits.chatRateLimitPerMinute > 0
      ? new InMemoryRateLimiter(config.limits.chatRateLimitPerMinute, 60_000, now)
      : undefined;

  return { env, config, sessions, retrieval, generator, orchestrator, rateLimiter, now };
};
