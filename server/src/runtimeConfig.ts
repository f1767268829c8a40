import { getAuthConfig, type AuthConfig } from './access';
import { getAiRuntimeConfig, parseIntBounded, type AiRuntimeConfig } from './aiConfig';
import { DEFAULT_MAX_HISTORY_MESSAGES } from './prompts';
import { DEFAULT_TEMPLATE_DIR, DEFAULT_TEMPLATE_NAME } from './prompts/templates';
import { getRetrievalRuntimeConfig, type RetrievalRuntimeConfig } from './retrieval/config';
import { getLimits } from './security';
import { getSessionRuntimeConfig, type SessionRuntimeConfig } from './sessions/config';
import type { Env } from './types';

export interface PromptRuntimeConfig {
  templateDir: string;
  templateName: string;
  maxHistoryMessages: number;
}

export interface RuntimeConfig {
  limits: ReturnType<typeof getLimits>;
  ai: AiRuntimeConfig;
  sessions: SessionRuntimeConfig;
  retrieval: RetrievalRuntimeConfig;
  prompts: PromptRuntimeConfig;
  auth: AuthConfig;
}

const getPromptRuntimeConfig = (env: Env): PromptRuntimeConfig => ({
  templateDir: env.PROMPT_TEMPLATE_DIR?.trim() || DEFAULT_TEMPLATE_DIR,
  templateName: env.PROMPT_TEMPLATE_NAME?.trim() || DEFAULT_TEMPLATE_NAME,
  maxHistoryMessages: parseIntBounded(env.PROMPT_MAX_HISTORY_MESSAGES, DEFAULT_MAX_HISTORY_MESSAGES, 0, 200)
});

export const getRuntimeConfig = (env: Env): RuntimeConfig => {
  return {
    limits: getLimits(env),
    ai: getAiRuntimeConfig(env),
    sessions: getSessionRuntimeConfig(env),
    retrieval: getRetrievalRuntimeConfig(env),
    prompts: getPromptRuntimeConfig(env),
    auth: getAuthConfig(env)
  };
};
