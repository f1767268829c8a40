import type { Env } from './types';

export const MAX_OUTPUT_TOKENS_CAP = 4000;

export interface ChatModelRuntimeConfig {
  model: string;
  temperature: number;
  timeoutMs: number;
  maxTokens: number;
}

export interface ModelRetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
}

export interface ModerationRuntimeConfig {
  enabled: boolean;
  model: string;
}

export interface AiRuntimeConfig {
  apiKey: string;
  chat: ChatModelRuntimeConfig;
  retry: ModelRetryConfig;
  moderation: ModerationRuntimeConfig;
}

const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

export const parseIntBounded = (value: string | undefined, fallback: number, min: number, max: number): number => {
  const parsed = Number.parseInt(value || '', 10);
  if (!Number.isFinite(parsed)) return fallback;
  return clamp(parsed, min, max);
};

const parseFloatBounded = (value: string | undefined, fallback: number, min: number, max: number): number => {
  const parsed = Number.parseFloat(value || '');
  if (!Number.isFinite(parsed)) return fallback;
  return clamp(parsed, min, max);
};

export const parseBool = (value: string | undefined, fallback: boolean): boolean => {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return fallback;
};

const normalizeModel = (value: string | undefined, fallback: string): string => {
  const normalized = value?.trim();
  return normalized || fallback;
};

export const getAiRuntimeConfig = (env: Env): AiRuntimeConfig => {
  return {
    apiKey: env.OPENAI_API_KEY?.trim() || '',
    chat: {
      model: normalizeModel(env.OPENAI_MODEL, 'gpt-4o-mini'),
      temperature: parseFloatBounded(env.OPENAI_TEMPERATURE, 0.3, 0, 1),
      timeoutMs: parseIntBounded(env.OPENAI_TIMEOUT_MS, 30000, 1000, 120000),
      maxTokens: parseIntBounded(env.MAX_OUTPUT_TOKENS, 1000, 1, MAX_OUTPUT_TOKENS_CAP)
    },
    retry: {
      maxAttempts: parseIntBounded(env.MODEL_MAX_ATTEMPTS, 3, 1, 6),
      baseDelayMs: parseIntBounded(env.MODEL_RETRY_BASE_MS, 250, 0, 10000)
    },
    moderation: {
      enabled: parseBool(env.ENABLE_MODERATION, false),
      model: normalizeModel(env.OPENAI_MODERATION_MODEL, 'omni-moderation-latest')
    }
  };
};
