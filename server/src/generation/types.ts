import type { PromptMessage } from '../prompts';

export interface GenerationParams {
  temperature: number;
  maxTokens: number;
}

export interface ModelCompletion {
  text: string;
  finishReason: string | null;
}

export interface ModelDelta {
  text: string;
  finishReason: string | null;
}

export interface ModelCallOptions {
  signal?: AbortSignal;
}

export interface ModelClient {
  complete: (messages: PromptMessage[], params: GenerationParams, options?: ModelCallOptions) => Promise<ModelCompletion>;
  stream: (messages: PromptMessage[], params: GenerationParams, options?: ModelCallOptions) => AsyncIterable<ModelDelta>;
}

export interface FilterVerdict {
  flagged: boolean;
  categories: string[];
}

export type FilterStatus = 'disabled' | 'healthy' | 'unhealthy';

export interface FilterHealth {
  status: FilterStatus;
  model?: string;
  message?: string;
}

export interface ContentFilter {
  readonly enabled: boolean;
  check: (text: string, options?: ModelCallOptions) => Promise<FilterVerdict>;
  health: () => Promise<FilterHealth>;
}

export interface Answer {
  text: string;
  finishReason: string | null;
  filtered: boolean;
  flaggedCategories: string[];
}

export interface ScreenResult {
  text: string;
  blocked: boolean;
  categories: string[];
}

export type GenerationEvent = { type: 'token'; text: string } | { type: 'complete'; answer: Answer };
