import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { ModelRejectedError, ModelUnavailableError, errorReason } from '../errors';
import type { PromptMessage } from '../prompts';
import type {
  ContentFilter,
  FilterHealth,
  FilterVerdict,
  GenerationParams,
  ModelCallOptions,
  ModelClient,
  ModelCompletion,
  ModelDelta
} from './types';

const RETRYABLE_STATUSES = new Set([408, 409, 429]);

export const mapOpenAIError = (error: unknown): Error => {
  if (error instanceof ModelUnavailableError || error instanceof ModelRejectedError) return error;

  if (error instanceof OpenAI.APIUserAbortError) {
    return new ModelUnavailableError('Model request was aborted.', { aborted: true });
  }

  if (error instanceof OpenAI.APIConnectionError) {
    return new ModelUnavailableError('Model provider is unreachable.', { reason: error.message });
  }

  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    if (status === undefined || status >= 500 || RETRYABLE_STATUSES.has(status)) {
      return new ModelUnavailableError('Model provider is temporarily unavailable.', { upstream_status: status });
    }

    return new ModelRejectedError('Model provider rejected the request.', { upstream_status: status });
  }

  return new ModelUnavailableError('Model request failed.', { reason: errorReason(error) });
};

const toChatMessages = (messages: PromptMessage[]): ChatCompletionMessageParam[] => {
  return messages.map((message): ChatCompletionMessageParam => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'assistant':
        return { role: 'assistant', content: message.content };
      default:
        return { role: 'user', content: message.content };
    }
  });
};

export class OpenAIModelClient implements ModelClient {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string
  ) {}

  async complete(
    messages: PromptMessage[],
    params: GenerationParams,
    options: ModelCallOptions = {}
  ): Promise<ModelCompletion> {
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: toChatMessages(messages),
          temperature: params.temperature,
          max_completion_tokens: params.maxTokens
        },
        { signal: options.signal }
      );

      const choice = completion.choices[0];
      return {
        text: choice?.message?.content ?? '',
        finishReason: choice?.finish_reason ?? null
      };
    } catch (error) {
      throw mapOpenAIError(error);
    }
  }

  async *stream(
    messages: PromptMessage[],
    params: GenerationParams,
    options: ModelCallOptions = {}
  ): AsyncGenerator<ModelDelta> {
    const stream = await this.client.chat.completions
      .create(
        {
          model: this.model,
          messages: toChatMessages(messages),
          temperature: params.temperature,
          max_completion_tokens: params.maxTokens,
          stream: true
        },
        { signal: options.signal }
      )
      .catch((error: unknown) => {
        throw mapOpenAIError(error);
      });

    let finished = false;
    try {
      for await (const chunk of stream) {
        const choice = chunk.choices[0];
        const text = choice?.delta?.content ?? '';
        const finishReason = choice?.finish_reason ?? null;
        if (text || finishReason) {
          yield { text, finishReason };
        }
      }
      finished = true;
    } catch (error) {
      throw mapOpenAIError(error);
    } finally {
      if (!finished) stream.controller.abort();
    }
  }
}

export const FILTER_HEALTH_INPUT = 'health check';

export class OpenAIModerationFilter implements ContentFilter {
  readonly enabled = true;

  constructor(
    private readonly client: OpenAI,
    private readonly model: string
  ) {}

  async check(text: string, options: ModelCallOptions = {}): Promise<FilterVerdict> {
    const response = await this.client.moderations.create({ model: this.model, input: text }, { signal: options.signal });

    const categories = new Set<string>();
    let flagged = false;
    for (const result of response.results) {
      if (!result.flagged) continue;
      flagged = true;
      for (const [category, value] of Object.entries(result.categories)) {
        if (value === true) categories.add(category);
      }
    }

    return { flagged, categories: [...categories] };
  }

  async health(): Promise<FilterHealth> {
    try {
      await this.check(FILTER_HEALTH_INPUT);
      return { status: 'healthy', model: this.model };
    } catch (error) {
      return { status: 'unhealthy', model: this.model, message: errorReason(mapOpenAIError(error)) };
    }
  }
}

export const passThroughFilter: ContentFilter = {
  enabled: false,
  check: async () => ({ flagged: false, categories: [] }),
  health: async () => ({ status: 'disabled', message: 'Moderation is disabled.' })
};

/** Stands in for the model when no API key is configured. */
export const unconfiguredModelClient: ModelClient = {
  complete: async () => {
    throw new ModelUnavailableError('Model provider is not configured.');
  },
  stream: async function* () {
    throw new ModelUnavailableError('Model provider is not configured.');
  }
};

export const createOpenAIClient = (options: { apiKey: string; timeoutMs: number }): OpenAI => {
  return new OpenAI({
    apiKey: options.apiKey,
    maxRetries: 0,
    timeout: options.timeoutMs
  });
};
