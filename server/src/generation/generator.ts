import { MAX_OUTPUT_TOKENS_CAP } from '../aiConfig';
import { FilterUnavailableError, InvalidParameterError, errorReason } from '../errors';
import type { Logger } from '../logger';
import type { Prompt } from '../prompts';
import type {
  Answer,
  ContentFilter,
  FilterHealth,
  FilterVerdict,
  GenerationEvent,
  GenerationParams,
  ModelClient,
  ScreenResult
} from './types';

export const BLOCKED_RESPONSE_MESSAGE =
  'I cannot provide a response to this query due to content policy restrictions. Please rephrase your question or consult appropriate resources for guidance.';

export const EMPTY_RESPONSE_MESSAGE = "I couldn't generate a response. Please try rephrasing your query.";

export interface GenerateOptions {
  signal?: AbortSignal;
  logger?: Logger;
}

export interface ResponseGeneratorOptions {
  model: ModelClient;
  filter: ContentFilter;
  defaults: GenerationParams;
  maxTokensCap?: number;
}

export const validateGenerationParams = (params: GenerationParams, maxTokensCap: number): GenerationParams => {
  const { temperature, maxTokens } = params;

  if (!Number.isFinite(temperature) || temperature < 0 || temperature > 1) {
    throw new InvalidParameterError('temperature must be a number between 0 and 1.');
  }

  if (!Number.isInteger(maxTokens) || maxTokens < 1 || maxTokens > maxTokensCap) {
    throw new InvalidParameterError(`maxTokens must be an integer between 1 and ${maxTokensCap}.`);
  }

  return { temperature, maxTokens };
};

export class ResponseGenerator {
  private readonly model: ModelClient;
  private readonly filter: ContentFilter;
  private readonly defaults: GenerationParams;
  private readonly maxTokensCap: number;

  constructor(options: ResponseGeneratorOptions) {
    this.model = options.model;
    this.filter = options.filter;
    this.maxTokensCap = options.maxTokensCap ?? MAX_OUTPUT_TOKENS_CAP;
    this.defaults = validateGenerationParams(options.defaults, this.maxTokensCap);
  }

  validateParams(params: Partial<GenerationParams> = {}): GenerationParams {
    return validateGenerationParams(
      {
        temperature: params.temperature ?? this.defaults.temperature,
        maxTokens: params.maxTokens ?? this.defaults.maxTokens
      },
      this.maxTokensCap
    );
  }

  async generate(prompt: Prompt, params: Partial<GenerationParams> = {}, options: GenerateOptions = {}): Promise<Answer> {
    const validated = this.validateParams(params);
    const completion = await this.model.complete(prompt.messages, validated, { signal: options.signal });
    return this.finalize(completion.text, completion.finishReason, options);
  }

  /**
   * Params are validated eagerly, so an invalid call throws before the
   * returned iterable is pulled and before any model call.
   */
  stream(prompt: Prompt, params: Partial<GenerationParams> = {}, options: GenerateOptions = {}): AsyncGenerator<GenerationEvent> {
    const validated = this.validateParams(params);
    return this.streamEvents(prompt, validated, options);
  }

  private async *streamEvents(
    prompt: Prompt,
    params: GenerationParams,
    options: GenerateOptions
  ): AsyncGenerator<GenerationEvent> {
    const deltas = this.model.stream(prompt.messages, params, { signal: options.signal });
    const iterator = deltas[Symbol.asyncIterator]();
    let text = '';
    let finishReason: string | null = null;
    let exhausted = false;

    try {
      while (true) {
        const next = await iterator.next();
        if (next.done) {
          exhausted = true;
          break;
        }

        if (next.value.finishReason) finishReason = next.value.finishReason;
        if (!next.value.text) continue;
        text += next.value.text;
        yield { type: 'token', text: next.value.text };
      }
    } finally {
      if (!exhausted && iterator.return) {
        await iterator.return();
      }
    }

    yield { type: 'complete', answer: await this.finalize(text, finishReason, options) };
  }

  get filterEnabled(): boolean {
    return this.filter.enabled;
  }

  filterHealth(): Promise<FilterHealth> {
    return this.filter.health();
  }

  /** Runs the safety filter on arbitrary text. Unlike answers, a filter failure here is an error. */
  async screen(text: string, options: GenerateOptions = {}): Promise<ScreenResult> {
    let verdict: FilterVerdict;
    try {
      verdict = await this.filter.check(text, { signal: options.signal });
    } catch (error) {
      throw new FilterUnavailableError('Safety filter is unavailable.', { reason: errorReason(error) });
    }

    if (!verdict.flagged) {
      return { text, blocked: false, categories: [] };
    }

    options.logger?.warn('filter.blocked', { categories: verdict.categories });
    return { text: BLOCKED_RESPONSE_MESSAGE, blocked: true, categories: verdict.categories };
  }

  private async finalize(rawText: string, finishReason: string | null, options: GenerateOptions): Promise<Answer> {
    const text = rawText.trim();
    if (!text) {
      return { text: EMPTY_RESPONSE_MESSAGE, finishReason, filtered: false, flaggedCategories: [] };
    }

    try {
      const verdict = await this.filter.check(text, { signal: options.signal });
      if (verdict.flagged) {
        options.logger?.warn('filter.blocked', { categories: verdict.categories });
        return { text: BLOCKED_RESPONSE_MESSAGE, finishReason, filtered: true, flaggedCategories: verdict.categories };
      }
    } catch (error) {
      options.logger?.warn('filter.failed', { reason: errorReason(error) });
    }

    return { text, finishReason, filtered: false, flaggedCategories: [] };
  }
}
