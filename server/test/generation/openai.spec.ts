import OpenAI from 'openai';
import { describe, expect, it } from 'vitest';
import { ModelRejectedError, ModelUnavailableError } from '../../src/errors';
import {
  FILTER_HEALTH_INPUT,
  OpenAIModerationFilter,
  mapOpenAIError,
  passThroughFilter,
  unconfiguredModelClient
} from '../../src/generation/openai';
import type { FilterVerdict } from '../../src/generation/types';

describe('mapOpenAIError', () => {
  it('treats rate limiting and server errors as retryable', () => {
    const rateLimited = mapOpenAIError(OpenAI.APIError.generate(429, undefined, 'slow down', {}));
    const serverError = mapOpenAIError(OpenAI.APIError.generate(503, undefined, 'overloaded', {}));

    expect(rateLimited).toBeInstanceOf(ModelUnavailableError);
    expect(rateLimited.message).toBe('Model provider is temporarily unavailable.');
    expect(serverError).toBeInstanceOf(ModelUnavailableError);
  });

  it('treats other client errors as rejections', () => {
    const mapped = mapOpenAIError(OpenAI.APIError.generate(400, undefined, 'bad request', {}));

    expect(mapped).toBeInstanceOf(ModelRejectedError);
    expect(mapped.message).toBe('Model provider rejected the request.');
  });

  it('maps connection failures and aborts to unavailability', () => {
    const unreachable = mapOpenAIError(new OpenAI.APIConnectionError({ message: 'socket hang up' }));
    const aborted = mapOpenAIError(new OpenAI.APIUserAbortError());

    expect(unreachable.message).toBe('Model provider is unreachable.');
    expect(aborted).toBeInstanceOf(ModelUnavailableError);
    expect(aborted.message).toBe('Model request was aborted.');
  });

  it('passes already-mapped errors through', () => {
    const rejected = new ModelRejectedError('Model provider rejected the request.');

    expect(mapOpenAIError(rejected)).toBe(rejected);
  });

  it('wraps unknown failures', () => {
    const mapped = mapOpenAIError(new TypeError('fetch failed'));

    expect(mapped).toBeInstanceOf(ModelUnavailableError);
    expect(mapped.message).toBe('Model request failed.');
  });
});

describe('fallback model wiring', () => {
  it('reports a missing provider as unavailable', async () => {
    await expect(unconfiguredModelClient.complete([], { temperature: 0.3, maxTokens: 10 })).rejects.toThrow(
      'Model provider is not configured.'
    );

    const iterator = unconfiguredModelClient.stream([], { temperature: 0.3, maxTokens: 10 })[Symbol.asyncIterator]();
    await expect(iterator.next()).rejects.toBeInstanceOf(ModelUnavailableError);
  });

  it('lets every answer through when moderation is off', async () => {
    await expect(passThroughFilter.check('anything')).resolves.toEqual({ flagged: false, categories: [] });
  });
});

class ScriptedModerationFilter extends OpenAIModerationFilter {
  readonly inputs: string[] = [];

  constructor(private readonly outcome: FilterVerdict | Error) {
    super(new OpenAI({ apiKey: 'test-key' }), 'omni-moderation-latest');
  }

  override async check(text: string): Promise<FilterVerdict> {
    this.inputs.push(text);
    if (this.outcome instanceof Error) throw this.outcome;
    return this.outcome;
  }
}

describe('moderation filter health', () => {
  it('reports the pass-through filter as disabled', async () => {
    expect(passThroughFilter.enabled).toBe(false);
    await expect(passThroughFilter.health()).resolves.toEqual({ status: 'disabled', message: 'Moderation is disabled.' });
  });

  it('reports healthy when a moderation call succeeds', async () => {
    const filter = new ScriptedModerationFilter({ flagged: false, categories: [] });

    await expect(filter.health()).resolves.toEqual({ status: 'healthy', model: 'omni-moderation-latest' });
    expect(filter.enabled).toBe(true);
    expect(filter.inputs).toEqual([FILTER_HEALTH_INPUT]);
  });

  it('reports unhealthy with the mapped provider failure', async () => {
    const filter = new ScriptedModerationFilter(OpenAI.APIError.generate(503, undefined, 'overloaded', {}));

    await expect(filter.health()).resolves.toEqual({
      status: 'unhealthy',
      model: 'omni-moderation-latest',
      message: 'Model provider is temporarily unavailable.'
    });
  });
});
