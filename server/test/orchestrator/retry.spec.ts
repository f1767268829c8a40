import { describe, expect, it } from 'vitest';
import { ModelRejectedError, ModelUnavailableError, RequestTimeoutError } from '../../src/errors';
import { RequestDeadline } from '../../src/orchestrator/deadline';
import { backoffDelayMs, retryModelCall, sleep } from '../../src/orchestrator/retry';

describe('retryModelCall', () => {
  it('doubles the delay between attempts', () => {
    expect([1, 2, 3].map((attempt) => backoffDelayMs(attempt, 250))).toEqual([250, 500, 1000]);
  });

  it('retries retryable errors and reports each retry', async () => {
    const delays: number[] = [];
    const notices: number[] = [];
    let calls = 0;

    const result = await retryModelCall(
      async (attempt) => {
        calls += 1;
        if (attempt < 3) throw new ModelUnavailableError('Model provider is unreachable.');
        return 'ok';
      },
      {
        maxAttempts: 3,
        baseDelayMs: 100,
        sleep: async (ms) => {
          delays.push(ms);
        },
        onRetry: ({ attempt }) => notices.push(attempt)
      }
    );

    expect(result).toBe('ok');
    expect(calls).toBe(3);
    expect(delays).toEqual([100, 200]);
    expect(notices).toEqual([1, 2]);
  });

  it('gives up immediately on non-retryable errors', async () => {
    let calls = 0;

    await expect(
      retryModelCall(
        async () => {
          calls += 1;
          throw new ModelRejectedError('Model provider rejected the request.');
        },
        { maxAttempts: 5, baseDelayMs: 0, sleep: async () => {} }
      )
    ).rejects.toBeInstanceOf(ModelRejectedError);
    expect(calls).toBe(1);
  });

  it('stops retrying once the signal aborts', async () => {
    const controller = new AbortController();
    let calls = 0;

    await expect(
      retryModelCall(
        async () => {
          calls += 1;
          controller.abort();
          throw new ModelUnavailableError('Model provider is unreachable.');
        },
        { maxAttempts: 3, baseDelayMs: 0, signal: controller.signal, sleep: async () => {} }
      )
    ).rejects.toBeInstanceOf(ModelUnavailableError);
    expect(calls).toBe(1);
  });
});

describe('sleep', () => {
  it('rejects when aborted mid-wait', async () => {
    const controller = new AbortController();
    const waiting = sleep(10_000, controller.signal);
    controller.abort();

    await expect(waiting).rejects.toMatchObject({ name: 'AbortError' });
  });
});

describe('RequestDeadline', () => {
  it('rejects pending work with a timeout error', async () => {
    const deadline = new RequestDeadline(10);

    await expect(deadline.race(new Promise<never>(() => {}))).rejects.toThrow(new RequestTimeoutError('Request timed out.'));
    expect(deadline.failure().message).toBe('Request timed out.');
    deadline.clear();
  });

  it('passes through work that finishes in time', async () => {
    const deadline = new RequestDeadline(1000);

    await expect(deadline.race(Promise.resolve('done'))).resolves.toBe('done');
    expect(deadline.signal.aborted).toBe(false);
    deadline.clear();
  });

  it('follows the parent signal as a cancellation', async () => {
    const parent = new AbortController();
    const deadline = new RequestDeadline(1000, parent.signal);
    const pending = deadline.race(new Promise<never>(() => {}));

    parent.abort();

    await expect(pending).rejects.toThrow('Request was cancelled.');
    expect(deadline.failure().message).toBe('Request was cancelled.');
    deadline.clear();
  });
});
