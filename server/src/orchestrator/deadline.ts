import { RequestTimeoutError } from '../errors';

/**
 * Wall-clock budget for one request. Aborts `signal` when the timer fires
 * or when the caller's own signal aborts (client disconnect).
 */
export class RequestDeadline {
  readonly signal: AbortSignal;
  private readonly controller = new AbortController();
  private readonly timer: ReturnType<typeof setTimeout>;
  private expired = false;
  private readonly detachParent: () => void;

  constructor(timeoutMs: number, parent?: AbortSignal) {
    this.signal = this.controller.signal;
    this.timer = setTimeout(() => {
      this.expired = true;
      this.controller.abort();
    }, timeoutMs);

    const onParentAbort = () => this.controller.abort();
    if (parent?.aborted) {
      this.controller.abort();
    } else {
      parent?.addEventListener('abort', onParentAbort, { once: true });
    }
    this.detachParent = () => parent?.removeEventListener('abort', onParentAbort);
  }

  failure(): RequestTimeoutError {
    return this.expired ? new RequestTimeoutError() : new RequestTimeoutError('Request was cancelled.');
  }

  /** Settles with `work`, or rejects as soon as the deadline aborts. */
  race<T>(work: Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const onAbort = () => reject(this.failure());
      if (this.signal.aborted) {
        onAbort();
      } else {
        this.signal.addEventListener('abort', onAbort, { once: true });
      }

      void work.then(resolve, reject).finally(() => this.signal.removeEventListener('abort', onAbort));
    });
  }

  clear(): void {
    clearTimeout(this.timer);
    this.detachParent();
  }
}
