export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previousTail = this.tails.get(key) || Promise.resolve();

    let release = () => {};
    const currentGate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const currentTail = previousTail.then(() => currentGate);
    this.tails.set(key, currentTail);

    await previousTail;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === currentTail) {
        this.tails.delete(key);
      }
    }
  }

  stats(): { activeLocks: number } {
    return {
      activeLocks: this.tails.size
    };
  }
}
