/**
 * Async utilities
 */

export class AsyncSemaphore {
  private active = 0;
  private readonly waiters: Array<() => void> = [];
  private readonly limit: number;

  constructor(limit: number) {
    if (!Number.isFinite(limit) || limit <= 0) {
      throw new Error(`max concurrent operations must be > 0 (got ${limit})`);
    }
    this.limit = limit;
  }

  async acquire(): Promise<() => void> {
    if (this.active >= this.limit) {
      // the releasing holder hands its permit over, `active` stays as is
      await new Promise<void>((resolve) => {
        this.waiters.push(resolve);
      });
    } else {
      this.active += 1;
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        next();
        return;
      }
      this.active = Math.max(0, this.active - 1);
    };
  }

  /** Run `fn` while holding one permit */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

/**
 * Resolve after `ms`, or immediately once `signal` settles.
 */
export function waitOrTimeout(signal: Promise<unknown>, ms: number): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    const timer = setTimeout(() => resolve(false), ms);
    timer.unref?.();
    signal.then(
      () => {
        clearTimeout(timer);
        resolve(true);
      },
      () => {
        clearTimeout(timer);
        resolve(true);
      },
    );
  });
}
