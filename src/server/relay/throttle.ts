export class ThrottleInterruptedError extends Error {
  constructor(message = 'interrupted while waiting for a permit') {
    super(message);
    this.name = 'ThrottleInterruptedError';
  }
}

/** Proof of a successful acquire. Only a held permit can be released, and only once. */
export interface Permit {
  readonly released: boolean;
  release(): void;
}

interface Waiter {
  grant: (permit: Permit) => void;
  detach?: () => void;
}

/**
 * Fair counting semaphore bounding how many inbound messages are processed
 * at once. Waiters are served strictly in arrival order.
 */
export class Throttle {
  private held = 0;
  private readonly queue: Waiter[] = [];
  private readonly idleWaiters = new Set<() => void>();

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) throw new RangeError(`throttle limit must be a positive integer, got ${limit}`);
  }

  get inUse(): number {
    return this.held;
  }

  get available(): number {
    return this.limit - this.held;
  }

  get pending(): number {
    return this.queue.length;
  }

  /** Callers currently waiting in `idle()`. */
  get idleWaiting(): number {
    return this.idleWaiters.size;
  }

  acquire(signal?: AbortSignal): Promise<Permit> {
    if (signal?.aborted) return Promise.reject(new ThrottleInterruptedError());
    if (this.held < this.limit && this.queue.length === 0) {
      return Promise.resolve(this.issue());
    }

    return new Promise<Permit>((resolve, reject) => {
      const waiter: Waiter = { grant: resolve };
      if (signal) {
        const onAbort = () => {
          const idx = this.queue.indexOf(waiter);
          if (idx >= 0) this.queue.splice(idx, 1);
          reject(new ThrottleInterruptedError());
        };
        signal.addEventListener('abort', onAbort, { once: true });
        waiter.detach = () => signal.removeEventListener('abort', onAbort);
      }
      this.queue.push(waiter);
    });
  }

  async run<T>(task: () => Promise<T> | T, signal?: AbortSignal): Promise<T> {
    const permit = await this.acquire(signal);
    try {
      return await task();
    } finally {
      permit.release();
    }
  }

  /** Resolves once no permit is held. Rejects with `ThrottleInterruptedError` if `signal` aborts first. */
  idle(signal?: AbortSignal): Promise<void> {
    if (this.held === 0) return Promise.resolve();
    if (signal?.aborted) return Promise.reject(new ThrottleInterruptedError('interrupted while waiting for idle'));

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        this.idleWaiters.delete(done);
        reject(new ThrottleInterruptedError('interrupted while waiting for idle'));
      };
      const done = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.idleWaiters.add(done);
    });
  }

  private issue(): Permit {
    this.held += 1;
    let released = false;
    return {
      get released() {
        return released;
      },
      release: () => {
        if (released) return;
        released = true;
        this.returnPermit();
      }
    };
  }

  private returnPermit(): void {
    const next = this.queue.shift();
    if (next) {
      // Hand the permit straight over; the held count does not change.
      next.detach?.();
      this.held -= 1;
      next.grant(this.issue());
      return;
    }
    this.held -= 1;
    if (this.held === 0) {
      const waiters = [...this.idleWaiters];
      this.idleWaiters.clear();
      for (const done of waiters) done();
    }
  }
}
